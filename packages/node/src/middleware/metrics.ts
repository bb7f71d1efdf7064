/**
 * Prometheus metrics middleware + collector.
 *
 * Hand-rolled Prometheus text format, no prom-client dependency.
 * Counters, gauges and histograms share one labeled-series model.
 * Collects:
 * - http_requests_total (counter, by method + status + path)
 * - http_request_duration_seconds (histogram, by method + path)
 * - named counters and gauges for chain activity
 *   (scoregov_blocks_total, scoregov_transactions_total{status},
 *   scoregov_block_height, scoregov_mempool_size)
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

type Labels = Record<string, string>;

interface Series {
  readonly labels: Labels;
  value: number;
}

interface HistogramSeries {
  readonly labels: Labels;
  sum: number;
  count: number;
  /** Cumulative count per configured bucket, same order as the bounds */
  readonly buckets: number[];
}

type MetricType = "counter" | "gauge" | "histogram";

const HTTP_REQUESTS = "http_requests_total";
const HTTP_DURATION = "http_request_duration_seconds";

const HELP: ReadonlyMap<string, string> = new Map([
  [HTTP_REQUESTS, "Total HTTP requests"],
  [HTTP_DURATION, "HTTP request duration in seconds"],
]);

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function sortedLabels(labels: Labels): [string, string][] {
  return Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
}

function labelsKey(labels: Labels): string {
  return sortedLabels(labels)
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
}

function renderSeries(name: string, labels: Labels, value: number): string {
  const labelStr = sortedLabels(labels)
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
  return labelStr.length > 0 ? `${name}{${labelStr}} ${value}` : `${name} ${value}`;
}

function renderHeader(name: string, type: MetricType): string[] {
  const help = HELP.get(name);
  const header = help === undefined ? [] : [`# HELP ${name} ${help}`];
  return [...header, `# TYPE ${name} ${type}`];
}

function seriesOf<T>(families: Map<string, Map<string, T>>, name: string): Map<string, T> {
  let family = families.get(name);
  if (family === undefined) {
    family = new Map();
    families.set(name, family);
  }
  return family;
}

export class MetricsCollector {
  private readonly _buckets: readonly number[];
  private readonly _counters = new Map<string, Map<string, Series>>();
  private readonly _gauges = new Map<string, Map<string, Series>>();
  private readonly _histograms = new Map<string, Map<string, HistogramSeries>>();

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = buckets;
  }

  /**
   * Record an HTTP request: one count by method, path and status, one
   * duration observation by method and path.
   */
  recordRequest(method: string, path: string, status: number, durationMs: number): void {
    this.incrementCounter(HTTP_REQUESTS, { method, path, status: String(status) });
    this.observe(HTTP_DURATION, durationMs / 1000, { method, path });
  }

  /**
   * Increment a named counter, e.g. scoregov_transactions_total{status="success"}.
   */
  incrementCounter(name: string, labels: Labels = {}, by = 1): void {
    this._series(this._counters, name, labels).value += by;
  }

  /**
   * Set a named gauge, e.g. scoregov_block_height.
   */
  setGauge(name: string, value: number, labels: Labels = {}): void {
    this._series(this._gauges, name, labels).value = value;
  }

  /**
   * Add one observation to a histogram.
   */
  observe(name: string, value: number, labels: Labels = {}): void {
    const family = seriesOf(this._histograms, name);
    const key = labelsKey(labels);
    const entry = family.get(key) ?? { labels: { ...labels }, sum: 0, count: 0, buckets: this._buckets.map(() => 0) };
    family.set(key, entry);
    entry.sum += value;
    entry.count++;
    this._buckets.forEach((le, i) => {
      if (value <= le) {
        entry.buckets[i] = (entry.buckets[i] ?? 0) + 1;
      }
    });
  }

  /** Current value of a counter series, 0 if never incremented. */
  counterValue(name: string, labels: Labels = {}): number {
    return this._counters.get(name)?.get(labelsKey(labels))?.value ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    for (const [name, family] of this._counters) {
      lines.push(...renderHeader(name, "counter"));
      for (const { labels, value } of family.values()) {
        lines.push(renderSeries(name, labels, value));
      }
    }

    for (const [name, family] of this._histograms) {
      lines.push(...renderHeader(name, "histogram"));
      for (const entry of family.values()) {
        this._buckets.forEach((le, i) => {
          lines.push(renderSeries(`${name}_bucket`, { ...entry.labels, le: String(le) }, entry.buckets[i] ?? 0));
        });
        lines.push(renderSeries(`${name}_bucket`, { ...entry.labels, le: "+Inf" }, entry.count));
        lines.push(renderSeries(`${name}_sum`, entry.labels, entry.sum));
        lines.push(renderSeries(`${name}_count`, entry.labels, entry.count));
      }
    }

    for (const [name, family] of this._gauges) {
      lines.push(...renderHeader(name, "gauge"));
      for (const { labels, value } of family.values()) {
        lines.push(renderSeries(name, labels, value));
      }
    }

    return lines.map((line) => `${line}\n`).join("");
  }

  clear(): void {
    this._counters.clear();
    this._gauges.clear();
    this._histograms.clear();
  }

  private _series(families: Map<string, Map<string, Series>>, name: string, labels: Labels): Series {
    const family = seriesOf(families, name);
    const key = labelsKey(labels);
    let entry = family.get(key);
    if (entry === undefined) {
      entry = { labels: { ...labels }, value: 0 };
      family.set(key, entry);
    }
    return entry;
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create metrics collection middleware.
 *
 * Records method, path, status, and duration for every request.
 */
export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const durationMs = performance.now() - start;

    collector.recordRequest(
      c.req.method,
      c.req.path,
      c.res.status,
      durationMs,
    );
  };
}
