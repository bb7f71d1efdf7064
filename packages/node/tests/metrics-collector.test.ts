/**
 * Tests for MetricsCollector — requests, named series, render() and clear().
 */

import { describe, it, expect } from "vitest";
import { MetricsCollector } from "../src/middleware/metrics.js";

describe("MetricsCollector", () => {
  it("render() produces Prometheus format for recorded requests", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/health", 200, 5);
    collector.recordRequest("POST", "/api/v3", 200, 12);
    collector.recordRequest("GET", "/health", 200, 3);

    const output = collector.render();

    expect(output).toContain("# HELP http_requests_total Total HTTP requests\n# TYPE http_requests_total counter\n");
    expect(output).toContain('http_requests_total{method="GET",path="/health",status="200"} 2');
    expect(output).toContain('http_requests_total{method="POST",path="/api/v3",status="200"} 1');
    expect(output).toContain("# TYPE http_request_duration_seconds histogram");
    expect(output).toContain('http_request_duration_seconds_bucket{le="+Inf",method="GET",path="/health"} 2');
    expect(output).toContain('http_request_duration_seconds_count{method="GET",path="/health"} 2');
  });

  it("counts requests as a labeled counter series", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("POST", "/api/v3", 200, 1);
    collector.recordRequest("POST", "/api/v3", 200, 1);

    expect(collector.counterValue("http_requests_total", { method: "POST", path: "/api/v3", status: "200" })).toBe(2);
  });

  it("renders a full histogram for one request", () => {
    const collector = new MetricsCollector([1]);

    collector.recordRequest("GET", "/health", 200, 500);

    expect(collector.render()).toBe(
      [
        "# HELP http_requests_total Total HTTP requests",
        "# TYPE http_requests_total counter",
        'http_requests_total{method="GET",path="/health",status="200"} 1',
        "# HELP http_request_duration_seconds HTTP request duration in seconds",
        "# TYPE http_request_duration_seconds histogram",
        'http_request_duration_seconds_bucket{le="1",method="GET",path="/health"} 1',
        'http_request_duration_seconds_bucket{le="+Inf",method="GET",path="/health"} 1',
        'http_request_duration_seconds_sum{method="GET",path="/health"} 0.5',
        'http_request_duration_seconds_count{method="GET",path="/health"} 1',
        "",
      ].join("\n"),
    );
  });

  it("render() histogram sum reflects total duration", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/test", 200, 100);
    collector.recordRequest("GET", "/test", 200, 200);

    expect(collector.render()).toContain('http_request_duration_seconds_sum{method="GET",path="/test"} 0.30000000000000004');
  });

  it("places a request only in buckets at or above its duration", () => {
    const collector = new MetricsCollector([0.01, 1]);

    collector.recordRequest("GET", "/slow", 200, 500);

    const output = collector.render();
    expect(output).toContain('http_request_duration_seconds_bucket{le="0.01",method="GET",path="/slow"} 0\n');
    expect(output).toContain('http_request_duration_seconds_bucket{le="1",method="GET",path="/slow"} 1\n');
  });

  it("accumulates labeled counters independently", () => {
    const collector = new MetricsCollector();

    collector.incrementCounter("scoregov_transactions_total", { status: "success" }, 3);
    collector.incrementCounter("scoregov_transactions_total", { status: "failure" });
    collector.incrementCounter("scoregov_transactions_total", { status: "success" });

    expect(collector.counterValue("scoregov_transactions_total", { status: "success" })).toBe(4);
    expect(collector.counterValue("scoregov_transactions_total", { status: "failure" })).toBe(1);
    expect(collector.counterValue("scoregov_blocks_total")).toBe(0);

    const output = collector.render();
    expect(output).toContain("# TYPE scoregov_transactions_total counter");
    expect(output).toContain('scoregov_transactions_total{status="success"} 4');
    expect(output).toContain('scoregov_transactions_total{status="failure"} 1');
  });

  it("overwrites gauges", () => {
    const collector = new MetricsCollector();

    collector.setGauge("scoregov_block_height", 3);
    collector.setGauge("scoregov_block_height", 7);

    const output = collector.render();
    expect(output).toContain("# TYPE scoregov_block_height gauge");
    expect(output).toContain("scoregov_block_height 7\n");
    expect(output).not.toContain("scoregov_block_height 3\n");
  });

  it("clear() resets all metrics", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/health", 200, 5);
    collector.incrementCounter("scoregov_blocks_total");
    collector.setGauge("scoregov_mempool_size", 2);
    collector.clear();

    expect(collector.render()).toBe("");
  });
});
