/**
 * BlockProducer — produces a block on a fixed interval.
 *
 * Ticks with an empty mempool are skipped, so the chain only grows when
 * there is something to execute.
 */

import type { Logger } from "pino";
import type { ChainService } from "./chain-service.js";

export class BlockProducer {
  private _timer: ReturnType<typeof setInterval> | undefined;

  constructor(
    private readonly _chain: ChainService,
    private readonly _intervalMs: number,
    private readonly _logger: Logger,
  ) {}

  start(): void {
    if (this._timer !== undefined) {
      return;
    }
    this._timer = setInterval(() => this.tick(), this._intervalMs);
    this._logger.info({ intervalMs: this._intervalMs }, "Block producer started");
  }

  stop(): void {
    if (this._timer === undefined) {
      return;
    }
    clearInterval(this._timer);
    this._timer = undefined;
    this._logger.info("Block producer stopped");
  }

  get running(): boolean {
    return this._timer !== undefined;
  }

  /** Produce one block if anything is queued. */
  tick(): void {
    if (this._chain.mempoolSize === 0) {
      return;
    }
    try {
      this._chain.produceBlock();
    } catch (err) {
      this._logger.error({ err }, "Block production failed");
      this.stop();
    }
  }
}
