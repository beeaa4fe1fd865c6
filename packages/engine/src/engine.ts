/**
 * @settle/engine — Single-writer payments engine.
 *
 * Producers enqueue transactions on a bounded channel; one consumer
 * loop drains it in order and applies each transaction to the
 * TransactionProcessor. Closing the channel ends the run, and serve()
 * resolves with the final snapshot once the backlog is drained.
 *
 * Usage:
 *   const engine = new PaymentsEngine({ onReject });
 *   const result = engine.serve();
 *   for (const tx of source) await engine.send(tx);
 *   engine.close();
 *   const { accounts, stats } = await result;
 */

import type { Transaction } from "@settle/types";
import { BoundedChannel } from "./channel.js";
import { TransactionProcessor } from "./processor.js";
import { EngineError } from "./types.js";
import type { EngineResult, PaymentsEngineOptions } from "./types.js";

export const DEFAULT_CHANNEL_CAPACITY = 100;

export class PaymentsEngine {
  private readonly _channel: BoundedChannel<Transaction>;
  private readonly _processor: TransactionProcessor;
  private _serving = false;

  constructor(options?: PaymentsEngineOptions) {
    this._channel = new BoundedChannel<Transaction>(options?.capacity ?? DEFAULT_CHANNEL_CAPACITY);
    this._processor = new TransactionProcessor({
      onReject: options?.onReject,
      onError: options?.onError,
    });
  }

  /**
   * Enqueue a transaction, waiting while the channel is full.
   * Safe to call from several producers at once.
   */
  send(tx: Transaction): Promise<void> {
    return this._channel.send(tx);
  }

  /** Signal that no more transactions will be sent. */
  close(): void {
    this._channel.close();
  }

  /**
   * Run the consumer loop until the channel is closed and drained.
   * May only be called once per engine.
   *
   * If applying a transaction throws, the channel is aborted with that
   * error, so waiting and later send() calls reject instead of hanging.
   */
  async serve(): Promise<EngineResult> {
    if (this._serving) {
      throw new EngineError("ALREADY_SERVING", "Engine is already serving");
    }
    this._serving = true;

    try {
      for await (const tx of this._channel) {
        this._processor.apply(tx);
      }
    } catch (err: unknown) {
      this._channel.abort(err instanceof Error ? err : new Error(String(err)));
      throw err;
    }

    return {
      accounts: this._processor.snapshot(),
      stats: this._processor.stats,
    };
  }

  /**
   * Run a whole stream through a fresh engine.
   *
   * The channel is closed when the source ends or throws; a source
   * error is rethrown after the consumer has drained. A consumer failure
   * rejects the pending send, so it surfaces here the same way.
   */
  static async process(
    source: Iterable<Transaction> | AsyncIterable<Transaction>,
    options?: PaymentsEngineOptions,
  ): Promise<EngineResult> {
    const engine = new PaymentsEngine(options);
    const serving = engine.serve();
    // Observed now; a consumer failure is rethrown through send() or below.
    void serving.catch(() => undefined);

    try {
      for await (const tx of source) {
        await engine.send(tx);
      }
    } catch (err: unknown) {
      engine.close();
      await serving.catch(() => undefined);
      throw err;
    }

    engine.close();
    return serving;
  }
}
