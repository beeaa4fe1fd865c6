/**
 * @settle/engine — Types for the aggregation loop.
 */

import type { AccountSnapshot } from "@settle/types";
import type { RejectionCode, RejectionHandler } from "@settle/ledger";

// ─── Stats ───────────────────────────────────────────────────────────────

/**
 * Counters kept while a stream is processed.
 * received === applied + rejected.
 */
export interface ProcessingStats {
  readonly received: number;
  readonly applied: number;
  readonly rejected: number;
  readonly rejectionsByCode: Readonly<Partial<Record<RejectionCode, number>>>;
}

// ─── Options & Results ───────────────────────────────────────────────────

export interface ProcessorOptions {
  /** Called for every discarded transaction, after it is counted. */
  readonly onReject?: RejectionHandler | undefined;

  /**
   * Receives anything `onReject` throws, so a failing handler cannot
   * stop processing. Without it the failure propagates out of apply().
   */
  readonly onError?: ((err: unknown) => void) | undefined;
}

export interface PaymentsEngineOptions extends ProcessorOptions {
  /** Channel capacity; producers wait while this many are queued. Default 100. */
  readonly capacity?: number | undefined;
}

/**
 * Outcome of a completed run.
 */
export interface EngineResult {
  /** Every account ever created, ascending by client ID. */
  readonly accounts: readonly AccountSnapshot[];
  readonly stats: ProcessingStats;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type EngineErrorCode =
  | "INVALID_CAPACITY"
  | "CHANNEL_CLOSED"
  | "ALREADY_SERVING";

/**
 * Structured error from the engine.
 * Thrown for misuse of the channel or engine lifecycle, never for
 * transactions that break account policy.
 */
export class EngineError extends Error {
  public readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}
