/**
 * @settle/engine — Single-writer aggregation loop.
 *
 * Routes a stream of transactions to per-client accounts:
 * - One consumer owns every account; producers only enqueue
 * - Bounded channel with backpressure, strict FIFO order
 * - Transaction IDs are unique across all clients
 * - Final snapshot is ordered by client ID
 */

// Engine
export { PaymentsEngine, DEFAULT_CHANNEL_CAPACITY } from "./engine.js";

// Aggregation state
export { TransactionProcessor } from "./processor.js";

// Channel
export { BoundedChannel } from "./channel.js";

// Snapshot & stats
export { assembleSnapshot } from "./snapshot.js";
export { StatsCollector } from "./stats.js";

// Types
export type {
  ProcessingStats,
  ProcessorOptions,
  PaymentsEngineOptions,
  EngineResult,
  EngineErrorCode,
} from "./types.js";

export { EngineError } from "./types.js";
