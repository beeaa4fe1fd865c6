/**
 * @settle/engine — Bounded FIFO channel.
 *
 * Connects any number of producers to a single consumer.
 *
 * Properties:
 * - send() suspends while the buffer is full (backpressure)
 * - receive() suspends while the buffer is empty
 * - Items come out in exactly the order they were admitted
 * - close() ends input; queued items and waiting producers still drain
 * - abort() ends input and discards the backlog; producers get the reason
 *
 * `undefined` marks the end of the stream, so items must be objects.
 */

import { EngineError } from "./types.js";

interface PendingSend<T> {
  readonly item: T;
  readonly resolve: () => void;
  readonly reject: (reason: Error) => void;
}

type PendingReceive<T> = (item: T | undefined) => void;

export class BoundedChannel<T extends object> implements AsyncIterable<T> {
  private readonly _capacity: number;
  private readonly _buffer: T[] = [];

  /** Producers waiting for space, oldest first. Only non-empty while the buffer is full. */
  private readonly _senders: PendingSend<T>[] = [];

  /** Consumers waiting for an item. Only non-empty while the buffer is empty. */
  private readonly _receivers: PendingReceive<T>[] = [];

  private _closed = false;
  private _failure: Error | undefined;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new EngineError(
        "INVALID_CAPACITY",
        `Channel capacity must be a positive integer, got: ${String(capacity)}`,
      );
    }
    this._capacity = capacity;
  }

  get capacity(): number {
    return this._capacity;
  }

  /** Number of items queued, not counting producers waiting for space. */
  get size(): number {
    return this._buffer.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  // ─── Producer side ───────────────────────────────────────────────────

  /**
   * Queue an item. Resolves once the item is admitted.
   * Rejects with CHANNEL_CLOSED if the channel was closed first, or with
   * the abort reason if it was aborted.
   */
  send(item: T): Promise<void> {
    if (this._closed) {
      return Promise.reject(
        this._failure ?? new EngineError("CHANNEL_CLOSED", "Cannot send on a closed channel"),
      );
    }

    const receiver = this._receivers.shift();
    if (receiver !== undefined) {
      receiver(item);
      return Promise.resolve();
    }

    if (this._buffer.length < this._capacity) {
      this._buffer.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this._senders.push({ item, resolve, reject });
    });
  }

  /**
   * End input. Idempotent.
   * Waiting consumers receive `undefined` once everything queued is drained.
   */
  close(): void {
    if (this._closed) {
      return;
    }
    this._closed = true;

    // Receivers only wait on an empty buffer, so nothing is left for them.
    for (const receiver of this._receivers.splice(0)) {
      receiver(undefined);
    }
  }

  /**
   * End input without draining. Queued items are dropped and every
   * producer, waiting or later, is rejected with `reason`.
   */
  abort(reason: Error): void {
    const failure = this._failure ?? reason;
    this._closed = true;
    this._failure = failure;
    this._buffer.length = 0;

    for (const sender of this._senders.splice(0)) {
      sender.reject(failure);
    }
    for (const receiver of this._receivers.splice(0)) {
      receiver(undefined);
    }
  }

  // ─── Consumer side ───────────────────────────────────────────────────

  /**
   * Take the next item, waiting if none is queued.
   * Resolves `undefined` when the channel is closed and drained.
   */
  receive(): Promise<T | undefined> {
    const item = this._buffer.shift();
    if (item !== undefined) {
      this._admitWaitingSender();
      return Promise.resolve(item);
    }

    if (this._closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      this._receivers.push(resolve);
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.receive();
      if (item === undefined) {
        return;
      }
      yield item;
    }
  }

  private _admitWaitingSender(): void {
    const sender = this._senders.shift();
    if (sender !== undefined) {
      this._buffer.push(sender.item);
      sender.resolve();
    }
  }
}
