/**
 * @settle/engine — Processing counters.
 */

import type { RejectionCode } from "@settle/ledger";
import type { ProcessingStats } from "./types.js";

export class StatsCollector {
  private _applied = 0;
  private readonly _rejections = new Map<RejectionCode, number>();

  recordApplied(): void {
    this._applied++;
  }

  recordRejected(code: RejectionCode): void {
    this._rejections.set(code, (this._rejections.get(code) ?? 0) + 1);
  }

  snapshot(): ProcessingStats {
    const rejectionsByCode: Partial<Record<RejectionCode, number>> = {};
    let rejected = 0;
    for (const [code, count] of this._rejections) {
      rejectionsByCode[code] = count;
      rejected += count;
    }

    return {
      received: this._applied + rejected,
      applied: this._applied,
      rejected,
      rejectionsByCode,
    };
  }
}
