/**
 * PendingRequestTable: correlation id → single-use reply slot.
 *
 * Every entry leaves the table exactly once: through `resolve` (the widget
 * replied), its timer, `cancel` (the write failed) or `cancelAll` (the
 * session ended). All operations are synchronous, so no removal can
 * interleave with another on the same id.
 */

import { InvalidStateError, RequestTimeoutError } from "../errors.js";
import type { ToWidgetAction } from "../types/widget-messages.js";

interface PendingRequest {
  resolve: (reply: ToWidgetAction) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class PendingRequestTable {
  private readonly pending = new Map<string, PendingRequest>();

  /**
   * Park a slot for `requestId`. The promise settles with the widget's reply,
   * or rejects with `RequestTimeoutError` once `timeoutMs` has passed.
   */
  register(requestId: string, timeoutMs: number): Promise<ToWidgetAction> {
    if (this.pending.has(requestId)) {
      throw new InvalidStateError(`Request ${requestId} is already pending`);
    }
    return new Promise<ToWidgetAction>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(
          new RequestTimeoutError(
            requestId,
            `Widget did not reply to ${requestId} within ${timeoutMs}ms`,
          ),
        );
      }, timeoutMs);
      this.pending.set(requestId, { resolve, reject, timer });
    });
  }

  /** Deliver a reply. Returns false when nothing is waiting for `requestId`. */
  resolve(requestId: string, reply: ToWidgetAction): boolean {
    const entry = this.take(requestId);
    if (!entry) return false;
    entry.resolve(reply);
    return true;
  }

  cancel(requestId: string, error: Error): boolean {
    const entry = this.take(requestId);
    if (!entry) return false;
    entry.reject(error);
    return true;
  }

  cancelAll(error: Error): void {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      clearTimeout(entry.timer);
      entry.reject(error);
    }
  }

  has(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  get size(): number {
    return this.pending.size;
  }

  private take(requestId: string): PendingRequest | undefined {
    const entry = this.pending.get(requestId);
    if (!entry) return undefined;
    clearTimeout(entry.timer);
    this.pending.delete(requestId);
    return entry;
  }
}
