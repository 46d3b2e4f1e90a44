import { Acknowledgement } from '../types/Interfaces';
import { CorrelationTimeoutError, CorrelatorBusyError } from '../../shared/errors';
import { relayLogger } from '../../shared/RelayLogger';

export interface CorrelatorStats {
  published: number;
  delivered: number;
  timeouts: number;
  stale: number;
}

interface PendingWait {
  requestId?: number;
  resolve: (ack: Acknowledgement) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

/**
 * Hand-off between the actuation channel (producer) and the relay loop
 * (consumer). At most one wait is outstanding.
 *
 * Matching is positional unless both sides carry a request id: an ack
 * without an id pairs with whatever wait is pending, in arrival order. When
 * ids are present only the same id matches; acks for earlier requests are
 * stale and discarded, acks for later requests stay queued.
 */
export class ResponseCorrelator {
  private queue: Acknowledgement[] = [];
  private pending: PendingWait | null = null;
  private stats: CorrelatorStats = { published: 0, delivered: 0, timeouts: 0, stale: 0 };

  // Enqueue an acknowledgement, or hand it straight to the pending wait
  publish(ack: Acknowledgement): void {
    this.stats.published++;

    const pending = this.pending;
    if (pending) {
      if (this.isStale(ack, pending.requestId)) {
        this.discard(ack, pending.requestId);
        return;
      }
      if (this.isAhead(ack, pending.requestId)) {
        this.queue.push(ack);
        return;
      }
      this.settle(pending);
      this.stats.delivered++;
      pending.resolve(ack);
      return;
    }

    this.queue.push(ack);
  }

  /**
   * Take the oldest matching acknowledgement, waiting up to deadlineMs for one.
   * Rejects with CorrelationTimeoutError when none arrives in time.
   */
  awaitNext(deadlineMs: number, requestId?: number): Promise<Acknowledgement> {
    if (this.pending) {
      return Promise.reject(new CorrelatorBusyError());
    }

    let match: Acknowledgement | null = null;
    const remaining: Acknowledgement[] = [];
    for (const queued of this.queue) {
      if (match || this.isAhead(queued, requestId)) {
        remaining.push(queued);
      } else if (this.isStale(queued, requestId)) {
        this.discard(queued, requestId);
      } else {
        match = queued;
      }
    }
    this.queue = remaining;

    if (match) {
      this.stats.delivered++;
      return Promise.resolve(match);
    }

    return new Promise<Acknowledgement>((resolve, reject) => {
      const timeout = setTimeout(() => {
        if (this.pending?.timeout !== timeout) return;
        this.pending = null;
        this.stats.timeouts++;
        reject(new CorrelationTimeoutError(deadlineMs, requestId));
      }, deadlineMs);

      this.pending = { requestId, resolve, reject, timeout };
    });
  }

  // Reject the outstanding wait, if any (peer lost, shutdown)
  cancel(error: Error): boolean {
    const pending = this.pending;
    if (!pending) return false;

    this.settle(pending);
    pending.reject(error);
    return true;
  }

  // Drop queued acknowledgements left over from an earlier session
  clear(): number {
    const dropped = this.queue.length;
    this.queue = [];
    if (dropped > 0) {
      relayLogger.debug(`Dropped ${dropped} queued acknowledgements`, undefined, 'CORRELATOR');
    }
    return dropped;
  }

  hasPendingWait(): boolean {
    return this.pending !== null;
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  getStats(): CorrelatorStats {
    return { ...this.stats };
  }

  private isStale(ack: Acknowledgement, requestId: number | undefined): boolean {
    return requestId !== undefined && ack.requestId !== undefined && ack.requestId < requestId;
  }

  private isAhead(ack: Acknowledgement, requestId: number | undefined): boolean {
    return requestId !== undefined && ack.requestId !== undefined && ack.requestId > requestId;
  }

  private discard(ack: Acknowledgement, requestId: number | undefined): void {
    this.stats.stale++;
    relayLogger.warn(`Discarding stale acknowledgement for request ${ack.requestId} while awaiting ${requestId}`, undefined, 'CORRELATOR');
  }

  private settle(pending: PendingWait): void {
    clearTimeout(pending.timeout);
    if (this.pending === pending) {
      this.pending = null;
    }
  }
}
