import { v4 as uuidv4 } from 'uuid';
import { summarizeDelays } from '../time-sync';
import { relayLogger } from '../shared/RelayLogger';
import {
    LatencyRecord,
    LatencyRecordFields,
    SessionEndReason,
    SessionState,
    SessionSummary,
} from './types';

/**
 * Session-scoped log of completed relay cycles.
 * Records and raw delay samples live only between start() and stop().
 */
export class SessionLog {
    private records: LatencyRecord[] = [];
    private delaysMs: number[] = [];
    private active = false;
    private sessionId: string | null = null;
    private startedAt: number | null = null;

    constructor(private readonly now: () => number = Date.now) {}

    /** Start a new session, discarding anything from the previous one. */
    start(): string {
        if (this.active) {
            relayLogger.warn(`Restarting active session ${this.sessionId}, ${this.records.length} records discarded`, undefined, 'SESSION');
        }

        this.records = [];
        this.delaysMs = [];
        this.sessionId = uuidv4();
        this.startedAt = this.now();
        this.active = true;

        relayLogger.info(`Session ${this.sessionId} started`, undefined, 'SESSION');
        return this.sessionId;
    }

    /**
     * Append a completed cycle. The sequence number is assigned here so a
     * skipped cycle never leaves a gap. Returns null when no session is active.
     */
    append(fields: LatencyRecordFields): LatencyRecord | null {
        if (!this.active) {
            relayLogger.warn('Dropping record for an inactive session', { requestId: fields.requestId }, 'SESSION');
            return null;
        }

        const record: LatencyRecord = { sequence: this.records.length + 1, ...fields };
        this.records.push(record);
        this.delaysMs.push(fields.delayMs);
        return record;
    }

    /** Stop the session and return its summary; a second stop returns null. */
    stop(reason: SessionEndReason): SessionSummary | null {
        if (!this.active || this.sessionId === null || this.startedAt === null) return null;

        this.active = false;
        const stats = summarizeDelays(this.delaysMs);
        const summary: SessionSummary = {
            sessionId: this.sessionId,
            startedAt: this.startedAt,
            endedAt: this.now(),
            endReason: reason,
            records: [...this.records],
            delaysMs: [...this.delaysMs],
            meanDelayMs: stats.meanMs,
            minDelayMs: stats.minMs,
            maxDelayMs: stats.maxMs,
        };

        relayLogger.info(`Session ${this.sessionId} stopped (${reason}), ${this.records.length} records, mean delay ${stats.meanMs.toFixed(2)} ms`, undefined, 'SESSION');
        return summary;
    }

    isActive(): boolean {
        return this.active;
    }

    getState(): SessionState {
        return {
            active: this.active,
            sessionId: this.sessionId,
            startedAt: this.startedAt,
            recordCount: this.records.length,
        };
    }

    getRecords(): LatencyRecord[] {
        return [...this.records];
    }

    getDelaySamples(): number[] {
        return [...this.delaysMs];
    }
}
