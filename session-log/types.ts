import { DataStatus } from '../websocket-bridge/types/MessageTypes';
import { Position } from '../websocket-bridge/types/Interfaces';

export type SessionEndReason = 'operator' | 'peer-lost' | 'shutdown';

/** One completed relay cycle. */
export interface LatencyRecord {
    sequence: number;               // 1-based, dense within a session
    requestId: number | null;
    t1: number;                     // measurement send time (s)
    correctedT2: number;            // actuation receipt time on the measurement clock (s)
    delayMs: number;                // corrected one-way delay, unclamped
    sensorVoltage: number;
    status: DataStatus;
    appliedVoltage: number;
    measurementPosition: Position | null;
    actuationPosition: Position | null;
}

export type LatencyRecordFields = Omit<LatencyRecord, 'sequence'>;

/** Session state for status queries. */
export interface SessionState {
    active: boolean;
    sessionId: string | null;
    startedAt: number | null;
    recordCount: number;
}

/** Finalized session handed to the report generator. */
export interface SessionSummary {
    sessionId: string;
    startedAt: number;              // Unix ms
    endedAt: number;                // Unix ms
    endReason: SessionEndReason;
    records: LatencyRecord[];
    delaysMs: number[];
    meanDelayMs: number;
    minDelayMs: number;
    maxDelayMs: number;
}

/** Row-oriented report ready for persistence. */
export interface SessionReport {
    title: string;
    summary: Array<[string, string]>;
    header: string[];
    rows: string[][];
    source: SessionSummary;
}

/** Persists finalized session reports. */
export interface ReportSink {
    persist(report: SessionReport): Promise<void>;
}
