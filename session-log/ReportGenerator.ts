import { DATA_STATUS } from '../websocket-bridge/types/MessageTypes';
import { Position } from '../websocket-bridge/types/Interfaces';
import { LatencyRecord, SessionReport, SessionSummary } from './types';

export interface ReportContext {
    measurementAddress: string | null;
    actuationAddress: string | null;
}

export interface ReportFormatOptions {
    /** Render clock times in UTC instead of local time. */
    utc?: boolean;
}

export const REPORT_HEADER = [
    'Packet #',
    'Measurement Send Time',
    'Corrected Actuation Receive Time',
    'Delay (ms)',
    'Sensor Voltage',
    'Data Status',
    'Applied Voltage (V)',
    'Measurement Position',
];

const MICROS_PER_SECOND = 1_000_000;

function pad(value: number, width: number = 2): string {
    return String(value).padStart(width, '0');
}

/**
 * Format Unix seconds as HH:MM:SS:ffffff (microseconds).
 */
export function formatClockTime(seconds: number, options: ReportFormatOptions = {}): string {
    const totalMicros = Math.round(seconds * MICROS_PER_SECOND);
    const micros = ((totalMicros % MICROS_PER_SECOND) + MICROS_PER_SECOND) % MICROS_PER_SECOND;
    const date = new Date((totalMicros - micros) / 1000);

    const hours = options.utc ? date.getUTCHours() : date.getHours();
    const minutes = options.utc ? date.getUTCMinutes() : date.getMinutes();
    const secs = options.utc ? date.getUTCSeconds() : date.getSeconds();

    return `${pad(hours)}:${pad(minutes)}:${pad(secs)}:${pad(micros, 6)}`;
}

function formatPosition(position: Position | null): string {
    return position ? `[${position[0]}, ${position[1]}]` : 'None';
}

export function formatRecordRow(record: LatencyRecord, options: ReportFormatOptions = {}): string[] {
    return [
        String(record.sequence),
        formatClockTime(record.t1, options),
        formatClockTime(record.correctedT2, options),
        record.delayMs.toFixed(2),
        record.status === DATA_STATUS.PROPER ? record.sensorVoltage.toFixed(4) : 'Junk Value',
        record.status,
        `${record.appliedVoltage.toFixed(4)}V`,
        formatPosition(record.measurementPosition),
    ];
}

/**
 * Build the persisted report for a finalized session.
 * Returns null for a session without records.
 */
export function buildReport(
    summary: SessionSummary,
    context: ReportContext,
    options: ReportFormatOptions = {}
): SessionReport | null {
    if (summary.records.length === 0) return null;

    return {
        title: `--- New Test Run --- ${new Date(summary.endedAt).toISOString()}`,
        summary: [
            ['Session ID', summary.sessionId],
            ['Started', new Date(summary.startedAt).toISOString()],
            ['Ended', new Date(summary.endedAt).toISOString()],
            ['End Reason', summary.endReason],
            ['Connected To (Measurement)', context.measurementAddress ?? 'N/A'],
            ['Connected To (Actuation)', context.actuationAddress ?? 'N/A'],
            ['Records', String(summary.records.length)],
            ['Average Communication Delay', `${summary.meanDelayMs.toFixed(2)} ms`],
            ['Min Delay', `${summary.minDelayMs.toFixed(2)} ms`],
            ['Max Delay', `${summary.maxDelayMs.toFixed(2)} ms`],
        ],
        header: [...REPORT_HEADER],
        rows: summary.records.map(record => formatRecordRow(record, options)),
        source: summary,
    };
}
