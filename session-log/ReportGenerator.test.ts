import { buildReport, formatClockTime, formatRecordRow } from './ReportGenerator';
import { LatencyRecord, SessionSummary } from './types';

const properRecord: LatencyRecord = {
    sequence: 1,
    requestId: 1,
    t1: 1700000000.25,
    correctedT2: 1700000000.3125,
    delayMs: 62.5,
    sensorVoltage: 1.5,
    status: 'Proper',
    appliedVoltage: 1.5,
    measurementPosition: [52.52, 13.405],
    actuationPosition: null,
};

const junkRecord: LatencyRecord = {
    sequence: 2,
    requestId: 3,
    t1: 1700000001,
    correctedT2: 1700000000.996875,
    delayMs: -3.25,
    sensorVoltage: 0.02,
    status: 'Junk',
    appliedVoltage: 0,
    measurementPosition: null,
    actuationPosition: [52.5, 13.4],
};

function makeSummary(records: LatencyRecord[]): SessionSummary {
    return {
        sessionId: 'abcdef12-3456-4789-8abc-def012345678',
        startedAt: 1700000000000,
        endedAt: 1700000060000,
        endReason: 'operator',
        records,
        delaysMs: records.map(r => r.delayMs),
        meanDelayMs: 29.625,
        minDelayMs: -3.25,
        maxDelayMs: 62.5,
    };
}

describe('formatClockTime', () => {
    test('renders hours, minutes, seconds and microseconds', () => {
        expect(formatClockTime(1700000000.25, { utc: true })).toBe('22:13:20:250000');
        expect(formatClockTime(1700000000.996875, { utc: true })).toBe('22:13:20:996875');
        expect(formatClockTime(1700000001, { utc: true })).toBe('22:13:21:000000');
    });
});

describe('formatRecordRow', () => {
    test('formats a proper sample', () => {
        expect(formatRecordRow(properRecord, { utc: true })).toEqual([
            '1',
            '22:13:20:250000',
            '22:13:20:312500',
            '62.50',
            '1.5000',
            'Proper',
            '1.5000V',
            '[52.52, 13.405]',
        ]);
    });

    test('marks junk voltage and keeps a negative delay', () => {
        expect(formatRecordRow(junkRecord, { utc: true })).toEqual([
            '2',
            '22:13:21:000000',
            '22:13:20:996875',
            '-3.25',
            'Junk Value',
            'Junk',
            '0.0000V',
            'None',
        ]);
    });
});

describe('buildReport', () => {
    test('returns null for a session without records', () => {
        expect(buildReport(makeSummary([]), { measurementAddress: null, actuationAddress: null })).toBeNull();
    });

    test('builds the summary block, header and rows', () => {
        const report = buildReport(
            makeSummary([properRecord, junkRecord]),
            { measurementAddress: '10.0.0.2:41000', actuationAddress: null },
            { utc: true },
        );

        expect(report?.title).toBe('--- New Test Run --- 2023-11-14T22:14:20.000Z');
        expect(report?.summary).toEqual([
            ['Session ID', 'abcdef12-3456-4789-8abc-def012345678'],
            ['Started', '2023-11-14T22:13:20.000Z'],
            ['Ended', '2023-11-14T22:14:20.000Z'],
            ['End Reason', 'operator'],
            ['Connected To (Measurement)', '10.0.0.2:41000'],
            ['Connected To (Actuation)', 'N/A'],
            ['Records', '2'],
            ['Average Communication Delay', '29.63 ms'],
            ['Min Delay', '-3.25 ms'],
            ['Max Delay', '62.50 ms'],
        ]);
        expect(report?.header[0]).toBe('Packet #');
        expect(report?.rows).toHaveLength(2);
        expect(report?.rows[1][0]).toBe('2');
    });
});
