import { SessionLog } from './SessionLog';
import { LatencyRecordFields } from './types';

function fields(delayMs: number, requestId: number): LatencyRecordFields {
    return {
        requestId,
        t1: 100,
        correctedT2: 100 + delayMs / 1000,
        delayMs,
        sensorVoltage: 1.2,
        status: 'Proper',
        appliedVoltage: 1.2,
        measurementPosition: null,
        actuationPosition: null,
    };
}

describe('SessionLog', () => {
    let clockMs: number;
    let log: SessionLog;

    beforeEach(() => {
        clockMs = 1_700_000_000_000;
        log = new SessionLog(() => clockMs);
    });

    test('is inactive until started and ignores appends meanwhile', () => {
        expect(log.isActive()).toBe(false);
        expect(log.append(fields(10, 1))).toBeNull();
        expect(log.getState()).toEqual({ active: false, sessionId: null, startedAt: null, recordCount: 0 });
    });

    test('assigns dense sequence numbers in append order', () => {
        log.start();

        const sequences = [12, 15, 9].map((delay, i) => log.append(fields(delay, i + 1))?.sequence);

        expect(sequences).toEqual([1, 2, 3]);
        expect(log.getDelaySamples()).toEqual([12, 15, 9]);
    });

    test('stop returns the records and delay statistics', () => {
        const sessionId = log.start();
        log.append(fields(10, 1));
        log.append(fields(30, 2));
        clockMs += 5000;

        const summary = log.stop('operator');

        expect(summary).not.toBeNull();
        expect(summary?.sessionId).toBe(sessionId);
        expect(summary?.startedAt).toBe(1_700_000_000_000);
        expect(summary?.endedAt).toBe(1_700_000_005_000);
        expect(summary?.endReason).toBe('operator');
        expect(summary?.records.map(r => r.sequence)).toEqual([1, 2]);
        expect(summary?.delaysMs).toEqual([10, 30]);
        expect(summary?.meanDelayMs).toBe(20);
        expect(summary?.minDelayMs).toBe(10);
        expect(summary?.maxDelayMs).toBe(30);
        expect(log.isActive()).toBe(false);
    });

    test('a second stop is a no-op', () => {
        log.start();
        log.append(fields(10, 1));

        expect(log.stop('operator')).not.toBeNull();
        expect(log.stop('operator')).toBeNull();
        expect(log.getRecords()).toHaveLength(1);
    });

    test('starting again clears records and delay samples', () => {
        const firstId = log.start();
        log.append(fields(10, 1));
        log.append(fields(20, 2));
        log.stop('peer-lost');

        const secondId = log.start();

        expect(secondId).not.toBe(firstId);
        expect(secondId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        expect(log.getRecords()).toEqual([]);
        expect(log.getDelaySamples()).toEqual([]);
        expect(log.append(fields(5, 3))?.sequence).toBe(1);
    });

    test('restarting an active session also clears it', () => {
        log.start();
        log.append(fields(10, 1));

        log.start();

        expect(log.isActive()).toBe(true);
        expect(log.getState().recordCount).toBe(0);
    });

    test('an empty session reports zero mean delay', () => {
        log.start();
        const summary = log.stop('shutdown');

        expect(summary?.records).toEqual([]);
        expect(summary?.meanDelayMs).toBe(0);
    });

    test('returned records are copies', () => {
        log.start();
        log.append(fields(10, 1));

        log.getRecords().pop();

        expect(log.getRecords()).toHaveLength(1);
    });
});
