import { ResponseCorrelator } from './ResponseCorrelator';
import { Acknowledgement } from '../types/Interfaces';
import { ConnectionLostError, CorrelationTimeoutError, CorrelatorBusyError } from '../../shared/errors';

function ack(receiptTime: number, requestId?: number): Acknowledgement {
  const message: Acknowledgement = {
    type: 'ack',
    receiptTime,
    replySendTime: receiptTime + 0.01,
    appliedVoltage: 1.5,
    position: null,
  };
  if (requestId !== undefined) {
    message.requestId = requestId;
  }
  return message;
}

describe('ResponseCorrelator', () => {
  let correlator: ResponseCorrelator;

  beforeEach(() => {
    jest.useFakeTimers();
    correlator = new ResponseCorrelator();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('returns an already queued acknowledgement immediately', async () => {
    const queued = ack(1);
    correlator.publish(queued);

    await expect(correlator.awaitNext(2000)).resolves.toBe(queued);
    expect(correlator.getQueueLength()).toBe(0);
  });

  test('hands an acknowledgement to a pending wait', async () => {
    const wait = correlator.awaitNext(2000);
    expect(correlator.hasPendingWait()).toBe(true);

    const arriving = ack(2);
    jest.advanceTimersByTime(1500);
    correlator.publish(arriving);

    await expect(wait).resolves.toBe(arriving);
    expect(correlator.hasPendingWait()).toBe(false);
  });

  test('times out when nothing arrives before the deadline', async () => {
    const wait = correlator.awaitNext(2000, 4);
    jest.advanceTimersByTime(2000);

    await expect(wait).rejects.toBeInstanceOf(CorrelationTimeoutError);
    await expect(wait).rejects.toThrow('No acknowledgement for request 4 within 2000 ms');
    expect(correlator.getStats().timeouts).toBe(1);
    expect(correlator.hasPendingWait()).toBe(false);
  });

  test('an acknowledgement arriving after a timeout is queued for the next wait', async () => {
    const wait = correlator.awaitNext(2000);
    jest.advanceTimersByTime(2000);
    await expect(wait).rejects.toBeInstanceOf(CorrelationTimeoutError);

    const late = ack(3);
    correlator.publish(late);

    expect(correlator.getQueueLength()).toBe(1);
    await expect(correlator.awaitNext(2000)).resolves.toBe(late);
  });

  test('allows only one outstanding wait', async () => {
    const first = correlator.awaitNext(2000);
    await expect(correlator.awaitNext(2000)).rejects.toBeInstanceOf(CorrelatorBusyError);

    correlator.publish(ack(1));
    await expect(first).resolves.toMatchObject({ receiptTime: 1 });
  });

  test('without request ids, two in-flight commands pair with acknowledgements by arrival order', async () => {
    // Commands A then B were both sent; B's acknowledgement happens to arrive first
    const ackForB = ack(20);
    const ackForA = ack(10);
    correlator.publish(ackForB);
    correlator.publish(ackForA);

    // The wait issued for A receives B's acknowledgement
    await expect(correlator.awaitNext(2000)).resolves.toBe(ackForB);
    await expect(correlator.awaitNext(2000)).resolves.toBe(ackForA);
  });

  test('discards queued acknowledgements for earlier request ids', async () => {
    correlator.publish(ack(1, 1));
    correlator.publish(ack(2, 2));
    const current = ack(3, 3);
    correlator.publish(current);

    await expect(correlator.awaitNext(2000, 3)).resolves.toBe(current);
    expect(correlator.getStats()).toEqual({ published: 3, delivered: 1, timeouts: 0, stale: 2 });
  });

  test('a late acknowledgement for a timed-out request does not satisfy the next one', async () => {
    const first = correlator.awaitNext(2000, 1);
    jest.advanceTimersByTime(2000);
    await expect(first).rejects.toBeInstanceOf(CorrelationTimeoutError);

    const second = correlator.awaitNext(2000, 2);
    correlator.publish(ack(5, 1));
    expect(correlator.hasPendingWait()).toBe(true);

    const matching = ack(6, 2);
    correlator.publish(matching);
    await expect(second).resolves.toBe(matching);
    expect(correlator.getStats().stale).toBe(1);
  });

  test('an acknowledgement for a later request does not satisfy an earlier wait', async () => {
    const wait = correlator.awaitNext(2000, 1);
    const later = ack(7, 2);
    correlator.publish(later);

    expect(correlator.hasPendingWait()).toBe(true);
    expect(correlator.getQueueLength()).toBe(1);

    jest.advanceTimersByTime(2000);
    await expect(wait).rejects.toBeInstanceOf(CorrelationTimeoutError);
    await expect(correlator.awaitNext(2000, 2)).resolves.toBe(later);
    expect(correlator.getStats()).toEqual({ published: 1, delivered: 1, timeouts: 1, stale: 0 });
  });

  test('picks the matching id out of the queue and keeps later ones in order', async () => {
    correlator.publish(ack(1, 1));
    correlator.publish(ack(3, 3));
    const matching = ack(2, 2);
    correlator.publish(matching);

    await expect(correlator.awaitNext(2000, 2)).resolves.toBe(matching);
    expect(correlator.getQueueLength()).toBe(1);
    await expect(correlator.awaitNext(2000, 3)).resolves.toMatchObject({ requestId: 3 });
    expect(correlator.getStats().stale).toBe(1);
  });

  test('an acknowledgement without an id satisfies an id-tagged wait', async () => {
    const wait = correlator.awaitNext(2000, 9);
    const legacy = ack(4);
    correlator.publish(legacy);

    await expect(wait).resolves.toBe(legacy);
  });

  test('cancel rejects the pending wait', async () => {
    const wait = correlator.awaitNext(2000);

    expect(correlator.cancel(new ConnectionLostError('actuation peer lost'))).toBe(true);
    await expect(wait).rejects.toThrow('actuation peer lost');
    expect(correlator.cancel(new ConnectionLostError('again'))).toBe(false);

    // The cancelled wait's timer no longer fires
    jest.advanceTimersByTime(5000);
    expect(correlator.getStats().timeouts).toBe(0);
  });

  test('clear drops queued acknowledgements', () => {
    correlator.publish(ack(1));
    correlator.publish(ack(2));

    expect(correlator.clear()).toBe(2);
    expect(correlator.getQueueLength()).toBe(0);
  });
});
