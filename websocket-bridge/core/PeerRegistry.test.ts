import { PeerRegistry, PeerSnapshot } from './PeerRegistry';
import { FakePeerConnection } from '../test/FakePeerConnection';

describe('PeerRegistry', () => {
  let registry: PeerRegistry;

  beforeEach(() => {
    registry = new PeerRegistry();
  });

  test('starts empty', () => {
    expect(registry.current('measurement')).toBeNull();
    expect(registry.current('actuation')).toBeNull();
    expect(registry.snapshot().actuation).toEqual({
      role: 'actuation',
      connected: false,
      connectionId: null,
      agentId: null,
      remoteAddress: null,
      connectedAt: null,
    });
  });

  test('registers one connection per role', () => {
    const sensor = new FakePeerConnection('measurement', 'sensor-1');
    const actuator = new FakePeerConnection('actuation', 'actuator-1');

    expect(registry.register(sensor)).toBeNull();
    expect(registry.register(actuator)).toBeNull();

    expect(registry.current('measurement')).toBe(sensor);
    expect(registry.current('actuation')).toBe(actuator);
    expect(registry.isConnected('measurement')).toBe(true);
  });

  test('replaces and closes the previous connection for an occupied role', () => {
    const first = new FakePeerConnection('actuation');
    const second = new FakePeerConnection('actuation');

    registry.register(first);
    const replaced = registry.register(second);

    expect(replaced).toBe(first);
    expect(first.closedWith).toEqual({ code: 4000, reason: 'Replaced by a newer connection' });
    expect(registry.current('actuation')).toBe(second);
    expect(registry.isCurrent(first)).toBe(false);
    expect(registry.isCurrent(second)).toBe(true);
  });

  test('a stale connection cannot clear its replacement', () => {
    const first = new FakePeerConnection('measurement');
    const second = new FakePeerConnection('measurement');
    registry.register(first);
    registry.register(second);

    expect(registry.clear('measurement', first.id)).toBe(false);
    expect(registry.current('measurement')).toBe(second);

    expect(registry.clear('measurement', second.id)).toBe(true);
    expect(registry.current('measurement')).toBeNull();
  });

  test('clear without an id removes whatever is registered', () => {
    registry.register(new FakePeerConnection('actuation'));
    expect(registry.clear('actuation')).toBe(true);
    expect(registry.clear('actuation')).toBe(false);
  });

  test('notifies subscribers on every change until unsubscribed', () => {
    const snapshots: PeerSnapshot[] = [];
    const unsubscribe = registry.onChange(snapshot => snapshots.push(snapshot));

    const sensor = new FakePeerConnection('measurement', 'sensor-1', '10.0.0.2:41000');
    registry.register(sensor);
    registry.clear('measurement', sensor.id);
    unsubscribe();
    registry.register(new FakePeerConnection('actuation'));

    expect(snapshots).toHaveLength(2);
    expect(snapshots[0].measurement).toMatchObject({
      connected: true,
      connectionId: sensor.id,
      agentId: 'sensor-1',
      remoteAddress: '10.0.0.2:41000',
    });
    expect(snapshots[1].measurement.connected).toBe(false);
  });

  test('a throwing subscriber does not block the others', () => {
    const seen: boolean[] = [];
    registry.onChange(() => {
      throw new Error('display offline');
    });
    registry.onChange(snapshot => seen.push(snapshot.actuation.connected));

    registry.register(new FakePeerConnection('actuation'));

    expect(seen).toEqual([true]);
  });

  test('closeAll closes and removes every connection', () => {
    const sensor = new FakePeerConnection('measurement');
    const actuator = new FakePeerConnection('actuation');
    registry.register(sensor);
    registry.register(actuator);

    registry.closeAll('Relay shutting down');

    expect(sensor.closedWith).toEqual({ code: 1001, reason: 'Relay shutting down' });
    expect(actuator.closedWith).toEqual({ code: 1001, reason: 'Relay shutting down' });
    expect(registry.current('measurement')).toBeNull();
  });
});
