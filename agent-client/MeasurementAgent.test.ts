import { MeasurementAgent } from './MeasurementAgent';
import { SimulatedSensor } from './providers/SimulatedSensor';
import { StaticPositionProvider } from './providers/PollingPositionProvider';
import { LoopbackAgentClient } from './test/LoopbackAgentClient';

describe('MeasurementAgent', () => {
  let client: LoopbackAgentClient;

  beforeEach(() => {
    client = new LoopbackAgentClient('measurement');
  });

  test('sends one telemetry packet per sample stamped with its own clock', async () => {
    const agent = new MeasurementAgent(
      client,
      new SimulatedSensor(() => 1.2),
      new StaticPositionProvider([52.52, 13.405]),
      { clock: () => 100.25 },
    );

    const packet = await agent.sample();

    expect(packet).toEqual({
      type: 'telemetry',
      voltage: 1.2,
      status: 'Proper',
      position: [52.52, 13.405],
      sendTime: 100.25,
    });
    expect(client.sent).toEqual([packet]);
    expect(agent.getSentCount()).toBe(1);
  });

  test('marks a reading at the threshold as junk and sends a null position', async () => {
    const agent = new MeasurementAgent(client, new SimulatedSensor(() => 0.1), new StaticPositionProvider(null), {
      clock: () => 5,
    });

    expect(await agent.sample()).toEqual({ type: 'telemetry', voltage: 0.1, status: 'Junk', position: null, sendTime: 5 });
  });

  test('drops samples while disconnected', async () => {
    client.connected = false;
    const agent = new MeasurementAgent(client, new SimulatedSensor(() => 2), new StaticPositionProvider(null));

    expect(await agent.sample()).toBeNull();
    expect(client.sent).toEqual([]);
    expect(agent.getSentCount()).toBe(0);
  });

  test('samples on the configured interval once started', () => {
    jest.useFakeTimers();
    try {
      const agent = new MeasurementAgent(client, new SimulatedSensor(() => 2), new StaticPositionProvider(null), {
        sampleIntervalMs: 500,
      });
      const sample = jest.spyOn(agent, 'sample');

      agent.start();
      jest.advanceTimersByTime(1500);
      agent.stop();
      jest.advanceTimersByTime(1000);

      expect(client.started).toBe(true);
      expect(sample).toHaveBeenCalledTimes(3);
    } finally {
      jest.useRealTimers();
    }
  });
});
