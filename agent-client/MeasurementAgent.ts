import { AgentClient } from './AgentClient';
import { PositionProvider, SensorProvider } from './types';
import { MESSAGE_TYPES } from '../websocket-bridge/types/MessageTypes';
import { TelemetryPacket } from '../websocket-bridge/types/Interfaces';
import { wallClock } from '../time-sync/LatencyEstimator';
import { Clock } from '../time-sync/types';
import { CONFIG } from '../shared/config';
import { relayLogger } from '../shared/RelayLogger';

export interface MeasurementAgentOptions {
  sampleIntervalMs?: number;
  clock?: Clock;
}

/**
 * Samples the sensor on a fixed interval and sends one telemetry packet per
 * sample, stamped with this machine's clock. Samples taken while
 * disconnected are dropped.
 */
export class MeasurementAgent {
  private readonly sampleIntervalMs: number;
  private readonly clock: Clock;
  private sampleTimer: NodeJS.Timeout | null = null;
  private sampling = false;
  private sent = 0;

  constructor(
    private readonly client: AgentClient,
    private readonly sensor: SensorProvider,
    private readonly position: PositionProvider,
    options: MeasurementAgentOptions = {},
  ) {
    this.sampleIntervalMs = options.sampleIntervalMs ?? CONFIG.AGENT.SAMPLE_INTERVAL_MS;
    this.clock = options.clock ?? wallClock;
  }

  start(): void {
    if (this.sampleTimer) return;
    this.client.start();
    this.sampleTimer = setInterval(() => {
      this.sample().catch(error => relayLogger.error('Sample failed', error, 'MEASUREMENT'));
    }, this.sampleIntervalMs);
  }

  stop(): void {
    if (this.sampleTimer) {
      clearInterval(this.sampleTimer);
      this.sampleTimer = null;
    }
    this.client.disconnect();
  }

  /**
   * Read the sensor and send one packet.
   * Resolves with the packet sent, or null when it was not sent.
   */
  async sample(): Promise<TelemetryPacket | null> {
    if (this.sampling || !this.client.isConnected()) return null;

    this.sampling = true;
    try {
      const reading = await this.sensor.read();
      const packet: TelemetryPacket = {
        type: MESSAGE_TYPES.TELEMETRY,
        voltage: reading.voltage,
        status: reading.status,
        position: this.position.latest(),
        sendTime: this.clock(),
      };

      if (!this.client.send(packet)) return null;

      this.sent++;
      relayLogger.debug(`Sent voltage=${packet.voltage.toFixed(2)}V status=${packet.status}`, { position: packet.position }, 'MEASUREMENT');
      return packet;
    } finally {
      this.sampling = false;
    }
  }

  getSentCount(): number {
    return this.sent;
  }
}
