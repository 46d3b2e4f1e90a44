import { AgentClient } from './AgentClient';
import { ActuatorProvider, PositionProvider } from './types';
import { MESSAGE_TYPES } from '../websocket-bridge/types/MessageTypes';
import { Acknowledgement, Command } from '../websocket-bridge/types/Interfaces';
import { wallClock } from '../time-sync/LatencyEstimator';
import { Clock } from '../time-sync/types';
import { relayLogger } from '../shared/RelayLogger';

export interface ActuationAgentOptions {
  clock?: Clock;
}

/**
 * Applies each command and replies with an acknowledgement carrying the
 * receipt and reply-send times. The output returns to 0 V whenever the
 * relay connection drops.
 */
export class ActuationAgent {
  private readonly clock: Clock;
  private subscriptions: Array<() => void> = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly client: AgentClient,
    private readonly actuator: ActuatorProvider,
    private readonly position: PositionProvider,
    options: ActuationAgentOptions = {},
  ) {
    this.clock = options.clock ?? wallClock;
  }

  start(): void {
    if (this.subscriptions.length > 0) return;

    this.subscriptions.push(
      this.client.on('command', command => this.enqueue(command)),
      this.client.on('disconnected', () => {
        this.actuator.reset().catch(error => relayLogger.error('Actuator reset failed', error, 'ACTUATION'));
      }),
    );
    this.client.start();
  }

  async stop(): Promise<void> {
    this.subscriptions.forEach(unsubscribe => unsubscribe());
    this.subscriptions = [];
    this.client.disconnect();
    await this.tail;
    await this.actuator.reset();
  }

  /**
   * Apply one command and send its acknowledgement.
   * Resolves with the acknowledgement, or null when it could not be sent.
   */
  async handleCommand(command: Command): Promise<Acknowledgement | null> {
    const receiptTime = this.clock();
    const appliedVoltage = await this.actuator.apply(command.voltage, command.status);

    const ack: Acknowledgement = {
      type: MESSAGE_TYPES.ACK,
      requestId: command.requestId,
      receiptTime,
      replySendTime: this.clock(),
      appliedVoltage,
      position: this.position.latest(),
    };

    if (!this.client.send(ack)) {
      relayLogger.warn(`Could not acknowledge request ${command.requestId}`, undefined, 'ACTUATION');
      return null;
    }

    relayLogger.debug(`Applied ${appliedVoltage.toFixed(4)}V for request ${command.requestId}`, undefined, 'ACTUATION');
    return ack;
  }

  // Commands are applied one at a time, in arrival order
  private enqueue(command: Command): void {
    this.tail = this.tail
      .then(() => this.handleCommand(command))
      .then(() => undefined)
      .catch(error => relayLogger.error(`Command ${command.requestId} failed`, error, 'ACTUATION'));
  }
}
