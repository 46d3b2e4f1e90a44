import { Acknowledgement, Command, PeerConnection, TelemetryPacket } from '../types/Interfaces';
import { MESSAGE_TYPES, ROLES } from '../types/MessageTypes';
import { PeerRegistry } from '../core/PeerRegistry';
import { ResponseCorrelator } from '../core/ResponseCorrelator';
import { SessionLog } from '../../session-log/SessionLog';
import { LatencyRecord } from '../../session-log/types';
import { estimateLatency, isPlausible, wallClock } from '../../time-sync/LatencyEstimator';
import { Clock, LatencyEstimate } from '../../time-sync/types';
import {
  ConnectionLostError,
  CorrelationTimeoutError,
  CorrelatorBusyError,
  RelayError,
  describeError,
} from '../../shared/errors';
import { relayLogger } from '../../shared/RelayLogger';

export const CYCLE_OUTCOMES = {
  OBSERVED: 'observed',
  CORRELATED: 'correlated',
  TIMED_OUT: 'timed-out',
  ABORTED: 'aborted',
} as const;

export type CycleResult =
  | { outcome: typeof CYCLE_OUTCOMES.OBSERVED; packet: TelemetryPacket }
  | {
      outcome: typeof CYCLE_OUTCOMES.CORRELATED;
      packet: TelemetryPacket;
      requestId: number;
      ack: Acknowledgement;
      estimate: LatencyEstimate;
      record: LatencyRecord | null;
    }
  | { outcome: typeof CYCLE_OUTCOMES.TIMED_OUT; packet: TelemetryPacket; requestId: number; error: CorrelationTimeoutError }
  | { outcome: typeof CYCLE_OUTCOMES.ABORTED; packet: TelemetryPacket; requestId?: number; error: Error };

export interface RelayLoopDependencies {
  registry: PeerRegistry;
  correlator: ResponseCorrelator;
  session: SessionLog;
  ackTimeoutMs: number;
  nextRequestId: () => number;
  // Whether new cycles may forward commands; defaults to the session's active flag
  isRelaying?: () => boolean;
  clock?: Clock;
  onCycle?: (result: CycleResult) => void;
}

/**
 * Relay cycles for one measurement connection.
 *
 * Packets are processed strictly in arrival order: cycle N+1 starts only
 * after cycle N has been correlated, timed out or aborted.
 */
export class RelayLoop {
  private readonly deps: RelayLoopDependencies;
  private readonly clock: Clock;
  private tail: Promise<void> = Promise.resolve();
  private pendingCycles = 0;
  private closed = false;

  constructor(readonly connection: PeerConnection, deps: RelayLoopDependencies) {
    this.deps = deps;
    this.clock = deps.clock ?? wallClock;
  }

  // Queue a packet behind any cycle already in progress
  enqueue(packet: TelemetryPacket): void {
    if (this.closed) {
      relayLogger.debug(`Dropping packet for closed loop ${this.connection.id}`, undefined, 'RELAY_LOOP');
      return;
    }

    this.pendingCycles++;
    this.tail = this.tail
      .then(() => this.runCycle(packet))
      .then(result => this.deps.onCycle?.(result))
      .catch(error => relayLogger.error(`Relay cycle failed on ${this.connection.id}`, error, 'RELAY_LOOP'))
      .finally(() => {
        this.pendingCycles--;
      });
  }

  // Resolves once every cycle queued so far has finished
  drain(): Promise<void> {
    return this.tail;
  }

  // Stop accepting packets; queued cycles still run to completion
  close(): void {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  getPendingCycles(): number {
    return this.pendingCycles;
  }

  private isRelaying(): boolean {
    return this.deps.isRelaying ? this.deps.isRelaying() : this.deps.session.isActive();
  }

  private async runCycle(packet: TelemetryPacket): Promise<CycleResult> {
    const actuation = this.deps.registry.current(ROLES.ACTUATION);
    if (!this.isRelaying() || !actuation) {
      return { outcome: CYCLE_OUTCOMES.OBSERVED, packet };
    }

    // A replaced or lost connection's queued packets must not reach the actuator
    if (!this.deps.registry.isCurrent(this.connection)) {
      const error = new ConnectionLostError(`Measurement connection ${this.connection.id} is no longer current`);
      relayLogger.debug(error.message, undefined, 'RELAY_LOOP');
      return { outcome: CYCLE_OUTCOMES.ABORTED, packet, error };
    }

    if (this.deps.correlator.hasPendingWait()) {
      const error = new CorrelatorBusyError();
      relayLogger.warn(`Command not sent for ${this.connection.id}: ${error.message}`, undefined, 'RELAY_LOOP');
      return { outcome: CYCLE_OUTCOMES.ABORTED, packet, error };
    }

    const requestId = this.deps.nextRequestId();
    const command: Command = {
      type: MESSAGE_TYPES.COMMAND,
      requestId,
      voltage: packet.voltage,
      status: packet.status,
    };

    if (!actuation.send(command)) {
      const error = new ConnectionLostError(`Failed to send command ${requestId} to actuation peer ${actuation.id}`);
      relayLogger.warn(error.message, undefined, 'RELAY_LOOP');
      return { outcome: CYCLE_OUTCOMES.ABORTED, packet, requestId, error };
    }

    let ack: Acknowledgement;
    try {
      ack = await this.deps.correlator.awaitNext(this.deps.ackTimeoutMs, requestId);
    } catch (error) {
      if (error instanceof CorrelationTimeoutError) {
        relayLogger.warn(error.message, { voltage: packet.voltage, status: packet.status }, 'RELAY_LOOP');
        return { outcome: CYCLE_OUTCOMES.TIMED_OUT, packet, requestId, error };
      }
      const aborted = error instanceof RelayError ? error : new ConnectionLostError(describeError(error), { cause: error });
      relayLogger.warn(`Cycle for request ${requestId} aborted: ${aborted.message}`, undefined, 'RELAY_LOOP');
      return { outcome: CYCLE_OUTCOMES.ABORTED, packet, requestId, error: aborted };
    }

    const t4 = this.clock();
    const estimate = estimateLatency({ t1: packet.sendTime, t2: ack.receiptTime, t3: ack.replySendTime, t4 });
    if (!isPlausible(estimate)) {
      relayLogger.warn(`Implausible delay for request ${requestId}: ${estimate.delayMs.toFixed(2)} ms`, {
        offset: estimate.offset,
      }, 'RELAY_LOOP');
    }

    const record = this.deps.session.append({
      requestId,
      t1: packet.sendTime,
      correctedT2: estimate.correctedT2,
      delayMs: estimate.delayMs,
      sensorVoltage: packet.voltage,
      status: packet.status,
      appliedVoltage: ack.appliedVoltage,
      measurementPosition: packet.position,
      actuationPosition: ack.position,
    });

    return { outcome: CYCLE_OUTCOMES.CORRELATED, packet, requestId, ack, estimate, record };
  }
}
