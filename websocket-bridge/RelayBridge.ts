import { WebSocketServer } from './core/WebSocketServer';
import { WebSocketPeerConnection } from './core/WebSocketPeerConnection';
import { PeerRegistry, PeerSnapshot } from './core/PeerRegistry';
import { CorrelatorStats, ResponseCorrelator } from './core/ResponseCorrelator';
import { CYCLE_OUTCOMES, CycleResult, RelayLoop } from './handlers/RelayLoop';
import { ALL_ROLES, MESSAGE_TYPES, ROLES, Role } from './types/MessageTypes';
import { InboundByRole, Position } from './types/Interfaces';
import { SessionLog } from '../session-log/SessionLog';
import { buildReport, ReportFormatOptions } from '../session-log/ReportGenerator';
import { LatencyRecord, ReportSink, SessionEndReason, SessionState, SessionSummary } from '../session-log/types';
import { Clock } from '../time-sync/types';
import { RelayConfig } from '../shared/config';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';
import {
  ConnectionLostError,
  CorrelationTimeoutError,
  RelayError,
  ReportSinkFailureError,
  SessionStateError,
} from '../shared/errors';
import { relayLogger } from '../shared/RelayLogger';

export interface RelayPorts {
  measurement: number;
  actuation: number;
}

export type Positions = Record<Role, Position | null>;

export type SessionEvent =
  | { state: 'started'; sessionId: string }
  | { state: 'stopped'; summary: SessionSummary };

export interface RelayBridgeEvents {
  peers: PeerSnapshot;
  session: SessionEvent;
  record: LatencyRecord;
  timeout: CorrelationTimeoutError;
  position: { role: Role; position: Position };
}

export interface RelayStatus {
  listening: RelayPorts | null;
  peers: PeerSnapshot;
  session: SessionState;
  positions: Positions;
  correlator: CorrelatorStats;
}

export interface RelayBridgeOptions {
  // Receives the report of every session that recorded at least one cycle
  sink?: ReportSink | null;
  clock?: Clock;
  now?: () => number;
  reportFormat?: ReportFormatOptions;
}

type RelayListenerConfig = Pick<RelayConfig,
  'host' | 'measurementPort' | 'actuationPort' | 'ackTimeoutMs' | 'handshakeTimeoutMs'
  | 'heartbeatIntervalMs' | 'connectionTimeoutMs' | 'maxPayloadSize'>;

/**
 * Relay Bridge
 *
 * Owns both role listeners, the peer registry, the response correlator and
 * the session log, and runs one relay loop per measurement connection.
 */
export class RelayBridge extends TypedEventEmitter<RelayBridgeEvents> {
  private readonly config: RelayListenerConfig;
  private readonly options: RelayBridgeOptions;
  private readonly registry = new PeerRegistry();
  private readonly correlator = new ResponseCorrelator();
  private readonly session: SessionLog;
  private readonly listeners: Record<Role, WebSocketServer>;
  private readonly loops = new Map<string, RelayLoop>();
  private positions: Positions = { measurement: null, actuation: null };
  // Last address seen per role; the report names a peer even after it is lost
  private lastAddresses: Record<Role, string | null> = { measurement: null, actuation: null };
  private ports: RelayPorts | null = null;
  private requestCounter = 0;
  private stopping: Promise<SessionSummary | null> | null = null;

  constructor(config: RelayListenerConfig, options: RelayBridgeOptions = {}) {
    super();
    this.config = config;
    this.options = options;
    this.session = new SessionLog(options.now);
    this.listeners = {
      measurement: this.createListener(ROLES.MEASUREMENT, config.measurementPort),
      actuation: this.createListener(ROLES.ACTUATION, config.actuationPort),
    };

    this.registry.onChange(snapshot => this.emit('peers', snapshot));
  }

  // Start both listeners; resolves with the bound ports
  async start(): Promise<RelayPorts> {
    if (this.ports) return this.ports;

    const measurement = await this.listeners.measurement.start();
    let actuation: number;
    try {
      actuation = await this.listeners.actuation.start();
    } catch (error) {
      await this.listeners.measurement.stop();
      throw error;
    }

    this.ports = { measurement, actuation };
    relayLogger.info('Relay started', this.ports, 'BRIDGE');
    return this.ports;
  }

  // Stop the session, close every peer and both listeners
  async stop(): Promise<void> {
    await this.stopSession('shutdown');

    this.correlator.cancel(new ConnectionLostError('Relay shutting down'));
    this.loops.forEach(loop => loop.close());
    await Promise.all([...this.loops.values()].map(loop => loop.drain()));
    this.loops.clear();

    this.registry.closeAll('Relay shutting down');
    await Promise.all(ALL_ROLES.map(role => this.listeners[role].stop()));
    this.ports = null;
    relayLogger.info('Relay stopped', undefined, 'BRIDGE');
  }

  /**
   * Start a session. Both peers must be connected; acknowledgements left over
   * from before the session are dropped.
   */
  startSession(): string {
    if (this.stopping) {
      throw new SessionStateError('The previous session is still stopping');
    }

    const missing = ALL_ROLES.filter(role => !this.registry.isConnected(role));
    if (missing.length > 0) {
      throw new SessionStateError(`Cannot start a session: ${missing.join(' and ')} peer not connected`);
    }

    this.correlator.clear();
    const sessionId = this.session.start();
    this.emit('session', { state: 'started', sessionId });
    return sessionId;
  }

  /**
   * Stop the active session once in-flight cycles have finished, then hand
   * its report to the sink. Resolves with null when no session was active.
   */
  stopSession(reason: SessionEndReason = 'operator'): Promise<SessionSummary | null> {
    if (this.stopping) return this.stopping;
    if (!this.session.isActive()) return Promise.resolve(null);

    const stopping = this.finishSession(reason);
    this.stopping = stopping;
    return stopping.finally(() => {
      this.stopping = null;
    });
  }

  getStatus(): RelayStatus {
    return {
      listening: this.ports,
      peers: this.registry.snapshot(),
      session: this.session.getState(),
      positions: this.getPositions(),
      correlator: this.correlator.getStats(),
    };
  }

  getPositions(): Positions {
    return { ...this.positions };
  }

  getRecords(): LatencyRecord[] {
    return this.session.getRecords();
  }

  private createListener(role: Role, port: number): WebSocketServer {
    const listener = new WebSocketServer({
      role,
      host: this.config.host,
      port,
      handshakeTimeoutMs: this.config.handshakeTimeoutMs,
      heartbeatInterval: this.config.heartbeatIntervalMs,
      connectionTimeout: this.config.connectionTimeoutMs,
      maxPayloadSize: this.config.maxPayloadSize,
    });

    listener.onPeer(connection => this.handlePeer(connection));
    listener.onMessage((connection, message) => this.handleMessage(connection, message));
    listener.onPeerLost((connection, error) => this.handlePeerLost(connection, error));
    return listener;
  }

  private handlePeer(connection: WebSocketPeerConnection): void {
    const previous = this.registry.register(connection);
    this.lastAddresses[connection.role] = connection.remoteAddress;

    if (connection.role === ROLES.MEASUREMENT) {
      if (previous) {
        this.retireLoop(previous.id);
        // The outstanding wait belongs to the replaced connection's cycle
        this.correlator.cancel(new ConnectionLostError(`Measurement connection ${previous.id} replaced by ${connection.id}`));
      }

      this.loops.set(connection.id, new RelayLoop(connection, {
        registry: this.registry,
        correlator: this.correlator,
        session: this.session,
        ackTimeoutMs: this.config.ackTimeoutMs,
        nextRequestId: () => ++this.requestCounter,
        isRelaying: () => this.session.isActive() && this.stopping === null,
        clock: this.options.clock,
        onCycle: result => this.handleCycle(result),
      }));
    }
  }

  private handleMessage(connection: WebSocketPeerConnection, message: InboundByRole[Role]): void {
    if (!this.registry.isCurrent(connection)) {
      relayLogger.debug(`Ignoring ${message.type} from replaced connection ${connection.id}`, undefined, 'BRIDGE');
      return;
    }

    if (message.position) {
      this.updatePosition(connection.role, message.position);
    }

    if (message.type === MESSAGE_TYPES.TELEMETRY) {
      this.loops.get(connection.id)?.enqueue(message);
    } else {
      this.correlator.publish(message);
    }
  }

  private handlePeerLost(connection: WebSocketPeerConnection, error: RelayError): void {
    this.retireLoop(connection.id);

    // A replaced or already cleared connection does not affect the session
    if (!this.registry.clear(connection.role, connection.id)) return;

    relayLogger.warn(`${connection.role} peer lost: ${error.message}`, undefined, 'BRIDGE');

    if (connection.role === ROLES.ACTUATION) {
      this.correlator.cancel(new ConnectionLostError(`Actuation peer lost: ${error.message}`, { cause: error }));
    }

    if (this.session.isActive()) {
      this.stopSession('peer-lost').catch(stopError => {
        relayLogger.error('Failed to stop session after peer loss', stopError, 'BRIDGE');
      });
    }
  }

  private retireLoop(connectionId: string): void {
    const loop = this.loops.get(connectionId);
    if (!loop || loop.isClosed()) return;

    // Stays registered until its queued cycles finish so stopSession can wait for them
    loop.close();
    void loop.drain().then(() => this.loops.delete(connectionId));
  }

  private handleCycle(result: CycleResult): void {
    switch (result.outcome) {
      case CYCLE_OUTCOMES.CORRELATED:
        if (result.record) {
          this.emit('record', result.record);
        }
        break;
      case CYCLE_OUTCOMES.TIMED_OUT:
        this.emit('timeout', result.error);
        break;
      default:
        break;
    }
  }

  private updatePosition(role: Role, position: Position): void {
    this.positions[role] = position;
    this.emit('position', { role, position });
  }

  private async finishSession(reason: SessionEndReason): Promise<SessionSummary | null> {
    await Promise.all([...this.loops.values()].map(loop => loop.drain()));

    const summary = this.session.stop(reason);
    if (!summary) return null;

    relayLogger.info(`Session ${summary.sessionId} stopped (${reason}): ${summary.records.length} records, mean ${summary.meanDelayMs.toFixed(2)} ms`, undefined, 'BRIDGE');
    this.emit('session', { state: 'stopped', summary });

    await this.persistReport(summary);
    return summary;
  }

  private async persistReport(summary: SessionSummary): Promise<void> {
    const sink = this.options.sink;
    if (!sink) return;

    const report = buildReport(summary, {
      measurementAddress: this.lastAddresses.measurement,
      actuationAddress: this.lastAddresses.actuation,
    }, this.options.reportFormat);

    if (!report) {
      relayLogger.info(`Session ${summary.sessionId} recorded nothing; no report written`, undefined, 'BRIDGE');
      return;
    }

    try {
      await sink.persist(report);
    } catch (error) {
      const failure = new ReportSinkFailureError(`Failed to persist report for session ${summary.sessionId}`, { cause: error });
      relayLogger.error(failure.message, error, 'REPORT');
    }
  }
}
