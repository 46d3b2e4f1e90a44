import type { IncomingMessage } from 'http';
import { WebSocketServer as WSServer, WebSocket as WSWebSocket, RawData } from 'ws';
import { JsonProtocol } from '../protocol/JsonProtocol';
import { CLOSE_CODES, CloseCode, MESSAGE_TYPES, ROLES, Role } from '../types/MessageTypes';
import { InboundByRole, PeerMessage } from '../types/Interfaces';
import { WebSocketPeerConnection } from './WebSocketPeerConnection';
import {
  ConnectionLostError,
  HandshakeError,
  MalformedMessageError,
  RelayError,
  describeError,
} from '../../shared/errors';
import { relayLogger } from '../../shared/RelayLogger';

export interface ServerConfig {
  role: Role;
  host: string;
  port: number;
  handshakeTimeoutMs: number;
  heartbeatInterval: number;
  connectionTimeout: number;
  maxPayloadSize: number;
}

export interface ServerStats {
  connections: number;
  handshakesRejected: number;
  messagesReceived: number;
  errors: number;
  uptime: number;
}

type InboundMessage = InboundByRole[Role];

/**
 * Accept loop for one peer role.
 *
 * Every socket must open with a hello naming this listener's role before any
 * other traffic is accepted. Frames that fail to decode, or that are the wrong
 * kind for the channel, end the connection and report the peer lost.
 */
export class WebSocketServer {
  private server: WSServer | null = null;
  private clients = new Map<string, WebSocketPeerConnection>();
  private handshaking = new Set<WSWebSocket>();
  private config: ServerConfig;
  private stats: ServerStats;
  private startTime = 0;
  private heartbeatTimer: NodeJS.Timeout | null = null;

  private peerHandler: ((connection: WebSocketPeerConnection) => void) | null = null;
  private messageHandler: ((connection: WebSocketPeerConnection, message: InboundMessage) => void) | null = null;
  private peerLostHandler: ((connection: WebSocketPeerConnection, error: RelayError) => void) | null = null;

  constructor(config: ServerConfig) {
    this.config = { ...config };
    this.stats = {
      connections: 0,
      handshakesRejected: 0,
      messagesReceived: 0,
      errors: 0,
      uptime: 0,
    };
  }

  get role(): Role {
    return this.config.role;
  }

  // Start listening; resolves with the bound port (port 0 picks one)
  async start(): Promise<number> {
    if (this.server) {
      throw new Error(`${this.config.role} listener already running`);
    }

    try {
      const port = await this.createServer();
      this.startHeartbeat();
      this.startTime = Date.now();
      relayLogger.info(`${this.config.role} listener on ${this.config.host}:${port}`, undefined, 'SERVER');
      return port;
    } catch (error) {
      this.cleanup();
      throw new Error(`Failed to start ${this.config.role} listener: ${describeError(error)}`, { cause: error });
    }
  }

  // Stop server and close every socket it accepted
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.stopHeartbeat();

    this.handshaking.forEach(socket => socket.close(CLOSE_CODES.GOING_AWAY, 'Relay shutting down'));
    this.clients.forEach(client => client.close(CLOSE_CODES.GOING_AWAY, 'Relay shutting down'));

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      // Sockets that ignore the close handshake are dropped
      server.clients.forEach(socket => socket.terminate());
    });

    this.server = null;
    this.cleanup();
    relayLogger.info(`${this.config.role} listener stopped`, undefined, 'SERVER');
  }

  // Called once a socket completes its handshake
  onPeer(handler: (connection: WebSocketPeerConnection) => void): void {
    this.peerHandler = handler;
  }

  // Called for each decoded message after the handshake
  onMessage(handler: (connection: WebSocketPeerConnection, message: InboundMessage) => void): void {
    this.messageHandler = handler;
  }

  // Called once per connection when it closes, errors or sends a bad frame
  onPeerLost(handler: (connection: WebSocketPeerConnection, error: RelayError) => void): void {
    this.peerLostHandler = handler;
  }

  getPort(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  getStats(): ServerStats {
    return {
      ...this.stats,
      connections: this.clients.size,
      uptime: this.startTime ? Date.now() - this.startTime : 0,
    };
  }

  private createServer(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = new WSServer({
        host: this.config.host,
        port: this.config.port,
        maxPayload: this.config.maxPayloadSize,
        perMessageDeflate: false,
      });
      this.server = server;

      let listening = false;
      server.once('listening', () => {
        listening = true;
        const address = server.address();
        resolve(address && typeof address === 'object' ? address.port : this.config.port);
      });
      server.on('error', (error) => {
        if (!listening) {
          server.close();
          this.server = null;
          reject(error);
          return;
        }
        this.stats.errors++;
        relayLogger.error(`${this.config.role} listener error`, error, 'SERVER');
      });
      server.on('connection', (socket, request) => this.handleConnection(socket, request));
    });
  }

  private handleConnection(socket: WSWebSocket, request: IncomingMessage): void {
    const remoteAddress = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
    this.handshaking.add(socket);

    const timer = setTimeout(() => {
      this.rejectHandshake(socket, CLOSE_CODES.HANDSHAKE_TIMEOUT, new HandshakeError(
        `No hello from ${remoteAddress} within ${this.config.handshakeTimeoutMs} ms`,
      ));
    }, this.config.handshakeTimeoutMs);

    const onEarlyClose = () => {
      clearTimeout(timer);
      this.handshaking.delete(socket);
    };

    socket.on('error', (error) => {
      this.stats.errors++;
      relayLogger.warn(`Socket error from ${remoteAddress}: ${error.message}`, undefined, 'SERVER');
    });
    socket.once('close', onEarlyClose);
    socket.once('message', (data) => {
      clearTimeout(timer);
      socket.off('close', onEarlyClose);
      this.handshaking.delete(socket);
      this.completeHandshake(socket, data, remoteAddress);
    });
  }

  private completeHandshake(socket: WSWebSocket, data: RawData, remoteAddress: string): void {
    let hello: PeerMessage;
    try {
      hello = JsonProtocol.deserialize(data, this.config.maxPayloadSize);
    } catch (error) {
      this.rejectHandshake(socket, CLOSE_CODES.POLICY_VIOLATION, new HandshakeError(
        `Invalid handshake from ${remoteAddress}: ${describeError(error)}`,
      ));
      return;
    }

    if (hello.type !== MESSAGE_TYPES.HELLO) {
      this.rejectHandshake(socket, CLOSE_CODES.POLICY_VIOLATION, new HandshakeError(
        `Expected hello from ${remoteAddress}, got ${hello.type}`,
      ));
      return;
    }

    if (hello.role !== this.config.role) {
      this.rejectHandshake(socket, CLOSE_CODES.POLICY_VIOLATION, new HandshakeError(
        `${hello.role} agent ${hello.agentId} connected to the ${this.config.role} listener`,
      ));
      return;
    }

    const connection = new WebSocketPeerConnection(socket, this.config.role, hello.agentId, remoteAddress);
    this.clients.set(connection.id, connection);
    this.stats.connections++;
    relayLogger.logConnection(connection.role, connection.id, 'HANDSHAKE', {
      agentId: connection.agentId,
      remoteAddress,
    });

    socket.on('message', (frame) => this.handleMessage(connection, frame));
    socket.on('pong', () => connection.markSeen());
    socket.on('close', (code, reason) => {
      this.clients.delete(connection.id);
      const detail = reason.toString();
      this.reportLost(connection, new ConnectionLostError(
        `${connection.role} peer ${connection.id} closed (${code}${detail ? `: ${detail}` : ''})`,
      ));
    });

    this.peerHandler?.(connection);
  }

  private handleMessage(connection: WebSocketPeerConnection, data: RawData): void {
    connection.markSeen();

    let message: PeerMessage;
    try {
      message = JsonProtocol.deserialize(data, this.config.maxPayloadSize);
    } catch (error) {
      const malformed = error instanceof MalformedMessageError
        ? error
        : new MalformedMessageError(describeError(error));
      this.dropConnection(connection, malformed);
      return;
    }

    const inbound = this.acceptForRole(message);
    if (!inbound) {
      this.dropConnection(connection, new MalformedMessageError(
        `Unexpected ${message.type} message on ${connection.role} channel`,
      ));
      return;
    }

    this.stats.messagesReceived++;
    try {
      this.messageHandler?.(connection, inbound);
    } catch (error) {
      this.stats.errors++;
      relayLogger.error(`Message handler failed for ${connection.id}`, error, 'SERVER');
    }
  }

  private acceptForRole(message: PeerMessage): InboundMessage | null {
    if (this.config.role === ROLES.MEASUREMENT) {
      return message.type === MESSAGE_TYPES.TELEMETRY ? message : null;
    }
    return message.type === MESSAGE_TYPES.ACK ? message : null;
  }

  private dropConnection(connection: WebSocketPeerConnection, error: MalformedMessageError): void {
    this.stats.errors++;
    relayLogger.logConnectionError(connection.role, connection.id, 'DECODE', error);
    this.reportLost(connection, error);
    connection.close(CLOSE_CODES.INVALID_PAYLOAD, error.message.slice(0, 120));
  }

  private reportLost(connection: WebSocketPeerConnection, error: RelayError): void {
    if (!connection.markLost()) return;
    relayLogger.logConnection(connection.role, connection.id, 'LOST', { reason: error.message });
    this.peerLostHandler?.(connection, error);
  }

  private rejectHandshake(socket: WSWebSocket, code: CloseCode, error: HandshakeError): void {
    this.handshaking.delete(socket);
    this.stats.handshakesRejected++;
    relayLogger.warn(error.message, undefined, 'SERVER');
    socket.close(code, error.message.slice(0, 120));
  }

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      const now = Date.now();

      this.clients.forEach((client) => {
        if (!client.isAlive()) return;

        if (now - client.lastSeen > this.config.connectionTimeout) {
          this.reportLost(client, new ConnectionLostError(
            `${client.role} peer ${client.id} silent for ${now - client.lastSeen} ms`,
          ));
          client.terminate();
          return;
        }

        client.socket.ping();
      });
    }, this.config.heartbeatInterval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private cleanup(): void {
    this.stopHeartbeat();
    this.clients.clear();
    this.handshaking.clear();
  }
}
