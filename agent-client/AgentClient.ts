import { WebSocket, RawData } from 'ws';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';
import { JsonProtocol } from '../websocket-bridge/protocol/JsonProtocol';
import { MESSAGE_TYPES, Role } from '../websocket-bridge/types/MessageTypes';
import { PeerMessage } from '../websocket-bridge/types/Interfaces';
import { CONFIG } from '../shared/config';
import { ConnectionLostError, describeError } from '../shared/errors';
import { relayLogger } from '../shared/RelayLogger';
import { calculateBackoff } from './utils/retry';
import { AgentClientEvents, ConnectionState } from './types';

export interface AgentClientOptions {
  url: string;
  role: Role;
  agentId: string;
  reconnectBaseDelayMs?: number;
  reconnectMaxDelayMs?: number;
  maxReconnectAttempts?: number;
}

// Fill in the role's default port when the relay URL names none
export function resolveRelayUrl(baseUrl: string, defaultPort: number): string {
  const url = new URL(baseUrl);
  if (!url.port) {
    url.port = String(defaultPort);
  }
  return url.toString();
}

/**
 * Agent side of a relay channel: sends the hello on open, decodes inbound
 * frames and reconnects with capped exponential backoff.
 */
export class AgentClient extends TypedEventEmitter<AgentClientEvents> {
  private ws: WebSocket | null = null;
  private state: ConnectionState = 'disconnected';
  private reconnectAttempts = 0;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private running = false;
  private options: Required<AgentClientOptions>;

  constructor(options: AgentClientOptions) {
    super();
    this.options = {
      url: options.url,
      role: options.role,
      agentId: options.agentId,
      reconnectBaseDelayMs: options.reconnectBaseDelayMs ?? CONFIG.AGENT.RECONNECT_BASE_DELAY,
      reconnectMaxDelayMs: options.reconnectMaxDelayMs ?? CONFIG.AGENT.RECONNECT_MAX_DELAY,
      maxReconnectAttempts: options.maxReconnectAttempts ?? Infinity,
    };
  }

  // Connect and keep reconnecting until disconnect()
  start(): void {
    if (this.running) return;
    this.running = true;
    this.connect().catch(error => {
      relayLogger.warn(`Connection to ${this.options.url} failed: ${describeError(error)}`, undefined, 'AGENT');
    });
  }

  // Single connection attempt; resolves once the hello has been sent
  connect(): Promise<void> {
    if (this.state === 'connected' || this.state === 'connecting') {
      return Promise.reject(new Error(`Already ${this.state}`));
    }
    this.state = 'connecting';

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.options.url, { perMessageDeflate: false });
      this.ws = ws;
      let opened = false;

      ws.on('open', () => {
        opened = true;
        this.state = 'connected';
        this.reconnectAttempts = 0;
        ws.send(JsonProtocol.serialize({
          type: MESSAGE_TYPES.HELLO,
          role: this.options.role,
          agentId: this.options.agentId,
        }));
        relayLogger.info(`Connected to relay at ${this.options.url} as ${this.options.role} (${this.options.agentId})`, undefined, 'AGENT');
        this.emit('connected', { url: this.options.url });
        resolve();
      });
      ws.on('message', (data) => this.handleMessage(data));
      ws.on('close', (code, reason) => this.handleClose(ws, code, reason.toString()));
      ws.on('error', (error) => {
        this.emit('error', error);
        if (!opened) {
          reject(new ConnectionLostError(`Cannot reach relay at ${this.options.url}: ${error.message}`, { cause: error }));
        }
      });
    });
  }

  // Close the connection and stop reconnecting
  disconnect(): void {
    this.running = false;
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
    if (this.ws) {
      const ws = this.ws;
      this.ws = null;
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else {
        ws.close(1000, 'Agent stopping');
      }
    }
    this.state = 'disconnected';
  }

  send(message: PeerMessage): boolean {
    if (!this.isConnected() || !this.ws) return false;

    try {
      this.ws.send(JsonProtocol.serialize(message));
      return true;
    } catch (error) {
      relayLogger.error('Failed to send message', error, 'AGENT');
      return false;
    }
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  get role(): Role {
    return this.options.role;
  }

  private handleMessage(data: RawData): void {
    let message: PeerMessage;
    try {
      message = JsonProtocol.deserialize(data);
    } catch (error) {
      relayLogger.warn(`Ignoring malformed frame from relay: ${describeError(error)}`, undefined, 'AGENT');
      this.emit('error', error instanceof Error ? error : new Error(describeError(error)));
      return;
    }

    if (message.type === MESSAGE_TYPES.COMMAND) {
      this.emit('command', message);
    } else {
      relayLogger.debug(`Ignoring ${message.type} message from relay`, undefined, 'AGENT');
    }
  }

  private handleClose(ws: WebSocket, code: number, reason: string): void {
    // A socket abandoned by disconnect() no longer drives the state
    if (this.ws !== ws) return;

    this.ws = null;
    this.state = 'disconnected';
    relayLogger.warn(`Disconnected from relay (${code}${reason ? `: ${reason}` : ''})`, undefined, 'AGENT');
    this.emit('disconnected', { code, reason });

    if (this.running) {
      this.attemptReconnect();
    }
  }

  private attemptReconnect(): void {
    if (this.reconnectAttempts >= this.options.maxReconnectAttempts) {
      relayLogger.error('Max reconnect attempts reached', undefined, 'AGENT');
      this.running = false;
      return;
    }
    this.state = 'reconnecting';
    const delay = calculateBackoff(this.reconnectAttempts, this.options.reconnectBaseDelayMs, this.options.reconnectMaxDelayMs);
    this.reconnectAttempts++;
    this.emit('reconnecting', { attempt: this.reconnectAttempts, delay });
    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.state = 'disconnected';
      this.connect().catch(error => {
        relayLogger.warn(`Reconnect failed: ${describeError(error)}`, undefined, 'AGENT');
      });
    }, delay);
  }
}
