import { WebSocket as WSWebSocket } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { JsonProtocol } from '../protocol/JsonProtocol';
import { CloseCode, Role } from '../types/MessageTypes';
import { PeerConnection, PeerMessage } from '../types/Interfaces';
import { relayLogger } from '../../shared/RelayLogger';

// PeerConnection over an accepted ws socket
export class WebSocketPeerConnection implements PeerConnection {
  readonly id: string;
  readonly connectedAt = Date.now();
  lastSeen = Date.now();
  private lost = false;

  constructor(
    readonly socket: WSWebSocket,
    readonly role: Role,
    readonly agentId: string,
    readonly remoteAddress: string,
  ) {
    this.id = `${role}_${uuidv4()}`;
  }

  isAlive(): boolean {
    return this.socket.readyState === WSWebSocket.OPEN;
  }

  send(message: PeerMessage): boolean {
    if (!this.isAlive()) return false;

    try {
      this.socket.send(JsonProtocol.serialize(message));
      return true;
    } catch (error) {
      relayLogger.logConnectionError(this.role, this.id, 'SEND', error);
      return false;
    }
  }

  close(code: CloseCode, reason: string): void {
    if (this.socket.readyState === WSWebSocket.OPEN || this.socket.readyState === WSWebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }

  terminate(): void {
    this.socket.terminate();
  }

  markSeen(): void {
    this.lastSeen = Date.now();
  }

  // First call wins; later close/error events for the same socket are ignored
  markLost(): boolean {
    if (this.lost) return false;
    this.lost = true;
    return true;
  }
}
