/**
 * Peer Registry
 *
 * Holds at most one live connection per role. Registering a connection for an
 * occupied role replaces the old one and closes the stale handle; clearing is
 * keyed by connection id so a replaced connection going away never evicts its
 * successor. Status consumers subscribe to changes instead of polling sockets.
 */

import { ALL_ROLES, CLOSE_CODES, Role } from '../types/MessageTypes';
import { PeerConnection, PeerStatus } from '../types/Interfaces';
import { relayLogger } from '../../shared/RelayLogger';

export type PeerSnapshot = Record<Role, PeerStatus>;

type RegistryChangeHandler = (snapshot: PeerSnapshot) => void;

export class PeerRegistry {
  private peers = new Map<Role, PeerConnection>();
  private changeHandlers = new Set<RegistryChangeHandler>();

  /**
   * Install a connection for its role.
   *
   * @returns the connection it replaced, or null
   */
  register(connection: PeerConnection): PeerConnection | null {
    const previous = this.peers.get(connection.role) ?? null;
    if (previous === connection) return null;

    this.peers.set(connection.role, connection);

    if (previous) {
      relayLogger.warn(`Replacing ${previous.role} peer ${previous.id} with ${connection.id}`, {
        previousAgent: previous.agentId,
        agent: connection.agentId,
      }, 'REGISTRY');
      previous.close(CLOSE_CODES.REPLACED, 'Replaced by a newer connection');
    } else {
      relayLogger.info(`Registered ${connection.role} peer ${connection.id} (${connection.agentId} @ ${connection.remoteAddress})`, undefined, 'REGISTRY');
    }

    this.notifyChanges();
    return previous;
  }

  current(role: Role): PeerConnection | null {
    return this.peers.get(role) ?? null;
  }

  /**
   * Remove the entry for a role. With a connection id, only that connection
   * is removed.
   */
  clear(role: Role, connectionId?: string): boolean {
    const existing = this.peers.get(role);
    if (!existing) return false;
    if (connectionId !== undefined && existing.id !== connectionId) return false;

    this.peers.delete(role);
    relayLogger.info(`Cleared ${role} peer ${existing.id}`, undefined, 'REGISTRY');
    this.notifyChanges();
    return true;
  }

  isCurrent(connection: PeerConnection): boolean {
    return this.peers.get(connection.role) === connection;
  }

  isConnected(role: Role): boolean {
    return this.peers.get(role)?.isAlive() ?? false;
  }

  snapshot(): PeerSnapshot {
    return {
      measurement: this.describe('measurement'),
      actuation: this.describe('actuation'),
    };
  }

  /**
   * Subscribe to registry changes
   *
   * @returns unsubscribe function
   */
  onChange(handler: RegistryChangeHandler): () => void {
    this.changeHandlers.add(handler);
    return () => {
      this.changeHandlers.delete(handler);
    };
  }

  // Close every registered connection (shutdown)
  closeAll(reason: string): void {
    for (const role of ALL_ROLES) {
      const connection = this.peers.get(role);
      if (connection) {
        connection.close(CLOSE_CODES.GOING_AWAY, reason);
        this.peers.delete(role);
      }
    }
    this.notifyChanges();
  }

  private describe(role: Role): PeerStatus {
    const connection = this.peers.get(role);
    if (!connection) {
      return { role, connected: false, connectionId: null, agentId: null, remoteAddress: null, connectedAt: null };
    }

    return {
      role,
      connected: connection.isAlive(),
      connectionId: connection.id,
      agentId: connection.agentId,
      remoteAddress: connection.remoteAddress,
      connectedAt: connection.connectedAt,
    };
  }

  private notifyChanges(): void {
    const snapshot = this.snapshot();
    this.changeHandlers.forEach(handler => {
      try {
        handler(snapshot);
      } catch (error) {
        relayLogger.error('Registry change handler failed', error, 'REGISTRY');
      }
    });
  }
}
