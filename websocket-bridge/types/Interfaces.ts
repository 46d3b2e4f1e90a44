import { MESSAGE_TYPES, Role, DataStatus, CloseCode } from './MessageTypes';

// [latitude, longitude] in decimal degrees
export type Position = [number, number];

export interface HelloMessage {
  type: typeof MESSAGE_TYPES.HELLO;
  role: Role;
  agentId: string;
}

// One measurement sample; sendTime is t1 on the measurement agent's clock
export interface TelemetryPacket {
  type: typeof MESSAGE_TYPES.TELEMETRY;
  voltage: number;
  status: DataStatus;
  position: Position | null;
  sendTime: number;
}

// Derived 1:1 from a telemetry packet
export interface Command {
  type: typeof MESSAGE_TYPES.COMMAND;
  requestId: number;
  voltage: number;
  status: DataStatus;
}

// receiptTime is t2 and replySendTime t3, both on the actuation agent's clock
export interface Acknowledgement {
  type: typeof MESSAGE_TYPES.ACK;
  requestId?: number;
  receiptTime: number;
  replySendTime: number;
  appliedVoltage: number;
  position: Position | null;
}

export type PeerMessage = HelloMessage | TelemetryPacket | Command | Acknowledgement;

// Messages a relay accepts on each channel after the handshake
export interface InboundByRole {
  measurement: TelemetryPacket;
  actuation: Acknowledgement;
}

// One live bidirectional channel to an agent
export interface PeerConnection {
  readonly id: string;
  readonly role: Role;
  readonly agentId: string;
  readonly remoteAddress: string;
  readonly connectedAt: number;
  isAlive(): boolean;
  send(message: PeerMessage): boolean;
  close(code: CloseCode, reason: string): void;
}

// Read-only view of a registry slot for status consumers
export interface PeerStatus {
  role: Role;
  connected: boolean;
  connectionId: string | null;
  agentId: string | null;
  remoteAddress: string | null;
  connectedAt: number | null;
}
