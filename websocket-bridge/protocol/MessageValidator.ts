import { MESSAGE_TYPES, PROTOCOL, ROLES, DATA_STATUS, Role, DataStatus } from '../types/MessageTypes';
import {
  PeerMessage,
  HelloMessage,
  TelemetryPacket,
  Command,
  Acknowledgement,
  Position,
} from '../types/Interfaces';

export type ValidationResult<T> =
  | { valid: true; message: T }
  | { valid: false; error: string };

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isRole(value: unknown): value is Role {
  return value === ROLES.MEASUREMENT || value === ROLES.ACTUATION;
}

export function isDataStatus(value: unknown): value is DataStatus {
  return value === DATA_STATUS.PROPER || value === DATA_STATUS.JUNK;
}

function invalid<T>(error: string): ValidationResult<T> {
  return { valid: false, error };
}

export class MessageValidator {
  // Validate any peer message; the returned message carries only known fields
  static validate(value: unknown): ValidationResult<PeerMessage> {
    if (!isRecord(value)) {
      return invalid('Invalid message structure');
    }

    switch (value.type) {
      case MESSAGE_TYPES.HELLO:
        return this.validateHello(value);

      case MESSAGE_TYPES.TELEMETRY:
        return this.validateTelemetry(value);

      case MESSAGE_TYPES.COMMAND:
        return this.validateCommand(value);

      case MESSAGE_TYPES.ACK:
        return this.validateAck(value);

      default:
        return invalid(`Unknown message type: ${String(value.type)}`);
    }
  }

  // Handshake validation
  private static validateHello(msg: Fields): ValidationResult<HelloMessage> {
    if (!isRole(msg.role)) {
      return invalid('Invalid role');
    }

    if (typeof msg.agentId !== 'string' || msg.agentId.trim().length === 0) {
      return invalid('Invalid agent ID');
    }

    if (msg.agentId.length > PROTOCOL.MAX_AGENT_ID_LENGTH) {
      return invalid(`Agent ID exceeds ${PROTOCOL.MAX_AGENT_ID_LENGTH} characters`);
    }

    return { valid: true, message: { type: MESSAGE_TYPES.HELLO, role: msg.role, agentId: msg.agentId.trim() } };
  }

  // Measurement sample validation
  private static validateTelemetry(msg: Fields): ValidationResult<TelemetryPacket> {
    if (!isFiniteNumber(msg.voltage)) {
      return invalid('Invalid voltage');
    }

    if (!isDataStatus(msg.status)) {
      return invalid('Invalid data status');
    }

    const position = this.readPosition(msg.position);
    if (position === undefined) {
      return invalid('Invalid position');
    }

    if (!isFiniteNumber(msg.sendTime)) {
      return invalid('Invalid send time');
    }

    return {
      valid: true,
      message: {
        type: MESSAGE_TYPES.TELEMETRY,
        voltage: msg.voltage,
        status: msg.status,
        position,
        sendTime: msg.sendTime,
      },
    };
  }

  // Command validation (agent side)
  private static validateCommand(msg: Fields): ValidationResult<Command> {
    if (!this.isRequestId(msg.requestId)) {
      return invalid('Invalid request ID');
    }

    if (!isFiniteNumber(msg.voltage)) {
      return invalid('Invalid voltage');
    }

    if (!isDataStatus(msg.status)) {
      return invalid('Invalid data status');
    }

    return {
      valid: true,
      message: { type: MESSAGE_TYPES.COMMAND, requestId: msg.requestId, voltage: msg.voltage, status: msg.status },
    };
  }

  // Acknowledgement validation; requestId is optional for agents that do not echo it
  private static validateAck(msg: Fields): ValidationResult<Acknowledgement> {
    if (msg.requestId !== undefined && msg.requestId !== null && !this.isRequestId(msg.requestId)) {
      return invalid('Invalid request ID');
    }

    if (!isFiniteNumber(msg.receiptTime) || !isFiniteNumber(msg.replySendTime)) {
      return invalid('Invalid acknowledgement timestamps');
    }

    if (!isFiniteNumber(msg.appliedVoltage)) {
      return invalid('Invalid applied voltage');
    }

    const position = this.readPosition(msg.position);
    if (position === undefined) {
      return invalid('Invalid position');
    }

    const ack: Acknowledgement = {
      type: MESSAGE_TYPES.ACK,
      receiptTime: msg.receiptTime,
      replySendTime: msg.replySendTime,
      appliedVoltage: msg.appliedVoltage,
      position,
    };
    if (this.isRequestId(msg.requestId)) {
      ack.requestId = msg.requestId;
    }

    return { valid: true, message: ack };
  }

  private static isRequestId(value: unknown): value is number {
    return Number.isInteger(value) && typeof value === 'number' && value > 0 && value <= PROTOCOL.MAX_REQUEST_ID;
  }

  // null/absent → null, valid pair → Position, anything else → undefined
  private static readPosition(value: unknown): Position | null | undefined {
    if (value === null || value === undefined) return null;
    if (!Array.isArray(value) || value.length !== 2) return undefined;

    const [lat, lon]: unknown[] = value;
    if (!isFiniteNumber(lat) || !isFiniteNumber(lon)) return undefined;
    if (lat < -90 || lat > 90 || lon < -180 || lon > 180) return undefined;

    return [lat, lon];
  }
}
