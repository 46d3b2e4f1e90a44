// Error taxonomy shared by the relay, its listeners and the agents

export enum ErrorCode {
  // Transport errors
  CONNECTION_LOST = 'CONNECTION_LOST',
  MALFORMED_MESSAGE = 'MALFORMED_MESSAGE',
  HANDSHAKE_FAILED = 'HANDSHAKE_FAILED',

  // Relay cycle errors
  CORRELATION_TIMEOUT = 'CORRELATION_TIMEOUT',
  CORRELATOR_BUSY = 'CORRELATOR_BUSY',

  // Session errors
  SESSION_STATE = 'SESSION_STATE',
  REPORT_SINK_FAILURE = 'REPORT_SINK_FAILURE',

  // Startup errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class RelayError extends Error {
  readonly code: ErrorCode;
  readonly recoverable: boolean;
  readonly component: string;
  readonly timestamp: number;

  constructor(code: ErrorCode, message: string, component: string, recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.component = component;
    this.recoverable = recoverable;
    this.timestamp = Date.now();
  }
}

// Peer channel closed, reset or silent past its liveness deadline
export class ConnectionLostError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.CONNECTION_LOST, message, 'transport', false, options);
  }
}

// Payload failed to decode or is the wrong kind for its channel
export class MalformedMessageError extends RelayError {
  readonly raw?: string;

  constructor(message: string, raw?: string) {
    super(ErrorCode.MALFORMED_MESSAGE, message, 'codec', false);
    this.raw = raw;
  }
}

export class HandshakeError extends RelayError {
  constructor(message: string) {
    super(ErrorCode.HANDSHAKE_FAILED, message, 'transport', false);
  }
}

export class CorrelationTimeoutError extends RelayError {
  readonly deadlineMs: number;
  readonly requestId?: number;

  constructor(deadlineMs: number, requestId?: number) {
    const target = requestId !== undefined ? `request ${requestId}` : 'next acknowledgement';
    super(ErrorCode.CORRELATION_TIMEOUT, `No acknowledgement for ${target} within ${deadlineMs} ms`, 'correlator', true);
    this.deadlineMs = deadlineMs;
    this.requestId = requestId;
  }
}

export class CorrelatorBusyError extends RelayError {
  constructor() {
    super(ErrorCode.CORRELATOR_BUSY, 'Another acknowledgement wait is already outstanding', 'correlator', true);
  }
}

export class SessionStateError extends RelayError {
  constructor(message: string) {
    super(ErrorCode.SESSION_STATE, message, 'session', true);
  }
}

export class ReportSinkFailureError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.REPORT_SINK_FAILURE, message, 'report', true, options);
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super(ErrorCode.INVALID_CONFIG, message, 'config', false);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
