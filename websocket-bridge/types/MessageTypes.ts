// Message type constants for the peer channels
export const MESSAGE_TYPES = {
  // Handshake (agent → relay, first frame on every connection)
  HELLO: 'hello',

  // Measurement channel (measurement → relay)
  TELEMETRY: 'telemetry',

  // Actuation channel (relay → actuation, actuation → relay)
  COMMAND: 'command',
  ACK: 'ack',
} as const;

export type MessageType = typeof MESSAGE_TYPES[keyof typeof MESSAGE_TYPES];

// Peer slots; each listener serves exactly one
export const ROLES = {
  MEASUREMENT: 'measurement',
  ACTUATION: 'actuation',
} as const;

export type Role = typeof ROLES[keyof typeof ROLES];

export const ALL_ROLES: readonly Role[] = [ROLES.MEASUREMENT, ROLES.ACTUATION];

// Sample quality reported by the measurement agent
export const DATA_STATUS = {
  PROPER: 'Proper',
  JUNK: 'Junk',
} as const;

export type DataStatus = typeof DATA_STATUS[keyof typeof DATA_STATUS];

// Protocol constants
export const PROTOCOL = {
  VERSION: 1,
  MAX_PAYLOAD_SIZE: 64 * 1024,
  MAX_REQUEST_ID: 0xFFFFFFFF,
  MAX_AGENT_ID_LENGTH: 64,
} as const;

// WebSocket close codes used by the relay
export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INVALID_PAYLOAD: 1007,
  POLICY_VIOLATION: 1008,
  REPLACED: 4000,
  HANDSHAKE_TIMEOUT: 4001,
  LIVENESS_TIMEOUT: 4002,
} as const;

export type CloseCode = typeof CLOSE_CODES[keyof typeof CLOSE_CODES];
