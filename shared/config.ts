import * as os from 'os';
import * as path from 'path';
import { ConfigError } from './errors';

// Core application configuration constants
export const CONFIG = {
  // Relay listeners, one port per role
  RELAY: {
    HOST: '0.0.0.0', // Bind to all interfaces so agents on the LAN can reach us
    MEASUREMENT_PORT: 65430,
    ACTUATION_PORT: 65431,
    ACK_TIMEOUT_MS: 2000,
    HANDSHAKE_TIMEOUT_MS: 5000,
    HEARTBEAT_INTERVAL: 30000,
    CONNECTION_TIMEOUT: 60000,
    MAX_PAYLOAD_SIZE: 64 * 1024, // 64KB
  },

  // Agent processes
  AGENT: {
    DEFAULT_URL: 'ws://127.0.0.1',
    SAMPLE_INTERVAL_MS: 500,
    RECONNECT_BASE_DELAY: 5000,
    RECONNECT_MAX_DELAY: 30000,
    POSITION_POLL_INTERVAL_MS: 3000,
  },

  // Hardware thresholds used by the simulated providers
  HARDWARE: {
    PROPER_VOLTAGE_THRESHOLD: 0.1,
    DAC_REFERENCE_VOLTAGE: 3.3,
  },

  REPORT: {
    OUTPUT_DIR: path.join(os.homedir(), 'Documents', 'TelemetryRelay', 'reports'),
  },
} as const;

export interface RelayConfig {
  host: string;
  measurementPort: number;
  actuationPort: number;
  ackTimeoutMs: number;
  handshakeTimeoutMs: number;
  heartbeatIntervalMs: number;
  connectionTimeoutMs: number;
  maxPayloadSize: number;
  reportDir: string;
  logFile: string | null;
}

export interface AgentConfig {
  relayUrl: string;
  agentId: string | null;
  sampleIntervalMs: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  positionPollIntervalMs: number;
  position: [number, number] | null;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number, min: number = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readPort(env: Env, key: string, fallback: number): number {
  const port = readInteger(env, key, fallback);
  if (port > 65535) {
    throw new ConfigError(`${key} must be a valid TCP port, got "${port}"`);
  }
  return port;
}

function readString(env: Env, key: string): string | null {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? null : raw.trim();
}

// "lat,lon" in decimal degrees
function readPosition(env: Env, key: string): [number, number] | null {
  const raw = readString(env, key);
  if (raw === null) return null;

  const parts = raw.split(',').map(part => Number(part.trim()));
  if (parts.length !== 2 || !parts.every(Number.isFinite)
    || Math.abs(parts[0]) > 90 || Math.abs(parts[1]) > 180) {
    throw new ConfigError(`${key} must be "lat,lon" in decimal degrees, got "${raw}"`);
  }
  return [parts[0], parts[1]];
}

// Build relay configuration from defaults and environment overrides
export function loadRelayConfig(env: Env = process.env): RelayConfig {
  return {
    host: readString(env, 'RELAY_HOST') ?? CONFIG.RELAY.HOST,
    measurementPort: readPort(env, 'RELAY_MEASUREMENT_PORT', CONFIG.RELAY.MEASUREMENT_PORT),
    actuationPort: readPort(env, 'RELAY_ACTUATION_PORT', CONFIG.RELAY.ACTUATION_PORT),
    ackTimeoutMs: readInteger(env, 'RELAY_ACK_TIMEOUT_MS', CONFIG.RELAY.ACK_TIMEOUT_MS, 1),
    handshakeTimeoutMs: readInteger(env, 'RELAY_HANDSHAKE_TIMEOUT_MS', CONFIG.RELAY.HANDSHAKE_TIMEOUT_MS, 1),
    heartbeatIntervalMs: CONFIG.RELAY.HEARTBEAT_INTERVAL,
    connectionTimeoutMs: CONFIG.RELAY.CONNECTION_TIMEOUT,
    maxPayloadSize: CONFIG.RELAY.MAX_PAYLOAD_SIZE,
    reportDir: readString(env, 'RELAY_REPORT_DIR') ?? CONFIG.REPORT.OUTPUT_DIR,
    logFile: readString(env, 'RELAY_LOG_FILE'),
  };
}

// Build agent configuration; the URL's port is chosen per role by the caller
export function loadAgentConfig(env: Env = process.env): AgentConfig {
  return {
    relayUrl: readString(env, 'RELAY_URL') ?? CONFIG.AGENT.DEFAULT_URL,
    agentId: readString(env, 'AGENT_ID'),
    sampleIntervalMs: readInteger(env, 'AGENT_SAMPLE_INTERVAL_MS', CONFIG.AGENT.SAMPLE_INTERVAL_MS, 1),
    reconnectBaseDelayMs: readInteger(env, 'AGENT_RECONNECT_DELAY_MS', CONFIG.AGENT.RECONNECT_BASE_DELAY, 1),
    reconnectMaxDelayMs: CONFIG.AGENT.RECONNECT_MAX_DELAY,
    positionPollIntervalMs: CONFIG.AGENT.POSITION_POLL_INTERVAL_MS,
    position: readPosition(env, 'AGENT_POSITION'),
  };
}
