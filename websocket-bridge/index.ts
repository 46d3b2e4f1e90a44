// Relay Bridge - Main Export
export { RelayBridge } from './RelayBridge';
export type {
  Positions,
  RelayBridgeEvents,
  RelayBridgeOptions,
  RelayPorts,
  RelayStatus,
  SessionEvent,
} from './RelayBridge';

// Core Components
export { WebSocketServer } from './core/WebSocketServer';
export type { ServerConfig, ServerStats } from './core/WebSocketServer';
export { WebSocketPeerConnection } from './core/WebSocketPeerConnection';
export { PeerRegistry } from './core/PeerRegistry';
export type { PeerSnapshot } from './core/PeerRegistry';
export { ResponseCorrelator } from './core/ResponseCorrelator';
export type { CorrelatorStats } from './core/ResponseCorrelator';

// Relay cycles
export { RelayLoop, CYCLE_OUTCOMES } from './handlers/RelayLoop';
export type { CycleResult, RelayLoopDependencies } from './handlers/RelayLoop';

// Protocol
export { JsonProtocol } from './protocol/JsonProtocol';
export { MessageValidator, isRole, isDataStatus } from './protocol/MessageValidator';
export type { ValidationResult } from './protocol/MessageValidator';

// Types
export * from './types/MessageTypes';
export * from './types/Interfaces';
