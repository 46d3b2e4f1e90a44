// Agent client export
export { AgentClient, resolveRelayUrl } from './AgentClient';
export type { AgentClientOptions } from './AgentClient';
export { MeasurementAgent } from './MeasurementAgent';
export type { MeasurementAgentOptions } from './MeasurementAgent';
export { ActuationAgent } from './ActuationAgent';
export type { ActuationAgentOptions } from './ActuationAgent';

// Providers
export { SimulatedSensor, classifyVoltage } from './providers/SimulatedSensor';
export { SimulatedActuator } from './providers/SimulatedActuator';
export { PollingPositionProvider, StaticPositionProvider } from './providers/PollingPositionProvider';
export type { PositionSource } from './providers/PollingPositionProvider';

export * from './types';
