import type { Command, Position } from '../websocket-bridge/types/Interfaces';
import type { DataStatus } from '../websocket-bridge/types/MessageTypes';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

// Events emitted by an agent's relay connection
export interface AgentClientEvents {
  connected: { url: string };
  disconnected: { code: number; reason: string };
  reconnecting: { attempt: number; delay: number };
  command: Command;
  error: Error;
}

export interface SensorReading {
  voltage: number;
  status: DataStatus;
}

// Measurement hardware (ADC)
export interface SensorProvider {
  read(): Promise<SensorReading>;
}

// Actuation hardware (DAC); apply resolves with the voltage actually output
export interface ActuatorProvider {
  apply(voltage: number, status: DataStatus): Promise<number>;
  reset(): Promise<void>;
}

// Latest location fix, or null without one
export interface PositionProvider {
  latest(): Position | null;
}
