import { CONFIG } from '../../shared/config';
import { DATA_STATUS, DataStatus } from '../../websocket-bridge/types/MessageTypes';
import { SensorProvider, SensorReading } from '../types';

// Readings at or below this are treated as a disconnected input
export function classifyVoltage(voltage: number, threshold: number = CONFIG.HARDWARE.PROPER_VOLTAGE_THRESHOLD): DataStatus {
  return voltage > threshold ? DATA_STATUS.PROPER : DATA_STATUS.JUNK;
}

// Slow sine sweep across the ADC range
function sweep(): number {
  const half = CONFIG.HARDWARE.DAC_REFERENCE_VOLTAGE / 2;
  return half + half * Math.sin(Date.now() / 2000);
}

export class SimulatedSensor implements SensorProvider {
  constructor(private readonly source: () => number = sweep) {}

  async read(): Promise<SensorReading> {
    const voltage = this.source();
    return { voltage, status: classifyVoltage(voltage) };
  }
}
