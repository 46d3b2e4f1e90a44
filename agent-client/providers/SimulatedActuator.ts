import { CONFIG } from '../../shared/config';
import { DATA_STATUS, DataStatus } from '../../websocket-bridge/types/MessageTypes';
import { ActuatorProvider } from '../types';

/**
 * Stand-in DAC. Proper commands are clamped to the reference range;
 * anything else drives the output to 0 V.
 */
export class SimulatedActuator implements ActuatorProvider {
  private output = 0;

  constructor(private readonly maxVoltage: number = CONFIG.HARDWARE.DAC_REFERENCE_VOLTAGE) {}

  async apply(voltage: number, status: DataStatus): Promise<number> {
    this.output = status === DATA_STATUS.PROPER ? Math.min(Math.max(voltage, 0), this.maxVoltage) : 0;
    return this.output;
  }

  async reset(): Promise<void> {
    this.output = 0;
  }

  getOutput(): number {
    return this.output;
  }
}
