/**
 * Measurement agent with a simulated sensor.
 *
 * Run with: npx tsx scripts/measurement-agent.ts
 * Set RELAY_URL (e.g. ws://192.168.1.20) to reach a remote relay and
 * AGENT_POSITION ("lat,lon") to report a fixed location.
 */

import * as os from 'os';
import { AgentClient, resolveRelayUrl } from '../agent-client/AgentClient';
import { MeasurementAgent } from '../agent-client/MeasurementAgent';
import { SimulatedSensor } from '../agent-client/providers/SimulatedSensor';
import { StaticPositionProvider } from '../agent-client/providers/PollingPositionProvider';
import { CONFIG, loadAgentConfig } from '../shared/config';
import { relayLogger } from '../shared/RelayLogger';

function main(): void {
  const config = loadAgentConfig();
  const client = new AgentClient({
    url: resolveRelayUrl(config.relayUrl, CONFIG.RELAY.MEASUREMENT_PORT),
    role: 'measurement',
    agentId: config.agentId ?? `measurement-${os.hostname()}`,
    reconnectBaseDelayMs: config.reconnectBaseDelayMs,
    reconnectMaxDelayMs: config.reconnectMaxDelayMs,
  });

  const agent = new MeasurementAgent(client, new SimulatedSensor(), new StaticPositionProvider(config.position), {
    sampleIntervalMs: config.sampleIntervalMs,
  });

  const shutdown = () => {
    agent.stop();
    relayLogger.close();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  agent.start();
}

main();
