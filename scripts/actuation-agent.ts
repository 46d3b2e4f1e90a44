/**
 * Actuation agent with a simulated DAC.
 *
 * Run with: npx tsx scripts/actuation-agent.ts
 * Set RELAY_URL (e.g. ws://192.168.1.20) to reach a remote relay and
 * AGENT_POSITION ("lat,lon") to report a fixed location.
 */

import * as os from 'os';
import { AgentClient, resolveRelayUrl } from '../agent-client/AgentClient';
import { ActuationAgent } from '../agent-client/ActuationAgent';
import { SimulatedActuator } from '../agent-client/providers/SimulatedActuator';
import { StaticPositionProvider } from '../agent-client/providers/PollingPositionProvider';
import { CONFIG, loadAgentConfig } from '../shared/config';
import { relayLogger } from '../shared/RelayLogger';

function main(): void {
  const config = loadAgentConfig();
  const client = new AgentClient({
    url: resolveRelayUrl(config.relayUrl, CONFIG.RELAY.ACTUATION_PORT),
    role: 'actuation',
    agentId: config.agentId ?? `actuation-${os.hostname()}`,
    reconnectBaseDelayMs: config.reconnectBaseDelayMs,
    reconnectMaxDelayMs: config.reconnectMaxDelayMs,
  });

  const agent = new ActuationAgent(client, new SimulatedActuator(), new StaticPositionProvider(config.position));

  const shutdown = () => {
    agent.stop()
      .catch(error => relayLogger.error('Actuation agent failed to stop cleanly', error, 'ACTUATION'))
      .finally(() => relayLogger.close());
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  agent.start();
}

main();
