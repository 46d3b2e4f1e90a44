/**
 * Relay control center: both role listeners plus an operator console.
 *
 * Run with: npx tsx scripts/relay.ts
 * Console commands: start, stop, status, help, quit
 */

import * as readline from 'readline';
import { RelayBridge } from '../websocket-bridge/RelayBridge';
import { CSVReportSink } from '../session-log/CSVReportSink';
import { loadRelayConfig } from '../shared/config';
import { describeError } from '../shared/errors';
import { relayLogger } from '../shared/RelayLogger';

const HELP = [
  'start   start a session (both peers must be connected)',
  'stop    stop the session and write its report',
  'status  show peers, session and last known positions',
  'quit    stop everything and exit',
].join('\n');

function formatPosition(position: [number, number] | null): string {
  return position ? `[${position[0]}, ${position[1]}]` : 'None';
}

function printStatus(bridge: RelayBridge): void {
  const status = bridge.getStatus();
  const lines = [
    `Listening:   ${status.listening ? `measurement ${status.listening.measurement}, actuation ${status.listening.actuation}` : 'no'}`,
    ...(['measurement', 'actuation'] as const).map(role => {
      const peer = status.peers[role];
      const label = `${role[0].toUpperCase()}${role.slice(1)}:`.padEnd(13);
      return peer.connected ? `${label}${peer.agentId} @ ${peer.remoteAddress}` : `${label}not connected`;
    }),
    `Session:     ${status.session.active ? `${status.session.sessionId} (${status.session.recordCount} records)` : 'inactive'}`,
    `Positions:   measurement ${formatPosition(status.positions.measurement)}, actuation ${formatPosition(status.positions.actuation)}`,
    `Acks:        ${status.correlator.delivered} delivered, ${status.correlator.timeouts} timeouts, ${status.correlator.stale} stale`,
  ];
  console.log(lines.join('\n'));
}

async function main(): Promise<void> {
  const config = loadRelayConfig();
  if (config.logFile) {
    relayLogger.attachFile(config.logFile);
  }

  const sink = new CSVReportSink(config.reportDir);
  const bridge = new RelayBridge(config, { sink });

  bridge.on('record', record => {
    relayLogger.info(`#${record.sequence} delay ${record.delayMs.toFixed(2)} ms, ${record.status} ${record.sensorVoltage.toFixed(4)}V -> ${record.appliedVoltage.toFixed(4)}V`, undefined, 'CYCLE');
  });

  await bridge.start();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'relay> ' });
  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    rl.close();
    await bridge.stop();
    relayLogger.close();
  };

  const handleLine = async (line: string): Promise<void> => {
    switch (line.trim().toLowerCase()) {
      case '':
        break;
      case 'start':
        relayLogger.info(`Session ${bridge.startSession()} started`, undefined, 'CONSOLE');
        break;
      case 'stop': {
        const summary = await bridge.stopSession('operator');
        if (!summary) {
          console.log('No active session');
        } else {
          console.log(`Session ${summary.sessionId}: ${summary.records.length} records, average delay ${summary.meanDelayMs.toFixed(2)} ms`);
        }
        break;
      }
      case 'status':
        printStatus(bridge);
        break;
      case 'help':
        console.log(HELP);
        break;
      case 'quit':
      case 'exit':
        await shutdown();
        return;
      default:
        console.log(`Unknown command "${line.trim()}"\n${HELP}`);
    }
  };

  rl.on('line', line => {
    handleLine(line)
      .catch(error => console.log(`Error: ${describeError(error)}`))
      .finally(() => {
        if (!shuttingDown) rl.prompt();
      });
  });
  rl.on('close', () => {
    shutdown().catch(error => relayLogger.error('Shutdown failed', error));
  });

  process.on('SIGINT', () => {
    shutdown().catch(error => relayLogger.error('Shutdown failed', error));
  });
  process.on('SIGTERM', () => {
    shutdown().catch(error => relayLogger.error('Shutdown failed', error));
  });

  console.log(HELP);
  rl.prompt();
}

main().catch(error => {
  relayLogger.error('Relay failed to start', error);
  process.exitCode = 1;
});
