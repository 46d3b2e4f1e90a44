import { CONFIG, loadAgentConfig, loadRelayConfig } from './config';
import { ConfigError } from './errors';

describe('loadRelayConfig', () => {
  test('uses defaults when the environment is empty', () => {
    const config = loadRelayConfig({});

    expect(config.host).toBe('0.0.0.0');
    expect(config.measurementPort).toBe(65430);
    expect(config.actuationPort).toBe(65431);
    expect(config.ackTimeoutMs).toBe(2000);
    expect(config.reportDir).toBe(CONFIG.REPORT.OUTPUT_DIR);
    expect(config.logFile).toBeNull();
  });

  test('applies overrides', () => {
    const config = loadRelayConfig({
      RELAY_HOST: '127.0.0.1',
      RELAY_MEASUREMENT_PORT: '7000',
      RELAY_ACTUATION_PORT: '0',
      RELAY_ACK_TIMEOUT_MS: '750',
      RELAY_REPORT_DIR: '/tmp/reports',
      RELAY_LOG_FILE: '/tmp/relay.log',
    });

    expect(config.host).toBe('127.0.0.1');
    expect(config.measurementPort).toBe(7000);
    expect(config.actuationPort).toBe(0);
    expect(config.ackTimeoutMs).toBe(750);
    expect(config.reportDir).toBe('/tmp/reports');
    expect(config.logFile).toBe('/tmp/relay.log');
  });

  test('treats blank values as unset', () => {
    expect(loadRelayConfig({ RELAY_MEASUREMENT_PORT: '  ' }).measurementPort).toBe(65430);
  });

  test('rejects malformed numbers', () => {
    expect(() => loadRelayConfig({ RELAY_MEASUREMENT_PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadRelayConfig({ RELAY_ACTUATION_PORT: '70000' })).toThrow('RELAY_ACTUATION_PORT must be a valid TCP port, got "70000"');
    expect(() => loadRelayConfig({ RELAY_ACK_TIMEOUT_MS: '0' })).toThrow('RELAY_ACK_TIMEOUT_MS must be an integer >= 1, got "0"');
  });
});

describe('loadAgentConfig', () => {
  test('uses defaults and reads overrides', () => {
    expect(loadAgentConfig({})).toEqual({
      relayUrl: 'ws://127.0.0.1',
      agentId: null,
      sampleIntervalMs: 500,
      reconnectBaseDelayMs: 5000,
      reconnectMaxDelayMs: 30000,
      positionPollIntervalMs: 3000,
      position: null,
    });

    const config = loadAgentConfig({ RELAY_URL: 'ws://10.0.0.5', AGENT_ID: 'bench-sensor', AGENT_SAMPLE_INTERVAL_MS: '250' });
    expect(config.relayUrl).toBe('ws://10.0.0.5');
    expect(config.agentId).toBe('bench-sensor');
    expect(config.sampleIntervalMs).toBe(250);
  });
});

describe('AGENT_POSITION', () => {
  test('parses a fixed location', () => {
    expect(loadAgentConfig({ AGENT_POSITION: '52.52, 13.405' }).position).toEqual([52.52, 13.405]);
  });

  test('rejects anything but two in-range numbers', () => {
    expect(() => loadAgentConfig({ AGENT_POSITION: '52.52' })).toThrow('AGENT_POSITION must be "lat,lon" in decimal degrees, got "52.52"');
    expect(() => loadAgentConfig({ AGENT_POSITION: '95,10' })).toThrow(ConfigError);
    expect(() => loadAgentConfig({ AGENT_POSITION: 'north,east' })).toThrow(ConfigError);
  });
});
