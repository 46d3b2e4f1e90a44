import { isLogLevel, relayLogger } from './RelayLogger';

describe('relayLogger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    relayLogger.setLevel('silent');
    jest.restoreAllMocks();
  });

  test('drops messages below the configured level', () => {
    relayLogger.setLevel('warn');

    relayLogger.info('routine');
    relayLogger.debug('noise');
    relayLogger.warn('careful', undefined, 'TEST');
    relayLogger.error('broken', new Error('boom'), 'TEST');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toEqual(expect.stringContaining('[WARN] [TEST] careful'));
    expect(error.mock.calls[0][0]).toEqual(expect.stringContaining('[ERROR] [TEST] broken | {"error":"boom","name":"Error"}'));
  });

  test('silent suppresses everything', () => {
    relayLogger.setLevel('silent');

    relayLogger.error('hidden');

    expect(error).not.toHaveBeenCalled();
    expect(relayLogger.getLevel()).toBe('silent');
  });

  test('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  test('does not take inherited object keys for level names', () => {
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
  });
});
