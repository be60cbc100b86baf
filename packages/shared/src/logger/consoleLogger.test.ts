import { ConsoleLogger } from './consoleLogger';
import type { BatchStarted } from '../types/events';

const event: BatchStarted = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  batchId: 'batch-1',
  type: 'BatchStarted',
  payload: {
    artifact: '/opt/solver.jar',
    casePath: 'cases',
    ledgerPath: 'ledger.csv',
    caseCount: 3,
    loadErrors: 0,
    concurrency: 1,
    timeoutMs: 1000,
  },
};

describe('ConsoleLogger', () => {
  it('prints events as JSON only in verbose mode', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger().log(event);
    expect(debugSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ verbose: true }).log(event);
    expect(debugSpy).toHaveBeenCalledWith(JSON.stringify(event));

    debugSpy.mockRestore();
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ verbose: true });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));

    debugSpy.mockRestore();
    infoSpy.mockRestore();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('drops debug messages unless verbose', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger().debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();

    debugSpy.mockRestore();
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ batch: 1 }).child({ caseId: 'c01' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[batch=1 caseId=c01] hello');

    logger.child({ env: 'dev' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[env=dev] warn');

    infoSpy.mockRestore();
    warnSpy.mockRestore();
  });
});
