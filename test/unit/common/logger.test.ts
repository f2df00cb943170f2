import { createLogger } from '../../../src/common/logger';

describe('HarnessLogger', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  it('prefixes each category and honours its flag', () => {
    const logger = createLogger({ enableHarnessLogs: true, enableStageLogs: true, enablePoolLogs: false, enableTestMode: false });

    logger.harness('stage write started');
    logger.stage('write', 'written 10/20 records');
    logger.pool('replica-1', 'drained');

    expect(log.mock.calls).toEqual([
      ['[HARNESS] stage write started'],
      ['[WRITE] written 10/20 records']
    ]);
  });

  it('prints pool activity with the node id when enabled', () => {
    const logger = createLogger({ enablePoolLogs: true, enableTestMode: false });

    logger.harness('run passed (exit code 0)');
    logger.pool('replica-1', 'initialized with 1 connection(s)');

    expect(log.mock.calls).toEqual([['[POOL:replica-1] initialized with 1 connection(s)']]);
  });

  it('stays silent in test mode', () => {
    const logger = createLogger({ enableHarnessLogs: true, enableStageLogs: true, enablePoolLogs: true, enableTestMode: true });

    logger.harness('stage write started');
    logger.stage('write', 'written 10/20 records');
    logger.pool('replica-1', 'drained');

    expect(log).not.toHaveBeenCalled();
  });
});
