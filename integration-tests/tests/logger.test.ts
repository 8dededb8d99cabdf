/**
 * Logger and Context Tests
 */

import {
  logger,
  runWithContext,
  runWithContextAsync,
  runForSourceRow,
  getContext,
} from '@journey-extractor/shared';

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  let logSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
    jest.restoreAllMocks();
  });

  it('should write JSON lines with the request context', () => {
    process.env.LOG_LEVEL = 'info';

    runWithContext({ correlationId: 'corr-1', batchId: 'batch-1', sourceId: 'r7' }, () => {
      logger.info('Row done', { confidence: 'low' });
    });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'INFO',
      correlationId: 'corr-1',
      batchId: 'batch-1',
      sourceId: 'r7',
      message: 'Row done',
      confidence: 'low',
    });
  });

  it('should serialize an error and keep the context beside it', () => {
    process.env.LOG_LEVEL = 'error';
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.error('Write failed', new Error('disk full'), { path: '/tmp/out.jsonl' });
    logger.error('Nothing to do', undefined, { path: '/tmp/in.csv' });

    const first: unknown = JSON.parse(String(errorSpy.mock.calls[0][0]));
    const second: unknown = JSON.parse(String(errorSpy.mock.calls[1][0]));
    expect(first).toMatchObject({
      message: 'Write failed',
      path: '/tmp/out.jsonl',
      error: { name: 'Error', message: 'disk full' },
    });
    expect(second).toMatchObject({ message: 'Nothing to do', path: '/tmp/in.csv' });
    expect(second).not.toHaveProperty('error');
  });

  it('should drop entries below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';

    logger.info('hidden');
    logger.debug('hidden');

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('should ignore an unknown level name', () => {
    process.env.LOG_LEVEL = 'constructor';

    logger.debug('visible');

    expect(debugSpy).toHaveBeenCalledTimes(1);
  });
});

describe('runForSourceRow', () => {
  it('should keep the enclosing ids and add the row id', async () => {
    const context = await runWithContextAsync(
      { correlationId: 'corr-2', batchId: 'batch-2' },
      () => runForSourceRow('r9', async () => getContext())
    );

    expect(context).toEqual({ correlationId: 'corr-2', batchId: 'batch-2', sourceId: 'r9' });
  });

  it('should generate a correlation id outside any context', async () => {
    const context = await runForSourceRow(null, async () => getContext());

    expect(context?.correlationId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(context?.sourceId).toBeUndefined();
  });
});
