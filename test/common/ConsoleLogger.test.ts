import { ConsoleLogger } from '../../src/infrastructure/common/ConsoleLogger';

const AT = new Date('2026-01-02T03:04:05.000Z');

describe('ConsoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should format pretty lines with context and metadata', () => {
    const logger = new ConsoleLogger('info', { component: 'storage' });

    expect(logger.formatMessage('warn', 'Disk slow', { ms: 120 }, AT))
      .toBe('2026-01-02T03:04:05.000Z [WARN] [component=storage] Disk slow {"ms":120}');
  });

  it('should format one JSON object per line', () => {
    const logger = new ConsoleLogger('info', { component: 'scheduler' }, 'json');

    const line = logger.formatMessage('info', 'Cycle finished', { outcome: 'played' }, AT);

    expect(JSON.parse(line)).toEqual({
      timestamp: '2026-01-02T03:04:05.000Z',
      level: 'info',
      message: 'Cycle finished',
      component: 'scheduler',
      outcome: 'played'
    });
  });

  it('should drop messages below the configured level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('info');

    logger.debug('hidden');
    logger.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
  });

  it('should merge context into child loggers', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('info', { app: 'ambush' }, 'json');

    logger.child({ component: 'voice' }).info('Joined');

    const line: unknown = JSON.parse(String(info.mock.calls[0][0]));
    expect(line).toMatchObject({ app: 'ambush', component: 'voice', message: 'Joined' });
  });
});
