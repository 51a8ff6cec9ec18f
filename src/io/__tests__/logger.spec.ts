import { LogLevel } from '../../models';
import { Logger } from '../logger';

describe('Logger', () => {
  function collect(level: LogLevel = LogLevel.info) {
    const lines: Array<[LogLevel, string]> = [];
    const logger = new Logger({
      level,
      noColor: true,
      logMethod: (messageLevel, ...params) => lines.push([messageLevel, params.join(' ')]),
    });
    return { logger, lines };
  }

  it('drops messages below its level', () => {
    const { logger, lines } = collect(LogLevel.warn);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines).toEqual([
      [LogLevel.warn, 'shown'],
      [LogLevel.error, 'shown too'],
    ]);
  });

  it('prefixes messages of child loggers', () => {
    const { logger, lines } = collect();

    logger.child('Lab').child('A').info('start');

    expect(lines).toEqual([[LogLevel.info, '[Lab:A] start']]);
  });

  it('holds messages back until flushed', () => {
    const { logger, lines } = collect();
    const child = logger.child('Lab');

    child.collectMessages();
    child.info('first');
    logger.warn('second');
    expect(lines).toEqual([]);

    logger.flush();
    expect(lines).toEqual([
      [LogLevel.info, '[Lab] first'],
      [LogLevel.warn, 'second'],
    ]);
  });

  it('forgets collected messages on clear', () => {
    const { logger, lines } = collect();

    logger.collectMessages();
    logger.info('dropped');
    logger.clear();
    logger.flush();

    expect(lines).toEqual([]);
  });
});
