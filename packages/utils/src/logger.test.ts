import { afterEach, describe, expect, it } from 'vitest';
import { createLogger, logger, setLogLevel } from './logger.js';

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('reaches module loggers created before the change', () => {
    const child = createLogger({ module: 'early' });
    expect(child.isLevelEnabled('debug')).toBe(false);

    setLogLevel('debug');

    expect(logger.isLevelEnabled('debug')).toBe(true);
    expect(child.isLevelEnabled('debug')).toBe(true);
  });

  it('silences module loggers as well as the root', () => {
    const child = createLogger({ module: 'quiet' });

    setLogLevel('silent');

    expect(logger.isLevelEnabled('error')).toBe(false);
    expect(child.isLevelEnabled('error')).toBe(false);
  });
});
