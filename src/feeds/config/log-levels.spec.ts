import { resolveLogLevels } from './log-levels';

describe('resolveLogLevels', () => {
  it('enables the named level and everything more severe', () => {
    expect(resolveLogLevels('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(resolveLogLevels('verbose')).toEqual([
      'fatal',
      'error',
      'warn',
      'log',
      'debug',
      'verbose',
    ]);
  });

  it('falls back to log for unknown names', () => {
    expect(resolveLogLevels('chatty')).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});
