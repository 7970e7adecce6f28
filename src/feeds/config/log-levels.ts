import { LogLevel } from '@nestjs/common';

// Most severe first; a level enables itself and everything before it.
const SEVERITY: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export function resolveLogLevels(level: string): LogLevel[] {
  const index = SEVERITY.findIndex((candidate) => candidate === level);
  return SEVERITY.slice(0, index === -1 ? SEVERITY.indexOf('log') + 1 : index + 1);
}
