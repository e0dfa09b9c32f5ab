import fs from 'node:fs';
import path from 'node:path';
import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export type LoggerOptions = {
  level?: LevelWithSilent;
  name?: string;
  /** Also write every record at debug level to this file. */
  file?: string;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const base = {
    name: options.name,
    level: 'debug',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  };
  if (!options.file) {
    return pino({ ...base, level });
  }
  fs.mkdirSync(path.dirname(options.file), { recursive: true });
  const streams = pino.multistream([
    { level: level === 'silent' ? 'fatal' : level, stream: process.stdout },
    { level: 'debug', stream: pino.destination({ dest: options.file, sync: true }) }
  ]);
  return pino(base, streams);
}

export function logFilePath(workspace: string, workflowName: string, now = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return path.join(workspace, 'logs', `${workflowName}_${stamp}.log`);
}
