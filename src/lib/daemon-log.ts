/**
 * Daemon Log - Observability for background work
 *
 * Location: <cache dir>/daemon.log
 * Format:   [ISO time] [PID:n] [LEVEL] message
 * Rotation: file is reset once it grows past 100KB
 * Disable:  STATUSLINE_DAEMON_LOG=0
 *
 * Only background code logs; the render path stays silent.
 */

import { appendFileSync, existsSync, mkdirSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import { sanitizeError } from './sanitize';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

const MAX_LOG_SIZE = 100 * 1024;

export class DaemonLog {
  readonly logPath: string;
  private readonly dir: string;
  private readonly enabled: boolean;

  constructor(dir: string, env: NodeJS.ProcessEnv = process.env) {
    this.dir = dir;
    this.logPath = join(dir, 'daemon.log');
    this.enabled = env.STATUSLINE_DAEMON_LOG !== '0';
  }

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARN', message);
  }

  /** Error text is sanitized (first line, credentials redacted). */
  error(message: string, error?: unknown): void {
    const detail = error === undefined ? '' : `: ${sanitizeError(error)}`;
    this.write('ERROR', `${message}${detail}`);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.enabled) return;

    try {
      if (!existsSync(this.dir)) {
        mkdirSync(this.dir, { recursive: true, mode: 0o700 });
      }

      if (existsSync(this.logPath) && statSync(this.logPath).size > MAX_LOG_SIZE) {
        writeFileSync(this.logPath, `[LOG ROTATED at ${new Date().toISOString()}]\n`, { mode: 0o600 });
      }

      const line = `[${new Date().toISOString()}] [PID:${process.pid}] [${level}] ${message}\n`;
      appendFileSync(this.logPath, line, { mode: 0o600 });
    } catch {
      // Can't log - give up silently (the status line must stay clean)
    }
  }
}

export default DaemonLog;
