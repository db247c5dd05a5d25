#!/usr/bin/env node
/**
 * DATA DAEMON - Background model-usage refresh (decoupled from display)
 *
 * INVOCATION:
 *   data-daemon --session-id <id> --transcript-path <path>
 * Launched detached by the statusline after it has printed; nothing waits on it.
 *
 * EFFECT:
 *   Rescans the transcript (+ subagent transcripts) and atomically replaces
 *   <cache>/models-<id>.json for the NEXT render.
 *
 * FAILURE MODE:
 *   Display keeps showing the previous cache (or the aggregate fallback).
 *   Errors go to <cache>/daemon.log; stdout is never written.
 */

import { DaemonLog } from './lib/daemon-log';
import { ModelUsageScanner } from './lib/model-usage-scanner';
import { sanitizeSessionId } from './lib/sanitize';
import { UsageCache } from './lib/usage-cache';

export interface DaemonArgs {
  sessionId: string;
  transcriptPath: string;
}

export function parseDaemonArgs(argv: string[]): DaemonArgs {
  const valueOf = (flag: string): string => {
    const idx = argv.indexOf(flag);
    return idx >= 0 && idx + 1 < argv.length ? argv[idx + 1] : '';
  };
  return {
    sessionId: sanitizeSessionId(valueOf('--session-id')),
    transcriptPath: valueOf('--transcript-path')
  };
}

/**
 * Scan and persist. Resolves to the written cache path, or null when the
 * arguments were incomplete or the refresh failed.
 */
export async function refreshModelUsage(
  args: DaemonArgs,
  cache: UsageCache,
  log: DaemonLog
): Promise<string | null> {
  if (!args.sessionId || !args.transcriptPath) {
    log.warn('missing --session-id or --transcript-path - skipping');
    return null;
  }

  const startTime = Date.now();
  log.info(`Session ${args.sessionId} refresh started`);
  try {
    const result = await ModelUsageScanner.scan(args.transcriptPath, args.sessionId);
    const target = cache.writeModelUsage(args.sessionId, result.models);
    const duration = Date.now() - startTime;
    log.info(
      `Session ${args.sessionId} updated in ${duration}ms ` +
      `(${result.models.length} models, ${result.filesScanned} files, ${result.linesSkipped} lines skipped)`
    );
    return target;
  } catch (error) {
    const duration = Date.now() - startTime;
    log.error(`Refresh for ${args.sessionId} failed after ${duration}ms`, error);
    return null;
  }
}

if (require.main === module) {
  const cache = new UsageCache();
  const log = new DaemonLog(cache.basePath);
  refreshModelUsage(parseDaemonArgs(process.argv.slice(2)), cache, log)
    .catch((error: unknown) => log.error('Daemon failed', error));
}
