#!/usr/bin/env node
/**
 * Statusline - Entry point
 *
 * 1. Resolve config (defaults < ~/.claude/statusline.env < env < CLI)
 * 2. --help: usage on stderr, exit 0, stdin untouched
 * 3. Read stdin JSON (permissive), render two lines to stdout
 * 4. Fire background refreshes (model cache, cumulative stats), never awaited
 *
 * Never throws to the caller: a failed render prints two empty lines.
 */

import ConfigResolver, { HELP_TEXT } from './lib/config-resolver';
import { BackgroundRefresh } from './lib/background-refresh';
import { DaemonLog } from './lib/daemon-log';
import { parseSessionInput, readStdin } from './lib/session-input';
import { UsageCache } from './lib/usage-cache';
import { createRenderDeps, render, RenderDeps } from './render';
import { createDefaultSnapshot } from './types/statusline';

export interface StatuslineIO {
  argv: string[];
  env: NodeJS.ProcessEnv;
  readInput: () => string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  configPath?: string;
  deps?: RenderDeps;
  refresh?: BackgroundRefresh;
}

const EMPTY_RENDER = '\n\n';

/**
 * Run one invocation. Returns the process exit code.
 */
export function runStatusline(io: StatuslineIO): number {
  const config = ConfigResolver.resolve({ argv: io.argv, env: io.env, configPath: io.configPath });

  if (config.showHelp) {
    io.stderr(HELP_TEXT);
    return 0;
  }

  const cacheDir = UsageCache.resolveCacheDir(io.env);
  const cache = io.deps?.cache ?? new UsageCache(cacheDir);
  let snapshot = createDefaultSnapshot();

  try {
    snapshot = parseSessionInput(io.readInput());
    const deps: RenderDeps = io.deps ?? createRenderDeps(cache);
    io.stdout(render(snapshot, config, deps));
  } catch {
    io.stdout(EMPTY_RENDER);
  }

  const log = new DaemonLog(cache.basePath, io.env);
  try {
    const refresh = io.refresh ?? new BackgroundRefresh({ log });
    refresh.spawnCumulativeStats(snapshot.projectDir);
    const sessionId = UsageCache.sessionIdFromTranscript(snapshot.transcriptPath);
    refresh.spawnModelRefresh(sessionId, snapshot.transcriptPath);
  } catch (error) {
    log.error('background refresh not started', error);
  }

  return 0;
}

if (require.main === module) {
  process.exitCode = runStatusline({
    argv: process.argv.slice(2),
    env: process.env,
    readInput: readStdin,
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text)
  });
}
