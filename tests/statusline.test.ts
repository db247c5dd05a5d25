/**
 * Entry point tests - config, help, render, background refresh wiring
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ChildProcess } from 'child_process';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { runStatusline, type StatuslineIO } from '../src/statusline';
import { HELP_TEXT } from '../src/lib/config-resolver';
import { BackgroundRefresh, type SpawnFn } from '../src/lib/background-refresh';
import { DaemonLog } from '../src/lib/daemon-log';
import { UsageCache } from '../src/lib/usage-cache';
import { makeTempDir, mockSessionInput, removeDir } from './test-helpers';

class FailingRefresh extends BackgroundRefresh {
  spawnCumulativeStats(): boolean {
    throw new Error('boom');
  }
}

describe('runStatusline', () => {
  let tempDir: string;
  let out: string[];
  let err: string[];
  let spawned: string[][];
  let cache: UsageCache;
  let refresh: BackgroundRefresh;

  const io = (overrides: Partial<StatuslineIO>): StatuslineIO => ({
    argv: ['--no-color'],
    env: {},
    readInput: () => mockSessionInput({ transcriptPath: '/t/s1.jsonl' }),
    stdout: text => { out.push(text); },
    stderr: text => { err.push(text); },
    configPath: join(tempDir, 'absent.env'),
    deps: { cache, probeGit: () => null },
    refresh,
    ...overrides
  });

  beforeEach(() => {
    tempDir = makeTempDir('statusline-test');
    out = [];
    err = [];
    spawned = [];
    cache = new UsageCache(tempDir);
    const daemonScript = join(tempDir, 'data-daemon.js');
    writeFileSync(daemonScript, '');
    const spawn: SpawnFn = (_command, args) => {
      spawned.push(args);
      return new ChildProcess();
    };
    refresh = new BackgroundRefresh({
      log: new DaemonLog(tempDir, {}),
      spawn,
      daemonScript,
      cumulativeScripts: []
    });
  });

  afterEach(() => {
    removeDir(tempDir);
  });

  test('renders both lines and starts the model refresh', () => {
    expect(runStatusline(io({}))).toBe(0);
    expect(out).toEqual(['Opus │ ▓▓▓▓░░░░░░ 45% │ $2.5 │ 2m\nin:12k out:3.0k\n']);
    expect(err).toEqual([]);
    expect(spawned).toEqual([
      [join(tempDir, 'data-daemon.js'), '--session-id', 's1', '--transcript-path', '/t/s1.jsonl']
    ]);
  });

  test('--help prints usage to stderr without reading stdin', () => {
    let inputRead = false;
    const code = runStatusline(io({
      argv: ['--help'],
      readInput: () => {
        inputRead = true;
        return '';
      }
    }));
    expect(code).toBe(0);
    expect(err).toEqual([HELP_TEXT]);
    expect(out).toEqual([]);
    expect(inputRead).toBe(false);
    expect(spawned).toEqual([]);
  });

  test('a failed render prints two empty lines and exits 0', () => {
    const code = runStatusline(io({
      readInput: () => {
        throw new Error('stdin closed');
      }
    }));
    expect(code).toBe(0);
    expect(out).toEqual(['\n\n']);
    expect(spawned).toEqual([]);
  });

  test('empty stdin renders defaults', () => {
    runStatusline(io({ readInput: () => '' }));
    expect(out).toEqual(['? │ ░░░░░░░░░░ 0% │ $0.00 │ 0m\nin:0 out:0\n']);
  });

  test('a throwing refresh is logged and does not change the output', () => {
    const failing = new FailingRefresh({ log: new DaemonLog(tempDir, {}), cumulativeScripts: [] });
    expect(runStatusline(io({ refresh: failing }))).toBe(0);
    expect(out).toHaveLength(1);
    expect(readFileSync(join(tempDir, 'daemon.log'), 'utf-8'))
      .toContain('[ERROR] background refresh not started: boom\n');
  });
});
