/**
 * Background Refresh - Fire-and-forget cache updates
 *
 * Two detached tasks per render, neither awaited:
 *   1. data-daemon: rescans the transcript → models-<sessionId>.json
 *   2. cumulative-stats.sh (external, optional): rolling 1/7/30-day costs
 *
 * The render never learns whether they ran. Results land in the cache
 * directory and are picked up by a later render. Launch failures, sync or
 * async, are recorded in daemon.log and otherwise ignored.
 */

import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { accessSync, constants, existsSync, statSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { DaemonLog } from './daemon-log';

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface BackgroundRefreshOptions {
  log: DaemonLog;
  spawn?: SpawnFn;
  /** Node entry of the data daemon; refresh is skipped when the file is missing. */
  daemonScript?: string;
  /** Candidate locations of cumulative-stats.sh, first executable file wins. */
  cumulativeScripts?: string[];
}

const DETACHED: SpawnOptions = { detached: true, stdio: 'ignore' };

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class BackgroundRefresh {
  private readonly log: DaemonLog;
  private readonly spawn: SpawnFn;
  private readonly daemonScript: string;
  private readonly cumulativeScripts: string[];

  constructor(options: BackgroundRefreshOptions) {
    this.log = options.log;
    this.spawn = options.spawn ?? nodeSpawn;
    this.daemonScript = options.daemonScript ?? join(__dirname, '..', 'data-daemon.js');
    this.cumulativeScripts = options.cumulativeScripts ?? BackgroundRefresh.defaultCumulativeScripts();
  }

  static defaultCumulativeScripts(): string[] {
    return [
      join(__dirname, '..', 'cumulative-stats.sh'),
      join(__dirname, '..', '..', 'scripts', 'cumulative-stats.sh'),
      join(homedir(), '.claude', 'cumulative-stats.sh')
    ];
  }

  findCumulativeScript(): string | null {
    return this.cumulativeScripts.find(isExecutableFile) ?? null;
  }

  /**
   * Launch the data daemon for this session. Returns whether a process was started.
   */
  spawnModelRefresh(sessionId: string, transcriptPath: string): boolean {
    if (!sessionId || !transcriptPath) return false;
    if (!existsSync(this.daemonScript)) return false;

    return this.launch('data-daemon', process.execPath, [
      this.daemonScript,
      '--session-id', sessionId,
      '--transcript-path', transcriptPath
    ]);
  }

  /**
   * Launch the external cumulative-stats collaborator, when installed.
   */
  spawnCumulativeStats(projectDir: string): boolean {
    if (!projectDir) return false;
    const script = this.findCumulativeScript();
    if (!script) return false;

    return this.launch('cumulative-stats', script, [projectDir]);
  }

  private launch(name: string, command: string, args: string[]): boolean {
    try {
      const child = this.spawn(command, args, DETACHED);
      child.on('error', (error: Error) => {
        this.log.error(`${name} spawn failed`, error);
      });
      child.unref();
      return true;
    } catch (error) {
      this.log.error(`${name} spawn failed`, error);
      return false;
    }
  }
}

export default BackgroundRefresh;
