/**
 * Git Module - Repository status for the status line
 * Data Source: git commands (sequential, 2s timeout each)
 *
 * Every query degrades on its own: non-zero exit, timeout or spawn failure
 * gives '' for that query and the rest still run.
 */

import { spawnSync } from 'child_process';
import { realpathSync } from 'fs';
import { dirname, join, resolve } from 'path';
import type { GitSummary } from '../types/statusline';
import { shortenBranch, truncate } from '../lib/formatters';

/** Runs `git <args>` in cwd; returns stdout, or '' on any failure. */
export type GitRunner = (args: string[], cwd: string, timeoutMs: number) => string;

export interface GitModuleConfig {
  timeout: number;
  maxNameLength: number;
  cwd: string;
}

const WORKTREE_ICON = '⊕';

export const runGit: GitRunner = (args, cwd, timeoutMs) => {
  try {
    const result = spawnSync('git', args, {
      cwd,
      encoding: 'utf-8',
      timeout: timeoutMs,
      killSignal: 'SIGKILL',
      maxBuffer: 512 * 1024,
      stdio: ['ignore', 'pipe', 'ignore']
    });
    if (result.error || result.status !== 0) return '';
    return result.stdout;
  } catch {
    return '';
  }
};

function resolveRealpath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}

function toCount(text: string): number {
  const n = parseInt(text.trim(), 10);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

class GitModule {
  config: GitModuleConfig = { timeout: 2000, maxNameLength: 20, cwd: process.cwd() };
  private runner: GitRunner;

  constructor(config?: Partial<GitModuleConfig>, runner: GitRunner = runGit) {
    if (config) {
      this.config = { ...this.config, ...config };
    }
    this.runner = runner;
  }

  private git(...args: string[]): string {
    return this.runner(args, this.config.cwd, this.config.timeout).trim();
  }

  /**
   * Probe the working tree. Null when not on a branch (no repo, detached HEAD).
   */
  fetch(): GitSummary | null {
    const branch = this.git('branch', '--show-current');
    if (!branch) return null;

    const { inWorktree, worktreeName } = this.detectWorktree();

    const dirty = this.git('status', '--porcelain') !== '';

    // No upstream → rev-list fails → 0
    const ahead = toCount(this.git('rev-list', '--count', '@{u}..HEAD'));
    const behind = toCount(this.git('rev-list', '--count', 'HEAD..@{u}'));

    const stashList = this.git('stash', 'list');
    const stash = stashList ? stashList.split('\n').filter(l => l.trim()).length : 0;

    return {
      branch,
      display: this.formatDisplay(branch, inWorktree, worktreeName),
      inWorktree,
      worktreeName,
      dirty,
      ahead,
      behind,
      stash
    };
  }

  /**
   * Linked worktree when the resolved common dir is not <toplevel>/.git.
   * Name is the path below <main>/.worktrees/, else the full toplevel.
   */
  private detectWorktree(): { inWorktree: boolean; worktreeName: string } {
    const toplevel = this.git('rev-parse', '--show-toplevel');
    const commonDir = this.git('rev-parse', '--git-common-dir');
    if (!toplevel || !commonDir) {
      return { inWorktree: false, worktreeName: '' };
    }

    const resolvedCommon = resolveRealpath(resolve(this.config.cwd, commonDir));
    if (resolvedCommon === join(toplevel, '.git')) {
      return { inWorktree: false, worktreeName: '' };
    }

    const mainToplevel = dirname(resolvedCommon);
    const prefix = `${mainToplevel}/.worktrees/`;
    const worktreeName = toplevel.startsWith(prefix) ? toplevel.slice(prefix.length) : toplevel;
    return { inWorktree: true, worktreeName };
  }

  private formatDisplay(branch: string, inWorktree: boolean, worktreeName: string): string {
    const max = this.config.maxNameLength;
    const sb = truncate(shortenBranch(branch), max);
    if (!inWorktree) return sb;

    const sw = truncate(shortenBranch(worktreeName), max);
    return sw === sb ? `${WORKTREE_ICON} ${sb}` : `${WORKTREE_ICON}${sw} ${sb}`;
  }

  /**
   * "↑2 ↓1 stash:3" with zero counts omitted; '' when all zero.
   */
  static formatExtras(summary: GitSummary): string {
    const parts: string[] = [];
    if (summary.ahead > 0) parts.push(`↑${summary.ahead}`);
    if (summary.behind > 0) parts.push(`↓${summary.behind}`);
    if (summary.stash > 0) parts.push(`stash:${summary.stash}`);
    return parts.join(' ');
  }
}

export default GitModule;
