/**
 * Usage Cache - Reader/writer for the statusline cache directory
 *
 * Path: $XDG_CACHE_HOME/claude-code-statusline (default ~/.cache/claude-code-statusline)
 *
 *   all.json                 global cumulative {d1:{cost}, d7:{cost}, d30:{cost}}
 *   proj-<hash>.json         per-project cumulative (same shape)
 *   models-<sessionId>.json  per-session model usage {models:[{model,in,out}]}
 *
 * Cumulative files are written by the external cumulative-stats script; model
 * files by the data daemon. The render path only reads, and every read
 * degrades to null on a missing, empty or malformed file.
 *
 * Writes are atomic: temp file in the same directory, then rename.
 */

import { createHash } from 'crypto';
import { existsSync, mkdirSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { basename, extname, join } from 'path';
import type {
  CumulativeCost,
  ModelFamilyTotals,
  ModelUsageDocument,
  ModelUsageEntry
} from '../types/statusline';
import { createEmptyFamilyTotals } from '../types/statusline';
import { coerceNumber, isRecord, numberOr, safeReadJson } from './json-utils';
import { sanitizeSessionId } from './sanitize';

const CACHE_DIR_NAME = 'claude-code-statusline';

/** Checked in order; first substring hit wins. Case-sensitive. */
const MODEL_FAMILIES: ReadonlyArray<keyof ModelFamilyTotals> = ['opus', 'sonnet', 'haiku'];

export class UsageCache {
  readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath || UsageCache.resolveCacheDir();
  }

  static resolveCacheDir(env: NodeJS.ProcessEnv = process.env): string {
    const xdg = env.XDG_CACHE_HOME;
    if (xdg) return join(xdg, CACHE_DIR_NAME);
    return join(homedir(), '.cache', CACHE_DIR_NAME);
  }

  /**
   * 8-hex project key shared with cumulative-stats.sh:
   * md5("<path without leading '/', '/' → '-'>\n").slice(0, 8)
   */
  static projectHash(projectDir: string): string {
    const slug = projectDir.replace(/^\//, '').replace(/\//g, '-');
    return createHash('md5').update(`${slug}\n`).digest('hex').slice(0, 8);
  }

  /** "/x/abc-123.jsonl" → "abc-123" (sanitized; '' when unusable) */
  static sessionIdFromTranscript(transcriptPath: string): string {
    if (!transcriptPath) return '';
    const base = basename(transcriptPath);
    return sanitizeSessionId(base.slice(0, base.length - extname(base).length));
  }

  globalPath(): string {
    return join(this.basePath, 'all.json');
  }

  projectPath(projectDir: string): string {
    return join(this.basePath, `proj-${UsageCache.projectHash(projectDir)}.json`);
  }

  modelsPath(sessionId: string): string {
    return join(this.basePath, `models-${sessionId}.json`);
  }

  // -------------------------------------------------------------------------
  // Read path
  // -------------------------------------------------------------------------

  /**
   * Per-session model usage, summed by family. Null when no cache exists yet
   * or it cannot be parsed.
   */
  readModelUsage(sessionId: string): ModelFamilyTotals | null {
    if (!sessionId) return null;
    const doc = safeReadJson(this.modelsPath(sessionId));
    if (!isRecord(doc) || !Array.isArray(doc.models)) return null;

    const totals = createEmptyFamilyTotals();
    for (const item of doc.models) {
      if (!isRecord(item)) continue;
      const model = item.model;
      if (typeof model !== 'string') continue;
      const family = MODEL_FAMILIES.find(name => model.includes(name));
      if (!family) continue;
      totals[family].in += numberOr(item.in, 0);
      totals[family].out += numberOr(item.out, 0);
    }
    return totals;
  }

  /** Project (when projectDir is known) and global rolling windows. */
  readCumulative(projectDir: string): { project: CumulativeCost | null; global: CumulativeCost | null } {
    return {
      project: projectDir ? this.readCumulativeFile(this.projectPath(projectDir)) : null,
      global: this.readCumulativeFile(this.globalPath())
    };
  }

  /** All-zero windows read as absent. */
  private readCumulativeFile(path: string): CumulativeCost | null {
    const doc = safeReadJson(path);
    if (!isRecord(doc)) return null;

    const windowCost = (key: string): number => {
      const period = doc[key];
      return isRecord(period) ? coerceNumber(period.cost) ?? 0 : 0;
    };

    const stats: CumulativeCost = { d1: windowCost('d1'), d7: windowCost('d7'), d30: windowCost('d30') };
    if (stats.d1 === 0 && stats.d7 === 0 && stats.d30 === 0) return null;
    return stats;
  }

  // -------------------------------------------------------------------------
  // Write path (background only)
  // -------------------------------------------------------------------------

  ensureDirectory(): void {
    if (!existsSync(this.basePath)) {
      mkdirSync(this.basePath, { recursive: true, mode: 0o700 });
    }
  }

  /**
   * Atomic write: temp file beside the target, then rename over it.
   * A reader sees either the old document or the complete new one.
   * Temp names carry the PID so concurrent writers never share one.
   */
  atomicWrite(filePath: string, data: string): void {
    this.ensureDirectory();
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, data, { encoding: 'utf-8', mode: 0o600 });
      renameSync(tmpPath, filePath);
    } catch (error) {
      if (existsSync(tmpPath)) {
        try {
          unlinkSync(tmpPath);
        } catch (cleanupError) {
          throw new AggregateError([error, cleanupError], `atomic write failed: ${filePath}`);
        }
      }
      throw error;
    }
  }

  writeModelUsage(sessionId: string, models: ModelUsageEntry[]): string {
    const doc: ModelUsageDocument = { models };
    const target = this.modelsPath(sessionId);
    this.atomicWrite(target, JSON.stringify(doc));
    return target;
  }
}

export default UsageCache;
