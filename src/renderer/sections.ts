/**
 * Sections - One colored segment per metric
 *
 * Each formatter returns '' when it has nothing to show, so the composer
 * can drop it. Colors are always emitted; the composer strips them when
 * color is off.
 */

import type {
  CumulativeCost,
  GitSummary,
  ModelFamilyTotals,
  SessionSnapshot
} from '../types/statusline';
import GitModule from '../modules/git-module';
import {
  barChar,
  contextBar,
  formatCost,
  formatCount,
  formatDuration
} from '../lib/formatters';

export const COLORS = {
  dim: '\x1b[2m',
  reset: '\x1b[0m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m'
} as const;

const { dim, reset: rst, cyan, green, yellow, red, magenta } = COLORS;

const CONTEXT_WARN_PERCENT = 70;
const CONTEXT_CRIT_PERCENT = 90;
const SPEED_GOOD = 30;
const SPEED_OK = 15;

// ============================================================================
// Line 1
// ============================================================================

/** "Claude Opus 4" → "Opus 4" */
export function modelLabel(displayName: string): string {
  return displayName.startsWith('Claude ') ? displayName.slice('Claude '.length) : displayName;
}

/**
 * Three bars (opus/sonnet/haiku) scaled to the largest output count.
 * A family with no output shows a dim dot.
 */
export function fmtModelMix(totals: ModelFamilyTotals | null): string {
  if (!totals) return '';
  const maxOut = Math.max(totals.opus.out, totals.sonnet.out, totals.haiku.out);
  if (maxOut <= 0) return '';

  const glyph = (value: number, color: string): string => {
    const bar = barChar(value, maxOut);
    return bar ? `${color}${bar}` : `${dim}·`;
  };

  return glyph(totals.opus.out, magenta)
    + glyph(totals.sonnet.out, cyan)
    + glyph(totals.haiku.out, green)
    + rst;
}

export function fmtModel(model: string, modelMix: string): string {
  if (model) {
    const part = `${cyan}${model}${rst}`;
    return modelMix ? `${part} ${modelMix}` : part;
  }
  return modelMix;
}

export function fmtContext(usedPercentage: number): string {
  const pct = Math.trunc(usedPercentage);
  let color: string = green;
  let warn = '';
  if (pct >= CONTEXT_CRIT_PERCENT) {
    color = red;
    warn = ' ⚠';
  } else if (pct >= CONTEXT_WARN_PERCENT) {
    color = yellow;
    warn = ' ⚠';
  }
  return `${color}${contextBar(pct)} ${pct}%${warn}${rst}`;
}

export function fmtCost(snapshot: SessionSnapshot): string {
  return formatCost(snapshot.costUsd);
}

export function fmtDuration(snapshot: SessionSnapshot): string {
  return formatDuration(snapshot.durationMs);
}

export function fmtGit(summary: GitSummary | null): string {
  if (!summary || !summary.display) return '';
  let part = `${magenta}${summary.display}${rst}`;
  if (summary.dirty) {
    part += ` ${yellow}●${rst}`;
  }
  const extras = GitModule.formatExtras(summary);
  if (extras) {
    part += ` ${cyan}${extras}${rst}`;
  }
  return part;
}

export function fmtDiff(snapshot: SessionSnapshot): string {
  const added = Math.trunc(snapshot.linesAdded);
  const removed = Math.trunc(snapshot.linesRemoved);
  if (added <= 0 && removed <= 0) return '';
  return `${green}+${added}${rst} ${red}-${removed}${rst}`;
}

// ============================================================================
// Line 2
// ============================================================================

/**
 * "O:45k/3.2k S:1.0k/200" per family with tokens; falls back to the
 * snapshot's aggregate "in:12k out:3.0k".
 */
export function fmtTokens(totals: ModelFamilyTotals | null, snapshot: SessionSnapshot): string {
  const parts: string[] = [];
  if (totals) {
    const families: Array<[keyof ModelFamilyTotals, string, string]> = [
      ['opus', 'O', magenta],
      ['sonnet', 'S', cyan],
      ['haiku', 'H', green]
    ];
    for (const [family, letter, color] of families) {
      const { in: tokIn, out: tokOut } = totals[family];
      if (tokIn > 0 || tokOut > 0) {
        parts.push(`${color}${letter}${rst}:${formatCount(tokIn)}/${formatCount(tokOut)}`);
      }
    }
  }
  if (parts.length > 0) return parts.join(' ');

  const inFmt = formatCount(Math.trunc(snapshot.totalInputTokens));
  const outFmt = formatCount(Math.trunc(snapshot.totalOutputTokens));
  return `${dim}in:${rst}${inFmt} ${dim}out:${rst}${outFmt}`;
}

/** Output tokens per second of API time, rounded to nearest. */
export function tokensPerSecond(snapshot: SessionSnapshot): number | null {
  const apiMs = Math.trunc(snapshot.apiDurationMs);
  const out = Math.trunc(snapshot.totalOutputTokens);
  if (apiMs <= 0 || out <= 0) return null;
  return Math.round((out * 1000) / apiMs);
}

export function fmtSpeed(snapshot: SessionSnapshot): string {
  const speed = tokensPerSecond(snapshot);
  if (speed === null) return '';
  let color: string = red;
  if (speed > SPEED_GOOD) color = green;
  else if (speed >= SPEED_OK) color = yellow;
  return `${color}${speed} tok/s${rst}`;
}

function fmtWindows(icon: string, stats: CumulativeCost | null): string {
  if (!stats) return '';
  return `${icon} ${formatCost(stats.d1)}/${formatCost(stats.d7)}/${formatCost(stats.d30)}`;
}

export function fmtCumulativeProject(stats: CumulativeCost | null): string {
  return fmtWindows('⌂', stats);
}

export function fmtCumulativeGlobal(stats: CumulativeCost | null): string {
  return fmtWindows('Σ', stats);
}
