/**
 * Formatters - Compact tokens for the status line
 *
 * Pure functions, no side effects. Every function is total over finite
 * numbers; non-finite input is treated as 0.
 */

const BAR_GLYPHS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

const BRANCH_PREFIXES: ReadonlyArray<{ prefix: string; icon: string }> = [
  { prefix: 'feature/', icon: '★' },
  { prefix: 'feat/', icon: '★' },
  { prefix: 'fix/', icon: '✦' },
  { prefix: 'chore/', icon: '⚙' },
  { prefix: 'refactor/', icon: '↻' },
  { prefix: 'docs/', icon: '§' }
];

const ELLIPSIS = '…';
const CONTEXT_BAR_CELLS = 10;

function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

// Enough fraction digits to print any double in range exactly
const EXACT_FRACTION_DIGITS = 64;

/**
 * toFixed with ties (exact binary halves) going to the even digit, as
 * printf-style formatting does: 12.5 → "12", 0.125 → "0.12", 0.375 → "0.38".
 */
export function toFixedHalfEven(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  const exact = value.toFixed(digits + EXACT_FRACTION_DIGITS);
  const point = exact.indexOf('.');
  if (point < 0) return rounded;
  const cut = digits === 0 ? point : point + 1 + digits;
  if (!/^50*$/.test(exact.slice(point + 1 + digits))) return rounded;

  const truncated = exact.slice(0, cut);
  const lastDigit = Number(truncated[truncated.length - 1]);
  return lastDigit % 2 === 0 ? truncated : rounded;
}

/**
 * Token/line counts: 1234567 → "1.2M", 45231 → "45k", 1234 → "1.2k", 523 → "523"
 */
export function formatCount(n: number): string {
  const value = finite(n);
  if (value >= 1_000_000) return `${toFixedHalfEven(value / 1_000_000, 1)}M`;
  if (value >= 10_000) return `${toFixedHalfEven(value / 1000, 0)}k`;
  if (value >= 1000) return `${toFixedHalfEven(value / 1000, 1)}k`;
  return String(Math.trunc(value));
}

/**
 * Dollars: ≥1000 → "$1.8k", ≥100 → "$374", ≥10 → "$14", ≥1 → "$8.4", <1 → "$0.12"
 */
export function formatCost(cost: number): string {
  const c = finite(cost);
  if (c >= 1000) return `$${toFixedHalfEven(c / 1000, 1)}k`;
  if (c >= 100) return `$${toFixedHalfEven(c, 0)}`;
  if (c >= 10) return `$${toFixedHalfEven(c, 0)}`;
  if (c >= 1) return `$${toFixedHalfEven(c, 1)}`;
  return `$${toFixedHalfEven(c, 2)}`;
}

/**
 * Milliseconds to "4h0m" (≥ 1 hour) or "15m"
 */
export function formatDuration(ms: number): string {
  const minutes = Math.trunc(finite(ms) / 60000);
  if (minutes >= 60) {
    return `${Math.trunc(minutes / 60)}h${minutes % 60}m`;
  }
  return `${minutes}m`;
}

/**
 * Replace a conventional branch prefix with its icon ("feature/login" → "★login").
 */
export function shortenBranch(name: string): string {
  for (const { prefix, icon } of BRANCH_PREFIXES) {
    if (name.startsWith(prefix)) {
      return icon + name.slice(prefix.length);
    }
  }
  return name;
}

/**
 * Truncate to maxLen code points, ending in "…" when cut.
 */
export function truncate(text: string, maxLen: number): string {
  const codePoints = Array.from(text);
  if (codePoints.length > maxLen) {
    return codePoints.slice(0, Math.max(0, maxLen - 1)).join('') + ELLIPSIS;
  }
  return text;
}

/**
 * One block glyph whose height is value/max on an 8-level scale.
 * Rounds to nearest (adds max/2 before dividing); never below level 1.
 */
export function barChar(value: number, max: number): string {
  const v = Math.trunc(finite(value));
  const m = Math.trunc(finite(max));
  if (v <= 0 || m <= 0) return '';

  let level = Math.floor((v * 8 + Math.floor(m / 2)) / m);
  if (level < 1) level = 1;
  if (level > 8) level = 8;
  return BAR_GLYPHS[level - 1];
}

/**
 * Ten-cell context bar: one ▓ per full 10%, ░ for the rest.
 */
export function contextBar(percent: number): string {
  const filled = Math.min(CONTEXT_BAR_CELLS, Math.max(0, Math.floor(finite(percent) / 10)));
  return '▓'.repeat(filled) + '░'.repeat(CONTEXT_BAR_CELLS - filled);
}

/**
 * Strip ANSI SGR escape codes
 */
export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
