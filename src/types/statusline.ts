/**
 * Statusline Types - Shared data model for one render
 *
 * SessionSnapshot: per-invocation input (read-only, never persisted)
 * StatuslineConfig: effective feature map after precedence merge
 * GitSummary: derived git state (per-invocation)
 * Model/Cumulative cache documents: persisted under the cache root
 */

// ============================================================================
// Session Snapshot (stdin JSON)
// ============================================================================

export interface SessionSnapshot {
  modelName: string;
  costUsd: number;
  durationMs: number;
  apiDurationMs: number;
  linesAdded: number;
  linesRemoved: number;
  usedPercentage: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  projectDir: string;
  transcriptPath: string;
}

// ============================================================================
// Configuration
// ============================================================================

export const FEATURE_NAMES = [
  'model',
  'model-bars',
  'context',
  'cost',
  'duration',
  'git',
  'diff',
  'line2',
  'tokens',
  'speed',
  'cumulative'
] as const;

export type FeatureName = typeof FEATURE_NAMES[number];

export type FeatureMap = Record<FeatureName, boolean>;

export interface StatuslineConfig {
  features: FeatureMap;
  noColor: boolean;
  showHelp: boolean;
}

// ============================================================================
// Git
// ============================================================================

export interface GitSummary {
  branch: string;
  display: string;      // shortened/truncated branch, worktree-prefixed
  inWorktree: boolean;
  worktreeName: string;
  dirty: boolean;
  ahead: number;
  behind: number;
  stash: number;
}

// ============================================================================
// Cache documents
// ============================================================================

/** One row of models-<sessionId>.json */
export interface ModelUsageEntry {
  model: string;
  in: number;
  out: number;
}

export interface ModelUsageDocument {
  models: ModelUsageEntry[];
}

export interface TokenPair {
  in: number;
  out: number;
}

export interface ModelFamilyTotals {
  opus: TokenPair;
  sonnet: TokenPair;
  haiku: TokenPair;
}

/** Rolling cost windows from proj-<hash>.json / all.json */
export interface CumulativeCost {
  d1: number;
  d7: number;
  d30: number;
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createDefaultSnapshot(): SessionSnapshot {
  return {
    modelName: '?',
    costUsd: 0,
    durationMs: 0,
    apiDurationMs: 0,
    linesAdded: 0,
    linesRemoved: 0,
    usedPercentage: 0,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    projectDir: '',
    transcriptPath: ''
  };
}

export function createDefaultFeatures(): FeatureMap {
  return {
    'model': true,
    'model-bars': true,
    'context': true,
    'cost': true,
    'duration': true,
    'git': true,
    'diff': true,
    'line2': true,
    'tokens': true,
    'speed': true,
    'cumulative': true
  };
}

export function createDefaultConfig(): StatuslineConfig {
  return {
    features: createDefaultFeatures(),
    noColor: false,
    showHelp: false
  };
}

export function createEmptyFamilyTotals(): ModelFamilyTotals {
  return {
    opus: { in: 0, out: 0 },
    sonnet: { in: 0, out: 0 },
    haiku: { in: 0, out: 0 }
  };
}
