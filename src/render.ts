/**
 * Render - One synchronous pass from snapshot + config to output text
 *
 * Sources, each allowed to fail on its own:
 * - snapshot (stdin JSON, already parsed permissively)
 * - git (subprocess queries)
 * - usage cache (files written by background processes)
 *
 * Disabled features skip their work entirely: no git calls with --no-git,
 * no cumulative reads with --no-cumulative.
 */

import type { GitSummary, ModelFamilyTotals, SessionSnapshot, StatuslineConfig } from './types/statusline';
import GitModule from './modules/git-module';
import { UsageCache } from './lib/usage-cache';
import LineComposer, { Line2Sections } from './renderer/line-composer';
import {
  fmtContext,
  fmtCost,
  fmtCumulativeGlobal,
  fmtCumulativeProject,
  fmtDiff,
  fmtDuration,
  fmtGit,
  fmtModel,
  fmtModelMix,
  fmtSpeed,
  fmtTokens,
  modelLabel
} from './renderer/sections';

export interface RenderDeps {
  cache: UsageCache;
  /** Git probe; called only when the git section is enabled. */
  probeGit: () => GitSummary | null;
}

export function createRenderDeps(cache: UsageCache): RenderDeps {
  const git = new GitModule();
  return {
    cache,
    probeGit: () => git.fetch()
  };
}

export function render(snapshot: SessionSnapshot, config: StatuslineConfig, deps: RenderDeps): string {
  const f = config.features;
  const sessionId = UsageCache.sessionIdFromTranscript(snapshot.transcriptPath);

  // Per-model totals feed both the mix bar (line 1) and token breakdown (line 2)
  const line2Tokens = f.line2 && f.tokens;
  const modelTotals: ModelFamilyTotals | null =
    (f['model-bars'] || line2Tokens) ? deps.cache.readModelUsage(sessionId) : null;

  const model = f.model ? modelLabel(snapshot.modelName) : '';
  const modelMix = f['model-bars'] ? fmtModelMix(modelTotals) : '';

  const line1 = {
    model: fmtModel(model, modelMix),
    context: f.context ? fmtContext(snapshot.usedPercentage) : '',
    cost: f.cost ? fmtCost(snapshot) : '',
    duration: f.duration ? fmtDuration(snapshot) : '',
    git: f.git ? fmtGit(deps.probeGit()) : '',
    diff: f.diff ? fmtDiff(snapshot) : ''
  };

  let line2: Line2Sections | null = null;
  if (f.line2) {
    const cumulative = f.cumulative
      ? deps.cache.readCumulative(snapshot.projectDir)
      : { project: null, global: null };
    line2 = {
      tokens: f.tokens ? fmtTokens(modelTotals, snapshot) : '',
      speed: f.speed ? fmtSpeed(snapshot) : '',
      cumulativeProject: fmtCumulativeProject(cumulative.project),
      cumulativeGlobal: fmtCumulativeGlobal(cumulative.global)
    };
  }

  return new LineComposer({ useColors: !config.noColor }).compose(line1, line2);
}

export default render;
