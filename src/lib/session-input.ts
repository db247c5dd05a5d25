/**
 * Session Input - Permissive parse of the stdin JSON snapshot
 *
 * Shape (every field optional):
 *   { model: { display_name },
 *     cost: { total_cost_usd, total_duration_ms, total_api_duration_ms,
 *             total_lines_added, total_lines_removed },
 *     context_window: { used_percentage, total_input_tokens, total_output_tokens },
 *     workspace: { project_dir },
 *     transcript_path }
 *
 * Malformed or absent JSON yields the default snapshot. Extra keys are ignored.
 */

import { readFileSync } from 'fs';
import { createDefaultSnapshot, SessionSnapshot } from '../types/statusline';
import { field, isRecord, numberOr, parseJson, stringOr } from './json-utils';

export function parseSessionInput(raw: string): SessionSnapshot {
  const snapshot = createDefaultSnapshot();
  const parsed = parseJson(raw);
  if (!isRecord(parsed)) return snapshot;

  const model = field(parsed, 'model');
  const cost = field(parsed, 'cost');
  const ctx = field(parsed, 'context_window');
  const workspace = field(parsed, 'workspace');

  return {
    modelName: stringOr(model.display_name, snapshot.modelName),
    costUsd: numberOr(cost.total_cost_usd, 0),
    durationMs: numberOr(cost.total_duration_ms, 0),
    apiDurationMs: numberOr(cost.total_api_duration_ms, 0),
    linesAdded: numberOr(cost.total_lines_added, 0),
    linesRemoved: numberOr(cost.total_lines_removed, 0),
    usedPercentage: numberOr(ctx.used_percentage, 0),
    totalInputTokens: numberOr(ctx.total_input_tokens, 0),
    totalOutputTokens: numberOr(ctx.total_output_tokens, 0),
    projectDir: stringOr(workspace.project_dir, ''),
    transcriptPath: stringOr(parsed.transcript_path, '')
  };
}

/**
 * Read all of stdin synchronously. An interactive terminal or a read error
 * gives '' (the default snapshot), never an exception.
 */
export function readStdin(): string {
  if (process.stdin.isTTY) return '';
  try {
    return readFileSync(0, 'utf-8');
  } catch {
    return '';
  }
}
