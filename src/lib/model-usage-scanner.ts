/**
 * Model Usage Scanner - Per-model token totals from session transcripts
 *
 * Scans the session transcript plus <transcript dir>/<sessionId>/subagents/*.jsonl.
 * Counts assistant messages whose model id starts with "claude-" and that
 * carry a usage object:
 *   in  += input_tokens + cache_read_input_tokens + cache_creation_input_tokens
 *   out += output_tokens
 *
 * Grouped by exact model id, in first-seen order. Malformed lines and
 * unreadable files are skipped.
 */

import { createReadStream, existsSync, readdirSync } from 'fs';
import { createInterface } from 'readline';
import { dirname, join } from 'path';
import { minimatch } from 'minimatch';
import type { ModelUsageEntry } from '../types/statusline';
import { field, isRecord, numberOr, parseJson } from './json-utils';

const MODEL_ID_PREFIX = 'claude-';
const SUBAGENT_PATTERN = '*.jsonl';

export interface ScanResult {
  models: ModelUsageEntry[];
  filesScanned: number;
  linesSkipped: number;
}

export class ModelUsageScanner {
  /**
   * Transcript first, then subagent transcripts sorted by name.
   */
  static collectFiles(transcriptPath: string, sessionId: string): string[] {
    const files = [transcriptPath];
    const subagentDir = join(dirname(transcriptPath), sessionId, 'subagents');
    try {
      if (existsSync(subagentDir)) {
        const names = readdirSync(subagentDir)
          .filter(name => minimatch(name, SUBAGENT_PATTERN))
          .sort();
        for (const name of names) {
          files.push(join(subagentDir, name));
        }
      }
    } catch {
      return files;
    }
    return files;
  }

  /**
   * Usage carried by one transcript line, or null if the line does not count.
   */
  static parseLine(line: string): ModelUsageEntry | null {
    const entry = parseJson(line);
    if (!isRecord(entry) || entry.type !== 'assistant') return null;

    const message = field(entry, 'message');
    const model = message.model;
    if (typeof model !== 'string' || !model.startsWith(MODEL_ID_PREFIX)) return null;
    if (!isRecord(message.usage)) return null;

    const usage = message.usage;
    return {
      model,
      in: numberOr(usage.input_tokens, 0)
        + numberOr(usage.cache_read_input_tokens, 0)
        + numberOr(usage.cache_creation_input_tokens, 0),
      out: numberOr(usage.output_tokens, 0)
    };
  }

  static async scan(transcriptPath: string, sessionId: string): Promise<ScanResult> {
    const totals = new Map<string, ModelUsageEntry>();
    let filesScanned = 0;
    let linesSkipped = 0;

    for (const file of this.collectFiles(transcriptPath, sessionId)) {
      if (!existsSync(file)) continue;
      try {
        const rl = createInterface({
          input: createReadStream(file, { encoding: 'utf-8' }),
          crlfDelay: Infinity
        });
        for await (const line of rl) {
          if (!line.trim()) continue;
          const usage = this.parseLine(line);
          if (!usage) {
            linesSkipped++;
            continue;
          }
          const agg = totals.get(usage.model);
          if (agg) {
            agg.in += usage.in;
            agg.out += usage.out;
          } else {
            totals.set(usage.model, { ...usage });
          }
        }
        filesScanned++;
      } catch {
        // Unreadable mid-stream; totals so far still count
        linesSkipped++;
      }
    }

    return { models: [...totals.values()], filesScanned, linesSkipped };
  }
}

export default ModelUsageScanner;
