/**
 * Tests for ModelUsageScanner
 *
 * Transcript + subagent transcripts → per-model token totals.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ModelUsageScanner } from '../src/lib/model-usage-scanner';
import { makeTempDir, removeDir } from './test-helpers';

const assistant = (model: string, usage: Record<string, number>): string =>
  JSON.stringify({ type: 'assistant', message: { model, usage } });

describe('ModelUsageScanner', () => {
  let tempDir: string;
  let transcript: string;
  let subagentDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('scanner-test');
    transcript = join(tempDir, 's1.jsonl');
    subagentDir = join(tempDir, 's1', 'subagents');
  });

  afterEach(() => {
    removeDir(tempDir);
  });

  describe('parseLine', () => {
    test('input counts cache reads and creations; output is output_tokens', () => {
      const line = assistant('claude-opus-4', {
        input_tokens: 10,
        cache_read_input_tokens: 5,
        cache_creation_input_tokens: 1,
        output_tokens: 7
      });
      expect(ModelUsageScanner.parseLine(line)).toEqual({ model: 'claude-opus-4', in: 16, out: 7 });
    });

    test('lines that do not count give null', () => {
      expect(ModelUsageScanner.parseLine('{"type":"user","message":{}}')).toBeNull();
      expect(ModelUsageScanner.parseLine('not json')).toBeNull();
      expect(ModelUsageScanner.parseLine(assistant('<synthetic>', { output_tokens: 1 }))).toBeNull();
      expect(ModelUsageScanner.parseLine('{"type":"assistant","message":{"model":"claude-opus-4"}}')).toBeNull();
    });
  });

  describe('collectFiles', () => {
    test('transcript first, then sorted subagent *.jsonl files', () => {
      mkdirSync(subagentDir, { recursive: true });
      writeFileSync(join(subagentDir, 'b.jsonl'), '');
      writeFileSync(join(subagentDir, 'a.jsonl'), '');
      writeFileSync(join(subagentDir, 'notes.txt'), '');
      expect(ModelUsageScanner.collectFiles(transcript, 's1')).toEqual([
        transcript,
        join(subagentDir, 'a.jsonl'),
        join(subagentDir, 'b.jsonl')
      ]);
    });

    test('no subagent directory gives only the transcript', () => {
      expect(ModelUsageScanner.collectFiles(transcript, 's1')).toEqual([transcript]);
    });
  });

  describe('scan', () => {
    test('aggregates by model in first-seen order across files', async () => {
      writeFileSync(transcript, [
        assistant('claude-opus-4', {
          input_tokens: 10,
          cache_read_input_tokens: 5,
          cache_creation_input_tokens: 1,
          output_tokens: 7
        }),
        '{"type":"user","message":{}}',
        'not json',
        '',
        assistant('<synthetic>', { output_tokens: 1 }),
        '{"type":"assistant","message":{"model":"claude-opus-4"}}'
      ].join('\n'));
      mkdirSync(subagentDir, { recursive: true });
      writeFileSync(join(subagentDir, 'a.jsonl'), assistant('claude-haiku-4', { input_tokens: 3, output_tokens: 2 }) + '\n');
      writeFileSync(join(subagentDir, 'b.jsonl'), assistant('claude-opus-4', { input_tokens: 4, output_tokens: 1 }) + '\n');

      const result = await ModelUsageScanner.scan(transcript, 's1');
      expect(result).toEqual({
        models: [
          { model: 'claude-opus-4', in: 20, out: 8 },
          { model: 'claude-haiku-4', in: 3, out: 2 }
        ],
        filesScanned: 3,
        linesSkipped: 4
      });
    });

    test('missing transcript gives an empty result', async () => {
      const result = await ModelUsageScanner.scan(transcript, 's1');
      expect(result).toEqual({ models: [], filesScanned: 0, linesSkipped: 0 });
    });
  });
});
