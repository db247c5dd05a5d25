/**
 * Render tests - snapshot + config + caches → two output lines
 *
 * Git is stubbed through RenderDeps; caches live in a temp directory.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { render, type RenderDeps } from '../src/render';
import { UsageCache } from '../src/lib/usage-cache';
import { parseSessionInput } from '../src/lib/session-input';
import { SEPARATOR } from '../src/renderer/line-composer';
import { COLORS } from '../src/renderer/sections';
import { createDefaultConfig, type GitSummary, type StatuslineConfig } from '../src/types/statusline';
import { makeTempDir, mockSessionInput, removeDir } from './test-helpers';

const { dim, reset, cyan, green } = COLORS;

describe('render', () => {
  let tempDir: string;
  let cache: UsageCache;
  let gitCalls: number;
  let gitResult: GitSummary | null;
  let deps: RenderDeps;

  const configWith = (mutate: (config: StatuslineConfig) => void): StatuslineConfig => {
    const config = createDefaultConfig();
    mutate(config);
    return config;
  };

  beforeEach(() => {
    tempDir = makeTempDir('render-test');
    cache = new UsageCache(tempDir);
    gitCalls = 0;
    gitResult = null;
    deps = {
      cache,
      probeGit: () => {
        gitCalls++;
        return gitResult;
      }
    };
  });

  afterEach(() => {
    removeDir(tempDir);
  });

  test('basic session without git or caches', () => {
    const output = render(parseSessionInput(mockSessionInput()), createDefaultConfig(), deps);

    const l1 = [
      `${cyan}Opus${reset}`,
      `${green}▓▓▓▓░░░░░░ 45%${reset}`,
      '$2.5',
      '2m'
    ].join(SEPARATOR);
    const l2 = `${dim}in:${reset}12k ${dim}out:${reset}3.0k`;
    expect(output).toBe(`${l1}\n${l2}\n`);
  });

  test('zero-byte caches render the same as absent ones', () => {
    const snapshot = parseSessionInput(mockSessionInput({
      transcriptPath: '/t/s1.jsonl',
      projectDir: '/home/dev/proj'
    }));
    const before = render(snapshot, createDefaultConfig(), deps);

    writeFileSync(cache.modelsPath('s1'), '');
    writeFileSync(cache.globalPath(), '');
    writeFileSync(cache.projectPath('/home/dev/proj'), '');
    expect(render(snapshot, createDefaultConfig(), deps)).toBe(before);
  });

  test('every section, colors stripped', () => {
    writeFileSync(cache.modelsPath('s1'), JSON.stringify({
      models: [
        { model: 'claude-opus-4', in: 45231, out: 3200 },
        { model: 'claude-sonnet-4', in: 1000, out: 200 }
      ]
    }));
    writeFileSync(cache.projectPath('/home/dev/proj'), JSON.stringify({ d1: { cost: 0.5 }, d7: { cost: 2 }, d30: { cost: 8 } }));
    writeFileSync(cache.globalPath(), JSON.stringify({ d1: { cost: 1.5 }, d7: { cost: 10 }, d30: { cost: 40 } }));
    gitResult = {
      branch: 'main',
      display: 'main',
      inWorktree: false,
      worktreeName: '',
      dirty: true,
      ahead: 2,
      behind: 0,
      stash: 0
    };

    const snapshot = parseSessionInput(mockSessionInput({
      transcriptPath: '/t/s1.jsonl',
      projectDir: '/home/dev/proj',
      apiDurationMs: 100000,
      linesAdded: 12,
      linesRemoved: 3
    }));
    const output = render(snapshot, configWith(c => { c.noColor = true; }), deps);

    expect(output).toBe(
      'Opus █▁· │ ▓▓▓▓░░░░░░ 45% │ $2.5 │ 2m │ main ● ↑2 │ +12 -3\n' +
      'O:45k/3.2k S:1.0k/200 │ 30 tok/s │ ⌂ $0.50/$2.0/$8.0 │ Σ $1.5/$10/$40\n'
    );
  });

  test('disabled git is never probed', () => {
    render(parseSessionInput(mockSessionInput()), configWith(c => { c.features.git = false; }), deps);
    expect(gitCalls).toBe(0);

    render(parseSessionInput(mockSessionInput()), createDefaultConfig(), deps);
    expect(gitCalls).toBe(1);
  });

  test('disabled cumulative hides existing stats', () => {
    writeFileSync(cache.globalPath(), JSON.stringify({ d1: { cost: 1.5 }, d7: { cost: 10 }, d30: { cost: 40 } }));
    const config = configWith(c => {
      c.noColor = true;
      c.features.cumulative = false;
    });
    const output = render(parseSessionInput(mockSessionInput()), config, deps);
    expect(output.split('\n')[1]).toBe('in:12k out:3.0k');
  });

  test('line2 off leaves the second line empty', () => {
    const config = configWith(c => {
      c.noColor = true;
      c.features.line2 = false;
    });
    expect(render(parseSessionInput(mockSessionInput()), config, deps))
      .toBe('Opus │ ▓▓▓▓░░░░░░ 45% │ $2.5 │ 2m\n\n');
  });

  test('individual sections can be switched off', () => {
    const config = configWith(c => {
      c.noColor = true;
      c.features.model = false;
      c.features.cost = false;
      c.features.tokens = false;
    });
    expect(render(parseSessionInput(mockSessionInput()), config, deps))
      .toBe('▓▓▓▓░░░░░░ 45% │ 2m\n\n');
  });
});
