/**
 * Config Resolver - Effective feature map from four layered sources
 *
 * Precedence (lowest → highest):
 *   1. Built-in defaults (every feature on)
 *   2. ~/.claude/statusline.env (KEY=value lines)
 *   3. Environment variables (same keys)
 *   4. CLI disable flags (--no-<feature>)
 *
 * File and env values are overlaid first; only the literal "false" disables.
 * A CLI flag disables unconditionally.
 */

import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import {
  FEATURE_NAMES,
  FeatureName,
  StatuslineConfig,
  createDefaultConfig
} from '../types/statusline';

export const FEATURE_ENV_KEYS: Record<FeatureName, string> = {
  'model': 'STATUSLINE_SHOW_MODEL',
  'model-bars': 'STATUSLINE_SHOW_MODEL_BARS',
  'context': 'STATUSLINE_SHOW_CONTEXT',
  'cost': 'STATUSLINE_SHOW_COST',
  'duration': 'STATUSLINE_SHOW_DURATION',
  'git': 'STATUSLINE_SHOW_GIT',
  'diff': 'STATUSLINE_SHOW_DIFF',
  'line2': 'STATUSLINE_LINE2',
  'tokens': 'STATUSLINE_SHOW_TOKENS',
  'speed': 'STATUSLINE_SHOW_SPEED',
  'cumulative': 'STATUSLINE_SHOW_CUMULATIVE'
};

const NO_COLOR_ENV_KEYS = ['NO_COLOR', 'STATUSLINE_NO_COLOR'];

export interface ResolveOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

export class ConfigResolver {
  static defaultConfigPath(): string {
    return join(homedir(), '.claude', 'statusline.env');
  }

  /**
   * Parse KEY=value text. Blank lines, # comments and lines without '='
   * are skipped; keys and values are trimmed.
   */
  static parseEnvFile(content: string): Record<string, string> {
    const values: Record<string, string> = {};
    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) continue;
      const idx = line.indexOf('=');
      if (idx < 0) continue;
      const key = line.slice(0, idx).trim();
      if (!key) continue;
      values[key] = line.slice(idx + 1).trim();
    }
    return values;
  }

  /** Missing or unreadable file reads as empty. */
  static loadEnvFile(path: string): Record<string, string> {
    try {
      return this.parseEnvFile(readFileSync(path, 'utf-8'));
    } catch {
      return {};
    }
  }

  static resolve(options: ResolveOptions = {}): StatuslineConfig {
    const argv = options.argv ?? process.argv.slice(2);
    const env = options.env ?? process.env;
    const configPath = options.configPath ?? this.defaultConfigPath();

    const config = createDefaultConfig();

    // Layers 2+3: file < env (a set variable replaces the file value, even if empty)
    const merged: Record<string, string> = { ...this.loadEnvFile(configPath) };
    for (const name of FEATURE_NAMES) {
      const key = FEATURE_ENV_KEYS[name];
      const envValue = env[key];
      if (envValue !== undefined) {
        merged[key] = envValue;
      }
    }

    for (const name of FEATURE_NAMES) {
      if (merged[FEATURE_ENV_KEYS[name]] === 'false') {
        config.features[name] = false;
      }
    }

    // Layer 4: CLI flags. Presence alone counts; unknown args are ignored.
    const flags = new Set(argv);
    for (const name of FEATURE_NAMES) {
      if (flags.has(`--no-${name}`)) {
        config.features[name] = false;
      }
    }

    config.noColor =
      flags.has('--no-color') ||
      NO_COLOR_ENV_KEYS.some(key => (env[key] ?? '') !== '');
    config.showHelp = flags.has('--help') || flags.has('-h');

    return config;
  }
}

export const HELP_TEXT = `Usage: cc-statusbar [OPTIONS]
Reads session JSON from stdin, prints a two-line status bar.

Options:
  --no-model       Hide model name
  --no-model-bars  Hide model mix bars
  --no-context     Hide context window bar
  --no-cost        Hide session cost
  --no-duration    Hide duration
  --no-git         Hide git branch/status
  --no-diff        Hide lines added/removed
  --no-line2       Hide entire second line
  --no-tokens      Hide token counts
  --no-speed       Hide throughput (tok/s)
  --no-cumulative  Hide cumulative costs
  --no-color       Disable ANSI colors
  -h, --help       Show this help

Config precedence: CLI args > env vars > ~/.claude/statusline.env > defaults (all on)
`;

export default ConfigResolver;
