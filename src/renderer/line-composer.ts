/**
 * Line Composer - Assemble the two output lines
 *
 * Line 1: model │ context │ cost │ duration │ git │ diff
 * Line 2: tokens │ speed │ project cumulative │ global cumulative
 *
 * Empty sections are dropped. Output is always "l1\nl2\n", or "l1\n\n"
 * when line 2 has nothing to show.
 */

import { stripAnsi } from '../lib/formatters';
import { COLORS } from './sections';

export const SEPARATOR = ` ${COLORS.dim}│${COLORS.reset} `;

export interface Line1Sections {
  model: string;
  context: string;
  cost: string;
  duration: string;
  git: string;
  diff: string;
}

export interface Line2Sections {
  tokens: string;
  speed: string;
  cumulativeProject: string;
  cumulativeGlobal: string;
}

export interface ComposerOptions {
  useColors: boolean;
}

class LineComposer {
  private options: ComposerOptions;

  constructor(options: ComposerOptions = { useColors: true }) {
    this.options = options;
  }

  static join(parts: string[]): string {
    return parts.filter(Boolean).join(SEPARATOR);
  }

  /**
   * @param line2 null when the second line is switched off as a whole
   */
  compose(line1: Line1Sections, line2: Line2Sections | null): string {
    let l1 = LineComposer.join([
      line1.model,
      line1.context,
      line1.cost,
      line1.duration,
      line1.git,
      line1.diff
    ]);

    let l2 = line2
      ? LineComposer.join([
        line2.tokens,
        line2.speed,
        line2.cumulativeProject,
        line2.cumulativeGlobal
      ])
      : '';

    if (!this.options.useColors) {
      l1 = stripAnsi(l1);
      l2 = stripAnsi(l2);
    }

    return l2 ? `${l1}\n${l2}\n` : `${l1}\n\n`;
  }
}

export default LineComposer;
