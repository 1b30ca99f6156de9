import chalk from 'chalk';
import { stdout } from 'node:process';
import { formatProgress } from './messages.js';
import type { ProgressCallback } from '../types.js';

export interface ProgressPrinter {
  onProgress: ProgressCallback;
  finish(): void;
}

/**
 * Redraws a single line on a terminal; elsewhere prints one line per label so
 * logs stay readable.
 */
export function createProgressPrinter(): ProgressPrinter {
  let lastLabel: string | null = null;
  let drawn = false;

  return {
    onProgress(percent, label) {
      if (stdout.isTTY) {
        const line = formatProgress(percent, label);
        stdout.write(`\r${chalk.cyan(line.slice(0, Math.max(stdout.columns - 1, 20)))}\x1b[K`);
        drawn = true;
      } else if (label !== lastLabel) {
        console.log(formatProgress(percent, label));
      }
      lastLabel = label;
    },
    finish() {
      if (drawn) {
        stdout.write('\n');
        drawn = false;
      }
    },
  };
}
