/**
 * CLI Output
 *
 * Human-readable output goes to stdout; logs and errors go to stderr.
 *
 * @module cli/output
 */

import type { ProvisioningObserver } from '../orchestrator/index.js';
import { STEP_LABELS } from '../types/common.js';

export interface CliOutput {
  out(line?: string): void;
  err(line: string): void;
}

export const processOutput: CliOutput = {
  out: (line = '') => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

/**
 * Observer printing `[i/n] Step (detail)...` before each step and the
 * step's result under it.
 */
export function progressObserver(output: CliOutput): ProvisioningObserver {
  return {
    stepStarted: ({ step, index, total, detail }) => {
      const suffix = detail ? ` (${detail})` : '';
      output.out(`  [${index}/${total}] ${STEP_LABELS[step]}${suffix}...`);
    },
    stepCompleted: ({ detail }) => {
      if (detail) {
        output.out(`        ${detail}`);
      }
    },
  };
}
