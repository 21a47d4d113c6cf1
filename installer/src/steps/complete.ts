import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { StepOutcome } from '../utils/sequencer.js';

export function summarizeOutcomes(outcomes: StepOutcome[]): string {
  const done = outcomes.filter((outcome) => outcome.status === 'done').length;
  const skipped = outcomes.length - done;
  return `${done} configured, ${skipped} already in place`;
}

export function runCompletion(outcomes: StepOutcome[]): void {
  const summaryLines = [
    `Steps:      ${pc.cyan(summarizeOutcomes(outcomes))}`,
    `Changed:    ${pc.cyan(outcomes.filter((o) => o.status === 'done').map((o) => o.id).join(', ') || 'nothing')}`,
  ];
  p.note(summaryLines.join('\n'), 'Summary');

  const nextStepsLines = [
    `Reload your shell: ${pc.bold('source ~/.bashrc')}`,
    `Start the assistant: ${pc.bold('narnia')}`,
    `Review your prompts: ${pc.bold('narnia-feedback')}`,
  ];
  p.note(nextStepsLines.join('\n'), 'Next Steps');

  p.outro(pc.green('Update complete.'));
}
