import { pythonSteps } from './python.js';
import { nodeSteps } from './node.js';
import { cliConfigSteps } from './cli-config.js';
import { customizeScriptStep, feedbackScriptStep } from './scripts.js';
import {
  autoActivateStep,
  feedbackAliasStep,
  loginHookStep,
  narniaFunctionStep,
  updateAliasStep,
} from './shell.js';
import type { InstallStep } from './types.js';

/**
 * The bootstrap, in the order it must run
 */
export function buildSteps(): InstallStep[] {
  return [
    ...pythonSteps,
    ...nodeSteps,
    ...cliConfigSteps,
    autoActivateStep,
    narniaFunctionStep,
    customizeScriptStep,
    feedbackScriptStep,
    feedbackAliasStep,
    updateAliasStep,
    loginHookStep,
  ];
}
