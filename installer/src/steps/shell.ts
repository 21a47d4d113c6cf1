import { isMaterialized, materializeFile } from '../../../src/shared/materializer.js';
import { shellPath } from '../../../src/shared/paths.js';
import {
  appendLines,
  containsText,
  ensureBlock,
  ensureLine,
  hasBlock,
  hasLine,
  hasSingleMatch,
  removeMatching,
  replaceMatching,
} from '../utils/profile.js';
import { updateLauncher } from './scripts.js';
import type { InstallContext, InstallStep } from './types.js';

export const FUNCTION_START = '# Function to run Narnia customization script and call gemini';
export const FUNCTION_END = '}';
export const LEGACY_ALIAS = "alias narnia='gemini'";
export const FEEDBACK_ALIAS_PATTERN = 'alias narnia-feedback=';
export const UPDATE_ALIAS_PATTERN = 'alias narnia-update=';
export const LOGIN_HOOK = ['', '# Automatically run narnia-update on login', 'narnia-update'];

export function activationLine(ctx: InstallContext): string {
  return `conda activate ${ctx.settings.NARNIA_CONDA_ENV}`;
}

/**
 * The `narnia` shell function: refresh the branding quietly, then hand every
 * argument to the wrapped CLI
 */
export function narniaFunctionBlock(ctx: InstallContext): string {
  const script = shellPath(ctx.paths.customizeScript, ctx.paths.home);
  return [
    FUNCTION_START,
    'narnia() {',
    `    # Check if ${script} exists and run it.`,
    "    # The script's output is hidden.",
    `    if [ -f "${script}" ]; then`,
    `        bash "${script}" >/dev/null 2>&1`,
    '    fi',
    `    # Execute the ${ctx.settings.NARNIA_CLI_BIN} command, passing all arguments.`,
    `    ${ctx.settings.NARNIA_CLI_BIN} "$@"`,
    FUNCTION_END,
  ].join('\n') + '\n';
}

export function feedbackAliasLine(ctx: InstallContext): string {
  return `${FEEDBACK_ALIAS_PATTERN}'bash ${shellPath(ctx.paths.feedbackScript, ctx.paths.home)}'`;
}

/**
 * `narnia-update` goes through its own launcher, so it always re-runs the
 * installed narnia-setup on the runtime that installed it
 */
export function updateAliasLine(ctx: InstallContext): string {
  return `${UPDATE_ALIAS_PATTERN}'bash ${shellPath(ctx.paths.updateScript, ctx.paths.home)}'`;
}

export const autoActivateStep: InstallStep = {
  id: 'auto-activate',
  label: 'Configuring automatic environment activation...',
  doneMessage: 'Automatic environment activation configured.',
  skipMessage: 'Automatic environment activation is already set up. (Skipping)',
  check: (ctx) => hasLine(ctx.paths.bashrc, activationLine(ctx)),
  async run(ctx) {
    ensureLine(ctx.paths.bashrc, activationLine(ctx));
  },
};

export const narniaFunctionStep: InstallStep = {
  id: 'narnia-function',
  label: "Resetting 'narnia' command...",
  doneMessage: "'narnia' command setup complete.",
  skipMessage: "'narnia' command is already set up. (Skipping)",
  check: (ctx) =>
    hasBlock(ctx.paths.bashrc, FUNCTION_START, narniaFunctionBlock(ctx)) &&
    !containsText(ctx.paths.bashrc, LEGACY_ALIAS),
  async run(ctx) {
    removeMatching(ctx.paths.bashrc, LEGACY_ALIAS);
    ensureBlock(ctx.paths.bashrc, FUNCTION_START, FUNCTION_END, narniaFunctionBlock(ctx));
  },
};

export const feedbackAliasStep: InstallStep = {
  id: 'feedback-alias',
  label: "Setting up 'narnia-feedback' alias...",
  doneMessage: "'narnia-feedback' alias setup complete.",
  skipMessage: "'narnia-feedback' alias is already set up. (Skipping)",
  check: (ctx) => hasSingleMatch(ctx.paths.bashrc, FEEDBACK_ALIAS_PATTERN, feedbackAliasLine(ctx)),
  async run(ctx) {
    replaceMatching(ctx.paths.bashrc, FEEDBACK_ALIAS_PATTERN, feedbackAliasLine(ctx));
  },
};

export const updateAliasStep: InstallStep = {
  id: 'update-alias',
  label: "Setting up 'narnia-update' alias...",
  doneMessage: "'narnia-update' alias setup complete.",
  skipMessage: "'narnia-update' alias is already set up. (Skipping)",
  check: (ctx) =>
    isMaterialized(ctx.paths.updateScript, updateLauncher(ctx)) &&
    hasSingleMatch(ctx.paths.bashrc, UPDATE_ALIAS_PATTERN, updateAliasLine(ctx)),
  async run(ctx) {
    materializeFile(ctx.paths.updateScript, updateLauncher(ctx), { executable: true });
    replaceMatching(ctx.paths.bashrc, UPDATE_ALIAS_PATTERN, updateAliasLine(ctx));
  },
};

export const loginHookStep: InstallStep = {
  id: 'login-hook',
  label: 'Setting up automatic update on login...',
  doneMessage: 'Automatic update on login configured.',
  skipMessage: 'Automatic update on login is already set up. (Skipping)',
  check: (ctx) => containsText(ctx.paths.profile, 'narnia-update'),
  async run(ctx) {
    appendLines(ctx.paths.profile, LOGIN_HOOK);
  },
};
