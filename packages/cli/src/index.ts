/**
 * @module @envstage/cli
 */

export { runCli, createProgram, CLI_VERSION } from './cli.js';
export { createProcessIO } from './io.js';
export type { CliIO } from './io.js';
export { EXIT_CODES, exitCodeFor } from './exit-codes.js';
export type { ExitCode } from './exit-codes.js';
export { loadSettings, resolveWorkspaceRoot, expandPath } from './config/load-settings.js';
export type { LoadedSettings, LoadSettingsOptions, SettingsOverrides } from './config/load-settings.js';
export { createConsoleLogger } from './logging/console-logger.js';
export { TTYPresenter, formatSummary } from './presenter/tty-presenter.js';
export { TerminalPrompt } from './prompt/terminal-prompt.js';
export { CommandIdeAutomation } from './ide/command-ide-automation.js';
