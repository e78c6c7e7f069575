/**
 * @module @envstage/cli/presenter/tty-presenter
 * Command results for people (text) or for tools (one JSON document).
 */

import type { Writable } from 'node:stream';
import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { isDeployError } from '@envstage/core';
import type { DeploySummary, MetadataChange, StartupProjectOutcome } from '@envstage/core';

export type PresenterMessageLevel = 'info' | 'warn' | 'error';

export interface TTYPresenterOptions {
  stdout: Writable;
  stderr: Writable;
  /** One JSON document on stdout instead of text. */
  structured?: boolean;
  color?: boolean;
}

export interface EnvironmentListing {
  project: string;
  serviceInstance: string;
  environments: string[];
}

export class TTYPresenter {
  private readonly stdout: Writable;
  private readonly stderr: Writable;
  private readonly structured: boolean;
  private readonly chalk: ChalkInstance;

  constructor(options: TTYPresenterOptions) {
    this.stdout = options.stdout;
    this.stderr = options.stderr;
    this.structured = options.structured ?? false;
    this.chalk = new Chalk({ level: options.color ? 1 : 0 });
  }

  message(text: string, level: PresenterMessageLevel = 'info'): void {
    if (this.structured) {
      return;
    }
    const stream = level === 'info' ? this.stdout : this.stderr;
    stream.write(`${text}\n`);
  }

  json(data: unknown): void {
    this.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
  }

  summary(summary: DeploySummary): void {
    if (this.structured) {
      this.json({ ok: true, ...summary });
      return;
    }
    this.stdout.write(`${formatSummary(summary, this.chalk).join('\n')}\n`);
  }

  environments(listing: EnvironmentListing): void {
    if (this.structured) {
      this.json({ ok: true, ...listing });
      return;
    }
    if (listing.environments.length === 0) {
      this.stdout.write(`No environments for ${listing.serviceInstance}\n`);
      return;
    }
    this.stdout.write(`${listing.environments.join('\n')}\n`);
  }

  error(error: unknown): void {
    if (this.structured) {
      this.json({ ok: false, error: serializeError(error) });
      return;
    }
    this.stderr.write(`${this.chalk.red('error')} ${serializeError(error).message}\n`);
  }
}

export interface SerializedCliError {
  name: string;
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

export function serializeError(error: unknown): SerializedCliError {
  if (isDeployError(error)) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, code: 'UNKNOWN_ERROR' };
  }
  return { name: 'Error', message: String(error), code: 'UNKNOWN_ERROR' };
}

function row(label: string, value: string, chalk: ChalkInstance): string {
  return `${chalk.bold(label.padEnd(16))}${value}`;
}

function describeChange(change: MetadataChange): string {
  return change.message ? `${change.status} (${change.message})` : change.status;
}

function describeStartup(outcome: StartupProjectOutcome): string {
  return outcome.message ? `${outcome.status} (${outcome.message})` : outcome.status;
}

/**
 * Human-readable report, one line per fact.
 */
export function formatSummary(summary: DeploySummary, chalk: ChalkInstance): string[] {
  const lines: string[] = [];
  if (summary.dryRun) {
    lines.push(chalk.yellow('Dry run: nothing was written'));
  }

  const { targetConfig } = summary;
  const target = targetConfig.backupPath
    ? `${targetConfig.status} ${targetConfig.path} (backup ${targetConfig.backupPath})`
    : `${targetConfig.status} ${targetConfig.path}`;

  lines.push(
    row('Project', `${summary.project.name} (${summary.project.filePath})`, chalk),
    row('Instance', summary.serviceInstance.folderPath, chalk),
    row('Environment', `${summary.environment.name} (${summary.environment.sourceFile})`, chalk),
    row('Hostname', summary.hostname, chalk),
    row('Target config', target, chalk),
    row('Copy directive', describeChange(summary.metadata.copyDirective), chalk),
    row('Debug launch', describeChange(summary.metadata.debugLaunch), chalk),
    row('Startup project', describeStartup(summary.startupProject), chalk)
  );

  if (summary.preview !== undefined) {
    lines.push('', chalk.bold('Preview:'), summary.preview);
  }

  if (summary.warnings.length > 0) {
    lines.push('', chalk.yellow('Warnings:'), ...summary.warnings.map((warning) => `  - ${warning}`));
  }
  return lines;
}
