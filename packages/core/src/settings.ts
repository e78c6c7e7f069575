/**
 * @module @envstage/core/settings
 * Deployment settings schema and defaults.
 */

import { z } from 'zod';
import { InvalidSettingsError } from './errors.js';

export const projectMatchPredicateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('exact') }),
  z.object({ kind: z.literal('prefixed') }),
  z.object({ kind: z.literal('glob'), pattern: z.string().min(1) }),
  z.object({ kind: z.literal('shallowest') }),
]);

export type ProjectMatchPredicateConfig = z.infer<typeof projectMatchPredicateSchema>;

export const debugLaunchSettingsSchema = z.object({
  configuration: z.string().min(1).default('Debug'),
  platform: z.string().min(1).default('AnyCPU'),
  startAction: z.string().min(1).default('Program'),
  /** Template; see renderLaunchTemplate for tokens. */
  startProgram: z.string().min(1).default('{targetDrive}:\\Services\\{serviceInstance}\\ServiceHost.exe'),
  startArguments: z.string().default('-environment {environment} -host {hostname}'),
});

export type DebugLaunchSettings = z.infer<typeof debugLaunchSettingsSchema>;

export const startupProjectSettingsSchema = z.object({
  promptTimeoutMs: z.number().int().positive().default(10_000),
  /** External command that sets the IDE startup project. */
  command: z.string().min(1).optional(),
  args: z.array(z.string()).default(['{projectFile}']),
  commandTimeoutMs: z.number().int().positive().default(30_000),
});

export type StartupProjectSettings = z.infer<typeof startupProjectSettingsSchema>;

export const deploySettingsSchema = z
  .object({
    domainSuffix: z.string().min(1).default('corp.local'),
    hostnamePlaceholder: z.string().min(1).default('localhost'),
    targetDrive: z
      .string()
      .regex(/^[A-Za-z]$/, 'must be a single drive letter')
      .default('D')
      .transform((letter) => letter.toUpperCase()),
    namespacePrefix: z.string().default(''),
    projectExtension: z.string().regex(/^\.\w+$/, 'must look like .csproj').default('.csproj'),
    projectMatchOrder: z
      .array(projectMatchPredicateSchema)
      .min(1)
      .default([{ kind: 'exact' }, { kind: 'prefixed' }, { kind: 'shallowest' }]),
    deployDirectory: z.string().min(1).default('.Deploy'),
    targetConfigFileName: z.string().min(1).default('App.config'),
    copyToOutput: z.string().min(1).default('Always'),
    previewLength: z.number().int().positive().default(400),
    debugLaunch: debugLaunchSettingsSchema.default({}),
    startupProject: startupProjectSettingsSchema.default({}),
  })
  .superRefine((settings, ctx) => {
    const placeholder = settings.hostnamePlaceholder.toLowerCase();
    if (settings.domainSuffix.toLowerCase().includes(placeholder)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['domainSuffix'],
        message: `must not contain the hostname placeholder '${settings.hostnamePlaceholder}'`,
      });
    }
  });

export type DeploySettings = z.output<typeof deploySettingsSchema>;
export type DeploySettingsInput = z.input<typeof deploySettingsSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate and default raw settings.
 * @throws InvalidSettingsError listing every schema issue
 */
export function parseDeploySettings(input: unknown = {}): DeploySettings {
  const result = deploySettingsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSettingsError('Invalid deployment settings', formatZodIssues(result.error));
  }
  return result.data;
}

/**
 * Hostname substituted for the placeholder: `<environment>.<domain>`.
 */
export function computeHostname(environment: string, settings: Pick<DeploySettings, 'domainSuffix'>): string {
  return `${environment}.${settings.domainSuffix}`;
}
