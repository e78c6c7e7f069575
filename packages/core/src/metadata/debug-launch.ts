/**
 * @module @envstage/core/metadata/debug-launch
 * Per-user debug launch settings (`<project>.csproj.user`).
 */

import type { XmlDocument, XmlElement } from './xml-document.js';
import {
  appendElement,
  childElements,
  createElement,
  ensureChildElement,
  getAttribute,
  setElementText,
} from './xml-document.js';

export interface DebugLaunchValues {
  configuration: string;
  platform: string;
  startAction: string;
  startProgram: string;
  startArguments: string;
}

export interface DebugLaunchResult {
  changed: boolean;
  groupCreated: boolean;
  changedFields: string[];
}

export type LaunchTemplateToken = 'environment' | 'hostname' | 'serviceInstance' | 'project' | 'targetDrive';

export type LaunchTemplateTokens = Record<LaunchTemplateToken, string>;

/**
 * Replace `{environment}`, `{hostname}`, `{serviceInstance}`, `{project}`
 * and `{targetDrive}`. Unknown tokens are left as written.
 */
export function renderLaunchTemplate(template: string, tokens: LaunchTemplateTokens): string {
  const lookup = new Map(Object.entries(tokens));
  return template.replace(/\{(\w+)\}/g, (match, name: string) => lookup.get(name) ?? match);
}

export function buildCondition(configuration: string, platform: string): string {
  return ` '$(Configuration)|$(Platform)' == '${configuration}|${platform}' `;
}

function normalizeCondition(condition: string): string {
  return condition.replace(/\s+/g, '').toLowerCase();
}

export function findConditionedGroup(
  document: XmlDocument,
  configuration: string,
  platform: string
): XmlElement | undefined {
  const wanted = normalizeCondition(buildCondition(configuration, platform));
  return childElements(document.root, 'PropertyGroup').find((group) => {
    const condition = getAttribute(group, 'Condition');
    return condition !== undefined && normalizeCondition(condition) === wanted;
  });
}

/**
 * Find or create the Debug|AnyCPU-style PropertyGroup and make its
 * StartAction, StartProgram and StartArguments equal `values`.
 */
export function ensureDebugLaunch(document: XmlDocument, values: DebugLaunchValues): DebugLaunchResult {
  let group = findConditionedGroup(document, values.configuration, values.platform);
  const groupCreated = group === undefined;
  if (!group) {
    group = createElement('PropertyGroup', { Condition: buildCondition(values.configuration, values.platform) });
    appendElement(document.root, group, 0, document.format);
  }

  const fields: Array<[string, string]> = [
    ['StartAction', values.startAction],
    ['StartProgram', values.startProgram],
    ['StartArguments', values.startArguments],
  ];

  const changedFields: string[] = [];
  for (const [name, value] of fields) {
    const { element, created } = ensureChildElement(group, name, 1, document.format);
    if (setElementText(element, value) || created) {
      changedFields.push(name);
    }
  }

  return { changed: groupCreated || changedFields.length > 0, groupCreated, changedFields };
}
