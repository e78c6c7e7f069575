/**
 * @module @envstage/core/metadata/copy-directive
 * Build-copy setting of the target config item in the project file.
 */

import type { XmlDocument, XmlElement } from './xml-document.js';
import { childElements, ensureChildElement, getAttribute, setElementText } from './xml-document.js';

export const COPY_TO_OUTPUT = 'CopyToOutputDirectory';

export type CopyDirectiveResult =
  | { status: 'not-registered' }
  | { status: 'unchanged'; include: string }
  | { status: 'changed'; include: string; added: boolean };

function includeBasename(include: string): string {
  const segments = include.split(/[\\/]/);
  return segments[segments.length - 1] ?? include;
}

/**
 * Item (`None`, `Content`, ...) in any ItemGroup whose Include names the file.
 */
export function findProjectItem(document: XmlDocument, fileName: string): XmlElement | undefined {
  const wanted = fileName.toLowerCase();
  for (const group of childElements(document.root, 'ItemGroup')) {
    for (const item of childElements(group)) {
      const include = getAttribute(item, 'Include');
      if (include !== undefined && includeBasename(include).toLowerCase() === wanted) {
        return item;
      }
    }
  }
  return undefined;
}

/**
 * Make the item's CopyToOutputDirectory equal `value`. A missing item is
 * reported, not treated as an error: copying may be configured elsewhere.
 */
export function ensureCopyDirective(document: XmlDocument, fileName: string, value: string): CopyDirectiveResult {
  const item = findProjectItem(document, fileName);
  if (!item) {
    return { status: 'not-registered' };
  }

  const include = getAttribute(item, 'Include') ?? fileName;
  // root = 0, ItemGroup = 1, item = 2
  const { element, created } = ensureChildElement(item, COPY_TO_OUTPUT, 2, document.format);
  const changed = setElementText(element, value);
  if (!created && !changed) {
    return { status: 'unchanged', include };
  }
  return { status: 'changed', include, added: created };
}
