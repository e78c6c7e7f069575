/**
 * @module @envstage/core/transform/config-transformer
 *
 * Textual rewrites applied to an environment config before it is staged.
 * The input is treated as plain UTF-8 text, never parsed as XML.
 */

import { InvalidEncodingError } from '../errors.js';

export interface TransformOptions {
  environment: string;
  domainSuffix: string;
  /** Single drive letter, e.g. `D`. */
  targetDrive: string;
  hostnamePlaceholder: string;
}

const DRIVE_ROOT = /[a-z]:\\/gi;
const UTF8_BOM = [0xef, 0xbb, 0xbf];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * 1. every hostname placeholder (ignoring case) becomes
 *    `<environment>.<domainSuffix>`;
 * 2. every `X:\` drive root becomes `<targetDrive>:\`.
 *
 * Idempotent as long as the hostname does not contain the placeholder,
 * which settings validation rejects.
 */
export function transformConfig(raw: string, options: TransformOptions): string {
  const hostname = `${options.environment}.${options.domainSuffix}`;
  const placeholder = new RegExp(escapeRegExp(options.hostnamePlaceholder), 'gi');
  const driveRoot = `${options.targetDrive.toUpperCase()}:\\`;

  return raw.replace(placeholder, () => hostname).replace(DRIVE_ROOT, () => driveRoot);
}

export function countDriveRoots(text: string): number {
  return text.match(DRIVE_ROOT)?.length ?? 0;
}

export interface DecodedText {
  text: string;
  hasBom: boolean;
}

/**
 * Strict UTF-8 decode.
 * @throws InvalidEncodingError on malformed bytes
 */
export function decodeConfigText(bytes: Uint8Array, filePath?: string): DecodedText {
  const hasBom = UTF8_BOM.every((byte, index) => bytes[index] === byte);
  try {
    const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(bytes);
    return { text, hasBom };
  } catch {
    throw new InvalidEncodingError(filePath);
  }
}

export function encodeConfigText(text: string, hasBom: boolean): Buffer {
  const body = Buffer.from(text, 'utf8');
  return hasBom ? Buffer.concat([Buffer.from(UTF8_BOM), body]) : body;
}

/**
 * Bounded prefix for dry-run output.
 */
export function previewConfig(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}\n… (${text.length - limit} more characters)`;
}
