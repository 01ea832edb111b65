/**
 * Maps an explicit format tag or a file extension to one of the five
 * interchange formats.
 */

import { extname } from 'node:path';

export const FORMATS = ['record', 'table', 'checklist', 'document', 'text'] as const;

export type Format = (typeof FORMATS)[number];

/** Formats that can be read back; the styled document is export-only */
export const DECODABLE_FORMATS: readonly Format[] = ['record', 'table', 'text', 'checklist'];

export const DEFAULT_FORMAT: Format = 'record';

const TAG_MAP = new Map<string, Format>([
  ['record', 'record'],
  ['json', 'record'],
  ['table', 'table'],
  ['csv', 'table'],
  ['checklist', 'checklist'],
  ['md', 'checklist'],
  ['markdown', 'checklist'],
  ['document', 'document'],
  ['html', 'document'],
  ['htm', 'document'],
  ['text', 'text'],
  ['txt', 'text'],
]);

const EXTENSION_MAP = new Map<string, Format>([
  ['.json', 'record'],
  ['.csv', 'table'],
  ['.md', 'checklist'],
  ['.markdown', 'checklist'],
  ['.html', 'document'],
  ['.htm', 'document'],
  ['.txt', 'text'],
  ['.text', 'text'],
]);

/** Canonical format for a tag or alias (case-insensitive), or null if unknown */
export function parseFormatTag(tag: string): Format | null {
  return TAG_MAP.get(tag.trim().toLowerCase()) ?? null;
}

/**
 * Resolve the format for a path. An explicit tag wins; an unknown explicit tag
 * resolves to null. Without a tag the extension decides, defaulting to record.
 */
export function resolveFormat(filePath: string, explicit?: string | null): Format | null {
  if (explicit != null && explicit !== '') {
    return parseFormatTag(explicit);
  }
  return EXTENSION_MAP.get(extname(filePath).toLowerCase()) ?? DEFAULT_FORMAT;
}

export function isDecodable(format: Format): boolean {
  return DECODABLE_FORMATS.includes(format);
}
