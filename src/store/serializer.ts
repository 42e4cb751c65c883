/**
 * Record Serialization
 *
 * YAML output sorts map keys and renders any multiline string as a literal
 * block (`|`), with trailing whitespace stripped from each line so the block
 * style is always representable. The style is applied to the document being
 * written only; no global YAML settings are touched. Documents follow YAML 1.1
 * so strings such as `yes` or `On` are quoted instead of reading back as booleans.
 *
 * JSON output is compact (no indentation).
 */

import { Document, Scalar, visit } from 'yaml';
import type { V2Record } from '../checklist/types/index.js';
import { UnsupportedFormatError } from './errors.js';
import type { OutputFormat } from './types.js';

/** Splits on any line break, dropping a single trailing one, and right-trims each line */
export function trimMultilineString(value: string): string {
  const lines = value.split(/\r\n|\r|\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => line.trimEnd()).join('\n');
}

function isMultiline(value: string): boolean {
  return /[\r\n]/.test(value);
}

export function toYaml(record: V2Record): string {
  const doc = new Document(record, { sortMapEntries: true, version: '1.1' });

  visit(doc, {
    Scalar(key, node) {
      if (key === 'key' || typeof node.value !== 'string' || !isMultiline(node.value)) return;
      node.value = trimMultilineString(node.value);
      node.type = Scalar.BLOCK_LITERAL;
    },
  });

  return doc.toString();
}

export function toJson(record: V2Record): string {
  return JSON.stringify(record);
}

/** File extension written for a format */
export function extensionFor(format: OutputFormat): 'yaml' | 'json' {
  return format === 'json' ? 'json' : 'yaml';
}

export function serializeRecord(record: V2Record, format: OutputFormat): string {
  switch (format) {
    case 'yaml':
    case 'yml':
      return toYaml(record);
    case 'json':
      return toJson(record);
    default: {
      const unsupported: never = format;
      throw new UnsupportedFormatError(String(unsupported));
    }
  }
}
