// SPDX-License-Identifier: Apache-2.0

import * as yaml from 'yaml';

/**
 * Narrowing helpers for JSON and YAML documents read from external tools.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a field as a string. Numbers are converted; anything else reads as the empty string.
 */
export function stringField(record: JsonRecord, key: string): string {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}

/**
 * Parses JSON text without throwing.
 * @returns the parsed value, or undefined when the text is not valid JSON
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parses a stream of JSON documents, one per non-empty line, skipping lines that are not valid JSON.
 */
export function parseJsonLines(text: string): unknown[] {
  const documents: unknown[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) {
      continue;
    }
    const parsed = tryParseJson(line.trim());
    if (parsed !== undefined) {
      documents.push(parsed);
    }
  }
  return documents;
}

/**
 * Parses a YAML document, keeping integers outside the safe range as bigint so they are written back unchanged.
 * @throws YAMLParseError when the text is not valid YAML
 */
export function parseYamlExact(text: string): unknown {
  return narrowIntegers(yaml.parse(text, {intAsBigInt: true, uniqueKeys: false}));
}

/**
 * Parses JSON text without throwing, with the integer handling of {@link parseYamlExact}.
 * @returns the parsed value, or undefined when the text is not valid JSON
 */
export function tryParseJsonExact(text: string): unknown {
  const parsed = tryParseJson(text);
  if (parsed === undefined) {
    return undefined;
  }
  try {
    return parseYamlExact(text);
  } catch {
    return parsed;
  }
}

function narrowIntegers(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value;
  }
  if (Array.isArray(value)) {
    return value.map(narrowIntegers);
  }
  if (isRecord(value)) {
    const narrowed: JsonRecord = {};
    for (const [key, entry] of Object.entries(value)) {
      narrowed[key] = narrowIntegers(entry);
    }
    return narrowed;
  }
  return value;
}
