// SPDX-License-Identifier: Apache-2.0

import {gunzipSync} from 'node:zlib';
import {Base64} from 'js-base64';
import {andThen, err, ok, type Result} from '../utils/result.js';
import {isRecord, type JsonRecord, tryParseJson} from '../utils/records.js';
import {type ChartMetadata} from './release-record.js';

/**
 * Helm stores a release as base64(base64(gzip(json))). The outer layer comes from the secret encoding; the inner
 * string may additionally be wrapped in double quotes.
 */

const STANDARD_ALPHABET_ONLY = /^[A-Za-z0-9+/]*={0,2}$/;

function strictBase64(text: string): Result<string> {
  const compact = text.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !STANDARD_ALPHABET_ONLY.test(compact) || !Base64.isValid(compact)) {
    return err('malformed base64');
  }
  return ok(compact);
}

export function decodeBase64Text(text: string): Result<string> {
  return andThen(strictBase64(text), compact => ok(Base64.decode(compact)));
}

export function decodeBase64Bytes(text: string): Result<Uint8Array> {
  return andThen(strictBase64(text), compact => ok(Base64.toUint8Array(compact)));
}

export function stripSurroundingQuotes(text: string): Result<string> {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    return ok(text.slice(1, -1));
  }
  return ok(text);
}

export function gunzipText(bytes: Uint8Array): Result<string> {
  try {
    return ok(gunzipSync(bytes).toString('utf8'));
  } catch (error) {
    return err(`gzip: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function parseJson(text: string): Result<unknown> {
  const parsed = tryParseJson(text);
  return parsed === undefined ? err('invalid JSON') : ok(parsed);
}

function textField(record: JsonRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

export function extractChartMetadata(release: unknown): Result<ChartMetadata> {
  if (!isRecord(release)) {
    return err('release is not an object');
  }
  const chart = release.chart;
  if (!isRecord(chart)) {
    return err('missing chart');
  }
  const metadata = chart.metadata;
  if (!isRecord(metadata)) {
    return err('missing chart.metadata');
  }
  return ok({
    name: textField(metadata, 'name'),
    version: textField(metadata, 'version'),
    appVersion: textField(metadata, 'appVersion'),
    description: textField(metadata, 'description'),
  });
}

/**
 * Reads `data.release` out of a secret document as printed by `kubectl get secret -o json`.
 */
export function extractReleasePayload(secretJson: string): Result<string> {
  return andThen(parseJson(secretJson), secret => {
    const data = isRecord(secret) ? secret.data : undefined;
    const release = isRecord(data) ? data.release : undefined;
    return typeof release === 'string' && release !== '' ? ok(release) : err("no 'release' key in secret data");
  });
}

/**
 * Runs the full chain on the `data.release` value of a release secret, stopping at the first failing layer.
 */
export function decodeReleasePayload(payload: string): Result<ChartMetadata> {
  const text = andThen(decodeBase64Text(payload), stripSurroundingQuotes);
  const compressed = andThen(text, decodeBase64Bytes);
  const json = andThen(compressed, gunzipText);
  const release = andThen(json, parseJson);
  return andThen(release, extractChartMetadata);
}
