// SPDX-License-Identifier: Apache-2.0

import {isRecord, stringField} from '../../../business/utils/records.js';

/**
 * Reads the namespace name from one line of `rancher namespaces ls --format json`.
 * The name is taken from `name`, then `ID`, then `Namespace.id`.
 */
export function namespaceName(value: unknown): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  if ('name' in value) {
    return stringField(value, 'name');
  }
  if ('ID' in value) {
    return stringField(value, 'ID');
  }
  const namespace = value.Namespace;
  if (isRecord(namespace) && 'id' in namespace) {
    return stringField(namespace, 'id');
  }
  return undefined;
}
