/**
 * XStream map conversion
 *
 * Java maps serialize as a run of <entry> elements:
 *
 *   <metaDataMap>
 *     <entry><string>SOURCE</string><string>lab</string></entry>
 *   </metaDataMap>
 *
 *   <connectorMessages>
 *     <entry><int>0</int><connectorMessage>...</connectorMessage></entry>
 *   </connectorMessages>
 *
 * When key and value share a type the parser folds them into one array under a
 * single key; otherwise the entry has two keys, key first.
 */

import { z } from 'zod';
import { MirthParseError } from '../client/errors.js';
import { ATTR_PREFIX, TEXT_NODE_NAME, isRecord } from './xml.js';

function mapKey(value: unknown): string {
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  if (isRecord(value) && TEXT_NODE_NAME in value) {
    return String(value[TEXT_NODE_NAME]);
  }
  throw new MirthParseError('Invalid XML map', [`Map key must be text, got ${JSON.stringify(value)}`]);
}

function convertEntry(entry: unknown): Record<string, unknown> {
  if (entry === '' || entry === undefined) {
    return {};
  }
  if (!isRecord(entry)) {
    throw new MirthParseError('Invalid XML map', [`Map entry must be an element, got ${typeof entry}`]);
  }

  const values = Object.entries(entry)
    .filter(([key]) => !key.startsWith(ATTR_PREFIX))
    .map(([, value]) => value);

  if (values.length === 0) {
    return {};
  }

  if (values.length === 1) {
    const pair = values[0];
    if (!Array.isArray(pair) || pair.length !== 2) {
      throw new MirthParseError('Invalid XML map', [
        'Expected exactly two items under a single-type map entry',
      ]);
    }
    return { [mapKey(pair[0])]: pair[1] };
  }

  if (values.length === 2) {
    return { [mapKey(values[0])]: values[1] };
  }

  throw new MirthParseError('Invalid XML map', ['Map entry can contain at most two elements']);
}

/**
 * Flatten a parsed XStream map element into a plain record.
 * Attribute keys such as `@class` are dropped.
 */
export function convertHashmap(value: unknown): Record<string, unknown> {
  if (value === undefined || value === null || value === '') {
    return {};
  }
  if (!isRecord(value)) {
    throw new MirthParseError('Invalid XML map', [`Expected a map element, got ${typeof value}`]);
  }

  if (!('entry' in value)) {
    return Object.fromEntries(Object.entries(value).filter(([key]) => !key.startsWith(ATTR_PREFIX)));
  }

  const entries = Array.isArray(value['entry']) ? value['entry'] : [value['entry']];
  const out: Record<string, unknown> = {};
  for (const entry of entries) {
    Object.assign(out, convertEntry(entry));
  }
  return out;
}

/**
 * Schema for an XStream map whose values match `valueSchema`
 */
export function xmlMap<S extends z.ZodTypeAny>(valueSchema: S) {
  return z.preprocess(convertHashmap, z.record(z.string(), valueSchema));
}
