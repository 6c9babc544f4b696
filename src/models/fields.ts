/**
 * Field schemas for XStream-serialized values.
 *
 * XML gives us strings for everything, so these coerce to the TypeScript
 * types the models expose while still accepting already-typed values (for
 * `parseObject` callers building models from JSON).
 */

import { z } from 'zod';
import { TEXT_NODE_NAME, isRecord } from './xml.js';

function emptyToUndefined(value: unknown): unknown {
  return value === '' || value === null ? undefined : value;
}

/**
 * Text content of an element that may carry attributes
 */
function unwrapText(value: unknown): unknown {
  if (isRecord(value) && TEXT_NODE_NAME in value) {
    return value[TEXT_NODE_NAME];
  }
  return value;
}

export const xmlText = z.preprocess(unwrapText, z.string());

/** Empty or missing element → undefined */
export const optionalText = z.preprocess(
  (value) => emptyToUndefined(unwrapText(value)),
  z.string().optional()
);

export const xmlInt = z.preprocess(
  unwrapText,
  z.union([
    z.number().int(),
    z
      .string()
      .trim()
      .regex(/^-?\d+$/, 'Expected an integer')
      .transform(Number),
  ])
);

export const xmlBoolean = z.preprocess(
  unwrapText,
  z.union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
);

export const xmlUuid = z.preprocess(unwrapText, z.string().uuid());

/**
 * XStream Calendar: <receivedDate><time>1643708252777</time><timezone>Europe/London</timezone></receivedDate>
 */
const mirthCalendar = z
  .object(
    {
      time: xmlInt,
      timezone: optionalText,
    },
    { invalid_type_error: 'Expected a Mirth timestamp object' }
  )
  .transform((value) => new Date(value.time));

/**
 * Mirth timestamp → Date. ISO-8601 strings are accepted too; some endpoints
 * (server events) serialize dates that way.
 */
export const mirthDate = z.union([
  z.date(),
  mirthCalendar,
  z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
]);

/**
 * Wrap a schema so an empty or missing element yields undefined
 */
export function optionalElement<S extends z.ZodTypeAny>(schema: S) {
  return z.preprocess(emptyToUndefined, schema.optional());
}

/**
 * Normalize a repeated element into an array. Handles:
 * - missing or empty container → []
 * - a single child parsed as an object → [child]
 */
export function xmlList<S extends z.ZodTypeAny>(item: S) {
  return z.preprocess((value) => {
    const unwrapped = emptyToUndefined(value);
    if (unwrapped === undefined) return [];
    return Array.isArray(unwrapped) ? unwrapped : [unwrapped];
  }, z.array(item));
}

/**
 * Container object for `<list>` style responses; `<list/>` parses as ''
 */
export function xmlContainer<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((value) => emptyToUndefined(value) ?? {}, z.object(shape));
}
