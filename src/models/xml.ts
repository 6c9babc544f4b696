/**
 * XML model plumbing
 *
 * Mirth's REST API answers most endpoints with XStream-serialized XML. Each
 * response model pairs a zod schema with the name of the XML root element it
 * lives under, plus the element paths that must always parse as arrays
 * (a <list> holding one <channel> would otherwise come back as an object).
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { z } from 'zod';
import { MirthParseError } from '../client/errors.js';

/**
 * Prefix for attribute keys in parsed objects, e.g. `@class`
 */
export const ATTR_PREFIX = '@';
export const TEXT_NODE_NAME = '#text';

export interface XmlModelDefinition<S extends z.ZodTypeAny> {
  /** Root element stripped before validation, e.g. `channel` */
  rootElement?: string;
  schema: S;
  /** Dot-separated element paths (from the document root) always parsed as arrays */
  forceList?: readonly string[];
}

export interface XmlModel<T> {
  readonly rootElement: string | undefined;
  /** Parse an XML document into the model */
  parse(xml: string): T;
  /** Validate an already-parsed object (root element optional) */
  parseObject(value: unknown): T;
}

/**
 * Output type of an XmlModel
 */
export type XmlModelOutput<M> = M extends XmlModel<infer T> ? T : never;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse an XML string into a plain object.
 *
 * Tag and attribute values are left as strings; the schemas decide what
 * becomes a number, boolean or date. Empty elements parse as ''.
 */
export function parseXml(xml: string, forceList: readonly string[] = []): unknown {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MirthParseError('Invalid XML', [`${msg} (line ${line}, column ${col})`]);
  }

  const forced = new Set(forceList);
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    textNodeName: TEXT_NODE_NAME,
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    htmlEntities: true,
    isArray: (_tagName, jPath) => forced.has(jPath),
  });

  return parser.parse(xml);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function defineXmlModel<S extends z.ZodTypeAny>(
  definition: XmlModelDefinition<S>
): XmlModel<z.output<S>> {
  const { rootElement, schema, forceList = [] } = definition;
  const label = rootElement ?? 'XML';

  const parseObject = (value: unknown): z.output<S> => {
    const body = rootElement && isRecord(value) && rootElement in value ? value[rootElement] : value;
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new MirthParseError(`Invalid <${label}> response`, formatIssues(result.error), {
        cause: result.error,
      });
    }
    return result.data;
  };

  return {
    rootElement,
    parseObject,
    parse(xml: string): z.output<S> {
      return parseObject(parseXml(xml, forceList));
    },
  };
}
