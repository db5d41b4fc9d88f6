/**
 * XML parsing helpers shared by the description and SOAP parsers.
 *
 * fast-xml-parser returns untyped objects; these helpers walk them without
 * assuming a shape.
 */

import { XMLParser } from "fast-xml-parser";

export type XmlNode = Record<string, unknown>;

/** Tags that may repeat and are always returned as arrays */
const REPEATED_TAGS = new Set(["device", "service"]);

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  // keep text as-is: values are converted per argument later
  parseTagValue: false,
  isArray: (tagName) => REPEATED_TAGS.has(tagName),
});

export function parseXml(xml: string): unknown {
  const doc: unknown = parser.parse(xml);
  return doc;
}

export function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Follow a path of element names, undefined if any step is missing */
export function descend(node: unknown, ...path: string[]): unknown {
  let current = node;
  for (const key of path) {
    if (!isNode(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** Child elements with the given name, as a list */
export function childList(node: unknown, key: string): unknown[] {
  const value = descend(node, key);
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Text content of a child element */
export function childText(node: unknown, key: string): string | undefined {
  const value = descend(node, key);
  return typeof value === "string" ? value : undefined;
}
