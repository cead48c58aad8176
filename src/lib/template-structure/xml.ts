/**
 * Namespace-aware DOM helpers over @xmldom/xmldom.
 * Elements are matched by namespace URI + local name, so documents that bind
 * the WordprocessingML namespace to a prefix other than "w" still parse.
 */

import { DOMParser } from "@xmldom/xmldom";
import { MalformedAttributeError } from "./errors";

export const NS = {
  w: "http://schemas.openxmlformats.org/wordprocessingml/2006/main",
  r: "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
  wp: "http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing",
  a: "http://schemas.openxmlformats.org/drawingml/2006/main",
  pic: "http://schemas.openxmlformats.org/drawingml/2006/picture",
  rel: "http://schemas.openxmlformats.org/package/2006/relationships",
} as const;

export type Namespace = (typeof NS)[keyof typeof NS];

const ELEMENT_NODE = 1;
const NUMBER_PATTERN = /^[-+]?\d+(\.\d+)?$/;

/** Parse an XML string, throwing on any well-formedness error. */
export function parseXml(xml: string): Document {
  const parser = new DOMParser({
    errorHandler: {
      error: (msg: string) => {
        throw new Error(msg);
      },
      fatalError: (msg: string) => {
        throw new Error(msg);
      },
    },
  });
  const doc = parser.parseFromString(xml, "text/xml");
  if (!doc || !doc.documentElement) {
    throw new Error("XML has no root element");
  }
  return doc;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function matches(el: Element, ns: Namespace, localName: string): boolean {
  return el.namespaceURI === ns && el.localName === localName;
}

/** Element children of `parent`, optionally filtered by name. */
export function childElements(
  parent: Element,
  ns?: Namespace,
  localName?: string
): Element[] {
  const result: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (!node || !isElement(node)) continue;
    if (ns && localName && !matches(node, ns, localName)) continue;
    result.push(node);
  }
  return result;
}

export function firstChild(
  parent: Element,
  ns: Namespace,
  localName: string
): Element | undefined {
  return childElements(parent, ns, localName)[0];
}

/** All descendants with the given name, in document order. */
export function descendants(
  root: Element | Document,
  ns: Namespace,
  localName: string
): Element[] {
  const list = root.getElementsByTagNameNS(ns, localName);
  const result: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const el = list.item(i);
    if (el) result.push(el);
  }
  return result;
}

/**
 * Descendants that belong to `root` itself, looking through wrappers such as
 * w:sdt and w:customXml. The walk does not enter a match or an element named
 * `boundary`.
 */
export function ownDescendants(
  root: Element,
  ns: Namespace,
  localName: string,
  boundary: string
): Element[] {
  const result: Element[] = [];
  const visit = (parent: Element) => {
    for (const child of childElements(parent)) {
      if (matches(child, ns, localName)) result.push(child);
      else if (!matches(child, ns, boundary)) visit(child);
    }
  };
  visit(root);
  return result;
}

export function firstDescendant(
  root: Element | Document,
  ns: Namespace,
  localName: string
): Element | undefined {
  return descendants(root, ns, localName)[0];
}

/**
 * Attribute value, or undefined when absent. Pass `ns` for qualified
 * attributes such as w:val; omit it for unqualified ones such as cx.
 */
export function attr(
  el: Element,
  name: string,
  ns?: Namespace
): string | undefined {
  const node = ns ? el.getAttributeNodeNS(ns, name) : el.getAttributeNode(name);
  return node ? node.value : undefined;
}

/**
 * Numeric attribute value. Returns undefined when the attribute is absent and
 * throws MalformedAttributeError when it is present but not a number.
 */
export function numberAttr(
  el: Element,
  name: string,
  ns?: Namespace
): number | undefined {
  const raw = attr(el, name, ns);
  if (raw === undefined) return undefined;
  return parseNumber(raw.trim(), el.nodeName, name);
}

export function parseNumber(
  raw: string,
  element: string,
  attribute: string
): number {
  if (!NUMBER_PATTERN.test(raw)) {
    throw new MalformedAttributeError(element, attribute, raw);
  }
  return Number(raw);
}

/** Concatenated character data below `el`. */
export function textOf(el: Element): string {
  return el.textContent ?? "";
}
