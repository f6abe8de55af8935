import { DOMParser } from "@xmldom/xmldom";
import { DecodeError } from "../osm/DecodeError";

const ELEMENT_NODE = 1;

/**
 * Parses an XML string, turning any parser complaint into a
 * `MalformedDocument` error instead of letting it reach the console.
 */
export function parseXMLDocument(xml: string): Element {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => {},
      error: (message: string) => errors.push(message),
      fatalError: (message: string) => errors.push(message),
    },
  });

  let document: Document | undefined;
  try {
    document = parser.parseFromString(xml, "text/xml");
  } catch (error) {
    throw new DecodeError("MalformedDocument", `XML parse failed: ${error}`);
  }

  if (errors.length > 0) {
    throw new DecodeError("MalformedDocument", errors[0]);
  }
  if (!document || !document.documentElement) {
    throw new DecodeError("MalformedDocument", "document has no root element");
  }
  return document.documentElement;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/**
 * Direct child elements, optionally restricted to one tag name. Unlike
 * getElementsByTagName this does not descend into grandchildren.
 */
export function childElements(parent: Element, tagName?: string): Element[] {
  const children: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes.item(i);
    if (
      child &&
      isElement(child) &&
      (tagName === undefined || child.tagName === tagName)
    ) {
      children.push(child);
    }
  }
  return children;
}

export function firstChildElement(
  parent: Element,
  tagName?: string,
): Element | undefined {
  return childElements(parent, tagName)[0];
}

export function optionalAttribute(
  element: Element,
  name: string,
): string | undefined {
  const value = element.getAttribute(name);
  return value === null || value === "" ? undefined : value;
}

export function requiredAttribute(element: Element, name: string): string {
  const value = optionalAttribute(element, name);
  if (value === undefined) {
    throw new DecodeError(
      "MalformedElement",
      `<${element.tagName}> is missing attribute "${name}"`,
    );
  }
  return value;
}

export function optionalNumberAttribute(
  element: Element,
  name: string,
): number | undefined {
  const value = optionalAttribute(element, name);
  if (value === undefined) {
    return undefined;
  }
  const number = Number(value);
  if (Number.isNaN(number)) {
    throw new DecodeError(
      "MalformedElement",
      `<${element.tagName}> attribute "${name}" is not a number: ${value}`,
    );
  }
  return number;
}

export function requiredNumberAttribute(
  element: Element,
  name: string,
): number {
  const number = optionalNumberAttribute(element, name);
  if (number === undefined) {
    throw new DecodeError(
      "MalformedElement",
      `<${element.tagName}> is missing attribute "${name}"`,
    );
  }
  return number;
}

export function optionalDateAttribute(
  element: Element,
  name: string,
): Date | undefined {
  const value = optionalAttribute(element, name);
  if (value === undefined) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function tagsOf(element: Element): { [key: string]: string } {
  // No prototype, so keys such as "__proto__" are stored as tags.
  const tags: { [key: string]: string } = Object.create(null);
  for (const tag of childElements(element, "tag")) {
    tags[requiredAttribute(tag, "k")] = tag.getAttribute("v") ?? "";
  }
  return tags;
}
