import { SelectorError } from "../errors.js";
import type { NamespaceMap } from "../types.js";

export const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace";

const CLARK_NAME = /^\{([^}]+)\}(.+)$/;
const FALLBACK_PREFIX = "ns0";

export interface AttributeName {
  namespaceURI: string | null;
  localName: string;
  /** Prefix given by the caller, if any */
  prefix: string | null;
}

/**
 * Resolve `local`, `prefix:local` or `{uri}local` into a qualified name.
 */
export function resolveAttributeName(
  attribute: string,
  namespaces: NamespaceMap
): AttributeName {
  const clark = CLARK_NAME.exec(attribute);
  if (clark) {
    return { namespaceURI: clark[1] ?? null, localName: clark[2] ?? "", prefix: null };
  }

  const separator = attribute.indexOf(":");
  if (separator === -1) {
    return { namespaceURI: null, localName: attribute, prefix: null };
  }

  const prefix = attribute.slice(0, separator);
  const localName = attribute.slice(separator + 1);
  const namespaceURI = lookupNamespace(prefix, namespaces);
  if (namespaceURI === undefined) {
    throw new SelectorError(
      `Undeclared namespace prefix "${prefix}" in attribute ${attribute}.`
    );
  }
  return { namespaceURI, localName, prefix };
}

export function readAttribute(element: Element, name: AttributeName): string | null {
  if (name.namespaceURI === null) {
    return element.hasAttribute(name.localName)
      ? element.getAttribute(name.localName)
      : null;
  }
  return element.hasAttributeNS(name.namespaceURI, name.localName)
    ? element.getAttributeNS(name.namespaceURI, name.localName)
    : null;
}

export function writeAttribute(
  element: Element,
  name: AttributeName,
  value: string,
  namespaces: NamespaceMap
): void {
  if (name.namespaceURI === null) {
    element.setAttribute(name.localName, value);
    return;
  }
  const prefix =
    name.prefix ?? choosePrefix(element, name, name.namespaceURI, namespaces);
  element.setAttributeNS(name.namespaceURI, `${prefix}:${name.localName}`, value);
}

function lookupNamespace(
  prefix: string,
  namespaces: NamespaceMap
): string | undefined {
  if (Object.hasOwn(namespaces, prefix)) {
    return namespaces[prefix];
  }
  if (prefix === "xml") {
    return XML_NAMESPACE;
  }
  return undefined;
}

function choosePrefix(
  element: Element,
  name: AttributeName,
  namespaceURI: string,
  namespaces: NamespaceMap
): string {
  if (namespaceURI === XML_NAMESPACE) {
    return "xml";
  }
  const existing = element.getAttributeNodeNS(namespaceURI, name.localName)?.prefix;
  if (existing) {
    return existing;
  }
  const inScope = element.lookupPrefix(namespaceURI);
  if (inScope) {
    return inScope;
  }
  const mapped = Object.entries(namespaces).find(([, uri]) => uri === namespaceURI);
  return mapped ? mapped[0] : FALLBACK_PREFIX;
}
