import { DOMParser } from "@xmldom/xmldom";
import { InvalidChildSpecError, ParseError } from "../errors.js";
import { parseDocument } from "../document/parse.js";
import { XML_NAMESPACE } from "../selector/attribute-name.js";
import type {
  ChildAttributeMap,
  ChildInputType,
  ChildSpec,
  ChildSpecEntry,
  NamespaceMap
} from "../types.js";

/** Attribute-map key holding nested children. */
export const CHILDREN_KEY = "_";
/** Attribute-map key holding the child's text. */
export const TEXT_KEY = "+value";

const TAG_NAME = /^[\p{L}_][\p{L}\p{N}_.-]*(?::[\p{L}_][\p{L}\p{N}_.-]*)?$/u;
const XMLNS_NAMESPACE = "http://www.w3.org/2000/xmlns/";

export interface BuildChildrenOptions {
  inputType?: ChildInputType;
  /** Prefix mapping used to bind prefixed tag and attribute names */
  namespaces?: NamespaceMap;
}

/**
 * Validate untrusted child specifications, e.g. parsed from YAML.
 */
export function assertChildSpec(
  value: unknown,
  inputType: ChildInputType = "yaml"
): asserts value is ChildSpec {
  if (!Array.isArray(value)) {
    throw new InvalidChildSpecError("Children must be a list.");
  }
  value.forEach((entry: unknown, index: number) => {
    if (inputType === "xml") {
      if (typeof entry !== "string") {
        throw new InvalidChildSpecError(
          `Child ${index + 1} must be an XML string when the input type is xml.`
        );
      }
      return;
    }
    validateEntry(entry, `child ${index + 1}`);
  });
}

/**
 * Construct freestanding elements from a child specification. The elements
 * belong to a scratch document and are not attached to any tree.
 */
export function buildChildren(
  spec: ChildSpec,
  options: BuildChildrenOptions = {}
): Element[] {
  const inputType = options.inputType ?? "yaml";
  assertChildSpec(spec, inputType);

  if (inputType === "xml") {
    return spec.map((entry, index) => buildFromXml(entry, index));
  }
  const scratch = new DOMParser().parseFromString("<children/>", "text/xml");
  return buildEntries({ scratch, namespaces: options.namespaces ?? {} }, spec);
}

interface BuildContext {
  scratch: Document;
  namespaces: NamespaceMap;
}

function buildEntries(context: BuildContext, spec: ChildSpec): Element[] {
  return spec.map((entry) => buildEntry(context, entry));
}

function buildEntry(context: BuildContext, entry: ChildSpecEntry): Element {
  if (typeof entry === "string") {
    return createElement(context, entry);
  }

  const [tag, value] = singleEntry(entry);
  const element = createElement(context, tag);
  if (isPlainObject(value)) {
    applyAttributeMap(context, element, value);
  } else if (value !== null) {
    element.appendChild(context.scratch.createTextNode(String(value)));
  }
  return element;
}

function applyAttributeMap(
  context: BuildContext,
  element: Element,
  attributes: ChildAttributeMap
): void {
  const { scratch } = context;
  for (const [name, value] of Object.entries(attributes)) {
    if (name === CHILDREN_KEY) {
      if (Array.isArray(value)) {
        for (const child of buildEntries(context, value)) {
          element.appendChild(child);
        }
      }
      continue;
    }
    if (name === TEXT_KEY) {
      if (value !== null && !Array.isArray(value)) {
        element.insertBefore(scratch.createTextNode(String(value)), element.firstChild);
      }
      continue;
    }
    if (value !== null && !Array.isArray(value)) {
      setAttribute(context, element, name, String(value));
    }
  }
}

function createElement(context: BuildContext, tag: string): Element {
  const prefix = prefixOf(tag);
  if (prefix === null) {
    return context.scratch.createElement(tag);
  }
  const namespaceURI = lookupPrefix(prefix, context.namespaces);
  if (namespaceURI === undefined) {
    throw new InvalidChildSpecError(
      `Undeclared namespace prefix "${prefix}" in child <${tag}>.`
    );
  }
  return context.scratch.createElementNS(namespaceURI, tag);
}

function setAttribute(
  context: BuildContext,
  element: Element,
  name: string,
  value: string
): void {
  const prefix = prefixOf(name);
  if (prefix === null) {
    element.setAttribute(name, value);
    return;
  }
  const namespaceURI =
    prefix === "xml"
      ? XML_NAMESPACE
      : prefix === "xmlns"
        ? XMLNS_NAMESPACE
        : lookupPrefix(prefix, context.namespaces);
  if (namespaceURI === undefined) {
    throw new InvalidChildSpecError(
      `Undeclared namespace prefix "${prefix}" in attribute ${name} of <${element.tagName}>.`
    );
  }
  element.setAttributeNS(namespaceURI, name, value);
}

function prefixOf(name: string): string | null {
  const separator = name.indexOf(":");
  return separator === -1 ? null : name.slice(0, separator);
}

function lookupPrefix(prefix: string, namespaces: NamespaceMap): string | undefined {
  return Object.hasOwn(namespaces, prefix) ? namespaces[prefix] : undefined;
}

function buildFromXml(entry: ChildSpecEntry, index: number): Element {
  if (typeof entry !== "string") {
    throw new InvalidChildSpecError(`Child ${index + 1} must be an XML string.`);
  }
  try {
    const fragment = parseDocument(entry);
    const root = fragment.documentElement;
    fragment.removeChild(root);
    return root;
  } catch (error) {
    if (error instanceof ParseError) {
      throw new InvalidChildSpecError(
        `Child ${index + 1} is not well-formed XML: ${error.message}`,
        { cause: error }
      );
    }
    throw error;
  }
}

function singleEntry<T>(entry: Record<string, T>): [string, T] {
  const entries = Object.entries(entry);
  const first = entries[0];
  if (entries.length !== 1 || first === undefined) {
    throw new InvalidChildSpecError(
      `Child mappings must have exactly one key, found ${entries.length}.`
    );
  }
  return first;
}

function validateEntry(entry: unknown, location: string): void {
  if (typeof entry === "string") {
    validateTag(entry, location);
    return;
  }
  if (!isPlainObject(entry)) {
    throw new InvalidChildSpecError(
      `Invalid ${location}: expected a tag name or a single-key mapping.`
    );
  }

  const keys = Object.keys(entry);
  if (keys.length !== 1) {
    throw new InvalidChildSpecError(
      `Invalid ${location}: mappings must have exactly one key, found ${keys.length}.`
    );
  }
  const [tag, value] = singleEntry(entry);
  validateTag(tag, location);

  if (value === null || isScalar(value)) {
    return;
  }
  if (!isPlainObject(value)) {
    throw new InvalidChildSpecError(
      `Invalid ${location}: <${tag}> must map to text or to an attribute mapping.`
    );
  }
  validateAttributeMap(tag, value, location);
}

function validateAttributeMap(
  tag: string,
  attributes: Record<string, unknown>,
  location: string
): void {
  for (const [name, value] of Object.entries(attributes)) {
    if (name === CHILDREN_KEY) {
      if (!Array.isArray(value)) {
        throw new InvalidChildSpecError(
          `Invalid ${location}: "${CHILDREN_KEY}" of <${tag}> must be a list.`
        );
      }
      value.forEach((child: unknown, index: number) => {
        validateEntry(child, `${location} > ${tag} child ${index + 1}`);
      });
      continue;
    }
    if (name !== TEXT_KEY) {
      validateTag(name, `${location} attribute`);
    }
    if (value !== null && !isScalar(value)) {
      throw new InvalidChildSpecError(
        `Invalid ${location}: attribute "${name}" of <${tag}> must be a scalar.`
      );
    }
  }
}

function validateTag(name: string, location: string): void {
  if (!TAG_NAME.test(name)) {
    throw new InvalidChildSpecError(`Invalid ${location}: "${name}" is not a valid XML name.`);
  }
}

function isScalar(value: unknown): value is string | number | boolean {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
