import xpath from "xpath";
import { SelectorError, describeError } from "../errors.js";
import {
  childElements,
  isAttributeNode,
  isDomNode,
  isElementNode,
  isTextNode
} from "../dom.js";
import type { NamespaceMap, ResultMember, ResultSet, Selector } from "../types.js";

/**
 * Evaluate a selector against a document. Members keep document order.
 */
export function evaluateSelector(
  document: Document,
  selector: Selector
): ResultSet {
  const raw = select(document, selector.xpath, selector.namespaces);
  if (Array.isArray(raw)) {
    return raw.map((item: unknown) => toMember(item, selector.xpath));
  }
  if (raw === null || raw === undefined) {
    return [];
  }
  return [toMember(raw, selector.xpath)];
}

/**
 * Count matches through `count()` without materializing the node list.
 */
export function countMatches(document: Document, selector: Selector): number {
  const raw = select(
    document,
    `count(${selector.xpath})`,
    selector.namespaces
  );
  if (typeof raw !== "number") {
    throw new SelectorError(
      `Expected a number when counting ${selector.xpath}, received ${typeof raw}.`
    );
  }
  return raw;
}

/**
 * Canonical paths of every element the selector matches.
 */
export function matchPaths(document: Document, selector: Selector): string[] {
  const paths: string[] = [];
  for (const member of evaluateSelector(document, selector)) {
    if (member.kind === "element") {
      paths.push(canonicalPath(member.node));
    }
  }
  return paths;
}

/**
 * Absolute path of an element, e.g. `/config/item[2]/name`. A position is
 * only added when the parent holds several elements of the same name.
 */
export function canonicalPath(element: Element): string {
  const segments: string[] = [];
  let current: Element | null = element;
  while (current !== null) {
    segments.unshift(pathSegment(current));
    const parent: Node | null = current.parentNode;
    current = isElementNode(parent) ? parent : null;
  }
  return `/${segments.join("/")}`;
}

function pathSegment(element: Element): string {
  const name = element.nodeName;
  const parent = element.parentNode;
  if (!isElementNode(parent)) {
    return name;
  }
  const siblings = childElements(parent).filter(
    (sibling) => sibling.nodeName === name
  );
  if (siblings.length < 2) {
    return name;
  }
  return `${name}[${siblings.indexOf(element) + 1}]`;
}

function select(
  document: Document,
  expression: string,
  namespaces: NamespaceMap
): unknown {
  try {
    const evaluate = xpath.useNamespaces({ ...namespaces });
    return evaluate(expression, document);
  } catch (error) {
    throw new SelectorError(
      `Invalid xpath ${expression}: ${describeError(error)}`,
      { cause: error }
    );
  }
}

function toMember(item: unknown, expression: string): ResultMember {
  if (isElementNode(item)) {
    return { kind: "element", node: item };
  }
  if (isAttributeNode(item)) {
    return { kind: "attribute", node: item };
  }
  if (isTextNode(item)) {
    return { kind: "text", node: item };
  }
  if (isDomNode(item)) {
    return { kind: "node", node: item };
  }
  switch (typeof item) {
    case "number":
      return { kind: "number", value: item };
    case "string":
      return { kind: "string", value: item };
    case "boolean":
      return { kind: "boolean", value: item };
    default:
      throw new SelectorError(
        `Unsupported result of type ${typeof item} from xpath ${expression}.`
      );
  }
}
