import { buildChildren } from "../children/build-children.js";
import { MutationError, TargetTypeError } from "../errors.js";
import {
  DOCUMENT_NODE,
  getElementText,
  isElementNode,
  removeChildrenAfterText,
  setElementText
} from "../dom.js";
import { Err, Ok, attempt, type Result } from "../result.js";
import {
  resolveAttributeName,
  readAttribute,
  writeAttribute,
  type AttributeName
} from "../selector/attribute-name.js";
import { classifyResultSet, describeResults } from "../selector/classify.js";
import { evaluateSelector } from "../selector/evaluate.js";
import type {
  AddChildrenRequest,
  Classification,
  MutationRequest,
  MutationVerdict,
  ResultMember,
  ResultSet,
  Selector,
  SetChildrenRequest,
  SetValueRequest
} from "../types.js";

export type MutationResult = Result<MutationVerdict>;

export interface MutationOptions {
  /** Compute the verdict without touching the tree */
  dryRun?: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

export function describeMatches(count: number): string {
  return count === 1 ? "1 match" : `${count} matches`;
}

export function describeElements(count: number): string {
  return count === 1 ? "1 element" : `${count} elements`;
}

function describeChildren(count: number): string {
  return count === 1 ? "1 child" : `${count} children`;
}

function elementsOf(results: ResultSet): Element[] {
  const elements: Element[] = [];
  for (const member of results) {
    if (member.kind === "element") {
      elements.push(member.node);
    }
  }
  return elements;
}

function evaluate(document: Document, selector: Selector): Result<ResultSet> {
  return attempt(() => evaluateSelector(document, selector));
}

function requireNodes(
  results: ResultSet,
  selector: Selector,
  purpose: string
): Result<Element[]> {
  if (classifyResultSet(results) !== "node") {
    return Err(
      new TargetTypeError(
        `Cannot ${purpose}: ${selector.xpath} must select elements but resolved to ${describeResults(results)}.`
      )
    );
  }
  return Ok(elementsOf(results));
}

// ============================================================================
// Apply Mutation
// ============================================================================

export function applyMutation(
  document: Document,
  selector: Selector,
  request: MutationRequest,
  options: MutationOptions = {}
): MutationResult {
  switch (request.kind) {
    case "delete":
      return deleteTarget(document, selector, options);
    case "setValue":
      return setValue(document, selector, request, options);
    case "addChildren":
      return addChildren(document, selector, request, options);
    case "setChildren":
      return setChildren(document, selector, request, options);
    default: {
      const never: never = request;
      throw new Error(`Unknown mutation kind: ${JSON.stringify(never)}`);
    }
  }
}

// ============================================================================
// Delete
// ============================================================================

/**
 * Remove every selected attribute or element. Removals already made in the
 * pass stay in place when a later member fails.
 */
export function deleteTarget(
  document: Document,
  selector: Selector,
  options: MutationOptions = {}
): MutationResult {
  const evaluated = evaluate(document, selector);
  if (!evaluated.ok) {
    return evaluated;
  }
  const results = evaluated.value;
  if (results.length === 0) {
    return Ok({
      changed: false,
      matchCount: 0,
      message: `Nothing to delete at ${selector.xpath}`
    });
  }

  const classification = classifyResultSet(results);
  for (const member of results) {
    const removed = removeMember(member, classification, selector, options);
    if (!removed.ok) {
      return removed;
    }
  }

  return Ok({
    changed: true,
    matchCount: results.length,
    message: `Deleted ${describeMatches(results.length)} at ${selector.xpath}`
  });
}

function removeMember(
  member: ResultMember,
  classification: Classification,
  selector: Selector,
  options: MutationOptions
): Result<void> {
  if (classification === "attribute" && member.kind === "attribute") {
    const owner = member.node.ownerElement;
    if (owner === null) {
      return Err(
        new MutationError(`Attribute ${member.node.name} has no owning element.`)
      );
    }
    if (!options.dryRun) {
      owner.removeAttributeNode(member.node);
    }
    return Ok(undefined);
  }

  if (classification === "node" && member.kind === "element") {
    const parent = member.node.parentNode;
    if (parent === null || parent.nodeType === DOCUMENT_NODE) {
      return Err(
        new MutationError(
          `Cannot delete <${member.node.nodeName}>: it is the document root.`
        )
      );
    }
    if (!options.dryRun) {
      parent.removeChild(member.node);
    }
    return Ok(undefined);
  }

  return Err(
    new MutationError(
      `Cannot delete ${member.kind} results of ${selector.xpath}; select elements or attributes.`
    )
  );
}

// ============================================================================
// Set Value
// ============================================================================

/**
 * Set the text (or one attribute) of every selected element, touching only
 * elements whose current value differs.
 */
export function setValue(
  document: Document,
  selector: Selector,
  request: SetValueRequest,
  options: MutationOptions = {}
): MutationResult {
  const evaluated = evaluate(document, selector);
  if (!evaluated.ok) {
    return evaluated;
  }
  const label = request.attribute ? `attribute ${request.attribute}` : "text";
  const targets = requireNodes(evaluated.value, selector, `set ${label}`);
  if (!targets.ok) {
    return targets;
  }

  let name: AttributeName | null = null;
  if (request.attribute !== undefined) {
    const attribute = request.attribute;
    const resolved = attempt(() =>
      resolveAttributeName(attribute, selector.namespaces)
    );
    if (!resolved.ok) {
      return resolved;
    }
    name = resolved.value;
  }

  let updated = 0;
  for (const element of targets.value) {
    if (name === null) {
      if (getElementText(element) === request.value) {
        continue;
      }
      updated += 1;
      if (!options.dryRun) {
        setElementText(element, request.value);
      }
      continue;
    }

    const desired = request.value ?? "";
    if (readAttribute(element, name) === desired) {
      continue;
    }
    updated += 1;
    if (!options.dryRun) {
      writeAttribute(element, name, desired, selector.namespaces);
    }
  }

  const matchCount = targets.value.length;
  return Ok({
    changed: updated > 0,
    matchCount,
    message:
      updated > 0
        ? `Updated ${label} on ${describeElements(updated)} at ${selector.xpath}`
        : `${capitalize(label)} already set on ${describeElements(matchCount)} at ${selector.xpath}`
  });
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ============================================================================
// Children
// ============================================================================

/**
 * Append (or insert as siblings) freshly built children for every selected
 * element. Existing children are never compared or deduplicated.
 */
export function addChildren(
  document: Document,
  selector: Selector,
  request: AddChildrenRequest,
  options: MutationOptions = {}
): MutationResult {
  const evaluated = evaluate(document, selector);
  if (!evaluated.ok) {
    return evaluated;
  }
  if (evaluated.value.length === 0) {
    return Ok({
      changed: false,
      matchCount: 0,
      message: `No element at ${selector.xpath}; no children added`
    });
  }
  const targets = requireNodes(evaluated.value, selector, "add children");
  if (!targets.ok) {
    return targets;
  }
  const built = attempt(() =>
    buildChildren(request.children, {
      inputType: request.inputType,
      namespaces: selector.namespaces
    })
  );
  if (!built.ok) {
    return built;
  }

  for (const element of targets.value) {
    const inserted = insertChildren(element, built.value, request, options);
    if (!inserted.ok) {
      return inserted;
    }
  }

  const matchCount = targets.value.length;
  const verb =
    request.position === "append"
      ? `Added ${describeChildren(built.value.length)} to`
      : `Inserted ${describeChildren(built.value.length)} ${request.position}`;
  return Ok({
    changed: true,
    matchCount,
    message: `${verb} ${describeElements(matchCount)} at ${selector.xpath}`
  });
}

function insertChildren(
  element: Element,
  children: Element[],
  request: AddChildrenRequest,
  options: MutationOptions
): Result<void> {
  if (request.position === "append") {
    if (!options.dryRun) {
      for (const child of children) {
        element.appendChild(element.ownerDocument.importNode(child, true));
      }
    }
    return Ok(undefined);
  }

  const parent = element.parentNode;
  if (!isElementNode(parent)) {
    return Err(
      new MutationError(
        `Cannot insert siblings ${request.position} <${element.nodeName}>: it is the document root.`
      )
    );
  }
  if (!options.dryRun) {
    const anchor = request.position === "before" ? element : element.nextSibling;
    for (const child of children) {
      parent.insertBefore(element.ownerDocument.importNode(child, true), anchor);
    }
  }
  return Ok(undefined);
}

/**
 * Replace the children of every selected element. Always reports a change
 * when something matched, even if the new children equal the old ones.
 */
export function setChildren(
  document: Document,
  selector: Selector,
  request: SetChildrenRequest,
  options: MutationOptions = {}
): MutationResult {
  const evaluated = evaluate(document, selector);
  if (!evaluated.ok) {
    return evaluated;
  }
  const results = evaluated.value;
  if (results.length === 0) {
    return Ok({
      changed: false,
      matchCount: 0,
      message: `No element at ${selector.xpath}; children left unchanged`
    });
  }
  const built = attempt(() =>
    buildChildren(request.children, {
      inputType: request.inputType,
      namespaces: selector.namespaces
    })
  );
  if (!built.ok) {
    return built;
  }

  for (const member of results) {
    if (member.kind !== "element") {
      return Err(
        new MutationError(
          `Cannot replace children of ${member.kind} results of ${selector.xpath}.`
        )
      );
    }
    if (options.dryRun) {
      continue;
    }
    const element = member.node;
    removeChildrenAfterText(element);
    for (const child of built.value) {
      element.appendChild(element.ownerDocument.importNode(child, true));
    }
  }

  return Ok({
    changed: true,
    matchCount: results.length,
    message: `Replaced children of ${describeElements(results.length)} at ${selector.xpath}`
  });
}
