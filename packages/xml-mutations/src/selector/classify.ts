import type { Classification, ResultSet } from "../types.js";

/**
 * Classify a result set by its first member. Attribute-selecting
 * expressions yield homogeneous sets, so later members are not inspected.
 */
export function classifyResultSet(results: ResultSet): Classification {
  const first = results[0];
  if (first === undefined) {
    return "none";
  }
  if (first.kind === "element") {
    return "node";
  }
  if (first.kind === "attribute") {
    return "attribute";
  }
  return "none";
}

export function isNode(results: ResultSet): boolean {
  return classifyResultSet(results) === "node";
}

export function isAttribute(results: ResultSet): boolean {
  return classifyResultSet(results) === "attribute";
}

export function describeResults(results: ResultSet): string {
  const first = results[0];
  if (first === undefined) {
    return "no match";
  }
  switch (first.kind) {
    case "element":
      return "elements";
    case "attribute":
      return "attributes";
    case "text":
      return "text nodes";
    case "node":
      return "non-element nodes";
    default:
      return `a ${first.kind} value`;
  }
}
