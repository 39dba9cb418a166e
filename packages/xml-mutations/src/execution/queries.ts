import { TargetTypeError } from "../errors.js";
import { getElementText } from "../dom.js";
import { Err, Ok, attempt, type Result } from "../result.js";
import { classifyResultSet, describeResults } from "../selector/classify.js";
import {
  countMatches,
  evaluateSelector,
  matchPaths
} from "../selector/evaluate.js";
import type {
  ContentKind,
  ContentMatch,
  QueryRequest,
  QueryVerdict,
  Selector
} from "../types.js";
import { describeMatches } from "./apply-mutation.js";

/**
 * Answer a read-only request. Queries never touch the document.
 */
export function runQuery(
  document: Document,
  selector: Selector,
  request: QueryRequest
): Result<QueryVerdict> {
  switch (request.kind) {
    case "count":
      return attempt(() => {
        const matchCount = countMatches(document, selector);
        return { matchCount, message: found(matchCount, selector) };
      });
    case "printMatch":
      return attempt(() => {
        const matches = matchPaths(document, selector);
        return {
          matchCount: matches.length,
          message: found(matches.length, selector),
          matches
        };
      });
    case "content":
      return readContent(document, selector, request.content);
    case "match":
      return attempt(() => {
        const matchCount = evaluateSelector(document, selector).length;
        return { matchCount, message: found(matchCount, selector) };
      });
    default: {
      const never: never = request;
      throw new Error(`Unknown query kind: ${JSON.stringify(never)}`);
    }
  }
}

function readContent(
  document: Document,
  selector: Selector,
  content: ContentKind
): Result<QueryVerdict> {
  const evaluated = attempt(() => evaluateSelector(document, selector));
  if (!evaluated.ok) {
    return evaluated;
  }
  const results = evaluated.value;
  if (results.length > 0 && classifyResultSet(results) !== "node") {
    return Err(
      new TargetTypeError(
        `Cannot read ${content} content: ${selector.xpath} resolved to ${describeResults(results)}.`
      )
    );
  }

  const matches: ContentMatch[] = [];
  for (const member of results) {
    if (member.kind !== "element") {
      continue;
    }
    const element = member.node;
    matches.push(
      content === "text"
        ? { tag: element.nodeName, text: getElementText(element) }
        : { tag: element.nodeName, attributes: collectAttributes(element) }
    );
  }

  return Ok({
    matchCount: matches.length,
    message: found(matches.length, selector),
    content: matches
  });
}

function collectAttributes(element: Element): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const attr of Array.from(element.attributes)) {
    // namespace declarations are not attributes of the element
    if (attr.name === "xmlns" || attr.name.startsWith("xmlns:")) {
      continue;
    }
    attributes[attr.name] = attr.value;
  }
  return attributes;
}

function found(count: number, selector: Selector): string {
  return `Found ${describeMatches(count)} for ${selector.xpath}`;
}
