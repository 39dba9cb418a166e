import { XMLSerializer } from "@xmldom/xmldom";
import {
  childNodes,
  isElementNode,
  isTextNode,
  isXmlDeclaration
} from "../dom.js";

export const XML_DECLARATION = "<?xml version='1.0' encoding='UTF-8'?>";

const DEFAULT_INDENT = "  ";

export interface SerializeOptions {
  prettyPrint?: boolean;
  indent?: string;
}

/**
 * Serialize a document with a fresh UTF-8 declaration, keeping the top-level
 * nodes (doctype, comments, root) in document order.
 */
export function serializeDocument(
  document: Document,
  options: SerializeOptions = {}
): string {
  const serializer = new XMLSerializer();
  const parts: string[] = [];

  for (const node of childNodes(document)) {
    if (isXmlDeclaration(node) || isTextNode(node)) {
      continue;
    }
    if (options.prettyPrint && isElementNode(node)) {
      const copy = node.cloneNode(true);
      if (isElementNode(copy)) {
        indentElement(copy, 0, options.indent ?? DEFAULT_INDENT);
      }
      parts.push(serializer.serializeToString(copy));
      continue;
    }
    parts.push(serializer.serializeToString(node));
  }

  return `${XML_DECLARATION}\n${parts.join("\n")}\n`;
}

function indentElement(element: Element, depth: number, unit: string): void {
  const children = childNodes(element);
  const mixed = children.some(
    (child) => isTextNode(child) && child.data.trim().length > 0
  );
  if (mixed) {
    return;
  }

  const structural = children.filter((child) => !isTextNode(child));
  if (structural.length === 0) {
    return;
  }

  for (const child of children) {
    if (isTextNode(child)) {
      element.removeChild(child);
    }
  }

  const document = element.ownerDocument;
  for (const child of structural) {
    element.insertBefore(
      document.createTextNode(`\n${unit.repeat(depth + 1)}`),
      child
    );
    if (isElementNode(child)) {
      indentElement(child, depth + 1, unit);
    }
  }
  element.appendChild(document.createTextNode(`\n${unit.repeat(depth)}`));
}
