// DOM node type constants; the DOM lib only provides them as types here.
export const ELEMENT_NODE = 1;
export const ATTRIBUTE_NODE = 2;
export const TEXT_NODE = 3;
export const CDATA_SECTION_NODE = 4;
export const PROCESSING_INSTRUCTION_NODE = 7;
export const DOCUMENT_NODE = 9;

export function isDomNode(value: unknown): value is Node {
  return (
    typeof value === "object" &&
    value !== null &&
    "nodeType" in value &&
    typeof value.nodeType === "number"
  );
}

export function isElementNode(value: unknown): value is Element {
  return isDomNode(value) && value.nodeType === ELEMENT_NODE;
}

export function isAttributeNode(value: unknown): value is Attr {
  return isDomNode(value) && value.nodeType === ATTRIBUTE_NODE;
}

export function isTextNode(value: unknown): value is CharacterData {
  return (
    isDomNode(value) &&
    (value.nodeType === TEXT_NODE || value.nodeType === CDATA_SECTION_NODE)
  );
}

export function isXmlDeclaration(node: Node): boolean {
  return (
    node.nodeType === PROCESSING_INSTRUCTION_NODE &&
    node.nodeName.toLowerCase() === "xml"
  );
}

export function childNodes(node: Node): Node[] {
  return Array.from(node.childNodes);
}

export function childElements(node: Node): Element[] {
  return childNodes(node).filter(isElementNode);
}

/**
 * The element's own text: the run of text nodes before its first non-text
 * child, or null when there is none.
 */
export function getElementText(element: Element): string | null {
  let text: string | null = null;
  for (
    let node = element.firstChild;
    node !== null && isTextNode(node);
    node = node.nextSibling
  ) {
    text = (text ?? "") + node.data;
  }
  return text;
}

export function setElementText(element: Element, value: string | null): void {
  removeLeadingText(element);
  if (value !== null) {
    element.insertBefore(
      element.ownerDocument.createTextNode(value),
      element.firstChild
    );
  }
}

/**
 * Remove every child node that follows the element's own leading text.
 */
export function removeChildrenAfterText(element: Element): void {
  let node = element.firstChild;
  while (node !== null && isTextNode(node)) {
    node = node.nextSibling;
  }
  while (node !== null) {
    const next = node.nextSibling;
    element.removeChild(node);
    node = next;
  }
}

function removeLeadingText(element: Element): void {
  while (element.firstChild !== null && isTextNode(element.firstChild)) {
    element.removeChild(element.firstChild);
  }
}
