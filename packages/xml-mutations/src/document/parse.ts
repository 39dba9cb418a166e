import { DOMParser } from "@xmldom/xmldom";
import { XMLValidator } from "fast-xml-parser";
import { ParseError, describeError } from "../errors.js";
import { childElements } from "../dom.js";

/**
 * Parse XML text into a mutable DOM document.
 *
 * The DOM parser repairs broken markup instead of rejecting it, so the text
 * is checked for well-formedness first. Any diagnostic the DOM parser still
 * reports, including warnings, makes the whole document invalid.
 */
export function parseDocument(content: string): Document {
  const verdict = XMLValidator.validate(content);
  if (verdict !== true) {
    const { msg, line, col } = verdict.err;
    throw new ParseError(`Invalid XML: ${msg} (line ${line}, column ${col})`);
  }

  const diagnostics: string[] = [];
  const collect = (message: unknown) => {
    diagnostics.push(String(message));
  };
  const parser = new DOMParser({
    errorHandler: { warning: collect, error: collect, fatalError: collect }
  });

  let document: Document;
  try {
    document = parser.parseFromString(content, "text/xml");
  } catch (error) {
    throw new ParseError(`Invalid XML: ${describeError(error)}`, {
      cause: error
    });
  }

  if (diagnostics.length > 0) {
    throw new ParseError(`Invalid XML: ${diagnostics[0]}`);
  }
  if (!document.documentElement) {
    throw new ParseError("Invalid XML: document has no root element.");
  }
  assertPrefixesBound(document.documentElement);
  return document;
}

function assertPrefixesBound(element: Element): void {
  if (element.prefix && !element.namespaceURI) {
    throw new ParseError(
      `Invalid XML: namespace prefix "${element.prefix}" of <${element.tagName}> is not declared.`
    );
  }
  for (const attr of Array.from(element.attributes)) {
    if (attr.prefix && !attr.namespaceURI) {
      throw new ParseError(
        `Invalid XML: namespace prefix "${attr.prefix}" of attribute ${attr.name} is not declared.`
      );
    }
  }
  childElements(element).forEach(assertPrefixesBound);
}
