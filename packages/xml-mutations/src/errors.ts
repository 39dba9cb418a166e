export type XmlMutationErrorKind =
  | "parse"
  | "selector"
  | "targetType"
  | "invalidChildSpec"
  | "mutation"
  | "invocation"
  | "source";

export abstract class XmlMutationError extends Error {
  abstract readonly kind: XmlMutationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed source document. */
export class ParseError extends XmlMutationError {
  readonly kind = "parse";
}

/** Malformed xpath or undeclared namespace prefix. */
export class SelectorError extends XmlMutationError {
  readonly kind = "selector";
}

/** The selector resolved to results the operation cannot act on. */
export class TargetTypeError extends XmlMutationError {
  readonly kind = "targetType";
}

export class InvalidChildSpecError extends XmlMutationError {
  readonly kind = "invalidChildSpec";
}

/** Tree-structural failure while removing or inserting nodes. */
export class MutationError extends XmlMutationError {
  readonly kind = "mutation";
}

export class InvocationError extends XmlMutationError {
  readonly kind = "invocation";
}

export class SourceError extends XmlMutationError {
  readonly kind = "source";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
