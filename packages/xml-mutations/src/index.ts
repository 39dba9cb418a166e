// Main exports
export { xmlMutation } from "./mutations/xml-mutation.js";
export { resolveInvocation } from "./invocation.js";
export { runInvocation, isQueryRequest } from "./execution/run-invocation.js";
export { applyMutation } from "./execution/apply-mutation.js";
export { runQuery } from "./execution/queries.js";
export { finish } from "./execution/finish.js";
export { parseDocument } from "./document/parse.js";
export { serializeDocument, XML_DECLARATION } from "./document/serialize.js";
export {
  evaluateSelector,
  countMatches,
  matchPaths,
  canonicalPath
} from "./selector/evaluate.js";
export { classifyResultSet, isNode, isAttribute } from "./selector/classify.js";
export { resolveAttributeName } from "./selector/attribute-name.js";
export { buildChildren, assertChildSpec } from "./children/build-children.js";
export { Ok, Err, unwrap } from "./result.js";
export type { Result } from "./result.js";

// Errors
export {
  XmlMutationError,
  ParseError,
  SelectorError,
  TargetTypeError,
  InvalidChildSpecError,
  MutationError,
  InvocationError,
  SourceError,
  describeError
} from "./errors.js";
export type { XmlMutationErrorKind } from "./errors.js";

// Types
export type {
  NamespaceMap,
  Selector,
  ResultMember,
  ResultSet,
  Classification,
  ChildSpec,
  ChildSpecEntry,
  ChildAttributeMap,
  ChildInputType,
  ChildPosition,
  FileSystem,
  Disposition,
  ContentKind,
  ContentMatch,
  XmlSource,
  XmlRequest,
  QueryRequest,
  MutationRequest,
  XmlInvocation,
  InvocationParameters,
  MutationVerdict,
  XmlOutcome,
  EchoedParameters,
  InvocationDetails,
  InvocationObservers,
  RunContext
} from "./types.js";
