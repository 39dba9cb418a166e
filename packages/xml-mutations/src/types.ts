// ============================================================================
// Selector Types
// ============================================================================

export type NamespaceMap = Record<string, string>;

export interface Selector {
  xpath: string;
  namespaces: NamespaceMap;
}

export type ResultMember =
  | { kind: "element"; node: Element }
  | { kind: "attribute"; node: Attr }
  | { kind: "text"; node: CharacterData }
  | { kind: "node"; node: Node }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "boolean"; value: boolean };

export type ResultSet = ResultMember[];

export type Classification = "node" | "attribute" | "none";

// ============================================================================
// Child Specification
// ============================================================================

export type ChildScalar = string | number | boolean;

/**
 * Attributes of a constructed child. The reserved key `_` holds nested
 * children and `+value` holds the text content.
 */
export interface ChildAttributeMap {
  [name: string]: ChildScalar | null | ChildSpec;
}

export type ChildSpecEntry =
  | string
  | { [tag: string]: ChildScalar | null | ChildAttributeMap };

export type ChildSpec = ChildSpecEntry[];

export type ChildInputType = "yaml" | "xml";

export type ChildPosition = "append" | "before" | "after";

// ============================================================================
// FileSystem Interface
// ============================================================================

export interface FileSystem {
  readFile(path: string, encoding: "utf8"): Promise<string>;
  writeFile(
    path: string,
    content: string,
    options?: { encoding: "utf8" }
  ): Promise<void>;
}

// ============================================================================
// Requests
// ============================================================================

export type Disposition = "present" | "absent";

export type ContentKind = "text" | "attribute";

export type XmlSource =
  | { kind: "file"; path: string }
  | { kind: "inline"; xml: string };

export interface CountRequest {
  kind: "count";
}

export interface PrintMatchRequest {
  kind: "printMatch";
}

export interface ContentRequest {
  kind: "content";
  content: ContentKind;
}

export interface MatchRequest {
  kind: "match";
}

export interface DeleteRequest {
  kind: "delete";
}

export interface SetValueRequest {
  kind: "setValue";
  /** Desired text or attribute value; null clears it */
  value: string | null;
  attribute?: string;
}

export interface AddChildrenRequest {
  kind: "addChildren";
  children: ChildSpec;
  inputType: ChildInputType;
  position: ChildPosition;
}

export interface SetChildrenRequest {
  kind: "setChildren";
  children: ChildSpec;
  inputType: ChildInputType;
}

export type QueryRequest =
  | CountRequest
  | PrintMatchRequest
  | ContentRequest
  | MatchRequest;

export type MutationRequest =
  | DeleteRequest
  | SetValueRequest
  | AddChildrenRequest
  | SetChildrenRequest;

export type XmlRequest = QueryRequest | MutationRequest;

export interface XmlInvocation {
  source: XmlSource;
  selector: Selector;
  disposition: Disposition;
  request: XmlRequest;
  prettyPrint: boolean;
  dryRun: boolean;
  backup: boolean;
}

/**
 * Raw invocation options as a caller supplies them. `resolveInvocation`
 * turns these into an `XmlInvocation` carrying exactly one request.
 */
export interface InvocationParameters {
  path?: string;
  xml?: string;
  xpath?: string;
  namespaces?: NamespaceMap;
  state?: Disposition;
  value?: string | null;
  attribute?: string;
  addChildren?: ChildSpec;
  setChildren?: ChildSpec;
  inputType?: ChildInputType;
  insertBefore?: boolean;
  insertAfter?: boolean;
  count?: boolean;
  printMatch?: boolean;
  content?: ContentKind;
  prettyPrint?: boolean;
  backup?: boolean;
  dryRun?: boolean;
}

// ============================================================================
// Outcomes
// ============================================================================

export interface MutationVerdict {
  changed: boolean;
  matchCount: number;
  message: string;
}

export type ContentMatch =
  | { tag: string; text: string | null }
  | { tag: string; attributes: Record<string, string> };

export interface QueryVerdict {
  matchCount: number;
  message: string;
  matches?: string[];
  content?: ContentMatch[];
}

export interface EchoedParameters {
  xpath: string;
  namespaces: NamespaceMap;
  disposition: Disposition;
}

export interface XmlOutcome {
  changed: boolean;
  message: string;
  matchCount: number;
  echoed: EchoedParameters;
  matches?: string[];
  content?: ContentMatch[];
  /** Resulting document for inline sources */
  xmlString?: string;
  backupFile?: string;
}

// ============================================================================
// Observers
// ============================================================================

export interface InvocationDetails {
  kind: XmlRequest["kind"];
  label: string;
  source: string;
}

export interface InvocationObservers {
  onStart?(details: InvocationDetails): void;
  onComplete?(details: InvocationDetails, outcome: XmlOutcome): void;
  onError?(details: InvocationDetails, error: unknown): void;
}

export interface RunContext {
  fs: FileSystem;
  observers?: InvocationObservers;
  /** Clock used for backup file names */
  now?: () => Date;
}
