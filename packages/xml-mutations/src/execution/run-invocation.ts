import { SourceError, describeError } from "../errors.js";
import { isNotFound } from "../fs-utils.js";
import { parseDocument } from "../document/parse.js";
import { unwrap } from "../result.js";
import type {
  FileSystem,
  InvocationDetails,
  QueryRequest,
  RunContext,
  XmlInvocation,
  XmlOutcome,
  XmlRequest,
  XmlSource
} from "../types.js";
import { applyMutation } from "./apply-mutation.js";
import { finish } from "./finish.js";
import { runQuery } from "./queries.js";

/**
 * Run one invocation: load and parse the source, answer the query or apply
 * the mutation, then finish. Failures surface as thrown `XmlMutationError`s.
 */
export async function runInvocation(
  invocation: XmlInvocation,
  context: RunContext
): Promise<XmlOutcome> {
  const details: InvocationDetails = {
    kind: invocation.request.kind,
    label: describeRequest(invocation.request, invocation.selector.xpath),
    source: describeSource(invocation.source)
  };

  context.observers?.onStart?.(details);

  try {
    const outcome = await executeInvocation(invocation, context);
    context.observers?.onComplete?.(details, outcome);
    return outcome;
  } catch (error) {
    context.observers?.onError?.(details, error);
    throw error;
  }
}

async function executeInvocation(
  invocation: XmlInvocation,
  context: RunContext
): Promise<XmlOutcome> {
  const { selector, request } = invocation;
  const sourceText = await loadSource(invocation.source, context.fs);
  const document = parseDocument(sourceText);

  const echoed = {
    xpath: selector.xpath,
    namespaces: { ...selector.namespaces },
    disposition: invocation.disposition
  };
  const finishOptions = {
    fs: context.fs,
    source: invocation.source,
    sourceText,
    dryRun: invocation.dryRun,
    prettyPrint: invocation.prettyPrint,
    backup: invocation.backup,
    now: context.now
  };

  if (isQueryRequest(request)) {
    const verdict = unwrap(runQuery(document, selector, request));
    return finish(document, false, { ...verdict, echoed }, finishOptions);
  }

  const verdict = unwrap(
    applyMutation(document, selector, request, { dryRun: invocation.dryRun })
  );
  return finish(
    document,
    verdict.changed,
    { message: verdict.message, matchCount: verdict.matchCount, echoed },
    finishOptions
  );
}

export function isQueryRequest(request: XmlRequest): request is QueryRequest {
  return (
    request.kind === "count" ||
    request.kind === "printMatch" ||
    request.kind === "content" ||
    request.kind === "match"
  );
}

async function loadSource(source: XmlSource, fs: FileSystem): Promise<string> {
  if (source.kind === "inline") {
    return source.xml;
  }
  try {
    return await fs.readFile(source.path, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new SourceError(`XML source ${source.path} does not exist.`, {
        cause: error
      });
    }
    throw new SourceError(
      `Cannot read XML source ${source.path}: ${describeError(error)}`,
      { cause: error }
    );
  }
}

export function describeSource(source: XmlSource): string {
  return source.kind === "file" ? source.path : "<inline xml>";
}

export function describeRequest(request: XmlRequest, xpath: string): string {
  switch (request.kind) {
    case "count":
      return `Count ${xpath}`;
    case "printMatch":
      return `Print matches of ${xpath}`;
    case "content":
      return `Read ${request.content} content of ${xpath}`;
    case "match":
      return `Match ${xpath}`;
    case "delete":
      return `Delete ${xpath}`;
    case "setValue":
      return request.attribute
        ? `Set attribute ${request.attribute} on ${xpath}`
        : `Set text of ${xpath}`;
    case "addChildren":
      return request.position === "append"
        ? `Add children to ${xpath}`
        : `Insert siblings ${request.position} ${xpath}`;
    case "setChildren":
      return `Replace children of ${xpath}`;
    default: {
      const never: never = request;
      throw new Error(`Unknown request kind: ${JSON.stringify(never)}`);
    }
  }
}
