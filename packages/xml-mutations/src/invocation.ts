import { InvocationError } from "./errors.js";
import { xmlMutation } from "./mutations/xml-mutation.js";
import type {
  ChildPosition,
  InvocationParameters,
  XmlInvocation,
  XmlRequest,
  XmlSource
} from "./types.js";

const DEFAULT_XPATH = "/";

/**
 * Turn raw parameters into an invocation carrying exactly one request.
 * Conflicting parameters are rejected before any document is read.
 */
export function resolveInvocation(params: InvocationParameters): XmlInvocation {
  const source = resolveSource(params);
  const xpath = (params.xpath ?? DEFAULT_XPATH).trim();
  if (xpath.length === 0) {
    throw new InvocationError("An xpath expression is required.");
  }
  if (params.backup && source.kind !== "file") {
    throw new InvocationError("backup requires a file path source.");
  }

  return {
    source,
    selector: { xpath, namespaces: { ...params.namespaces } },
    disposition: params.state ?? "present",
    request: resolveRequest(params),
    prettyPrint: params.prettyPrint ?? false,
    dryRun: params.dryRun ?? false,
    backup: params.backup ?? false
  };
}

function resolveSource(params: InvocationParameters): XmlSource {
  if (params.path !== undefined && params.xml !== undefined) {
    throw new InvocationError("path and xml are mutually exclusive.");
  }
  if (params.path !== undefined) {
    return { kind: "file", path: params.path };
  }
  if (params.xml !== undefined) {
    return { kind: "inline", xml: params.xml };
  }
  throw new InvocationError("One of path or xml is required.");
}

function resolveRequest(params: InvocationParameters): XmlRequest {
  if (params.count) {
    return { kind: "count" };
  }
  if (params.printMatch) {
    return { kind: "printMatch" };
  }

  const edits = [
    params.value !== undefined ? "value" : null,
    params.addChildren !== undefined ? "addChildren" : null,
    params.setChildren !== undefined ? "setChildren" : null
  ].filter((name): name is string => name !== null);

  if (params.content !== undefined) {
    if (edits.length > 0) {
      throw new InvocationError(`content cannot be combined with ${edits[0]}.`);
    }
    return { kind: "content", content: params.content };
  }
  if (edits.length > 1) {
    throw new InvocationError(`${edits.join(" and ")} are mutually exclusive.`);
  }

  const position = resolvePosition(params);
  if (position !== "append" && params.addChildren === undefined) {
    throw new InvocationError(
      `insert${position === "before" ? "Before" : "After"} requires addChildren.`
    );
  }

  if (params.state === "absent") {
    return xmlMutation.delete();
  }
  if (params.addChildren !== undefined) {
    return xmlMutation.addChildren({
      children: params.addChildren,
      inputType: params.inputType,
      position
    });
  }
  if (params.setChildren !== undefined) {
    return xmlMutation.setChildren({
      children: params.setChildren,
      inputType: params.inputType
    });
  }
  if (params.value !== undefined || params.attribute !== undefined) {
    return xmlMutation.setValue({
      value: params.value ?? null,
      attribute: params.attribute
    });
  }
  return { kind: "match" };
}

function resolvePosition(params: InvocationParameters): ChildPosition {
  if (params.insertBefore && params.insertAfter) {
    throw new InvocationError("insertBefore and insertAfter are mutually exclusive.");
  }
  if (params.insertBefore) {
    return "before";
  }
  if (params.insertAfter) {
    return "after";
  }
  return "append";
}
