import path from "node:path";
import YAML from "yaml";
import {
  InvocationError,
  assertChildSpec,
  describeError,
  type ChildInputType,
  type ChildSpec,
  type ContentKind,
  type Disposition,
  type FileSystem,
  type InvocationParameters,
  type NamespaceMap
} from "@xpath-edit/xml-mutations";

type TaskFileSystem = Pick<FileSystem, "readFile">;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function pickOptionalString(
  task: Record<string, unknown>,
  key: keyof InvocationParameters
): string | undefined {
  const value = task[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new InvocationError(`Invalid "${key}": expected a string.`);
  }
  return value;
}

function pickOptionalBoolean(
  task: Record<string, unknown>,
  key: keyof InvocationParameters
): boolean | undefined {
  const value = task[key];
  if (value == null) return undefined;
  if (typeof value !== "boolean") {
    throw new InvocationError(`Invalid "${key}": expected a boolean.`);
  }
  return value;
}

function pickOptionalChoice<T extends string>(
  task: Record<string, unknown>,
  key: keyof InvocationParameters,
  choices: readonly T[]
): T | undefined {
  const value = task[key];
  if (value == null) return undefined;
  const choice = choices.find((candidate) => candidate === value);
  if (choice === undefined) {
    throw new InvocationError(
      `Invalid "${key}": expected one of ${choices.join(", ")}.`
    );
  }
  return choice;
}

/**
 * `value: null` clears the target; scalars are stringified.
 */
function pickOptionalValue(
  task: Record<string, unknown>
): string | null | undefined {
  if (!Object.hasOwn(task, "value")) return undefined;
  const value = task.value;
  if (value === null) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return String(value);
  }
  throw new InvocationError('Invalid "value": expected a scalar or null.');
}

function pickOptionalNamespaces(
  task: Record<string, unknown>
): NamespaceMap | undefined {
  const value = task.namespaces;
  if (value == null) return undefined;
  if (!isPlainObject(value)) {
    throw new InvocationError('Invalid "namespaces": expected a mapping.');
  }
  const namespaces: NamespaceMap = {};
  for (const [prefix, uri] of Object.entries(value)) {
    if (typeof uri !== "string") {
      throw new InvocationError(
        `Invalid "namespaces": URI for prefix "${prefix}" must be a string.`
      );
    }
    namespaces[prefix] = uri;
  }
  return namespaces;
}

function pickOptionalChildren(
  task: Record<string, unknown>,
  key: "addChildren" | "setChildren",
  inputType: ChildInputType
): ChildSpec | undefined {
  const value = task[key];
  if (value == null) return undefined;
  assertChildSpec(value, inputType);
  return value;
}

/**
 * Read invocation parameters from a YAML or JSON task file. Relative paths
 * inside the task resolve against the task file's directory.
 */
export async function loadTaskFile(
  taskPath: string,
  deps: { fs: TaskFileSystem }
): Promise<InvocationParameters> {
  const format = taskPath.endsWith(".json") ? "json" : "yaml";

  let raw: string;
  try {
    raw = await deps.fs.readFile(taskPath, "utf8");
  } catch (error) {
    throw new InvocationError(
      `Cannot read task file ${taskPath}: ${describeError(error)}`,
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = format === "yaml" ? YAML.parse(raw) : JSON.parse(raw);
  } catch (error) {
    throw new InvocationError(
      `Invalid task ${format.toUpperCase()} at ${taskPath}: ${describeError(error)}`,
      { cause: error }
    );
  }

  if (!isPlainObject(parsed)) {
    throw new InvocationError(`Invalid task at ${taskPath}: expected an object.`);
  }

  const task = parsed;
  const result: InvocationParameters = {};

  const taskDir = path.dirname(taskPath);
  const filePath = pickOptionalString(task, "path");
  if (filePath !== undefined) result.path = path.resolve(taskDir, filePath);
  const xml = pickOptionalString(task, "xml");
  if (xml !== undefined) result.xml = xml;
  const xpath = pickOptionalString(task, "xpath");
  if (xpath !== undefined) result.xpath = xpath;
  const attribute = pickOptionalString(task, "attribute");
  if (attribute !== undefined) result.attribute = attribute;

  const namespaces = pickOptionalNamespaces(task);
  if (namespaces) result.namespaces = namespaces;
  const value = pickOptionalValue(task);
  if (value !== undefined) result.value = value;

  const state = pickOptionalChoice<Disposition>(task, "state", ["present", "absent"]);
  if (state) result.state = state;
  const content = pickOptionalChoice<ContentKind>(task, "content", ["text", "attribute"]);
  if (content) result.content = content;
  const inputType = pickOptionalChoice<ChildInputType>(task, "inputType", ["yaml", "xml"]);
  if (inputType) result.inputType = inputType;

  const addChildren = pickOptionalChildren(task, "addChildren", inputType ?? "yaml");
  if (addChildren) result.addChildren = addChildren;
  const setChildren = pickOptionalChildren(task, "setChildren", inputType ?? "yaml");
  if (setChildren) result.setChildren = setChildren;

  const flags = [
    "insertBefore",
    "insertAfter",
    "count",
    "printMatch",
    "prettyPrint",
    "backup",
    "dryRun"
  ] as const;
  for (const flag of flags) {
    const enabled = pickOptionalBoolean(task, flag);
    if (enabled !== undefined) result[flag] = enabled;
  }

  return result;
}
