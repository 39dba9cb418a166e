import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import YAML from "yaml";
import {
  InvalidChildSpecError,
  XmlMutationError,
  assertChildSpec,
  describeError,
  isQueryRequest,
  resolveInvocation,
  runInvocation,
  type ChildInputType,
  type ChildSpec,
  type ContentKind,
  type ContentMatch,
  type Disposition,
  type FileSystem,
  type InvocationObservers,
  type InvocationParameters,
  type NamespaceMap,
  type XmlInvocation,
  type XmlOutcome
} from "@xpath-edit/xml-mutations";
import { CLI_NAME, CLI_VERSION } from "./constants.js";
import { CliError } from "./errors.js";
import { createLoggerFactory, type LoggerFn, type ScopedLogger } from "./logger.js";
import { loadTaskFile } from "./task-file.js";

export interface CliDependencies {
  fs: FileSystem;
  env: { cwd: string };
  /** Receives machine-readable output (`--json`, inline results) */
  stdout: (text: string) => void;
  /** Replaces the terminal logger, e.g. in tests */
  logger?: LoggerFn;
  now?: () => Date;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

interface CliFlags {
  path?: string;
  xml?: string;
  xpath?: string;
  namespace: NamespaceMap;
  state?: Disposition;
  value?: string;
  clearValue?: boolean;
  attribute?: string;
  addChildren?: string;
  setChildren?: string;
  inputType?: ChildInputType;
  insertBefore?: boolean;
  insertAfter?: boolean;
  count?: boolean;
  printMatch?: boolean;
  content?: ContentKind;
  prettyPrint?: boolean;
  backup?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  json?: boolean;
  task?: string;
}

export function createProgram(dependencies: CliDependencies): Command {
  const program = bootstrapProgram(dependencies);

  if (dependencies.exitOverride ?? true) {
    program.exitOverride();
  }

  if (dependencies.suppressCommanderOutput) {
    program.configureOutput({
      writeOut: () => {},
      writeErr: () => {}
    });
  }

  return program;
}

function bootstrapProgram(dependencies: CliDependencies): Command {
  const program = new Command();
  program
    .name(CLI_NAME)
    .description("Query and edit XML documents addressed by XPath.")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .option("-p, --path <file>", "XML file to read and update")
    .option("--xml <string>", "Inline XML document to read instead of a file")
    .option("-x, --xpath <expression>", "XPath selecting the target")
    .option(
      "-n, --namespace <prefix=uri>",
      "Namespace prefix used in the xpath (repeatable)",
      collectNamespace,
      {}
    )
    .addOption(
      new Option("--state <state>", "Whether the target should exist").choices([
        "present",
        "absent"
      ])
    )
    .option("--value <value>", "Text or attribute value to set")
    .option("--clear-value", "Clear the element text")
    .option("-a, --attribute <name>", "Attribute to set instead of the text")
    .option("--add-children <yaml>", "Children to append, as a YAML list")
    .option("--set-children <yaml>", "Children replacing the existing ones")
    .addOption(
      new Option("--input-type <type>", "How children are written")
        .choices(["yaml", "xml"])
    )
    .option("--insert-before", "Insert added children before the target")
    .option("--insert-after", "Insert added children after the target")
    .option("--count", "Report the number of matches")
    .option("--print-match", "Report the path of every match")
    .addOption(
      new Option("--content <kind>", "Report text or attributes of matches")
        .choices(["text", "attribute"])
    )
    .option("--pretty-print", "Indent the written document")
    .option("--backup", "Keep a timestamped copy of the original file")
    .option("--dry-run", "Report what would change without writing")
    .option("--verbose", "Show verbose logs")
    .option("--json", "Print the outcome as JSON")
    .option("--task <file>", "Read parameters from a YAML or JSON task file")
    .helpOption("-h, --help", "Display help for command")
    .action(async function (this: Command) {
      const flags = this.opts<CliFlags>();
      await runCommand(flags, dependencies);
    });

  return program;
}

function collectNamespace(value: string, previous: NamespaceMap): NamespaceMap {
  const separator = value.indexOf("=");
  if (separator <= 0 || separator === value.length - 1) {
    throw new InvalidArgumentError(`Expected prefix=uri, received "${value}".`);
  }
  return {
    ...previous,
    [value.slice(0, separator)]: value.slice(separator + 1)
  };
}

async function runCommand(
  flags: CliFlags,
  dependencies: CliDependencies
): Promise<void> {
  const logger = createLoggerFactory(dependencies.logger).create({
    dryRun: flags.dryRun ?? false,
    verbose: flags.verbose ?? false,
    scope: CLI_NAME
  });

  try {
    const params = await collectParameters(flags, dependencies);
    const invocation = resolveInvocation(params);
    const outcome = await runInvocation(invocation, {
      fs: dependencies.fs,
      observers: createObservers(logger),
      now: dependencies.now
    });

    if (flags.json) {
      dependencies.stdout(`${JSON.stringify(outcome, null, 2)}\n`);
      return;
    }
    reportOutcome(outcome, invocation, logger, dependencies);
  } catch (error) {
    if (error instanceof XmlMutationError) {
      throw new CliError(error.message, { isUserError: true, cause: error });
    }
    throw error;
  }
}

/**
 * Merge task-file parameters with command-line flags. Flags win.
 */
async function collectParameters(
  flags: CliFlags,
  dependencies: CliDependencies
): Promise<InvocationParameters> {
  const { cwd } = dependencies.env;
  const task = flags.task
    ? await loadTaskFile(path.resolve(cwd, flags.task), { fs: dependencies.fs })
    : {};

  if (flags.value !== undefined && flags.clearValue) {
    throw new CliError("--value and --clear-value are mutually exclusive.", {
      isUserError: true
    });
  }

  const inputType = flags.inputType ?? task.inputType;
  const params: InvocationParameters = {
    ...task,
    namespaces: { ...task.namespaces, ...flags.namespace }
  };

  // A source or edit given on the command line replaces the task file's one.
  if (flags.path !== undefined || flags.xml !== undefined) {
    params.path = flags.path === undefined ? undefined : path.resolve(cwd, flags.path);
    params.xml = flags.xml;
  }
  const editsFromFlags =
    flags.value !== undefined ||
    flags.clearValue === true ||
    flags.addChildren !== undefined ||
    flags.setChildren !== undefined ||
    flags.content !== undefined;
  if (editsFromFlags) {
    delete params.value;
    delete params.addChildren;
    delete params.setChildren;
    delete params.content;
  }

  if (flags.xpath !== undefined) params.xpath = flags.xpath;
  if (flags.state !== undefined) params.state = flags.state;
  if (flags.value !== undefined) params.value = flags.value;
  if (flags.clearValue) params.value = null;
  if (flags.attribute !== undefined) params.attribute = flags.attribute;
  if (inputType !== undefined) params.inputType = inputType;
  if (flags.addChildren !== undefined) {
    params.addChildren = parseChildren(flags.addChildren, inputType ?? "yaml");
  }
  if (flags.setChildren !== undefined) {
    params.setChildren = parseChildren(flags.setChildren, inputType ?? "yaml");
  }
  if (flags.content !== undefined) params.content = flags.content;

  const switches = [
    "insertBefore",
    "insertAfter",
    "count",
    "printMatch",
    "prettyPrint",
    "backup",
    "dryRun"
  ] as const;
  for (const name of switches) {
    if (flags[name]) params[name] = true;
  }

  return params;
}

/**
 * Read children from a YAML list. With the xml input type a single fragment
 * may be given directly.
 */
export function parseChildren(text: string, inputType: ChildInputType): ChildSpec {
  if (inputType === "xml" && !text.trimStart().startsWith("[")) {
    return [text];
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    throw new InvalidChildSpecError(
      `Invalid children YAML: ${describeError(error)}`,
      { cause: error }
    );
  }

  const children: unknown = Array.isArray(parsed) ? parsed : [parsed];
  assertChildSpec(children, inputType);
  return children;
}

function createObservers(logger: ScopedLogger): InvocationObservers {
  return {
    onStart(details) {
      logger.verbose(`${details.label} in ${details.source}`);
    },
    onComplete(details, outcome) {
      logger.verbose(
        `${details.label}: ${outcome.matchCount} matched, ${outcome.changed ? "changed" : "unchanged"}`
      );
    },
    onError(details, error) {
      if (logger.context.verbose) {
        logger.error(`${details.label} failed: ${describeError(error)}`);
      }
    }
  };
}

function reportOutcome(
  outcome: XmlOutcome,
  invocation: XmlInvocation,
  logger: ScopedLogger,
  dependencies: CliDependencies
): void {
  const { dryRun } = invocation;
  if (dryRun && outcome.changed) {
    logger.dryRun(outcome.message);
  } else if (outcome.changed) {
    logger.success(outcome.message);
  } else if (outcome.matchCount === 0 && !isQueryRequest(invocation.request)) {
    logger.warn(outcome.message);
  } else {
    logger.info(outcome.message);
  }

  for (const match of outcome.matches ?? []) {
    logger.info(match);
  }
  for (const match of outcome.content ?? []) {
    logger.resolved(match.tag, describeContent(match));
  }
  if (outcome.backupFile) {
    logger.resolved("Backup", outcome.backupFile);
  }
  if (outcome.xmlString !== undefined && outcome.changed && !dryRun) {
    dependencies.stdout(outcome.xmlString);
  }
}

function describeContent(match: ContentMatch): string {
  if ("text" in match) {
    return match.text ?? "(no text)";
  }
  const attributes = Object.entries(match.attributes);
  if (attributes.length === 0) {
    return "(no attributes)";
  }
  return attributes.map(([name, value]) => `${name}="${value}"`).join(" ");
}
