import { serializeDocument } from "../document/serialize.js";
import { createTimestamp } from "../fs-utils.js";
import type {
  ContentMatch,
  EchoedParameters,
  FileSystem,
  XmlOutcome,
  XmlSource
} from "../types.js";

export interface OutcomeFields {
  message: string;
  matchCount: number;
  echoed: EchoedParameters;
  matches?: string[];
  content?: ContentMatch[];
}

export interface FinishOptions {
  fs: FileSystem;
  source: XmlSource;
  /** Text the document was parsed from */
  sourceText: string;
  dryRun: boolean;
  prettyPrint: boolean;
  backup: boolean;
  now?: () => Date;
}

/**
 * Persist the document when it changed and report the outcome. Unchanged
 * documents (and dry runs) are never serialized, so their source keeps its
 * exact bytes.
 */
export async function finish(
  document: Document,
  changed: boolean,
  fields: OutcomeFields,
  options: FinishOptions
): Promise<XmlOutcome> {
  const outcome: XmlOutcome = { changed, ...fields };
  const { source } = options;

  if (!changed || options.dryRun) {
    return source.kind === "inline"
      ? { ...outcome, xmlString: options.sourceText }
      : outcome;
  }

  const serialized = serializeDocument(document, {
    prettyPrint: options.prettyPrint
  });
  if (source.kind === "inline") {
    return { ...outcome, xmlString: serialized };
  }

  let backupFile: string | undefined;
  if (options.backup) {
    const now = options.now ?? (() => new Date());
    backupFile = `${source.path}.backup-${createTimestamp(now())}`;
    await options.fs.writeFile(backupFile, options.sourceText, {
      encoding: "utf8"
    });
  }

  await options.fs.writeFile(source.path, serialized, { encoding: "utf8" });

  return backupFile === undefined ? outcome : { ...outcome, backupFile };
}
