import * as nodeFs from "node:fs/promises";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { log } from "@clack/prompts";
import type { Command } from "commander";
import type { FileSystem } from "@xpath-edit/xml-mutations";
import { CliError } from "./errors.js";
import type { CliDependencies } from "./program.js";

const fsAdapter: FileSystem = {
  readFile: (path, encoding) => nodeFs.readFile(path, encoding),
  writeFile: (path, content, options) => nodeFs.writeFile(path, content, options)
};

export function createCliMain(
  programFactory: (dependencies: CliDependencies) => Command
): () => Promise<void> {
  return async function runCli(): Promise<void> {
    const program = programFactory({
      fs: fsAdapter,
      env: { cwd: process.cwd() },
      stdout: (text) => {
        process.stdout.write(text);
      },
      exitOverride: false
    });

    try {
      await program.parseAsync(process.argv);
    } catch (error) {
      if (error instanceof Error) {
        if (error instanceof CliError && error.isUserError) {
          log.error(error.message);
        } else {
          log.error(`Error: ${error.message}`);
        }
        process.exit(1);
      }
      throw error;
    }
  };
}

export function isCliInvocation(
  argv: string[],
  moduleUrl: string,
  realpath: (path: string) => string = realpathSync
): boolean {
  const entry = argv.at(1);
  if (typeof entry !== "string") {
    return false;
  }

  const candidates = [pathToFileURL(entry).href];

  try {
    candidates.push(pathToFileURL(realpath(entry)).href);
  } catch {
    // Ignore resolution errors; fall back to direct comparison.
  }

  return candidates.includes(moduleUrl);
}
