import { log } from "@clack/prompts";
import chalk from "chalk";

export type LoggerFn = (message: string) => void;

export interface LoggerContext {
  dryRun?: boolean;
  verbose?: boolean;
  scope?: string;
}

export interface ScopedLogger {
  readonly context: Required<Pick<LoggerContext, "dryRun" | "verbose">> &
    Pick<LoggerContext, "scope">;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  dryRun(message: string): void;
  verbose(message: string): void;
  resolved(label: string, value: string): void;
}

export interface LoggerFactory {
  create(context?: LoggerContext): ScopedLogger;
}

export function createLoggerFactory(emitter?: LoggerFn): LoggerFactory {
  const infoSymbol = chalk.magenta("●");
  const successSymbol = chalk.magenta("◆");

  const emit = (
    level: "info" | "success" | "warn" | "error",
    message: string
  ): void => {
    if (emitter) {
      emitter(message);
      return;
    }
    if (level === "success") {
      log.message(message, { symbol: successSymbol });
      return;
    }
    if (level === "warn") {
      log.warn(message);
      return;
    }
    if (level === "error") {
      log.error(message);
      return;
    }
    log.message(message, { symbol: infoSymbol });
  };

  const create = (context: LoggerContext = {}): ScopedLogger => {
    const dryRun = context.dryRun ?? false;
    const verbose = context.verbose ?? false;
    const scope = context.scope;
    const formatMessage = (message: string): string =>
      scope && verbose ? `[${scope}] ${message}` : message;

    const scoped: ScopedLogger = {
      context: { dryRun, verbose, scope },
      info(message) {
        emit("info", formatMessage(message));
      },
      success(message) {
        emit("success", message);
      },
      warn(message) {
        emit("warn", formatMessage(message));
      },
      error(message) {
        emit("error", formatMessage(message));
      },
      dryRun(message) {
        emit("info", formatMessage(`Dry run: ${message}`));
      },
      verbose(message) {
        if (!verbose) {
          return;
        }
        if (emitter) {
          emitter(formatMessage(message));
          return;
        }
        log.message(formatMessage(message), { symbol: chalk.gray("│") });
      },
      resolved(label, value) {
        if (emitter) {
          emitter(`${label}: ${value}`);
          return;
        }
        log.message(`${label}\n   ${value}`, { symbol: chalk.magenta("◇") });
      }
    };

    return scoped;
  };

  return { create };
}
