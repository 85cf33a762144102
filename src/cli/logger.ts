import { intro, log, note } from "@clack/prompts";
import chalk from "chalk";
import type { OutputFormat } from "./ui/output-format.js";

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
  intro(title: string): void;
  resolved(label: string, value: string): void;
  nextSteps(steps: string[]): void;
  /** Raw text such as usage and help, written without a symbol */
  usage(text: string): void;
}

export interface LoggerFactory {
  create(context?: LoggerContext): ScopedLogger;
}

export interface LoggerTheme {
  intro?: (text: string) => string;
  infoSymbol?: string;
  successSymbol?: string;
  resolvedSymbol?: string;
  dryRunSymbol?: string;
  verboseSymbol?: string;
}

export interface LoggerFactoryOptions {
  theme?: LoggerTheme;
  format?: OutputFormat;
}

function wrapText(text: string, maxWidth: number): string {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    if (currentLine.length === 0) {
      currentLine = word;
    } else if (currentLine.length + 1 + word.length <= maxWidth) {
      currentLine += " " + word;
    } else {
      lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine.length > 0) {
    lines.push(currentLine);
  }
  return lines.join("\n");
}

/**
 * Loggers write to stdout. An emitter, when given, receives every line
 * unstyled instead.
 */
export function createLoggerFactory(
  emitter?: LoggerFn,
  options: LoggerFactoryOptions = {}
): LoggerFactory {
  const theme = options.theme ?? {};
  const format = options.format ?? "terminal";
  const infoSymbol = theme.infoSymbol ?? chalk.magenta("●");
  const successSymbol = theme.successSymbol ?? chalk.magenta("◆");

  const writePlain = (message: string): void => {
    if (emitter) {
      emitter(message);
      return;
    }
    process.stdout.write(message + "\n");
  };

  const emit = (
    level: "info" | "success" | "warn" | "error" | "dryRun" | "verbose",
    message: string
  ): void => {
    if (emitter || format !== "terminal") {
      writePlain(message);
      return;
    }
    switch (level) {
      case "success":
        log.message(message, { symbol: successSymbol });
        return;
      case "warn":
        log.warn(message);
        return;
      case "error":
        log.error(message);
        return;
      case "dryRun":
        log.message(message, { symbol: theme.dryRunSymbol ?? chalk.yellow("○") });
        return;
      case "verbose":
        log.message(message, { symbol: theme.verboseSymbol ?? chalk.gray("│") });
        return;
      default:
        log.message(message, { symbol: infoSymbol });
    }
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
        emit("dryRun", formatMessage(message));
      },
      verbose(message) {
        if (!verbose) {
          return;
        }
        emit("verbose", formatMessage(message));
      },
      intro(title) {
        if (emitter || format !== "terminal") {
          writePlain(title);
          return;
        }
        intro(theme.intro ? theme.intro(title) : title);
      },
      resolved(label, value) {
        if (emitter || format !== "terminal") {
          writePlain(`${label}: ${value}`);
          return;
        }
        const symbol = theme.resolvedSymbol ?? chalk.magenta("◇");
        log.message(`${label}\n   ${value}`, { symbol });
      },
      nextSteps(steps) {
        if (steps.length === 0) {
          return;
        }
        const numbered = steps.map((step, index) => `${index + 1}. ${step}`);
        if (emitter || format !== "terminal") {
          writePlain(["Next steps:", ...numbered].join("\n"));
          return;
        }
        const maxWidth = Math.min(process.stdout.columns || 80, 80) - 6;
        const wrapped = numbered.map((step) => wrapText(step, maxWidth)).join("\n");
        note(wrapped, "Next steps");
      },
      usage(text) {
        writePlain(text);
      }
    };

    return scoped;
  };

  return { create };
}
