import chalk from "chalk";
import type { CliEnvironment } from "../environment.js";
import { getThemePalette } from "./theme.js";

export interface CliTextStyles {
  intro(text: string): string;
  section(text: string): string;
  argument(text: string): string;
  option(text: string): string;
  example(text: string): string;
  usageCommand(text: string): string;
}

export interface CliDesignLanguage {
  text: CliTextStyles;
  symbols: {
    info: string;
    success: string;
    resolved: string;
    dryRun: string;
    verbose: string;
  };
}

const identity = (text: string): string => text;

const plainDesign: CliDesignLanguage = {
  text: {
    intro: identity,
    section: identity,
    argument: identity,
    option: identity,
    example: identity,
    usageCommand: identity
  },
  symbols: {
    info: "●",
    success: "◆",
    resolved: "◇",
    dryRun: "○",
    verbose: "│"
  }
};

/**
 * Styles for help text and log symbols. Plain output keeps every string free
 * of escape codes.
 */
export function createCliDesignLanguage(env: CliEnvironment): CliDesignLanguage {
  if (env.outputFormat === "plain") {
    return plainDesign;
  }

  const palette = getThemePalette(env.theme);
  const muted = chalk.dim;

  return {
    text: {
      intro: palette.intro,
      section: chalk.bold,
      argument: muted,
      option: chalk.yellow,
      example: muted,
      usageCommand: chalk.green
    },
    symbols: {
      info: chalk.magenta("●"),
      success: chalk.magenta("◆"),
      resolved: palette.resolvedSymbol,
      dryRun: chalk.yellow("○"),
      verbose: chalk.gray("│")
    }
  };
}
