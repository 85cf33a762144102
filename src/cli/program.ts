import { Command, CommanderError } from "commander";
import { createRequire } from "node:module";
import {
  createCliContainer,
  type CliContainer,
  type CliDependencies
} from "./container.js";
import { registerInitCommand } from "./commands/init.js";
import { registerValidateCommand } from "./commands/validate.js";
import { UsageError } from "./errors.js";
import { HelpExit, VersionExit } from "./exit-signals.js";
import { formatInitUsage, formatValidateUsage } from "./usage.js";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

export interface CliProgram {
  parseAsync(argv: readonly string[]): Promise<void>;
}

const HELP_OR_VERSION = new Set(["-h", "--help", "-V", "--version"]);

/**
 * `init-skill <skill-name> --path <path>`: the name comes first and the
 * literal `--path` token second. Anything else is a usage error.
 */
export function hasInitShape(args: readonly string[]): boolean {
  if (args.some((arg) => HELP_OR_VERSION.has(arg))) {
    return true;
  }
  const [skillName, flag, destination] = args;
  return skillName !== undefined && flag === "--path" && destination !== undefined;
}

/** Move the name behind `--` so that a leading dash is never read as an option. */
function toCommanderArgv(argv: readonly string[]): string[] {
  const args = argv.slice(2);
  if (args.some((arg) => HELP_OR_VERSION.has(arg))) {
    return [...argv];
  }
  const [skillName, ...rest] = args;
  return [...argv.slice(0, 2), ...rest, "--", ...(skillName === undefined ? [] : [skillName])];
}

export function createInitSkillProgram(dependencies: CliDependencies): CliProgram {
  const container = createCliContainer(dependencies);
  const usage = formatInitUsage(container.design);
  const program = bootstrapProgram("init-skill", usage, container);
  registerInitCommand(program, container);

  return {
    async parseAsync(argv) {
      if (!hasInitShape(argv.slice(2))) {
        throw new UsageError(usage);
      }
      await runCommander(program, toCommanderArgv(argv), usage);
    }
  };
}

export function createValidateSkillProgram(dependencies: CliDependencies): CliProgram {
  const container = createCliContainer(dependencies);
  const usage = formatValidateUsage(container.design);
  const program = bootstrapProgram("validate-skill", usage, container);
  registerValidateCommand(program, container);

  return {
    async parseAsync(argv) {
      await runCommander(program, argv, usage);
    }
  };
}

export type { CliDependencies };

function bootstrapProgram(name: string, usage: string, container: CliContainer): Command {
  const output = container.loggerFactory.create();
  const program = new Command();

  program
    .name(name)
    .version(packageJson.version, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display this usage text")
    .allowExcessArguments(false)
    .configureHelp({ formatHelp: () => usage })
    .configureOutput({
      writeOut: (text) => output.usage(text.replace(/\n$/, "")),
      writeErr: () => {},
      outputError: () => {}
    })
    .exitOverride();

  return program;
}

async function runCommander(
  program: Command,
  argv: readonly string[],
  usage: string
): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    if (error.code === "commander.version") {
      throw new VersionExit();
    }
    if (error.code === "commander.helpDisplayed" || error.code === "commander.help") {
      throw new HelpExit();
    }
    throw new UsageError(usage, error.message);
  }
}
