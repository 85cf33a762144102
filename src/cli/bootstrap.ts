import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { hasErrorCode } from "@skill-init/scaffold-mutations";
import { nodeFileSystem } from "../utils/file-system.js";
import type { CliDependencies } from "./container.js";
import { CliError, SilentError, UsageError } from "./errors.js";
import { createLoggerFactory } from "./logger.js";
import type { CliProgram } from "./program.js";
import { resolveOutputFormat } from "./ui/output-format.js";

export function createCliMain(
  programFactory: (dependencies: CliDependencies) => CliProgram,
  overrides: Partial<CliDependencies> = {}
): (argv?: string[]) => Promise<void> {
  return async function runCli(argv: string[] = process.argv): Promise<void> {
    const dependencies: CliDependencies = {
      fs: overrides.fs ?? nodeFileSystem,
      env: overrides.env ?? {
        cwd: process.cwd(),
        variables: process.env
      },
      logger: overrides.logger
    };
    const logger = createLoggerFactory(dependencies.logger, {
      format: resolveOutputFormat(dependencies.env.variables ?? process.env)
    }).create({ verbose: argv.includes("--verbose") });

    try {
      const program = programFactory(dependencies);
      await program.parseAsync(argv);
    } catch (error) {
      if (error instanceof SilentError) {
        if (error.exitCode !== 0) {
          process.exitCode = error.exitCode;
        }
        return;
      }
      if (error instanceof UsageError) {
        logger.usage(error.usage);
        process.exitCode = 1;
        return;
      }
      if (error instanceof Error) {
        if (error instanceof CliError && error.isUserError) {
          logger.error(error.message);
        } else {
          logger.error(`Error: ${error.message}`);
          if (error.stack) {
            logger.verbose(error.stack);
          }
        }
        process.exitCode = 1;
        return;
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
  } catch (error) {
    if (!hasErrorCode(error, "ENOENT")) {
      throw error;
    }
  }

  return candidates.includes(moduleUrl);
}
