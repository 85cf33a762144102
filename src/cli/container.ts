import type { FileSystem } from "../utils/file-system.js";
import {
  createCliEnvironment,
  type CliEnvironment,
  type CliEnvironmentInit
} from "./environment.js";
import { createLoggerFactory, type LoggerFactory, type LoggerFn } from "./logger.js";
import {
  createCliDesignLanguage,
  type CliDesignLanguage
} from "./ui/design-language.js";

export interface CliDependencies {
  fs: FileSystem;
  env: CliEnvironmentInit;
  /** Receives every output line instead of stdout */
  logger?: LoggerFn;
}

export interface CliContainer {
  fs: FileSystem;
  env: CliEnvironment;
  design: CliDesignLanguage;
  loggerFactory: LoggerFactory;
}

export function createCliContainer(dependencies: CliDependencies): CliContainer {
  const env = createCliEnvironment(dependencies.env);
  const design = createCliDesignLanguage(env);
  const loggerFactory = createLoggerFactory(dependencies.logger, {
    format: env.outputFormat,
    theme: {
      intro: design.text.intro,
      infoSymbol: design.symbols.info,
      successSymbol: design.symbols.success,
      resolvedSymbol: design.symbols.resolved,
      dryRunSymbol: design.symbols.dryRun,
      verboseSymbol: design.symbols.verbose
    }
  });

  return { fs: dependencies.fs, env, design, loggerFactory };
}
