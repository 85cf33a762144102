import path from "node:path";
import type { Command } from "commander";
import { describeError, type MutationObservers } from "@skill-init/scaffold-mutations";
import {
  DEFAULT_TEMPLATE_LOCALE,
  EXECUTABLE_ARTIFACTS,
  UnsupportedLocaleError,
  initSkill,
  type InitSkillFailed,
  type TemplateLocale
} from "@skill-init/skill-scaffold";
import type { CliContainer } from "../container.js";
import { resolveTemplateLocale } from "../environment.js";
import { CliError } from "../errors.js";
import { CommandFailed } from "../exit-signals.js";
import type { ScopedLogger } from "../logger.js";

export interface InitCommandOptions {
  path: string;
  locale?: string;
  strict?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

export function registerInitCommand(program: Command, container: CliContainer): void {
  program
    .argument("<skill-name>", "Hyphen-case skill identifier")
    .requiredOption("--path <path>", "Directory the skill is created in")
    .option("--locale <locale>", "Template language (zh or en)")
    .option("--strict", "Reject names that break the naming rules")
    .option("--dry-run", "Show what would be created without writing")
    .option("--verbose", "Show each filesystem step")
    .action(async (skillName: string, options: InitCommandOptions) => {
      await executeInit(container, skillName, options);
    });
}

export async function executeInit(
  container: CliContainer,
  skillName: string,
  options: InitCommandOptions
): Promise<void> {
  const logger = container.loggerFactory.create({
    dryRun: options.dryRun ?? false,
    verbose: options.verbose ?? false,
    scope: "init"
  });
  const locale = resolveLocale(options.locale, container);
  const skillDir = path.resolve(container.env.cwd, options.path, skillName);

  logger.intro(`Initializing skill: ${skillName}`);
  logger.resolved("Location", options.path);
  logger.verbose(`Template locale: ${locale}`);

  const result = await initSkill(skillName, options.path, {
    fs: container.fs,
    cwd: container.env.cwd,
    locale,
    strict: options.strict ?? false,
    dryRun: options.dryRun ?? false,
    observers: createProgressObservers(logger, skillDir)
  });

  if (result.status === "failed") {
    logger.error(formatFailure(result));
    throw new CommandFailed(result.message);
  }

  if (logger.context.dryRun) {
    logger.dryRun(`Would initialize skill '${skillName}' at ${result.skillDir}`);
    return;
  }

  logger.success(`Skill '${skillName}' initialized successfully at ${result.skillDir}`);
  logger.nextSteps([
    "Edit SKILL.md to complete the TODO items and update the description",
    "Customize or delete the example files in scripts/, references/, and assets/",
    `Run validate-skill ${result.skillDir} to check the skill structure`
  ]);
}

function resolveLocale(flag: string | undefined, container: CliContainer): TemplateLocale {
  try {
    return resolveTemplateLocale(flag, container.env, DEFAULT_TEMPLATE_LOCALE);
  } catch (error) {
    if (error instanceof UnsupportedLocaleError) {
      throw new CliError(error.message, { cause: error });
    }
    throw error;
  }
}

function createProgressObservers(logger: ScopedLogger, skillDir: string): MutationObservers {
  const report = (message: string): void => {
    if (logger.context.dryRun) {
      logger.dryRun(`Would create ${message}`);
    } else {
      logger.info(`Created ${message}`);
    }
  };

  return {
    onStart(details) {
      logger.verbose(details.label);
    },
    onComplete(details) {
      const artifact = path.relative(skillDir, details.targetPath).split(path.sep).join("/");
      switch (details.kind) {
        case "createDirectory":
          report(`skill directory: ${details.targetPath}`);
          return;
        case "fileWrite":
        case "templateWrite":
          // Executables are reported once their mode is set.
          if (!EXECUTABLE_ARTIFACTS.has(artifact)) {
            report(artifact);
          }
          return;
        case "chmod":
          report(artifact);
          return;
        default:
          return;
      }
    },
    onError(details, error) {
      logger.verbose(`${details.label} failed: ${describeError(error)}`);
    }
  };
}

function formatFailure(result: InitSkillFailed): string {
  if (result.reason === "exists" || result.reason === "invalid-name") {
    return `Error: ${result.message}`;
  }
  return result.message;
}
