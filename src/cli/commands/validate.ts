import type { Command } from "commander";
import { validateSkill } from "@skill-init/skill-scaffold";
import type { CliContainer } from "../container.js";
import { CommandFailed } from "../exit-signals.js";

export interface ValidateCommandOptions {
  verbose?: boolean;
}

export function registerValidateCommand(program: Command, container: CliContainer): void {
  program
    .argument("<skill-dir>", "Skill directory containing SKILL.md")
    .option("--verbose", "Show the parsed metadata")
    .action(async (skillDir: string, options: ValidateCommandOptions) => {
      await executeValidate(container, skillDir, options);
    });
}

export async function executeValidate(
  container: CliContainer,
  skillDir: string,
  options: ValidateCommandOptions
): Promise<void> {
  const logger = container.loggerFactory.create({
    verbose: options.verbose ?? false,
    scope: "validate"
  });

  const result = await validateSkill(skillDir, {
    fs: container.fs,
    cwd: container.env.cwd
  });

  for (const error of result.errors) {
    logger.error(error);
  }
  for (const warning of result.warnings) {
    logger.warn(`Warning: ${warning}`);
  }

  if (!result.valid || !result.metadata) {
    throw new CommandFailed(`Skill at ${result.skillDir} is invalid`);
  }

  const { metadata } = result;
  logger.verbose(`Description: ${metadata.description}`);
  if (metadata.allowedTools) {
    logger.verbose(`Allowed tools: ${metadata.allowedTools.join(", ")}`);
  }
  logger.success(`Skill '${metadata.name}' is valid`);
}
