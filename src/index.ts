#!/usr/bin/env node
import { createInitSkillProgram } from "./cli/program.js";
import { createCliMain, isCliInvocation } from "./cli/bootstrap.js";

// SDK exports
export {
  SKILL_ARTIFACTS,
  SKILL_NAME_MAX_LENGTH,
  SKILL_NAME_RULES,
  deriveSkillTitle,
  initSkill,
  parseSkillDocument,
  validateSkill,
  validateSkillName
} from "@skill-init/skill-scaffold";
export type {
  InitSkillFailureReason,
  InitSkillOptions,
  InitSkillResult,
  SkillMetadata,
  SkillNameIssue,
  SkillValidationResult,
  TemplateLocale
} from "@skill-init/skill-scaffold";
export { nodeFileSystem } from "./utils/file-system.js";

const main = createCliMain(createInitSkillProgram);

if (isCliInvocation(process.argv, import.meta.url)) {
  void main();
}

// CLI exports
export { main, isCliInvocation };
