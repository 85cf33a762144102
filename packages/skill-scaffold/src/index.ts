export { deriveSkillTitle } from "./title.js";
export {
  SKILL_NAME_MAX_LENGTH,
  SKILL_NAME_RULES,
  validateSkillName
} from "./naming.js";
export type { SkillNameIssue, SkillNameIssueCode } from "./naming.js";
export {
  DEFAULT_TEMPLATE_LOCALE,
  DEFAULT_TEMPLATES_ROOT,
  TEMPLATE_LOCALES,
  TemplateNotFoundError,
  UnsupportedLocaleError,
  clearTemplateCache,
  createTemplateLoader,
  isTemplateLocale
} from "./templates.js";
export type {
  SkillTemplateId,
  TemplateLoaderOptions,
  TemplateLocale
} from "./templates.js";
export { EXECUTABLE_ARTIFACTS, SKILL_ARTIFACTS, initSkill } from "./init.js";
export {
  SkillDocumentError,
  parseSkillDocument,
  validateSkill
} from "./validate.js";
export type { ParsedSkillDocument } from "./validate.js";
export type {
  InitSkillCreated,
  InitSkillFailed,
  InitSkillFailureReason,
  InitSkillOptions,
  InitSkillResult,
  SkillMetadata,
  SkillValidationResult
} from "./types.js";
