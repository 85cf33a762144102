export const SKILL_NAME_MAX_LENGTH = 40;

export type SkillNameIssueCode =
  | "empty"
  | "too-long"
  | "invalid-characters"
  | "hyphen-placement";

export interface SkillNameIssue {
  code: SkillNameIssueCode;
  message: string;
}

/** Human-readable naming rules, shown in usage output. */
export const SKILL_NAME_RULES: readonly string[] = [
  "Hyphen-case identifier (e.g., 'data-analyzer')",
  "Lowercase letters, digits, and hyphens only",
  `Max ${SKILL_NAME_MAX_LENGTH} characters`,
  "Must match directory name exactly"
];

const ALLOWED_CHARACTERS = /^[a-z0-9-]+$/;

/**
 * Check a skill name against the naming rules. Returns an empty list when the
 * name is valid.
 */
export function validateSkillName(name: string): SkillNameIssue[] {
  if (name.length === 0) {
    return [{ code: "empty", message: "Skill name must not be empty" }];
  }

  const issues: SkillNameIssue[] = [];

  if (name.length > SKILL_NAME_MAX_LENGTH) {
    issues.push({
      code: "too-long",
      message: `Skill name is ${name.length} characters long (max ${SKILL_NAME_MAX_LENGTH})`
    });
  }

  if (!ALLOWED_CHARACTERS.test(name)) {
    issues.push({
      code: "invalid-characters",
      message: `Skill name '${name}' may only contain lowercase letters, digits, and hyphens`
    });
  }

  if (name.startsWith("-") || name.endsWith("-") || name.includes("--")) {
    issues.push({
      code: "hyphen-placement",
      message: `Skill name '${name}' cannot start or end with a hyphen or contain consecutive hyphens`
    });
  }

  return issues;
}
