import path from "node:path";
import { parse } from "yaml";
import { describeError, isNotFound, type FileSystem } from "@skill-init/scaffold-mutations";
import { validateSkillName } from "./naming.js";
import type { SkillMetadata, SkillValidationResult } from "./types.js";

const FRONTMATTER_DELIMITER = "---";
const TODO_MARKER = "[TODO";

export interface ParsedSkillDocument {
  frontmatter: Record<string, unknown>;
  instructions: string;
}

export class SkillDocumentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SkillDocumentError";
  }
}

/**
 * Split a SKILL.md document into its YAML front-matter and Markdown body.
 */
export function parseSkillDocument(content: string): ParsedSkillDocument {
  const trimmed = content.trim();
  if (!trimmed.startsWith(FRONTMATTER_DELIMITER)) {
    throw new SkillDocumentError("SKILL.md must start with YAML front-matter (---)");
  }

  const rest = trimmed.slice(FRONTMATTER_DELIMITER.length);
  const end = rest.indexOf(`\n${FRONTMATTER_DELIMITER}`);
  if (end === -1) {
    throw new SkillDocumentError("Missing closing front-matter delimiter (---)");
  }

  let data: unknown;
  try {
    data = parse(rest.slice(0, end));
  } catch (error) {
    throw new SkillDocumentError(
      `Invalid YAML front-matter: ${describeError(error)}`,
      { cause: error }
    );
  }
  if (!isRecord(data)) {
    throw new SkillDocumentError("Front-matter must be a YAML mapping");
  }

  return {
    frontmatter: data,
    instructions: rest.slice(end + FRONTMATTER_DELIMITER.length + 1).trim()
  };
}

/**
 * Check the SKILL.md of a skill directory. Errors make the skill invalid;
 * warnings only flag leftovers from the generated template.
 */
export async function validateSkill(
  skillDir: string,
  options: { fs: FileSystem; cwd?: string }
): Promise<SkillValidationResult> {
  const resolvedDir = path.resolve(options.cwd ?? process.cwd(), skillDir);
  const skillFile = path.join(resolvedDir, "SKILL.md");
  const fail = (message: string): SkillValidationResult => ({
    valid: false,
    skillDir: resolvedDir,
    errors: [message],
    warnings: []
  });

  let content: string;
  try {
    content = await options.fs.readFile(skillFile, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return fail(`SKILL.md not found in ${resolvedDir}`);
    }
    return fail(`Cannot read ${skillFile}: ${describeError(error)}`);
  }

  let document: ParsedSkillDocument;
  try {
    document = parseSkillDocument(content);
  } catch (error) {
    if (error instanceof SkillDocumentError) {
      return fail(error.message);
    }
    throw error;
  }

  const { frontmatter } = document;
  const errors: string[] = [];
  const warnings: string[] = [];
  const name = nonEmptyString(frontmatter.name);
  const description = nonEmptyString(frontmatter.description);

  if (name === undefined) {
    errors.push("Front-matter field 'name' must be a non-empty string");
  } else {
    const directoryName = path.basename(resolvedDir);
    if (name !== directoryName) {
      errors.push(`Skill name '${name}' does not match directory name '${directoryName}'`);
    }
    for (const issue of validateSkillName(name)) {
      errors.push(issue.message);
    }
  }

  if (description === undefined) {
    errors.push("Front-matter field 'description' must be a non-empty string");
  } else if (description.includes(TODO_MARKER)) {
    warnings.push("Description still contains a TODO placeholder");
  }

  if (name === undefined || description === undefined || errors.length > 0) {
    return { valid: false, skillDir: resolvedDir, errors, warnings };
  }

  return {
    valid: true,
    skillDir: resolvedDir,
    errors,
    warnings,
    metadata: toMetadata(name, description, frontmatter),
    instructions: document.instructions
  };
}

function toMetadata(
  name: string,
  description: string,
  frontmatter: Record<string, unknown>
): SkillMetadata {
  const metadata: SkillMetadata = { name, description };
  const allowedTools = frontmatter["allowed-tools"];
  if (typeof allowedTools === "string") {
    metadata.allowedTools = allowedTools
      .split(/[,\s]+/)
      .filter((tool) => tool.length > 0);
  }
  if (typeof frontmatter.model === "string") {
    metadata.model = frontmatter.model;
  }
  if (typeof frontmatter.context === "string") {
    metadata.context = frontmatter.context;
  }
  const userInvocable = frontmatter["user-invocable"];
  if (typeof userInvocable === "boolean") {
    metadata.userInvocable = userInvocable;
  }
  if (isRecord(frontmatter.metadata)) {
    metadata.metadata = Object.fromEntries(
      Object.entries(frontmatter.metadata).map(([key, value]) => [key, String(value)])
    );
  }
  return metadata;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
