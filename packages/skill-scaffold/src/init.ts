import path from "node:path";
import {
  PathExistsError,
  describeError,
  fileMutation,
  runMutations,
  templateMutation,
  type Mutation,
  type MutationContext
} from "@skill-init/scaffold-mutations";
import { validateSkillName } from "./naming.js";
import { DEFAULT_TEMPLATE_LOCALE, createTemplateLoader } from "./templates.js";
import { deriveSkillTitle } from "./title.js";
import type {
  InitSkillFailureReason,
  InitSkillFailed,
  InitSkillOptions,
  InitSkillResult
} from "./types.js";

export const SKILL_ARTIFACTS = [
  "SKILL.md",
  "scripts/example.py",
  "references/api_reference.md",
  "assets/example_asset.txt"
] as const;

/** Artifacts that are made executable right after they are written. */
export const EXECUTABLE_ARTIFACTS: ReadonlySet<string> = new Set(["scripts/example.py"]);

const EXECUTABLE_MODE = 0o755;

class PhaseError extends Error {
  constructor(
    readonly reason: InitSkillFailureReason,
    readonly detail: string,
    options: { cause: unknown }
  ) {
    super(detail, options);
    this.name = "PhaseError";
  }
}

/**
 * Create `<destination>/<skillName>` with SKILL.md and the example
 * scripts/, references/ and assets/ files.
 *
 * Expected failures come back as a `failed` result; files written before the
 * failure stay where they are.
 */
export async function initSkill(
  skillName: string,
  destination: string,
  options: InitSkillOptions
): Promise<InitSkillResult> {
  const cwd = options.cwd ?? process.cwd();
  const destinationDir = path.resolve(cwd, destination);
  const skillDir = path.join(destinationDir, skillName);
  // Names with separators nest; only the last segment is created exclusively.
  const parentDir = path.dirname(skillDir);

  if (options.strict) {
    const issues = validateSkillName(skillName);
    if (issues.length > 0) {
      return {
        status: "failed",
        reason: "invalid-name",
        skillDir,
        message: `Invalid skill name: ${issues.map((issue) => issue.message).join("; ")}`,
        issues
      };
    }
  }

  const templates =
    options.templates ?? createTemplateLoader(options.locale ?? DEFAULT_TEMPLATE_LOCALE);
  const context: MutationContext = {
    fs: options.fs,
    cwd: skillDir,
    dryRun: options.dryRun,
    observers: options.observers,
    templates
  };
  const skillTitle = deriveSkillTitle(skillName);

  try {
    await runPhase("create-directory", context, [
      fileMutation.ensureDirectory({
        path: parentDir,
        label: `Create destination ${parentDir}`
      }),
      fileMutation.createDirectory({
        path: skillDir,
        label: `Create skill directory ${skillDir}`
      })
    ]);

    await runPhase("write-skill-md", context, [
      templateMutation.write({
        target: "SKILL.md",
        templateId: "SKILL.md",
        context: { skillName, skillTitle },
        label: "Write SKILL.md"
      })
    ]);

    await runPhase("write-resources", context, async () => [
      fileMutation.ensureDirectory({ path: "scripts", label: "Create scripts/" }),
      templateMutation.write({
        target: "scripts/example.py",
        templateId: "example.py",
        context: { skillName },
        label: "Write scripts/example.py"
      }),
      fileMutation.chmod({
        target: "scripts/example.py",
        mode: EXECUTABLE_MODE,
        label: "Make scripts/example.py executable"
      }),
      fileMutation.ensureDirectory({ path: "references", label: "Create references/" }),
      templateMutation.write({
        target: "references/api_reference.md",
        templateId: "api_reference.md",
        context: { skillTitle },
        label: "Write references/api_reference.md"
      }),
      fileMutation.ensureDirectory({ path: "assets", label: "Create assets/" }),
      fileMutation.write({
        target: "assets/example_asset.txt",
        content: await templates("example_asset.txt"),
        label: "Write assets/example_asset.txt"
      })
    ]);
  } catch (error) {
    if (error instanceof PhaseError) {
      return toFailure(error, skillDir);
    }
    throw error;
  }

  return { status: "created", skillDir, artifacts: [...SKILL_ARTIFACTS] };
}

async function runPhase(
  reason: InitSkillFailureReason,
  context: MutationContext,
  mutations: Mutation[] | (() => Promise<Mutation[]>)
): Promise<void> {
  try {
    const list = typeof mutations === "function" ? await mutations() : mutations;
    await runMutations(list, context);
  } catch (error) {
    if (error instanceof PathExistsError) {
      throw new PhaseError("exists", error.path, { cause: error });
    }
    throw new PhaseError(reason, describeError(error), { cause: error });
  }
}

function toFailure(error: PhaseError, skillDir: string): InitSkillFailed {
  return {
    status: "failed",
    reason: error.reason,
    skillDir,
    message: failureMessage(error.reason, error.detail, skillDir),
    cause: error.cause
  };
}

function failureMessage(
  reason: InitSkillFailureReason,
  detail: string,
  skillDir: string
): string {
  switch (reason) {
    case "exists":
      return `Skill directory already exists: ${skillDir}`;
    case "create-directory":
      return `Error creating directory: ${detail}`;
    case "write-skill-md":
      return `Error creating SKILL.md: ${detail}`;
    case "write-resources":
      return `Error creating resource directories: ${detail}`;
    case "invalid-name":
      return `Invalid skill name: ${detail}`;
    default: {
      const never: never = reason;
      return `Unknown failure ${String(never)}`;
    }
  }
}
