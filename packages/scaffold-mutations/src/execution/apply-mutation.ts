import type {
  Mutation,
  MutationContext,
  MutationDetails,
  MutationKind,
  MutationOutcome
} from "../types.js";
import { PathExistsError } from "../errors.js";
import { hasErrorCode, isNotFound, pathExists } from "../fs-utils.js";
import { renderTemplate } from "../template/render.js";
import { resolveTarget } from "./path-utils.js";

// ============================================================================
// Helper Functions
// ============================================================================

function describeMutation(kind: MutationKind, targetPath: string): string {
  switch (kind) {
    case "createDirectory":
    case "ensureDirectory":
      return `Create ${targetPath}`;
    case "templateWrite":
    case "fileWrite":
      return `Write ${targetPath}`;
    case "chmod":
      return `Set permissions on ${targetPath}`;
    default: {
      const never: never = kind;
      return `Operation ${String(never)}`;
    }
  }
}

function rawTarget(mutation: Mutation): string {
  switch (mutation.kind) {
    case "createDirectory":
    case "ensureDirectory":
      return mutation.path;
    case "chmod":
    case "fileWrite":
    case "templateWrite":
      return mutation.target;
    default: {
      const never: never = mutation;
      throw new Error(`Unknown mutation kind: ${JSON.stringify(never)}`);
    }
  }
}

const noop: MutationOutcome = { changed: false, effect: "none", detail: "noop" };

/**
 * Resolve the absolute target and display label of a mutation.
 */
export function resolveDetails(
  mutation: Mutation,
  context: MutationContext
): MutationDetails {
  const targetPath = resolveTarget(rawTarget(mutation), context.cwd);
  return {
    kind: mutation.kind,
    label: mutation.label ?? describeMutation(mutation.kind, targetPath),
    targetPath
  };
}

// ============================================================================
// Apply Mutation
// ============================================================================

export async function applyMutation(
  mutation: Mutation,
  details: MutationDetails,
  context: MutationContext
): Promise<MutationOutcome> {
  switch (mutation.kind) {
    case "createDirectory":
      return applyCreateDirectory(details.targetPath, context);
    case "ensureDirectory":
      return applyEnsureDirectory(details.targetPath, context);
    case "chmod":
      return applyChmod(mutation, details.targetPath, context);
    case "fileWrite":
      return writeContent(details.targetPath, mutation.content, context);
    case "templateWrite":
      return applyTemplateWrite(mutation, details.targetPath, context);
    default: {
      const never: never = mutation;
      throw new Error(`Unknown mutation kind: ${JSON.stringify(never)}`);
    }
  }
}

// ============================================================================
// Directory Handlers
// ============================================================================

async function applyCreateDirectory(
  targetPath: string,
  context: MutationContext
): Promise<MutationOutcome> {
  if (context.dryRun) {
    if (await pathExists(context.fs, targetPath)) {
      throw new PathExistsError(targetPath);
    }
    return { changed: true, effect: "mkdir", detail: "create" };
  }

  // Non-recursive mkdir fails with EEXIST, so the existence check and the
  // creation are a single filesystem call.
  try {
    await context.fs.mkdir(targetPath, { recursive: false });
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      throw new PathExistsError(targetPath, { cause: error });
    }
    throw error;
  }

  return { changed: true, effect: "mkdir", detail: "create" };
}

async function applyEnsureDirectory(
  targetPath: string,
  context: MutationContext
): Promise<MutationOutcome> {
  const existed = await pathExists(context.fs, targetPath);

  if (!context.dryRun) {
    await context.fs.mkdir(targetPath, { recursive: true });
  }

  return {
    changed: !existed,
    effect: "mkdir",
    detail: existed ? "noop" : "create"
  };
}

// ============================================================================
// File Handlers
// ============================================================================

async function applyChmod(
  mutation: Extract<Mutation, { kind: "chmod" }>,
  targetPath: string,
  context: MutationContext
): Promise<MutationOutcome> {
  if (typeof context.fs.chmod !== "function") {
    return noop;
  }

  try {
    const stat = await context.fs.stat(targetPath);
    const currentMode = typeof stat.mode === "number" ? stat.mode & 0o777 : null;

    if (currentMode === mutation.mode) {
      return noop;
    }

    if (!context.dryRun) {
      await context.fs.chmod(targetPath, mutation.mode);
    }

    return { changed: true, effect: "chmod", detail: "update" };
  } catch (error) {
    // A dry run never wrote the file it would now chmod.
    if (context.dryRun && isNotFound(error)) {
      return { changed: true, effect: "chmod", detail: "update" };
    }
    throw error;
  }
}

async function applyTemplateWrite(
  mutation: Extract<Mutation, { kind: "templateWrite" }>,
  targetPath: string,
  context: MutationContext
): Promise<MutationOutcome> {
  if (!context.templates) {
    throw new Error(
      "Template mutations require a templates loader. " +
        "Provide templates function to runMutations context."
    );
  }

  const template = await context.templates(mutation.templateId);
  const rendered = renderTemplate(template, mutation.context ?? {});
  return writeContent(targetPath, rendered, context);
}

async function writeContent(
  targetPath: string,
  content: string,
  context: MutationContext
): Promise<MutationOutcome> {
  const existed = await pathExists(context.fs, targetPath);

  if (!context.dryRun) {
    await context.fs.writeFile(targetPath, content, { encoding: "utf8" });
  }

  return {
    changed: true,
    effect: "write",
    detail: existed ? "update" : "create"
  };
}
