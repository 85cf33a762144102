// ============================================================================
// FileSystem Interface
// ============================================================================

export interface FileSystem {
  readFile(path: string, encoding: "utf8"): Promise<string>;
  writeFile(
    path: string,
    content: string,
    options?: { encoding: "utf8" }
  ): Promise<void>;
  mkdir(path: string, options?: { recursive: boolean }): Promise<unknown>;
  stat(path: string): Promise<{ mode?: number }>;
  chmod?(path: string, mode: number): Promise<void>;
}

// ============================================================================
// Template Loader
// ============================================================================

export type TemplateLoader = (templateId: string) => Promise<string>;

export type TemplateVariables = Record<string, string | number | boolean>;

// ============================================================================
// Mutation Context (passed to runMutations)
// ============================================================================

export interface MutationContext {
  /** Filesystem interface - required */
  fs: FileSystem;

  /** Base directory that relative targets resolve against - required */
  cwd: string;

  /** Optional dry-run mode */
  dryRun?: boolean;

  /** Optional observers for logging */
  observers?: MutationObservers;

  /** Required for template mutations */
  templates?: TemplateLoader;
}

// ============================================================================
// Mutation Types
// ============================================================================

interface BaseMutation {
  /** Human-readable label for logging */
  label?: string;
}

export interface CreateDirectoryMutation extends BaseMutation {
  kind: "createDirectory";
  path: string;
}

export interface EnsureDirectoryMutation extends BaseMutation {
  kind: "ensureDirectory";
  path: string;
}

export interface ChmodMutation extends BaseMutation {
  kind: "chmod";
  target: string;
  mode: number;
}

export interface FileWriteMutation extends BaseMutation {
  kind: "fileWrite";
  target: string;
  content: string;
}

export interface TemplateWriteMutation extends BaseMutation {
  kind: "templateWrite";
  target: string;
  templateId: string;
  context?: TemplateVariables;
}

export type Mutation =
  | CreateDirectoryMutation
  | EnsureDirectoryMutation
  | ChmodMutation
  | FileWriteMutation
  | TemplateWriteMutation;

export type MutationKind = Mutation["kind"];

// ============================================================================
// Mutation Result
// ============================================================================

export type MutationEffect = "none" | "mkdir" | "write" | "chmod";

export type MutationDetail = "create" | "update" | "noop";

export interface MutationOutcome {
  changed: boolean;
  effect: MutationEffect;
  detail?: MutationDetail;
}

export interface MutationDetails {
  kind: MutationKind;
  label: string;
  targetPath: string;
}

export interface MutationObservers {
  onStart?(details: MutationDetails): void;
  onComplete?(details: MutationDetails, outcome: MutationOutcome): void;
  onError?(details: MutationDetails, error: unknown): void;
}

export interface MutationResult {
  changed: boolean;
  effects: MutationOutcome[];
}
