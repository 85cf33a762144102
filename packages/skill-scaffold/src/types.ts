import type {
  FileSystem,
  MutationObservers,
  TemplateLoader
} from "@skill-init/scaffold-mutations";
import type { SkillNameIssue } from "./naming.js";
import type { TemplateLocale } from "./templates.js";

export interface InitSkillOptions {
  fs: FileSystem;
  /** Base for a relative destination; defaults to process.cwd() */
  cwd?: string;
  locale?: TemplateLocale;
  /** Reject names that break the naming rules before touching the filesystem */
  strict?: boolean;
  dryRun?: boolean;
  observers?: MutationObservers;
  /** Overrides the locale's bundled templates */
  templates?: TemplateLoader;
}

export type InitSkillFailureReason =
  | "invalid-name"
  | "exists"
  | "create-directory"
  | "write-skill-md"
  | "write-resources";

export interface InitSkillCreated {
  status: "created";
  skillDir: string;
  /** Generated files relative to skillDir, in creation order */
  artifacts: string[];
}

export interface InitSkillFailed {
  status: "failed";
  reason: InitSkillFailureReason;
  skillDir: string;
  message: string;
  issues?: SkillNameIssue[];
  cause?: unknown;
}

export type InitSkillResult = InitSkillCreated | InitSkillFailed;

export interface SkillMetadata {
  name: string;
  description: string;
  allowedTools?: string[];
  model?: string;
  context?: string;
  userInvocable?: boolean;
  metadata?: Record<string, string>;
}

export interface SkillValidationResult {
  valid: boolean;
  skillDir: string;
  errors: string[];
  warnings: string[];
  metadata?: SkillMetadata;
  /** Markdown body after the front-matter */
  instructions?: string;
}
