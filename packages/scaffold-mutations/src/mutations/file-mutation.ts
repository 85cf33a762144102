import type {
  ChmodMutation,
  CreateDirectoryMutation,
  EnsureDirectoryMutation,
  FileWriteMutation
} from "../types.js";

export interface CreateDirectoryOptions {
  /** Directory path; must not exist yet */
  path: string;
  /** Optional human-readable label for logging */
  label?: string;
}

export interface EnsureDirectoryOptions {
  /** Directory path, created with its parents when missing */
  path: string;
  /** Optional human-readable label for logging */
  label?: string;
}

export interface ChmodOptions {
  /** Target file path */
  target: string;
  /** File permission mode (e.g., 0o755) */
  mode: number;
  /** Optional human-readable label for logging */
  label?: string;
}

export interface FileWriteOptions {
  /** Target file path */
  target: string;
  /** Content written as-is, without template rendering */
  content: string;
  /** Optional human-readable label for logging */
  label?: string;
}

function createDirectory(options: CreateDirectoryOptions): CreateDirectoryMutation {
  return {
    kind: "createDirectory",
    path: options.path,
    label: options.label
  };
}

function ensureDirectory(options: EnsureDirectoryOptions): EnsureDirectoryMutation {
  return {
    kind: "ensureDirectory",
    path: options.path,
    label: options.label
  };
}

function chmod(options: ChmodOptions): ChmodMutation {
  return {
    kind: "chmod",
    target: options.target,
    mode: options.mode,
    label: options.label
  };
}

function write(options: FileWriteOptions): FileWriteMutation {
  return {
    kind: "fileWrite",
    target: options.target,
    content: options.content,
    label: options.label
  };
}

export const fileMutation = {
  createDirectory,
  ensureDirectory,
  chmod,
  write
};
