// Main exports
export { fileMutation } from "./mutations/file-mutation.js";
export { templateMutation } from "./mutations/template-mutation.js";
export { runMutations } from "./execution/run-mutations.js";
export { renderTemplate } from "./template/render.js";
export { PathExistsError } from "./errors.js";
export { describeError, hasErrorCode, isNotFound, pathExists } from "./fs-utils.js";

// Types
export type {
  FileSystem,
  Mutation,
  MutationContext,
  MutationDetails,
  MutationKind,
  MutationObservers,
  MutationOutcome,
  MutationResult,
  TemplateLoader,
  TemplateVariables
} from "./types.js";
