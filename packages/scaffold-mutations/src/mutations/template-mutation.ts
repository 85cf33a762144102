import type { TemplateVariables, TemplateWriteMutation } from "../types.js";

export interface WriteOptions {
  /** Target file path */
  target: string;
  /** Template ID to load via template loader */
  templateId: string;
  /** Variables passed to the mustache renderer */
  context?: TemplateVariables;
  /** Optional human-readable label for logging */
  label?: string;
}

function write(options: WriteOptions): TemplateWriteMutation {
  return {
    kind: "templateWrite",
    target: options.target,
    templateId: options.templateId,
    context: options.context,
    label: options.label
  };
}

export const templateMutation = {
  write
};
