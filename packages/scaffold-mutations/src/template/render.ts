import Mustache from "mustache";
import type { TemplateVariables } from "../types.js";

/**
 * Render a mustache template with the given variables. Templates that need
 * a value verbatim use triple braces (`{{{name}}}`), which mustache never
 * HTML-escapes.
 */
export function renderTemplate(
  template: string,
  variables: TemplateVariables
): string {
  return Mustache.render(template, variables);
}
