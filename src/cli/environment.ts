import {
  isTemplateLocale,
  UnsupportedLocaleError,
  type TemplateLocale
} from "@skill-init/skill-scaffold";
import { resolveOutputFormat, type OutputFormat } from "./ui/output-format.js";
import { resolveThemeName, type ThemeName } from "./ui/theme.js";

export interface CliEnvironmentInit {
  cwd: string;
  variables?: Record<string, string | undefined>;
}

export interface CliEnvironment {
  readonly cwd: string;
  readonly variables: Record<string, string | undefined>;
  readonly outputFormat: OutputFormat;
  readonly theme: ThemeName;
  /** Locale from SKILL_INIT_LOCALE, when set */
  readonly locale: string | undefined;
}

export function createCliEnvironment(init: CliEnvironmentInit): CliEnvironment {
  const variables = init.variables ?? process.env;
  const rawLocale = variables.SKILL_INIT_LOCALE?.trim();

  return {
    cwd: init.cwd,
    variables,
    outputFormat: resolveOutputFormat(variables),
    theme: resolveThemeName(variables),
    locale: rawLocale ? rawLocale.toLowerCase() : undefined
  };
}

/**
 * Template locale for a run: the flag wins over SKILL_INIT_LOCALE, which wins
 * over the built-in default.
 */
export function resolveTemplateLocale(
  flag: string | undefined,
  env: CliEnvironment,
  fallback: TemplateLocale
): TemplateLocale {
  const candidate = flag?.trim().toLowerCase() ?? env.locale;
  if (candidate === undefined) {
    return fallback;
  }
  if (!isTemplateLocale(candidate)) {
    throw new UnsupportedLocaleError(candidate);
  }
  return candidate;
}
