import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { isNotFound, type TemplateLoader } from "@skill-init/scaffold-mutations";

export const TEMPLATE_LOCALES = ["zh", "en"] as const;

export type TemplateLocale = (typeof TEMPLATE_LOCALES)[number];

export const DEFAULT_TEMPLATE_LOCALE: TemplateLocale = "zh";

export type SkillTemplateId =
  | "SKILL.md"
  | "example.py"
  | "api_reference.md"
  | "example_asset.txt";

const TEMPLATE_FILES: Record<SkillTemplateId, string> = {
  "SKILL.md": "SKILL.md.mustache",
  "example.py": "example.py.mustache",
  "api_reference.md": "api_reference.md.mustache",
  "example_asset.txt": "example_asset.txt"
};

export const DEFAULT_TEMPLATES_ROOT = fileURLToPath(
  new URL("../templates/", import.meta.url)
);

export class UnsupportedLocaleError extends Error {
  constructor(readonly locale: string) {
    super(
      `Unsupported template locale "${locale}". Expected one of: ${TEMPLATE_LOCALES.join(", ")}`
    );
    this.name = "UnsupportedLocaleError";
  }
}

export class TemplateNotFoundError extends Error {
  constructor(
    readonly templateId: string,
    readonly locale: TemplateLocale,
    options?: { cause?: unknown }
  ) {
    super(`Template "${templateId}" not found for locale "${locale}"`, options);
    this.name = "TemplateNotFoundError";
  }
}

export function isTemplateLocale(value: string): value is TemplateLocale {
  return TEMPLATE_LOCALES.some((locale) => locale === value);
}

function isSkillTemplateId(value: string): value is SkillTemplateId {
  return Object.hasOwn(TEMPLATE_FILES, value);
}

export interface TemplateLoaderOptions {
  /** Directory holding one sub-directory per locale */
  root?: string;
  readFile?: (filePath: string) => Promise<string>;
}

const cache = new Map<string, Promise<string>>();

/**
 * Loader for the skill templates of one locale. Each file is read once per
 * process; later calls share the cached content.
 */
export function createTemplateLoader(
  locale: string,
  options: TemplateLoaderOptions = {}
): TemplateLoader {
  if (!isTemplateLocale(locale)) {
    throw new UnsupportedLocaleError(locale);
  }
  const root = options.root ?? DEFAULT_TEMPLATES_ROOT;
  const read = options.readFile ?? ((filePath: string) => readFile(filePath, "utf8"));

  return async (templateId) => {
    if (!isSkillTemplateId(templateId)) {
      throw new TemplateNotFoundError(templateId, locale);
    }
    const filePath = path.join(root, locale, TEMPLATE_FILES[templateId]);
    const cached = cache.get(filePath);
    if (cached) {
      return cached;
    }

    const pending = read(filePath).catch((error: unknown) => {
      cache.delete(filePath);
      if (isNotFound(error)) {
        throw new TemplateNotFoundError(templateId, locale, { cause: error });
      }
      throw error;
    });
    cache.set(filePath, pending);
    return pending;
  };
}

export function clearTemplateCache(): void {
  cache.clear();
}
