import { SKILL_NAME_RULES } from "@skill-init/skill-scaffold";
import type { CliDesignLanguage } from "./ui/design-language.js";

export const INIT_EXAMPLES = [
  "init-skill my-new-skill --path skills/public",
  "init-skill my-api-helper --path skills/private",
  "init-skill custom-skill --path /custom/location"
];

const INIT_OPTIONS: Array<[string, string]> = [
  ["--locale <locale>", "Template language: zh (default) or en"],
  ["--strict", "Reject names that break the naming rules"],
  ["--dry-run", "Show what would be created without writing"],
  ["--verbose", "Show each filesystem step"],
  ["-V, --version", "Output the version number"],
  ["-h, --help", "Display this usage text"]
];

export function formatInitUsage(design: CliDesignLanguage): string {
  const { text } = design;
  return [
    `${text.section("Usage:")} ${text.usageCommand("init-skill")} ${text.argument("<skill-name> --path <path> [options]")}`,
    "",
    text.section("Skill name requirements:"),
    ...SKILL_NAME_RULES.map((rule) => `  - ${rule}`),
    "",
    text.section("Options:"),
    ...INIT_OPTIONS.map(([flag, description]) => `  ${text.option(flag.padEnd(19))}${description}`),
    "",
    text.section("Examples:"),
    ...INIT_EXAMPLES.map((example) => `  ${text.example(example)}`)
  ].join("\n");
}

export function formatValidateUsage(design: CliDesignLanguage): string {
  const { text } = design;
  return [
    `${text.section("Usage:")} ${text.usageCommand("validate-skill")} ${text.argument("<skill-dir>")}`,
    "",
    "Checks the YAML front-matter of <skill-dir>/SKILL.md.",
    "",
    text.section("Examples:"),
    `  ${text.example("validate-skill skills/public/my-new-skill")}`
  ].join("\n");
}
