import chalk from "chalk";

export type ThemeName = "dark" | "light";

export interface ThemePalette {
  intro(text: string): string;
  resolvedSymbol: string;
}

export const dark: ThemePalette = {
  intro: (text) => chalk.bgMagenta.white(` ${text} `),
  resolvedSymbol: chalk.magenta("◇")
};

export const light: ThemePalette = {
  intro: (text) => chalk.bgHex("#7a00c2").white(` ${text} `),
  resolvedSymbol: chalk.hex("#7a00c2")("◇")
};

function detectThemeFromEnv(
  variables: Record<string, string | undefined>
): ThemeName | undefined {
  const apple = variables.APPLE_INTERFACE_STYLE;
  if (typeof apple === "string") {
    return apple.toLowerCase() === "dark" ? "dark" : "light";
  }

  const vscodeKind = variables.VSCODE_COLOR_THEME_KIND;
  if (typeof vscodeKind === "string") {
    const normalized = vscodeKind.toLowerCase();
    if (normalized.includes("light")) {
      return "light";
    }
    if (normalized.includes("dark")) {
      return "dark";
    }
  }

  const colorFGBG = variables.COLORFGBG;
  if (typeof colorFGBG === "string") {
    const background = Number.parseInt(colorFGBG.split(";").at(-1) ?? "", 10);
    if (Number.isFinite(background)) {
      return background >= 8 ? "light" : "dark";
    }
  }

  return undefined;
}

export function resolveThemeName(
  variables: Record<string, string | undefined>
): ThemeName {
  const raw = variables.SKILL_INIT_THEME?.toLowerCase();
  if (raw === "light" || raw === "dark") {
    return raw;
  }
  return detectThemeFromEnv(variables) ?? "dark";
}

export function getThemePalette(name: ThemeName): ThemePalette {
  return name === "light" ? light : dark;
}
