import { beforeEach, describe, expect, it } from "vitest";
import { Volume, createFsFromVolume } from "memfs";
import { createRequire } from "node:module";
import { createFailingFs } from "@skill-init/scaffold-mutations/testing";
import type { FileSystem } from "../utils/file-system.js";
import type { CliDependencies } from "./container.js";
import { createCliEnvironment } from "./environment.js";
import { CliError, UsageError } from "./errors.js";
import { CommandFailed, HelpExit, VersionExit } from "./exit-signals.js";
import { createInitSkillProgram, createValidateSkillProgram, hasInitShape } from "./program.js";
import { createCliDesignLanguage } from "./ui/design-language.js";
import { formatInitUsage, formatValidateUsage } from "./usage.js";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

const plainDesign = createCliDesignLanguage(
  createCliEnvironment({ cwd: "/work", variables: { OUTPUT_FORMAT: "plain" } })
);
const initUsage = formatInitUsage(plainDesign);
const skillDir = "/work/skills/demo-tool";

describe("hasInitShape", () => {
  it("accepts a name followed by --path and a value", () => {
    expect(hasInitShape(["demo-tool", "--path", "skills"])).toBe(true);
    expect(hasInitShape(["demo-tool", "--path", "skills", "--strict"])).toBe(true);
  });

  it("rejects every other shape", () => {
    expect(hasInitShape([])).toBe(false);
    expect(hasInitShape(["demo-tool"])).toBe(false);
    expect(hasInitShape(["demo-tool", "--path"])).toBe(false);
    expect(hasInitShape(["demo-tool", "--dest", "skills"])).toBe(false);
    expect(hasInitShape(["demo-tool", "--path=skills", "x"])).toBe(false);
    expect(hasInitShape(["--path", "skills", "demo-tool"])).toBe(false);
  });

  it("accepts a name that starts with a dash", () => {
    expect(hasInitShape(["-x", "--path", "skills"])).toBe(true);
  });

  it("lets help and version through", () => {
    expect(hasInitShape(["--help"])).toBe(true);
    expect(hasInitShape(["-V"])).toBe(true);
  });
});

describe("init-skill program", () => {
  let vol: Volume;
  let fs: FileSystem;
  let logs: string[];

  beforeEach(() => {
    vol = new Volume();
    vol.mkdirSync("/work", { recursive: true });
    fs = createFsFromVolume(vol).promises as unknown as FileSystem;
    logs = [];
  });

  const dependencies = (
    overrides: Partial<CliDependencies> = {},
    variables: Record<string, string> = {}
  ): CliDependencies => ({
    fs,
    env: { cwd: "/work", variables: { OUTPUT_FORMAT: "plain", ...variables } },
    logger: (message) => {
      logs.push(message);
    },
    ...overrides
  });

  const run = (args: string[], deps: CliDependencies = dependencies()) =>
    createInitSkillProgram(deps).parseAsync(["node", "init-skill", ...args]);

  it("creates the skill and reports each artifact", async () => {
    await run(["demo-tool", "--path", "skills"]);

    expect(logs).toEqual([
      "Initializing skill: demo-tool",
      "Location: skills",
      `Created skill directory: ${skillDir}`,
      "Created SKILL.md",
      "Created scripts/example.py",
      "Created references/api_reference.md",
      "Created assets/example_asset.txt",
      `Skill 'demo-tool' initialized successfully at ${skillDir}`,
      [
        "Next steps:",
        "1. Edit SKILL.md to complete the TODO items and update the description",
        "2. Customize or delete the example files in scripts/, references/, and assets/",
        `3. Run validate-skill ${skillDir} to check the skill structure`
      ].join("\n")
    ]);
    expect(String(vol.readFileSync(`${skillDir}/SKILL.md`, "utf8"))).toContain("# Demo Tool");
  });

  it.each([
    [["demo-tool"]],
    [["demo-tool", "--dest", "skills"]],
    [["demo-tool", "--path=skills", "extra"]],
    [["--path", "skills", "demo-tool"]]
  ])("rejects %j with the usage text before touching the filesystem", async (args) => {
    const failure = run(args);

    await expect(failure).rejects.toBeInstanceOf(UsageError);
    await expect(failure).rejects.toMatchObject({ usage: initUsage });
    expect(vol.readdirSync("/work")).toEqual([]);
    expect(logs).toEqual([]);
  });

  it("creates a skill whose name starts with a dash", async () => {
    await run(["-x", "--path", "skills"]);

    expect(vol.existsSync("/work/skills/-x/SKILL.md")).toBe(true);
    expect(logs[0]).toBe("Initializing skill: -x");
  });

  it("reports the example script only after it is made executable", async () => {
    const failing = createFailingFs(fs, [{ operation: "chmod" }]);

    await expect(
      run(["demo-tool", "--path", "skills"], dependencies({ fs: failing }))
    ).rejects.toBeInstanceOf(CommandFailed);

    expect(logs).not.toContain("Created scripts/example.py");
    expect(logs.at(-1)).toBe(
      `Error creating resource directories: EACCES: permission denied, chmod '${skillDir}/scripts/example.py'`
    );
  });

  it("rejects excess positional arguments", async () => {
    await expect(run(["demo-tool", "--path", "skills", "extra"])).rejects.toBeInstanceOf(
      UsageError
    );
    expect(vol.readdirSync("/work")).toEqual([]);
  });

  it("rejects unknown options", async () => {
    await expect(run(["demo-tool", "--path", "skills", "--force"])).rejects.toBeInstanceOf(
      UsageError
    );
  });

  it("prints the usage text for --help", async () => {
    await expect(run(["--help"])).rejects.toBeInstanceOf(HelpExit);

    expect(logs).toEqual([initUsage]);
  });

  it("prints the package version for --version", async () => {
    await expect(run(["--version"])).rejects.toBeInstanceOf(VersionExit);

    expect(logs).toEqual([packageJson.version]);
  });

  it("fails when the skill already exists", async () => {
    await run(["demo-tool", "--path", "skills"]);
    logs = [];

    const failure = run(["demo-tool", "--path", "skills"]);

    await expect(failure).rejects.toBeInstanceOf(CommandFailed);
    await expect(failure).rejects.toMatchObject({ exitCode: 1 });
    expect(logs.at(-1)).toBe(`Error: Skill directory already exists: ${skillDir}`);
  });

  it("reports a denied directory creation", async () => {
    const failing = createFailingFs(fs, [{ operation: "mkdir", path: skillDir }]);

    await expect(
      run(["demo-tool", "--path", "skills"], dependencies({ fs: failing }))
    ).rejects.toBeInstanceOf(CommandFailed);

    expect(logs.at(-1)).toBe(
      `Error creating directory: EACCES: permission denied, mkdir '${skillDir}'`
    );
    expect(vol.existsSync(`${skillDir}/SKILL.md`)).toBe(false);
  });

  it("only reports what a dry run would create", async () => {
    await run(["demo-tool", "--path", "skills", "--dry-run"]);

    expect(logs).toEqual([
      "Initializing skill: demo-tool",
      "Location: skills",
      `Would create skill directory: ${skillDir}`,
      "Would create SKILL.md",
      "Would create scripts/example.py",
      "Would create references/api_reference.md",
      "Would create assets/example_asset.txt",
      `Would initialize skill 'demo-tool' at ${skillDir}`
    ]);
    expect(vol.readdirSync("/work")).toEqual([]);
  });

  it("enforces the naming rules with --strict", async () => {
    await expect(run(["Bad_Name", "--path", "skills", "--strict"])).rejects.toBeInstanceOf(
      CommandFailed
    );

    expect(logs.at(-1)).toBe(
      "Error: Invalid skill name: Skill name 'Bad_Name' may only contain lowercase letters, digits, and hyphens"
    );
    expect(vol.readdirSync("/work")).toEqual([]);
  });

  it("uses the locale flag", async () => {
    await run(["demo-tool", "--path", "skills", "--locale", "en"]);

    expect(String(vol.readFileSync(`${skillDir}/SKILL.md`, "utf8"))).toContain("## Goal");
  });

  it("falls back to SKILL_INIT_LOCALE", async () => {
    await run(["demo-tool", "--path", "skills"], dependencies({}, { SKILL_INIT_LOCALE: "en" }));

    expect(String(vol.readFileSync(`${skillDir}/SKILL.md`, "utf8"))).toContain("## Goal");
  });

  it("prefers the flag over SKILL_INIT_LOCALE", async () => {
    await run(
      ["demo-tool", "--path", "skills", "--locale", "zh"],
      dependencies({}, { SKILL_INIT_LOCALE: "en" })
    );

    expect(String(vol.readFileSync(`${skillDir}/SKILL.md`, "utf8"))).toContain("## 目标");
  });

  it("rejects an unsupported locale before touching the filesystem", async () => {
    const failure = run(["demo-tool", "--path", "skills", "--locale", "fr"]);

    await expect(failure).rejects.toBeInstanceOf(CliError);
    await expect(failure).rejects.toThrow(
      'Unsupported template locale "fr". Expected one of: zh, en'
    );
    expect(vol.readdirSync("/work")).toEqual([]);
  });

  it("logs each step with --verbose", async () => {
    await run(["demo-tool", "--path", "skills", "--verbose"]);

    expect(logs).toContain("[init] Template locale: zh");
    expect(logs).toContain("[init] Create destination /work/skills");
    expect(logs).toContain("[init] Make scripts/example.py executable");
    expect(logs).toContain("[init] Created SKILL.md");
  });
});

describe("validate-skill program", () => {
  let vol: Volume;
  let logs: string[];
  let deps: CliDependencies;

  beforeEach(() => {
    vol = new Volume();
    vol.mkdirSync(skillDir, { recursive: true });
    logs = [];
    deps = {
      fs: createFsFromVolume(vol).promises as unknown as FileSystem,
      env: { cwd: "/work", variables: { OUTPUT_FORMAT: "plain" } },
      logger: (message) => {
        logs.push(message);
      }
    };
  });

  const run = (args: string[]) =>
    createValidateSkillProgram(deps).parseAsync(["node", "validate-skill", ...args]);

  it("accepts a valid skill", async () => {
    vol.writeFileSync(
      `${skillDir}/SKILL.md`,
      "---\nname: demo-tool\ndescription: Summarize build logs\n---\n\n# Demo Tool\n"
    );

    await run(["skills/demo-tool"]);

    expect(logs).toEqual(["Skill 'demo-tool' is valid"]);
  });

  it("prints warnings for a valid skill", async () => {
    vol.writeFileSync(
      `${skillDir}/SKILL.md`,
      '---\nname: demo-tool\ndescription: "[TODO: describe]"\n---\n'
    );

    await run([skillDir]);

    expect(logs).toEqual([
      "Warning: Description still contains a TODO placeholder",
      "Skill 'demo-tool' is valid"
    ]);
  });

  it("prints each error and fails", async () => {
    await expect(run([skillDir])).rejects.toBeInstanceOf(CommandFailed);

    expect(logs).toEqual([`SKILL.md not found in ${skillDir}`]);
  });

  it("requires exactly one directory", async () => {
    await expect(run([])).rejects.toBeInstanceOf(UsageError);
    await expect(run(["a", "b"])).rejects.toMatchObject({
      usage: formatValidateUsage(plainDesign)
    });
  });
});
