import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { createCliMain } from "../../src/cli/bootstrap.js";
import type { CliDependencies } from "../../src/cli/container.js";
import {
  createInitSkillProgram,
  createValidateSkillProgram
} from "../../src/cli/program.js";

describe("init-skill and validate-skill on a real filesystem", () => {
  let root: string;
  let logs: string[];
  let overrides: Partial<CliDependencies>;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "skill-init-"));
    logs = [];
    overrides = {
      env: { cwd: root, variables: { OUTPUT_FORMAT: "plain" } },
      logger: (message) => {
        logs.push(message);
      }
    };
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(root, { recursive: true, force: true });
  });

  const runInit = (args: string[]) =>
    createCliMain(createInitSkillProgram, overrides)(["node", "init-skill", ...args]);
  const runValidate = (args: string[]) =>
    createCliMain(createValidateSkillProgram, overrides)(["node", "validate-skill", ...args]);

  it("creates the four artifacts in an empty destination", async () => {
    const skillDir = path.join(root, "work", "demo-tool");

    await runInit(["demo-tool", "--path", "work"]);

    expect(process.exitCode).toBeUndefined();
    expect((await readdir(skillDir)).sort()).toEqual([
      "SKILL.md",
      "assets",
      "references",
      "scripts"
    ]);
    const skill = await readFile(path.join(skillDir, "SKILL.md"), "utf8");
    expect(skill).toContain("name: demo-tool\n");
    expect(skill).toContain("# Demo Tool\n");
    expect(await readdir(path.join(skillDir, "assets"))).toEqual(["example_asset.txt"]);
    expect(await readdir(path.join(skillDir, "references"))).toEqual(["api_reference.md"]);

    const script = await stat(path.join(skillDir, "scripts", "example.py"));
    expect(script.mode & 0o777).toBe(0o755);
    expect(logs.at(-2)).toBe(`Skill 'demo-tool' initialized successfully at ${skillDir}`);
  });

  it("leaves the first run untouched when the skill already exists", async () => {
    const skillFile = path.join(root, "work", "demo-tool", "SKILL.md");
    await runInit(["demo-tool", "--path", "work"]);
    const before = await readFile(skillFile, "utf8");

    await runInit(["demo-tool", "--path", "work"]);

    expect(process.exitCode).toBe(1);
    expect(logs.at(-1)).toBe(
      `Error: Skill directory already exists: ${path.join(root, "work", "demo-tool")}`
    );
    expect(await readFile(skillFile, "utf8")).toBe(before);
  });

  it("flags an unedited skill and accepts it once the description is filled in", async () => {
    const skillDir = path.join(root, "work", "demo-tool");
    await runInit(["demo-tool", "--path", "work", "--locale", "en"]);

    await runValidate([skillDir]);
    expect(process.exitCode).toBe(1);

    process.exitCode = undefined;
    logs = [];
    const skillFile = path.join(skillDir, "SKILL.md");
    const content = await readFile(skillFile, "utf8");
    await writeFile(
      skillFile,
      content.replace(/^description: .*$/m, "description: Summarize build logs")
    );

    await runValidate(["work/demo-tool"]);

    expect(process.exitCode).toBeUndefined();
    expect(logs).toEqual(["Skill 'demo-tool' is valid"]);
  });
});
