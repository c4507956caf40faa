import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { chmodSync } from "fs";
import { delimiter, join } from "path";
import { SkillsLoader } from "../../../src/application/skills-loader.js";
import { buildArgv, createSkillTools } from "../../../src/tools/skill-command.js";
import { Allowlist } from "../../../src/infrastructure/exec/allowlist.js";
import { PACKAGED_SKILLS_DIR } from "../../../src/infrastructure/config/init.js";
import { makeTempDir, removeDir, writeFile } from "../../helpers/temp-dir.js";

// Stand-in notesmd-cli: no default vault, so daily dates resolve to themselves.
const FAKE_NOTESMD_CLI = "#!/bin/sh\nexit 0\n";

describe("packaged notesmd-cli-daily skill", () => {
  let binDir: string;

  beforeEach(() => {
    binDir = makeTempDir();
    chmodSync(writeFile(join(binDir, "notesmd-cli"), FAKE_NOTESMD_CLI), 0o755);
    vi.stubEnv("PATH", `${binDir}${delimiter}${process.env.PATH ?? ""}`);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    removeDir(binDir);
  });

  function loadSkill() {
    const skills = new SkillsLoader([{ dir: PACKAGED_SKILLS_DIR, source: "bundled" }]).loadEnabled(["notesmd-cli-daily"]);
    const [skill] = skills;
    if (!skill) throw new Error("packaged skill not loaded");
    return skill;
  }

  it("declares its six tools", () => {
    const tools = createSkillTools([loadSkill()], { allowScripts: true });

    expect(tools.map((tool) => tool.name)).toEqual([
      "notesmd_cli_search",
      "notesmd_cli_search_content",
      "notesmd_cli_create",
      "notesmd_cli_daily",
      "notesmd_cli_read_note",
      "notesmd_cli_update_daily",
    ]);
  });

  it("builds the update_daily command line", async () => {
    const skill = loadSkill();
    const execution = skill.descriptor?.execution.find((entry) => entry.tool === "notesmd_cli_update_daily");
    if (!execution) throw new Error("no update_daily execution entry");

    const argv = await buildArgv(
      execution,
      { date: "2026-02-25", content: "a\\nb", replace: true },
      { allowlist: new Allowlist(skill.descriptor?.allowlist), skillDir: skill.dir, allowScripts: true },
    );

    expect(execution.binary).toBe("notesmd-cli");
    expect(execution.subcommand).toBe("create");
    expect(argv).toEqual(["2026-02-25", "--content", "a\nb", "--overwrite"]);
  });
});
