import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type CliHarness, createCliHarness, genericConfig } from "./helpers/cliHarness";

describe("taskbranch start and list", () => {
  let cli: CliHarness;

  beforeEach(async () => {
    cli = await createCliHarness();
  });

  afterEach(async () => {
    await cli.cleanup();
  });

  it("creates tasks, switches between them and lists them", async () => {
    expect(await cli.run(["list"])).toEqual({ code: 0, stdout: "", stderr: "" });

    const first = await cli.run(["start", "issue-1"]);
    expect(first.code).toBe(0);
    expect(first.stdout).toBe("Creating new task issue-1\n");
    expect(cli.store.head).toBe("issue-1");
    cli.store.commit();
    expect(cli.store.branches.has("issue-1")).toBe(true);

    const second = await cli.run(["start", "issue-2"]);
    expect(second.stdout).toBe("Creating new task issue-2\n");
    expect(cli.store.head).toBe("issue-2");

    const back = await cli.run(["start", "issue-1"]);
    expect(back.stdout).toBe("Switching to existing task issue-1\n");
    expect(cli.store.head).toBe("issue-1");

    await cli.writeConfig(["systems:", "  - {name: Issues, type: plain, patterns: ['issue-\\d+']}"]);
    expect((await cli.run(["list"])).stdout).toBe("issue-1\nissue-2\n");
  });

  it("starting the same task twice leaves one branch", async () => {
    cli.store.commit();
    await cli.run(["start", "issue-1"]);
    const again = await cli.run(["start", "issue-1"]);
    expect(again.stdout).toContain("Switching");
    expect(Array.from(cli.store.branches.keys()).filter((name) => name === "issue-1")).toHaveLength(
      1,
    );
  });

  it("installs the commit hook for tracked tasks", async () => {
    await cli.writeConfig(genericConfig);
    const hookPath = path.join(cli.repoRoot, ".git", "hooks", "prepare-commit-msg");
    expect(await fs.pathExists(hookPath)).toBe(false);

    const result = await cli.run(["start", "generic-1"]);

    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      "Creating new task generic-1\nTracked by Generic\nInstalling commit hook\n",
    );
    expect(await fs.pathExists(hookPath)).toBe(true);
  });

  it("warns instead of replacing another prepare-commit-msg hook", async () => {
    await cli.writeConfig(genericConfig);
    const hookPath = path.join(cli.repoRoot, ".git", "hooks", "prepare-commit-msg");
    await fs.outputFile(hookPath, "#!/bin/sh\n");

    const result = await cli.run(["start", "generic-1"]);

    expect(result.code).toBe(0);
    expect(result.stderr).toBe(`warn ${hookPath} exists and was left untouched\n`);
    expect(await fs.readFile(hookPath, "utf8")).toBe("#!/bin/sh\n");
  });

  it("exits non-zero when git refuses the switch", async () => {
    cli.store.commit();
    cli.store.setBranch("issue-2", "master");
    cli.store.dirty = true;
    const result = await cli.run(["start", "issue-2"]);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe(
      "error: Your local changes to the following files would be overwritten by checkout\n",
    );
  });

  it("fails when the named config file is missing", async () => {
    const missing = path.join(cli.tempDir, "absent.yml");
    const result = await cli.run(["--config-file", missing, "list"]);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe(`${missing}: config file not found\n`);
  });

  it("reports a malformed config", async () => {
    await cli.writeConfig(["systems:", "  - name: Broken", "    type: generic", "    patterns: [x]"]);
    const result = await cli.run(["list"]);
    expect(result.code).toBe(1);
    expect(result.stderr).toContain("System 'Broken' of type generic requires a command");
  });
});
