import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

vi.mock("chalk", () => {
  const identity = (s: string) => s;
  return {
    default: {
      level: 0,
      red: Object.assign(identity, { bold: identity }),
      green: identity,
      yellow: identity,
      cyan: identity,
      gray: identity,
      dim: identity,
      bold: identity,
    },
  };
});

import { registerStatusCommand, statusEntries } from "./status.js";
import { initContext, resetContext } from "../lib/cli-context.js";

describe("status command", () => {
  let root: string;
  let outputDir: string;
  let configPath: string;
  let consoleLogSpy: MockInstance;

  async function run(...args: string[]): Promise<void> {
    const argv = ["node", "test", "status", "--config", configPath, ...args];
    initContext(argv, {});
    const program = new Command();
    program.exitOverride();
    registerStatusCommand(program, { env: {} });
    await program.parseAsync(argv);
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "hospital-data-status-"));
    outputDir = join(root, "out");
    configPath = join(root, "config.yaml");
    await writeFile(configPath, `output:\n  dir: ${outputDir}\nlogging:\n  level: error\n`);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(root, { recursive: true, force: true });
  });

  it("lists entries sorted by filename and flags missing files", async () => {
    await mkdir(outputDir);
    await writeFile(join(outputDir, "b.csv"), "x\n");

    expect(statusEntries({ "b.csv": "2024-02-01", "a.csv": "2024-01-01" }, outputDir)).toEqual([
      { filename: "a.csv", modified: "2024-01-01", present: false },
      { filename: "b.csv", modified: "2024-02-01", present: true },
    ]);
  });

  it("explains that nothing has been synced yet", async () => {
    await run();

    expect(consoleLogSpy).toHaveBeenCalledWith(`No metadata at ${join(outputDir, "metadata.json")}.`);
    expect(process.exitCode).toBeUndefined();
  });

  it("prints the recorded snapshot as a table", async () => {
    await mkdir(outputDir);
    await writeFile(join(outputDir, "metadata.json"), JSON.stringify({ "general.csv": "2024-01-01" }));

    await run();

    expect(consoleLogSpy).toHaveBeenCalledWith(`Metadata: ${join(outputDir, "metadata.json")}`);
    const table = String(consoleLogSpy.mock.calls[1][0]);
    expect(table).toContain("general.csv");
    expect(table).toContain("missing");
  });

  it("reports a null stamp for files whose catalog entry had none", async () => {
    await mkdir(outputDir);
    await writeFile(join(outputDir, "metadata.json"), JSON.stringify({ "plain.csv": null }));
    await writeFile(join(outputDir, "plain.csv"), "x\n");

    await run("--json");

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output.data.entries).toEqual([{ filename: "plain.csv", modified: null, present: true }]);
  });

  it("prints JSON with --json", async () => {
    await mkdir(outputDir);
    await writeFile(join(outputDir, "metadata.json"), JSON.stringify({ "general.csv": "2024-01-01" }));
    await writeFile(join(outputDir, "general.csv"), "x\n");

    await run("--json");

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output).toEqual({
      success: true,
      data: {
        metadataFile: join(outputDir, "metadata.json"),
        exists: true,
        entries: [{ filename: "general.csv", modified: "2024-01-01", present: true }],
      },
    });
  });
});
