import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { writeFileAtomic } from "./atomic-write.js";

describe("writeFileAtomic", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hospital-data-atomic-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates missing parent directories", async () => {
    const target = join(dir, "nested", "out.csv");

    await writeFileAtomic(target, "a,b\n");

    await expect(readFile(target, "utf-8")).resolves.toBe("a,b\n");
  });

  it("replaces existing content and leaves no temp files", async () => {
    const target = join(dir, "out.csv");
    await writeFile(target, "old\n");

    await writeFileAtomic(target, "new\n");

    await expect(readFile(target, "utf-8")).resolves.toBe("new\n");
    await expect(readdir(dir)).resolves.toEqual(["out.csv"]);
  });

  it("keeps the previous file and cleans up when the rename fails", async () => {
    // A directory at the target path makes the rename fail
    const target = join(dir, "blocked");
    await mkdir(join(target, "inner"), { recursive: true });

    await expect(writeFileAtomic(target, "data")).rejects.toThrow();

    expect((await readdir(dir)).sort()).toEqual(["blocked"]);
    await expect(readdir(target)).resolves.toEqual(["inner"]);
  });
});
