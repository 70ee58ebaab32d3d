import { mkdir, rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";

let counter = 0;

function tempPathFor(targetPath: string): string {
  counter += 1;
  return join(dirname(targetPath), `.${basename(targetPath)}.${process.pid}.${counter}.tmp`);
}

/**
 * Write a file so readers see either the old content or the new one.
 * Content goes to a temp file in the same directory, then a rename
 * replaces the target. On failure the temp file is removed and the
 * target is left as it was.
 */
export async function writeFileAtomic(targetPath: string, content: string): Promise<void> {
  await mkdir(dirname(targetPath), { recursive: true });
  const tempPath = tempPathFor(targetPath);

  try {
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, targetPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
