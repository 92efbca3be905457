// lib/draft/fs.ts
import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { WriteError } from "./errors";

/**
 * Write via a sibling temp file + rename, so the target is either the old file,
 * the complete new file, or absent. Never half-written.
 */
export async function writeFileAtomic(target: string, contents: string): Promise<void> {
  const dir = path.dirname(target);
  const tmp = path.join(
    dir,
    `.${path.basename(target)}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`
  );

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tmp, contents, "utf8");
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
      console.warn("[write] temp file left behind", { tmp, cleanupErr });
    });
    throw new WriteError(target, { cause: err });
  }
}
