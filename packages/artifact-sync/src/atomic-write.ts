import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { getErrorMessage } from "@cubelaunch/errors";

/**
 * Writes a file so that readers only ever see the old or the complete new content.
 *
 * Missing parent directories are created. Bytes go to a sibling temp file
 * that is renamed over the destination; the temp file is removed on failure.
 */
export async function atomicWriteFile(filePath: string, content: Uint8Array): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tmp = `${filePath}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await writeFile(tmp, content);
    await rename(tmp, filePath);
  } catch (error) {
    await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
      console.warn(`[AtomicWrite] Failed to remove ${tmp}: ${getErrorMessage(cleanupError)}`);
    });
    throw error;
  }
}
