/**
 * Filesystem operations on the artifact store.
 *
 * Downloads never write to the final path directly. A transfer streams into a
 * temporary sibling file which is renamed into place only once it has been
 * verified, so an interrupted or rejected transfer leaves nothing at the
 * final path.
 */

import { access, mkdir, open, rename, rm } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { constants } from "node:fs";

export const PDF_SIGNATURE = "%PDF";

export async function artifactExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a topic directory. Creating one that already exists is not an error.
 */
export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

/**
 * Unique temporary path next to the final one, so the later rename stays on
 * the same filesystem.
 */
export function temporaryPathFor(finalPath: string): string {
  return `${finalPath}.${randomBytes(4).toString("hex")}.part`;
}

/**
 * Move a verified temporary file onto its final path.
 */
export async function commitArtifact(tempPath: string, finalPath: string): Promise<void> {
  await rename(tempPath, finalPath);
}

/**
 * Remove a temporary file. A file that is already gone is ignored.
 */
export async function discardArtifact(tempPath: string): Promise<void> {
  await rm(tempPath, { force: true });
}

/**
 * Read the first bytes of a file.
 */
export async function readLeadingBytes(path: string, length: number): Promise<Buffer> {
  const handle = await open(path, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

export async function hasPdfSignature(path: string): Promise<boolean> {
  const head = await readLeadingBytes(path, PDF_SIGNATURE.length);
  return head.toString("latin1") === PDF_SIGNATURE;
}
