import { createHash, randomUUID } from "node:crypto";
import { mkdir, readdir, rm, stat, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { buildUploadFileName, UPLOAD_FILE_PREFIX } from "./storagePaths";

export interface SavedUpload {
  filePath: string;
  contentHash: string;
  size: number;
}

export function hashContent(content: Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

export async function saveUpload(
  uploadDir: string,
  originalName: string,
  content: Buffer
): Promise<SavedUpload> {
  await mkdir(uploadDir, { recursive: true });

  const filePath = join(
    uploadDir,
    buildUploadFileName(randomUUID(), extname(originalName))
  );
  await writeFile(filePath, content);

  return {
    filePath,
    contentHash: hashContent(content),
    size: content.length,
  };
}

/**
 * Removes an upload. A file that is already gone is not an error.
 */
export async function removeUpload(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (error) {
    console.error(`[uploads] Failed to remove ${filePath}:`, error);
  }
}

export async function removeStaleUploads(
  uploadDir: string,
  maxAgeMs: number,
  now: number = Date.now()
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(uploadDir);
  } catch (error) {
    if (isMissingDirectory(error)) {
      return [];
    }
    throw error;
  }

  const cutoff = now - maxAgeMs;
  const removed: string[] = [];

  for (const entry of entries) {
    if (!entry.startsWith(UPLOAD_FILE_PREFIX)) {
      continue;
    }

    const filePath = join(uploadDir, entry);
    const stats = await stat(filePath).catch(() => null);
    if (stats && stats.isFile() && stats.mtimeMs < cutoff) {
      await removeUpload(filePath);
      removed.push(filePath);
    }
  }

  if (removed.length > 0) {
    console.log(`[uploads] Removed ${removed.length} stale upload(s)`);
  }

  return removed;
}

function isMissingDirectory(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}
