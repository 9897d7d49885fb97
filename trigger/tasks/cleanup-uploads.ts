import { schedules } from "@trigger.dev/sdk";
import { getConfig } from "../config";
import { deleteFile, listFiles, type StoredObject } from "../utils/storage";
import { UPLOAD_PREFIX } from "../utils/storagePaths";

// ============================================================================
// SCHEDULED TASK: CLEAN UP STALE UPLOADS
// ============================================================================

export function selectStaleObjects(
  objects: StoredObject[],
  maxAgeMs: number,
  now: number = Date.now()
): StoredObject[] {
  const cutoff = now - maxAgeMs;
  return objects.filter(
    object =>
      object.lastModified !== undefined &&
      object.lastModified.getTime() < cutoff
  );
}

/**
 * Uploads normally leave storage when their analysis finishes; this sweeps
 * the ones whose run never started or crashed before cleanup.
 */
export const cleanupStaleUploads = schedules.task({
  id: "cleanup-stale-uploads",
  cron: "0 * * * *", // Hourly
  run: async () => {
    const taskId = "cleanup-stale-uploads";
    const maxAgeMs = getConfig().UPLOAD_RETENTION_MS;

    console.log(`[${taskId}] Listing objects under ${UPLOAD_PREFIX}...`);
    const objects = await listFiles(UPLOAD_PREFIX);
    const stale = selectStaleObjects(objects, maxAgeMs);
    console.log(
      `[${taskId}] ${stale.length} of ${objects.length} object(s) older than ${maxAgeMs / 60000} min`
    );

    let removed = 0;
    for (const object of stale) {
      try {
        await deleteFile(object.key);
        removed += 1;
      } catch (error) {
        console.error(`[${taskId}] Failed to delete ${object.key}:`, error);
      }
    }

    console.log(`[${taskId}] ✓ Removed ${removed} stale upload(s)`);
    return { scanned: objects.length, removed };
  },
});
