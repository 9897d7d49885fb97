import { basename } from "node:path";

export const UPLOAD_PREFIX = "uploads/";
export const UPLOAD_FILE_PREFIX = "upload_";

/**
 * Server-side upload names are unique per request, so two tasks never share
 * a file.
 */
export function buildUploadFileName(id: string, extension: string): string {
  return `${UPLOAD_FILE_PREFIX}${id}${extension.toLowerCase()}`;
}

export function buildUploadStorageKey(
  filePath: string,
  date: Date = new Date()
): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");

  return `${UPLOAD_PREFIX}${year}/${month}/${basename(filePath)}`;
}
