import {
  S3Client,
  PutObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
} from "@aws-sdk/client-s3";

// Create a singleton S3 client for the upload hand-over bucket
let s3Client: S3Client | null = null;

export function getStorageClient() {
  if (!s3Client) {
    const endpoint = process.env.STORAGE_ENDPOINT;
    const region = process.env.STORAGE_REGION;
    const accessKeyId = process.env.STORAGE_ACCESS_KEY_ID;
    const secretAccessKey = process.env.STORAGE_SECRET_ACCESS_KEY;

    if (!endpoint || !region || !accessKeyId || !secretAccessKey) {
      throw new Error("Missing object storage environment variables");
    }

    s3Client = new S3Client({
      forcePathStyle: true,
      region: region,
      endpoint: endpoint,
      credentials: {
        accessKeyId: accessKeyId,
        secretAccessKey: secretAccessKey,
      },
    });
  }

  return s3Client;
}

export function getBucket() {
  const bucket = process.env.STORAGE_BUCKET;
  if (!bucket) {
    throw new Error("STORAGE_BUCKET environment variable is not set");
  }
  return bucket;
}

/**
 * Upload a file to object storage
 */
export async function uploadFile(
  key: string,
  buffer: Buffer,
  contentType: string,
  originalFilename?: string
) {
  const client = getStorageClient();
  const bucket = getBucket();

  const command = new PutObjectCommand({
    Bucket: bucket,
    Key: key,
    Body: buffer,
    ContentType: contentType,
    Metadata: originalFilename
      ? {
          "original-filename": encodeURIComponent(originalFilename),
        }
      : undefined,
  });

  await client.send(command);

  return { bucket, key };
}

/**
 * Download a file from object storage
 */
export async function downloadFile(key: string): Promise<Buffer> {
  const client = getStorageClient();
  const bucket = getBucket();

  const command = new GetObjectCommand({
    Bucket: bucket,
    Key: key,
  });

  const response = await client.send(command);

  if (!response.Body) {
    throw new Error(`File not found: ${key}`);
  }

  return Buffer.from(await response.Body.transformToByteArray());
}

/**
 * Delete a file from object storage
 */
export async function deleteFile(key: string) {
  const client = getStorageClient();
  const bucket = getBucket();

  const command = new DeleteObjectCommand({
    Bucket: bucket,
    Key: key,
  });

  await client.send(command);

  return { bucket, key, deleted: true };
}

export interface StoredObject {
  key: string;
  lastModified: Date | undefined;
}

/**
 * List every object under a prefix, following continuation tokens
 */
export async function listFiles(prefix: string): Promise<StoredObject[]> {
  const client = getStorageClient();
  const bucket = getBucket();
  const objects: StoredObject[] = [];
  let continuationToken: string | undefined;

  do {
    const response = await client.send(
      new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken,
      })
    );

    for (const item of response.Contents ?? []) {
      if (item.Key) {
        objects.push({ key: item.Key, lastModified: item.LastModified });
      }
    }

    continuationToken = response.IsTruncated
      ? response.NextContinuationToken
      : undefined;
  } while (continuationToken);

  return objects;
}
