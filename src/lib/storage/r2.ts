import { GetObjectCommand, NoSuchKey, PutObjectCommand } from '@aws-sdk/client-s3';
import type { R2Config } from '../config';
import { getR2Client } from './client';

export async function uploadText(
  config: R2Config,
  key: string,
  body: string,
  contentType = 'text/csv'
): Promise<void> {
  const client = getR2Client(config);
  await client.send(
    new PutObjectCommand({
      Bucket: config.bucket,
      Key: key,
      Body: Buffer.from(body, 'utf-8'),
      ContentType: contentType,
    })
  );
}

/**
 * Download an object as UTF-8 text. Returns null when the key does not exist
 * (e.g. the very first run); other failures propagate.
 */
export async function downloadText(config: R2Config, key: string): Promise<string | null> {
  const client = getR2Client(config);
  try {
    const response = await client.send(
      new GetObjectCommand({
        Bucket: config.bucket,
        Key: key,
      })
    );

    if (!response.Body) return null;
    return await response.Body.transformToString('utf-8');
  } catch (error) {
    if (error instanceof NoSuchKey) return null;
    throw error;
  }
}
