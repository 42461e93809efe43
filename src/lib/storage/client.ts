import { S3Client } from '@aws-sdk/client-s3';
import type { R2Config } from '../config';

const clients = new Map<string, S3Client>();

export function getR2Client(config: R2Config): S3Client {
  const cacheKey = `${config.accountId}:${config.accessKeyId}`;
  const cached = clients.get(cacheKey);
  if (cached) return cached;

  const client = new S3Client({
    region: 'auto',
    endpoint: `https://${config.accountId}.r2.cloudflarestorage.com`,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });

  clients.set(cacheKey, client);
  return client;
}
