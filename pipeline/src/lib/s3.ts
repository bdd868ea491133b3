import { S3Client, GetObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';

export interface S3Location {
  bucket: string;
  key: string;
}

const S3_URI_RE = /^s3:\/\/([^/]+)\/(.+)$/;

// Parse "s3://bucket/key"; null for anything else
export function parseS3Uri(uri: string): S3Location | null {
  const match = S3_URI_RE.exec(uri);
  return match ? { bucket: match[1], key: match[2] } : null;
}

export function createS3Client(region: string): S3Client {
  return new S3Client({ region });
}

// Read an object as UTF-8 text; null when the key does not exist
export async function getObjectText(client: S3Client, { bucket, key }: S3Location): Promise<string | null> {
  try {
    const command = new GetObjectCommand({
      Bucket: bucket,
      Key: key,
    });
    const response = await client.send(command);
    return (await response.Body?.transformToString('utf-8')) ?? null;
  } catch (error: unknown) {
    if (error && typeof error === 'object' && 'name' in error && error.name === 'NoSuchKey') {
      return null;
    }
    throw error;
  }
}

// Upload object
export async function putObject(
  client: S3Client,
  { bucket, key }: S3Location,
  body: string,
  contentType: string
): Promise<void> {
  const command = new PutObjectCommand({
    Bucket: bucket,
    Key: key,
    Body: body,
    ContentType: contentType,
  });
  await client.send(command);
}
