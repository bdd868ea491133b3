import { readFile, rename, writeFile, unlink } from 'node:fs/promises';
import type { S3Client } from '@aws-sdk/client-s3';
import { config } from './config.js';
import { InputUnreadableError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { createS3Client, getObjectText, parseS3Uri, putObject } from './s3.js';

/**
 * Reads and writes whole text files addressed by local path or s3:// URI.
 */
export interface Storage {
  readText(location: string): Promise<string>;
  writeText(location: string, body: string, contentType: string): Promise<void>;
}

export function createStorage(region: string = config.region): Storage {
  let client: S3Client | null = null;
  const s3 = () => (client ??= createS3Client(region));

  return {
    async readText(location) {
      const s3Location = parseS3Uri(location);
      try {
        if (s3Location) {
          const text = await getObjectText(s3(), s3Location);
          if (text === null) {
            throw new InputUnreadableError(location, 'object does not exist');
          }
          return text;
        }
        return await readFile(location, 'utf-8');
      } catch (error) {
        if (error instanceof InputUnreadableError) throw error;
        throw new InputUnreadableError(location, errorMessage(error));
      }
    },

    async writeText(location, body, contentType) {
      const s3Location = parseS3Uri(location);
      if (s3Location) {
        await putObject(s3(), s3Location, body, contentType);
        return;
      }
      // Whole-file replace: readers never see a partially written run
      const tempPath = `${location}.${process.pid}.tmp`;
      try {
        await writeFile(tempPath, body, 'utf-8');
        await rename(tempPath, location);
      } catch (error) {
        await unlink(tempPath).catch((cleanupError: unknown) => {
          logger.debug({ error: cleanupError, tempPath }, 'Temp file cleanup failed');
        });
        throw error;
      }
    },
  };
}
