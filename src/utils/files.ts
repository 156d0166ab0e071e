import axios from 'axios';
import fs from 'fs/promises';
import path from 'path';
import logger from '../logger';
import { readModelJson, weightShardPaths } from '../services/classifier/model-loader';

export class ArtifactNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArtifactNotFoundError';
  }
}

export async function downloadFileFromUrl(url: string, timeout = 60000): Promise<Buffer> {
  logger.info(`Downloading file from ${url}`);

  try {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout,
    });

    logger.info(`File downloaded successfully from ${url}`);

    return Buffer.from(response.data);
  } catch (err) {
    logger.error(`Failed to download file from ${url}: ${err}`);
    throw err;
  }
}

export function validateUrl(url: string) {
  try {
    return ['http:', 'https:'].includes(new URL(url).protocol);
  } catch {
    return false;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Returns `localPath` once the file is there, downloading it from `url`
 * first when it is missing.
 */
export async function ensureArtifact(
  localPath: string,
  url?: string,
  timeout?: number
): Promise<string> {
  if (await fileExists(localPath)) {
    logger.debug(`Using local artifact ${localPath}`);
    return localPath;
  }

  if (!url) {
    throw new ArtifactNotFoundError(
      `Artifact not found at ${localPath} and no download URL is configured`
    );
  }
  if (!validateUrl(url)) {
    throw new Error(`Invalid download URL for ${localPath}: ${url}`);
  }

  const data = await downloadFileFromUrl(url, timeout);
  await fs.mkdir(path.dirname(localPath), { recursive: true });
  await fs.writeFile(localPath, data);
  logger.info(`Artifact saved: ${localPath} (${data.byteLength} bytes)`);

  return localPath;
}

/**
 * Ensures model.json and every weight shard it lists are present next to
 * each other. Shard URLs are resolved relative to the model URL.
 */
export async function ensureModelArtifacts(
  modelJsonPath: string,
  modelUrl?: string,
  timeout?: number
): Promise<string> {
  await ensureArtifact(modelJsonPath, modelUrl, timeout);

  const directory = path.dirname(modelJsonPath);
  const shards = weightShardPaths(await readModelJson(modelJsonPath));

  for (const shard of shards) {
    const shardUrl = modelUrl ? new URL(shard, modelUrl).toString() : undefined;
    await ensureArtifact(path.join(directory, shard), shardUrl, timeout);
  }

  return modelJsonPath;
}
