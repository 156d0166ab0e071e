import { LogLevel } from '../types/config';

export interface Config {
  port: number;
  logLevel: LogLevel;
  runningMode: string;
  bodySizeLimit: string;
  maxUploadBytes: number;
  modelPath: string;
  modelUrl?: string;
  centroidsPath: string;
  centroidsUrl?: string;
  corsOrigin: string | string[];
  downloadTimeoutMs: number;
}

const parseCorsOrigin = (value: string | undefined): string | string[] => {
  if (!value || value.trim() === '*') {
    return '*';
  }

  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return origins.length === 1 ? origins[0] : origins;
};

export const getConfig = (): Readonly<Config> => {
  return Object.freeze({
    port: Number.parseInt(process.env.PORT || '5000'),
    logLevel: (process.env.LOG_LEVEL || 'debug') as LogLevel,
    runningMode: process.env.MODE || '',
    bodySizeLimit: process.env.BODY_SIZE_LIMIT || '50mb',
    maxUploadBytes: Number.parseInt(process.env.MAX_UPLOAD_BYTES || `${50 * 1024 * 1024}`),
    modelPath: process.env.MODEL_PATH || 'models/soil-classifier/model.json',
    modelUrl: process.env.MODEL_URL || undefined,
    centroidsPath: process.env.CENTROIDS_PATH || 'models/centroids.json',
    centroidsUrl: process.env.CENTROIDS_URL || undefined,
    corsOrigin: parseCorsOrigin(process.env.CORS_ORIGIN),
    downloadTimeoutMs: Number.parseInt(process.env.DOWNLOAD_TIMEOUT_MS || '60000'),
  });
};
