import mongoose from 'mongoose';
import fs from 'fs';
import { describeError } from '../lib/errors';

const envCache = new Map<string, string>();

function getEnv(key: string, defaultValue?: string): string {
  const cached = envCache.get(key);
  if (cached !== undefined) {
    return cached;
  }

  const fileKey = `${key}_FILE`;
  const filePath = process.env[fileKey];
  let value: string | undefined;

  if (filePath) {
    try {
      value = fs.readFileSync(filePath, 'utf8').trim();
    } catch (err) {
      if (defaultValue === undefined) {
        throw new Error(`Required secret ${fileKey} could not be read: ${describeError(err)}`);
      }
    }
  }

  if (value === undefined) {
    value = process.env[key] || defaultValue;
  }

  if (value === undefined) {
    throw new Error(`Required environment variable ${key} is not set`);
  }

  envCache.set(key, value);
  return value;
}

function getNumber(key: string, defaultValue: string): number {
  const raw = getEnv(key, defaultValue);
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

function getFileStorage(): 'filesystem' | 'object' {
  const value = getEnv('FILE_STORAGE', 'filesystem');
  if (value !== 'filesystem' && value !== 'object') {
    throw new Error(`FILE_STORAGE must be "filesystem" or "object", got "${value}"`);
  }
  return value;
}

export async function connectDatastores(): Promise<void> {
  const mongoUri = getEnv('MONGO_URI', 'mongodb://localhost:27017/idp');
  if (mongoose.connection.readyState === 0) {
    await mongoose.connect(mongoUri);
  }
}

export const config = {
  port: getNumber('PORT', '4000'),
  adminSecretToken: getEnv('ADMIN_SECRET_TOKEN'),
  // Hours a user agreement stays valid; 0 keeps it forever
  agreementValidForHours: getNumber('SAML_IDP_USER_AGREEMENT_VALID_FOR', '0'),
  metadataHttpTimeout: getNumber('METADATA_HTTP_TIMEOUT', '10000'),
  persistentIdMaxAttempts: getNumber('PERSISTENT_ID_MAX_ATTEMPTS', '5'),
  fileStorage: getFileStorage(),
  mediaRoot: getEnv('MEDIA_ROOT', './media'),
  mediaUrl: getEnv('MEDIA_URL', '/media/'),
  objectStorageBaseUrl: getEnv('OBJECT_STORAGE_BASE_URL', '')
};

export type AppConfig = typeof config;
