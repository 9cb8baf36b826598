import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // Uploads
  maxFileSize: number;
  maxUploadFiles: number;

  // Editing defaults
  defaultAnchor: string;

  version: string;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function readPackageVersion(): string {
  try {
    const content = fs.readFileSync(path.resolve(__dirname, '../../package.json'), 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (parsed && typeof parsed === 'object' && 'version' in parsed) {
      return String(parsed.version);
    }
  } catch (error) {
    console.error('Failed to read package version:', error);
  }
  return '0.0.0';
}

export function loadConfig(): Config {
  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // Uploads
    maxFileSize: getEnvNumber('MAX_FILE_SIZE', 5 * 1024 * 1024), // 5MB
    maxUploadFiles: getEnvNumber('MAX_UPLOAD_FILES', 50),

    // Editing defaults
    defaultAnchor: getEnvString('DEFAULT_ANCHOR', '00:00:00,000'),

    version: readPackageVersion(),
  };
}

export const config = loadConfig();
