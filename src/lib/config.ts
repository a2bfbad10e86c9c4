/**
 * Application Configuration
 * Reads process.env (after dotenv) and validates it with zod
 */

import { z } from 'zod';

export const DEFAULT_ALLOWED_FILE_TYPES = [
  '.pdf',
  '.epub',
  '.mobi',
  '.azw3',
  '.cbz',
  '.cbr',
  '.fb2',
  '.txt',
  '.doc',
  '.docx',
  '.rtf',
  '.zip',
];

export interface RemoteConfig {
  baseUrl: string;
  apiToken: string;
  enabled: boolean;
  autoImport: boolean;
  retryAttempts: number;
  retryDelayMs: number;
  requestTimeoutMs: number;
  runTimeoutMs: number;
  defaultLibraryId?: number;
  defaultPathId?: number;
}

export interface AppConfig {
  port: number;
  allowedCallerIds: number[];
  storageRoot: string;
  allowedFileTypes: string[];
  maxFileSizeMB: number;
  preferencesFile: string;
  remote: RemoteConfig;
}

const callerIdList = z
  .string({ required_error: 'ALLOWED_CALLER_IDS is required' })
  .trim()
  .min(1, 'ALLOWED_CALLER_IDS is required')
  .transform((raw, ctx) => {
    const ids: number[] = [];
    for (const part of raw.split(',')) {
      const trimmed = part.trim();
      if (!/^-?\d+$/.test(trimmed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid caller id '${part}'`,
        });
        return z.NEVER;
      }
      const id = Number(trimmed);
      if (!Number.isSafeInteger(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `caller id '${trimmed}' is out of range`,
        });
        return z.NEVER;
      }
      ids.push(id);
    }
    return ids;
  });

const fileTypeList = z
  .string()
  .optional()
  .transform((raw) => {
    if (raw === undefined || raw.trim() === '') {
      return DEFAULT_ALLOWED_FILE_TYPES;
    }
    return raw
      .split(',')
      .map((ext) => ext.trim().toLowerCase())
      .filter((ext) => ext !== '');
  });

/**
 * Positive integer with a fallback; unparseable values fall back silently
 */
function positiveInt(fallback: number) {
  return z
    .string()
    .optional()
    .transform((raw) => {
      const parsed = raw === undefined ? NaN : Number.parseInt(raw, 10);
      return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
    });
}

function isHttpUrl(raw: string): boolean {
  try {
    const url = new URL(raw);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

const optionalId = z
  .string()
  .optional()
  .transform((raw) => {
    if (raw === undefined || raw.trim() === '') {
      return undefined;
    }
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
  });

const envSchema = z.object({
  PORT: positiveInt(3000),
  ALLOWED_CALLER_IDS: callerIdList,
  STORAGE_ROOT: z.string().trim().min(1).default('downloads'),
  ALLOWED_FILE_TYPES: fileTypeList,
  MAX_FILE_SIZE_MB: z.coerce
    .number({ invalid_type_error: 'MAX_FILE_SIZE_MB must be a number' })
    .int('MAX_FILE_SIZE_MB must be an integer')
    .positive('MAX_FILE_SIZE_MB must be positive')
    .default(20),
  PREFERENCES_FILE: z.string().trim().min(1).default('data/preferences.json'),
  REMOTE_API_URL: z
    .string()
    .trim()
    .default('')
    .refine((url) => url === '' || isHttpUrl(url), {
      message: 'REMOTE_API_URL must be an http(s) URL',
    })
    .transform((url) => url.replace(/\/+$/, '')),
  REMOTE_API_TOKEN: z.string().trim().default(''),
  REMOTE_AUTO_IMPORT: z.string().optional(),
  REMOTE_RETRY_ATTEMPTS: positiveInt(3),
  REMOTE_RETRY_DELAY_SECONDS: positiveInt(3),
  REMOTE_REQUEST_TIMEOUT_SECONDS: positiveInt(30),
  IMPORT_RUN_TIMEOUT_SECONDS: positiveInt(60),
  REMOTE_DEFAULT_LIBRARY_ID: optionalId,
  REMOTE_DEFAULT_PATH_ID: optionalId,
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build AppConfig from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration - ${problems}`);
  }

  const e = parsed.data;
  // Integration is only live with a token; auto-import follows unless overridden
  const enabled = e.REMOTE_API_TOKEN !== '' && e.REMOTE_API_URL !== '';
  const autoImport =
    e.REMOTE_AUTO_IMPORT === undefined || e.REMOTE_AUTO_IMPORT.trim() === ''
      ? enabled
      : e.REMOTE_AUTO_IMPORT.trim().toLowerCase() === 'true';

  const remote: RemoteConfig = {
    baseUrl: e.REMOTE_API_URL,
    apiToken: e.REMOTE_API_TOKEN,
    enabled,
    autoImport,
    retryAttempts: e.REMOTE_RETRY_ATTEMPTS,
    retryDelayMs: e.REMOTE_RETRY_DELAY_SECONDS * 1000,
    requestTimeoutMs: e.REMOTE_REQUEST_TIMEOUT_SECONDS * 1000,
    runTimeoutMs: e.IMPORT_RUN_TIMEOUT_SECONDS * 1000,
  };
  if (e.REMOTE_DEFAULT_LIBRARY_ID !== undefined) {
    remote.defaultLibraryId = e.REMOTE_DEFAULT_LIBRARY_ID;
  }
  if (e.REMOTE_DEFAULT_PATH_ID !== undefined) {
    remote.defaultPathId = e.REMOTE_DEFAULT_PATH_ID;
  }

  return {
    port: e.PORT,
    allowedCallerIds: e.ALLOWED_CALLER_IDS,
    storageRoot: e.STORAGE_ROOT,
    allowedFileTypes: e.ALLOWED_FILE_TYPES,
    maxFileSizeMB: e.MAX_FILE_SIZE_MB,
    preferencesFile: e.PREFERENCES_FILE,
    remote,
  };
}
