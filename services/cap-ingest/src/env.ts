import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';
import { DEFAULT_USER_AGENT } from './http.js';

export interface StoreConfig {
  url: string;
  serviceRoleKey: string;
  table: string;
}

export interface SheetsConfig {
  serviceAccountFile: string;
  spreadsheetId: string;
  sheetTitle: string;
}

export interface EnvConfig {
  baseUrl: string;
  season: string;
  userAgent: string;
  requestTimeoutMs: number;
  requestGapMs: number;
  maxAttempts: number;
  debugSaveHtml: boolean;
  store: StoreConfig | null;
  sheets: SheetsConfig | null;
}

type EnvSource = Record<string, string | undefined>;

const DEFAULTS = {
  CAP_BASE_URL: 'https://www.spotrac.com/nfl/',
  CAP_SEASON: '2023',
  CAP_TABLE: 'cap_tracker',
  GOOGLE_SHEET_TITLE: 'players_cap_hits',
  CAP_REQUEST_TIMEOUT_MS: 15_000,
  CAP_REQUEST_GAP_MS: 1_000,
  CAP_MAX_ATTEMPTS: 3,
} as const;

const ENV_PATH = join(dirname(fileURLToPath(import.meta.url)), '..', '.env');

let cachedConfig: EnvConfig | undefined;

export function parseEnv(source: EnvSource): EnvConfig {
  const baseUrl = withTrailingSlash(readEnv(source, 'CAP_BASE_URL') ?? DEFAULTS.CAP_BASE_URL);
  const season = readEnv(source, 'CAP_SEASON') ?? DEFAULTS.CAP_SEASON;
  if (!/^\d{4}$/.test(season)) {
    throw new Error(`CAP_SEASON must be a four-digit year, got "${season}"`);
  }

  return {
    baseUrl,
    season,
    userAgent: readEnv(source, 'CAP_USER_AGENT') ?? DEFAULT_USER_AGENT,
    requestTimeoutMs: parsePositiveInt(source, 'CAP_REQUEST_TIMEOUT_MS', DEFAULTS.CAP_REQUEST_TIMEOUT_MS),
    requestGapMs: parsePositiveInt(source, 'CAP_REQUEST_GAP_MS', DEFAULTS.CAP_REQUEST_GAP_MS, { allowZero: true }),
    maxAttempts: parsePositiveInt(source, 'CAP_MAX_ATTEMPTS', DEFAULTS.CAP_MAX_ATTEMPTS),
    debugSaveHtml: parseBoolean(source.DEBUG_SAVE_HTML),
    store: parseStoreConfig(source),
    sheets: parseSheetsConfig(source),
  };
}

function parseStoreConfig(source: EnvSource): StoreConfig | null {
  const url = readEnv(source, 'SUPABASE_URL');
  const serviceRoleKey = readEnv(source, 'SUPABASE_SERVICE_ROLE_KEY');
  if (!url && !serviceRoleKey) {
    return null;
  }
  if (!url || !serviceRoleKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together');
  }
  return { url, serviceRoleKey, table: readEnv(source, 'CAP_TABLE') ?? DEFAULTS.CAP_TABLE };
}

function parseSheetsConfig(source: EnvSource): SheetsConfig | null {
  const serviceAccountFile = readEnv(source, 'GOOGLE_SERVICE_ACCOUNT_FILE');
  const spreadsheetId = readEnv(source, 'GOOGLE_SPREADSHEET_ID');
  if (!serviceAccountFile && !spreadsheetId) {
    return null;
  }
  if (!serviceAccountFile || !spreadsheetId) {
    throw new Error('GOOGLE_SERVICE_ACCOUNT_FILE and GOOGLE_SPREADSHEET_ID must be set together');
  }
  return {
    serviceAccountFile,
    spreadsheetId,
    sheetTitle: readEnv(source, 'GOOGLE_SHEET_TITLE') ?? DEFAULTS.GOOGLE_SHEET_TITLE,
  };
}

function readEnv(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (!value || !value.trim()) {
    return undefined;
  }
  return value.trim();
}

function parsePositiveInt(
  source: EnvSource,
  name: string,
  fallback: number,
  options?: { allowZero?: boolean },
): number {
  const raw = readEnv(source, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  const min = options?.allowZero ? 0 : 1;
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return ['1', 'true', 'yes', 'on'].includes(normalized);
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export function getEnv(): EnvConfig {
  if (!cachedConfig) {
    loadEnv({ path: ENV_PATH });
    cachedConfig = parseEnv(process.env);
  }
  return cachedConfig;
}
