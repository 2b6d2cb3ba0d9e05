import fs from 'fs';
import path from 'path';
import { errorMessage } from '../common/errors';
import { logWarn } from './logger';

export interface AppConfig {
  address: string;
  port: number;
  pollIntervalMs: number;
  waitIntervalMs: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  speed: number;
  autoReverse: boolean;
  autoScreen: boolean;
  historySize: number;
  catalogPath: string;
}

export const defaultConfig: AppConfig = {
  address: '169.254.1.1',
  port: 3000,
  pollIntervalMs: 5000,
  waitIntervalMs: 2000,
  connectTimeoutMs: 1000,
  commandTimeoutMs: 5000,
  speed: 6,
  autoReverse: true,
  autoScreen: true,
  historySize: 300,
  catalogPath: path.resolve(__dirname, '..', '..', 'data', 'catalog.json')
};

type Env = Record<string, string | undefined>;

const NUMBER_KEYS = [
  'port',
  'pollIntervalMs',
  'waitIntervalMs',
  'connectTimeoutMs',
  'commandTimeoutMs',
  'speed',
  'historySize'
] as const;

const BOOLEAN_KEYS = ['autoReverse', 'autoScreen'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function readBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === '1' || value === 'true') {
    return true;
  }
  if (value === '0' || value === 'false') {
    return false;
  }
  return undefined;
}

function sanitize(raw: Record<string, unknown>): Partial<AppConfig> {
  const result: Partial<AppConfig> = {};
  if (typeof raw.address === 'string' && raw.address) {
    result.address = raw.address;
  }
  if (typeof raw.catalogPath === 'string' && raw.catalogPath) {
    result.catalogPath = raw.catalogPath;
  }
  for (const key of NUMBER_KEYS) {
    const value = readNumber(raw[key]);
    if (value !== undefined) {
      result[key] = value;
    }
  }
  for (const key of BOOLEAN_KEYS) {
    const value = readBoolean(raw[key]);
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function readConfigFile(filePath: string): Partial<AppConfig> {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!isRecord(parsed)) {
      logWarn('config_file_ignored', { filePath, reason: 'not a JSON object' });
      return {};
    }
    return sanitize(parsed);
  } catch (error) {
    logWarn('config_file_unreadable', { filePath, error: errorMessage(error) });
    return {};
  }
}

function fromEnv(env: Env): Partial<AppConfig> {
  return sanitize({
    address: env.MOUNT_ADDRESS,
    port: env.PORT,
    pollIntervalMs: env.MOUNT_POLL_INTERVAL_MS,
    waitIntervalMs: env.MOUNT_WAIT_INTERVAL_MS,
    connectTimeoutMs: env.MOUNT_CONNECT_TIMEOUT_MS,
    commandTimeoutMs: env.MOUNT_COMMAND_TIMEOUT_MS,
    speed: env.MOUNT_SPEED,
    autoReverse: env.MOUNT_AUTO_REVERSE,
    autoScreen: env.MOUNT_AUTO_SCREEN,
    historySize: env.MOUNT_HISTORY_SIZE,
    catalogPath: env.MOUNT_CATALOG
  });
}

/** Defaults, then the JSON file named by `MOUNT_CONFIG`, then `MOUNT_*` variables. */
export function loadConfig(env: Env = process.env): AppConfig {
  const file = env.MOUNT_CONFIG ? readConfigFile(env.MOUNT_CONFIG) : {};
  return { ...defaultConfig, ...file, ...fromEnv(env) };
}
