import * as cron from 'node-cron';
import { ConfigError } from './utils/errors';
import { splitCommandLine } from './services/ProcessRunner';
import { DEFAULT_GITHUB_API_URL } from './services/GitHubReleaseSource';

export const SERVER_DEFAULTS = {
  port: 8000,
  host: '0.0.0.0',
  sourcesFile: 'sources.yaml',
  esptoolCommand: 'python -m esptool',
  flashBaudRate: 921600,
  flashAddress: '0x0',
  buildCommand: 'pio',
  githubApiUrl: DEFAULT_GITHUB_API_URL,
  refreshCron: '0 */6 * * *',
  refreshOnStart: true,
  sessionGraceMs: 10 * 60 * 1000,
  replayLimit: 2000,
  diagnosticTimeoutMs: 120000,
  killGraceMs: 5000,
} as const;

export interface ServerConfig {
  port: number;
  host: string;
  sourcesFile: string;
  fetchDir?: string;
  esptoolCommand: string[];
  flashBaudRate: number;
  flashAddress: string;
  buildCommand: string[];
  githubToken?: string;
  githubApiUrl: string;
  refreshCron: string;
  refreshOnStart: boolean;
  sessionGraceMs: number;
  replayLimit: number;
  diagnosticTimeoutMs: number;
  killGraceMs: number;
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, issues: string[], min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (!/^\s*\d+\s*$/.test(raw) || Number.isNaN(value) || value < min) {
    issues.push(`${key} must be an integer >= ${min} (got "${raw}")`);
    return fallback;
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean, issues: string[]): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  issues.push(`${key} must be true or false (got "${raw}")`);
  return fallback;
}

function readCommand(env: NodeJS.ProcessEnv, key: string, fallback: string, issues: string[]): string[] {
  const args = splitCommandLine(env[key] ?? fallback);
  if (args.length === 0) {
    issues.push(`${key} must not be empty`);
    return splitCommandLine(fallback);
  }
  return args;
}

/** Reads the server settings from the environment once, at startup. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const issues: string[] = [];

  const refreshCron = env.REFRESH_CRON ?? SERVER_DEFAULTS.refreshCron;
  if (refreshCron !== '' && !cron.validate(refreshCron)) {
    issues.push(`REFRESH_CRON is not a valid cron expression (got "${refreshCron}")`);
  }

  const flashAddress = env.FLASH_ADDRESS || SERVER_DEFAULTS.flashAddress;
  if (!/^0x[0-9a-fA-F]+$/.test(flashAddress)) {
    issues.push(`FLASH_ADDRESS must be a hexadecimal address (got "${flashAddress}")`);
  }

  const config: ServerConfig = {
    port: readInt(env, 'PORT', SERVER_DEFAULTS.port, issues),
    host: env.HOST || SERVER_DEFAULTS.host,
    sourcesFile: env.SOURCES_FILE || SERVER_DEFAULTS.sourcesFile,
    fetchDir: env.FETCH_DIR || undefined,
    esptoolCommand: readCommand(env, 'ESPTOOL_COMMAND', SERVER_DEFAULTS.esptoolCommand, issues),
    flashBaudRate: readInt(env, 'FLASH_BAUD_RATE', SERVER_DEFAULTS.flashBaudRate, issues, 1),
    flashAddress,
    buildCommand: readCommand(env, 'BUILD_COMMAND', SERVER_DEFAULTS.buildCommand, issues),
    githubToken: env.GITHUB_TOKEN || undefined,
    githubApiUrl: env.GITHUB_API_URL || SERVER_DEFAULTS.githubApiUrl,
    refreshCron,
    refreshOnStart: readBool(env, 'REFRESH_ON_START', SERVER_DEFAULTS.refreshOnStart, issues),
    sessionGraceMs: readInt(env, 'SESSION_GRACE_MS', SERVER_DEFAULTS.sessionGraceMs, issues),
    replayLimit: readInt(env, 'REPLAY_LIMIT', SERVER_DEFAULTS.replayLimit, issues, 1),
    diagnosticTimeoutMs: readInt(env, 'DIAGNOSTIC_TIMEOUT_MS', SERVER_DEFAULTS.diagnosticTimeoutMs, issues),
    killGraceMs: readInt(env, 'KILL_GRACE_MS', SERVER_DEFAULTS.killGraceMs, issues),
  };

  if (issues.length > 0) {
    throw new ConfigError('Invalid server configuration', issues);
  }
  return config;
}
