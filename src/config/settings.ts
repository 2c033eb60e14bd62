/**
 * Settings resolution for uptime-sync
 *
 * ## API key resolution order
 *
 * 1. Explicit option (`--api-key`)
 * 2. UPTIMEROBOT_API_KEY environment variable
 * 3. ~/.uptime-sync/settings.json
 *
 * ## Base URL resolution order
 *
 * 1. Explicit option (`--base-url`)
 * 2. UPTIMEROBOT_API_URL environment variable
 * 3. ~/.uptime-sync/settings.json
 * 4. https://api.uptimerobot.com/v2/
 *
 * The settings file looks like:
 * {
 *   "apiKey": "...",
 *   "baseUrl": "https://api.uptimerobot.com/v2/"
 * }
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { SettingsError, errorMessage } from '../errors.js';
import { DEFAULT_BASE_URL } from '../api/client.js';
import { isRecord } from '../api/codec.js';

export const SETTINGS_DIR = '.uptime-sync';
export const SETTINGS_FILE = 'settings.json';

export interface SettingsOptions {
  apiKey?: string;
  baseUrl?: string;
}

export interface ResolvedSettings {
  apiKey: string;
  baseUrl: string;
  /** Where the API key came from */
  apiKeySource: 'option' | 'env' | 'file';
}

interface SettingsFile {
  apiKey?: string;
  baseUrl?: string;
}

export function settingsPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, SETTINGS_DIR, SETTINGS_FILE);
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Read the settings file. A missing file is empty settings; an unreadable or
 * malformed one is an error.
 */
export function readSettingsFile(filePath: string): SettingsFile {
  if (!fs.existsSync(filePath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new SettingsError(`Cannot read settings file ${filePath}: ${errorMessage(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new SettingsError(`Settings file ${filePath} must contain a JSON object`);
  }

  return { apiKey: nonEmpty(parsed.apiKey), baseUrl: nonEmpty(parsed.baseUrl) };
}

/**
 * Resolve the API key and base URL
 */
export function resolveSettings(
  options: SettingsOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): ResolvedSettings {
  const filePath = settingsPath(homeDir);
  const file = readSettingsFile(filePath);

  const baseUrl =
    nonEmpty(options.baseUrl) ??
    nonEmpty(env.UPTIMEROBOT_API_URL) ??
    file.baseUrl ??
    DEFAULT_BASE_URL;

  const fromOption = nonEmpty(options.apiKey);
  if (fromOption) return { apiKey: fromOption, baseUrl, apiKeySource: 'option' };

  const fromEnv = nonEmpty(env.UPTIMEROBOT_API_KEY);
  if (fromEnv) return { apiKey: fromEnv, baseUrl, apiKeySource: 'env' };

  if (file.apiKey) return { apiKey: file.apiKey, baseUrl, apiKeySource: 'file' };

  throw new SettingsError(
    `No Uptime Robot API key found. Pass --api-key, set UPTIMEROBOT_API_KEY, or add "apiKey" to ${filePath}`
  );
}
