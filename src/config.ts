import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { error, warn } from './utils/logger.js';

export interface Config {
  rotation: boolean;
  endPosition: boolean;
  debug: boolean;
}

const defaultConfig: Config = {
  rotation: false,
  endPosition: false,
  debug: false,
};

export const CONFIG_PATH = path.join(os.homedir(), '.config', 'cursorvec', 'config.json');

const CONFIG_KEYS = [
  'rotation',
  'endPosition',
  'debug',
] as const satisfies readonly (keyof Config)[];

const ENV_KEYS: Record<keyof Config, string> = {
  rotation: 'CURSORVEC_ROTATION',
  endPosition: 'CURSORVEC_END_POSITION',
  debug: 'CURSORVEC_DEBUG',
};

/**
 * Parse an on/off environment value. Returns null for anything unrecognized.
 */
export function parseBooleanFlag(value: string | undefined): boolean | null {
  switch (value?.trim().toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      return null;
  }
}

function readConfigFile(configPath: string): Record<string, unknown> | null {
  if (!fs.existsSync(configPath)) return null;
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    warn(`Ignoring config file ${configPath}: expected a JSON object`);
  } catch (err) {
    error(`Ignoring config file ${configPath}`, err);
  }
  return null;
}

/**
 * Defaults, then the JSON config file, then CURSORVEC_* environment overrides.
 */
export function loadConfig(
  configPath: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const config = { ...defaultConfig };

  const fileConfig = readConfigFile(configPath);
  if (fileConfig) {
    for (const key of CONFIG_KEYS) {
      const value = fileConfig[key];
      if (typeof value === 'boolean') config[key] = value;
    }
  }

  for (const key of CONFIG_KEYS) {
    const raw = env[ENV_KEYS[key]];
    if (raw === undefined) continue;
    const flag = parseBooleanFlag(raw);
    if (flag === null) {
      warn(`Ignoring ${ENV_KEYS[key]}=${raw}: expected 1, 0, true or false`);
    } else {
      config[key] = flag;
    }
  }

  return config;
}
