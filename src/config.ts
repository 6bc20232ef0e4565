import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

export interface Base58Config {
  alphabet?: string;
}

export const CONFIG_PATH = path.join(os.homedir(), '.base58', 'config.json');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the config file. A missing file is an empty config; anything else that
 * cannot be read as `{ "alphabet"?: string }` is an error.
 */
export function loadConfig(configPath: string = CONFIG_PATH): Base58Config {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid config file ${configPath}: ${msg}`);
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${configPath}: expected a JSON object`);
  }
  const { alphabet } = parsed;
  if (alphabet !== undefined && typeof alphabet !== 'string') {
    throw new Error(`Invalid config file ${configPath}: "alphabet" must be a string`);
  }
  return alphabet === undefined ? {} : { alphabet };
}

/**
 * Resolve a parameter with precedence: flag > env > config.
 */
export function resolve(
  flagValue: string | undefined,
  envVar: string | undefined,
  configValue: string | undefined,
): string | undefined {
  if (flagValue !== undefined) return flagValue;
  if (envVar !== undefined) {
    const val = process.env[envVar];
    if (val !== undefined && val !== '') return val;
  }
  return configValue;
}
