// Configuration loading - defaults, optional project config file, env overrides

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Config } from '../types.js';
import { errorMessage, logWarn } from './log.js';

export const STATE_DIR = '.docnav';
const CONFIG_FILE = 'config.json';
const INDEX_FILE = 'index.json';

type FileConfig = Partial<Omit<Config, 'root'>>;

export function defaultConfig(root: string): Config {
  return {
    root,
    sources: ['docs', STATE_DIR],
    extensions: ['.md', '.txt', '.rst', '.py', '.js', '.ts', '.json'],
    structuredExtensions: ['.md', '.txt', '.rst'],
    excludePaths: ['node_modules', '.git', '__pycache__', 'archive'],
    indexPath: join(root, STATE_DIR, INDEX_FILE),
    searchTopK: 5,
    previewChars: 300,
    wholeDocumentCap: 5000,
  };
}

/** All keys a config file may set. */
export const KNOWN_KEYS = new Set<string>([
  'sources',
  'extensions',
  'structuredExtensions',
  'excludePaths',
  'indexPath',
  'searchTopK',
  'previewChars',
  'wholeDocumentCap',
]);

type NumericKey = 'searchTopK' | 'previewChars' | 'wholeDocumentCap';
type StringArrayKey = 'sources' | 'extensions' | 'structuredExtensions' | 'excludePaths';

const NUMERIC_RANGES: Record<NumericKey, [number, number]> = {
  searchTopK: [1, 1000],
  previewChars: [0, 10000],
  wholeDocumentCap: [100, 1000000],
};

const STRING_ARRAY_FIELDS = new Set<string>([
  'sources',
  'extensions',
  'structuredExtensions',
  'excludePaths',
]);

function isNumericKey(key: string): key is NumericKey {
  return Object.hasOwn(NUMERIC_RANGES, key);
}

function isStringArrayKey(key: string): key is StringArrayKey {
  return STRING_ARRAY_FIELDS.has(key);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export function validateConfig(raw: object): { config: FileConfig; warnings: string[] } {
  const warnings: string[] = [];
  const config: FileConfig = {};

  for (const [key, entry] of Object.entries(raw)) {
    const value: unknown = entry;
    if (!KNOWN_KEYS.has(key)) {
      warnings.push(`Unknown config key "${key}" — ignoring`);
      continue;
    }

    if (key === 'indexPath') {
      if (typeof value !== 'string' || value.length === 0) {
        warnings.push(`Config key "${key}" should be a non-empty string — using default`);
        continue;
      }
      config.indexPath = value;
    } else if (isStringArrayKey(key)) {
      if (!isStringArray(value)) {
        warnings.push(`Config key "${key}" should be an array of strings — using default`);
        continue;
      }
      config[key] = value;
    } else if (isNumericKey(key)) {
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        warnings.push(`Config key "${key}" should be an integer — using default`);
        continue;
      }
      const [min, max] = NUMERIC_RANGES[key];
      if (value < min || value > max) {
        warnings.push(`Config key "${key}" value ${value} is out of range [${min}, ${max}] — using default`);
        continue;
      }
      config[key] = value;
    }
  }

  return { config, warnings };
}

/** Environment variables that override config fields. */
export const ENV_OVERRIDES: Record<string, 'indexPath'> = {
  DOCNAV_INDEX_PATH: 'indexPath',
};

export function applyEnvOverrides(config: Config): Config {
  const result = { ...config };
  for (const [envVar, field] of Object.entries(ENV_OVERRIDES)) {
    const value = process.env[envVar];
    if (value === undefined || value === '') continue;
    result[field] = resolve(config.root, value);
  }
  return result;
}

export function getConfigPath(root: string): string {
  return join(root, STATE_DIR, CONFIG_FILE);
}

function readConfigFile(path: string): FileConfig {
  if (!existsSync(path)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      logWarn('config', `Config file ${path} is not a JSON object — using defaults`);
      return {};
    }
    const { config, warnings } = validateConfig(parsed);
    for (const w of warnings) {
      logWarn('config', w);
    }
    return config;
  } catch (err) {
    logWarn('config', `Cannot read config file ${path} — using defaults`, { error: errorMessage(err) });
    return {};
  }
}

let rootOverride: string | undefined;

export function setRootOverride(dir: string): void {
  rootOverride = dir;
}

export function loadConfig(root: string = rootOverride ?? process.cwd()): Config {
  const absoluteRoot = resolve(root);
  const defaults = defaultConfig(absoluteRoot);
  const fromFile = readConfigFile(getConfigPath(absoluteRoot));

  const config: Config = { ...defaults, ...fromFile };
  if (fromFile.indexPath) {
    config.indexPath = resolve(absoluteRoot, fromFile.indexPath);
  }

  return applyEnvOverrides(config);
}
