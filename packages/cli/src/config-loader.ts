import { parseConfig } from '@seedling/shared';
import type { Config } from '@seedling/shared';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

export const DEFAULT_CONFIG_FILE = 'seedling.json';

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function readJson(path: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${path}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  let raw: Record<string, unknown> = {};

  // 1. Try configPath if provided, else look for seedling.json in CWD
  if (configPath) {
    const resolved = resolve(configPath);
    if (!existsSync(resolved)) {
      throw new Error(`Config file not found: ${resolved}`);
    }
    raw = readJson(resolved);
  } else {
    const defaultPath = resolve(DEFAULT_CONFIG_FILE);
    if (existsSync(defaultPath)) {
      raw = readJson(defaultPath);
    }
  }

  // 2. Build nested structure, applying env var overrides
  const notion = section(raw, 'notion');
  const properties = section(raw, 'properties');
  const deploy = section(raw, 'deploy');

  if (env.NOTION_API_KEY) {
    notion.apiKey = env.NOTION_API_KEY;
  }
  if (env.SEED_DATABASE_ID) {
    notion.seedDatabaseId = env.SEED_DATABASE_ID;
  }
  if (env.MODULE_DATABASE_ID) {
    notion.moduleDatabaseId = env.MODULE_DATABASE_ID;
  }
  if (env.NOTION_API_VERSION) {
    notion.apiVersion = env.NOTION_API_VERSION;
  }
  if (env.NOTION_BASE_URL) {
    notion.baseUrl = env.NOTION_BASE_URL;
  }
  // NOTION_TIMEOUT_MS -> notion.timeoutMs
  if (env.NOTION_TIMEOUT_MS) {
    notion.timeoutMs = parseInt(env.NOTION_TIMEOUT_MS, 10);
  }
  if (env.SEEDLING_OUTPUT_DIR) {
    deploy.outputDir = env.SEEDLING_OUTPUT_DIR;
  }

  // 3. Validate with parseConfig (zod) and return typed Config
  return parseConfig({
    notion,
    properties,
    deploy,
  });
}
