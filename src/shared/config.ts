import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getAppDir } from './utils.js';
import { DEFAULT_TIME_ZONE, isValidTimeZone } from './format.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  http: z
    .object({
      user_agent: z
        .string()
        .default('Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:143.0) Gecko/20100101 Firefox/143.0'),
      referer: z.string().default('https://www.bilibili.com/'),
      listing_timeout_ms: z.number().int().positive().default(15000),
      detail_timeout_ms: z.number().int().positive().default(10000),
      page_delay_ms: z.number().int().nonnegative().default(1000),
      item_delay_ms: z.number().int().nonnegative().default(300),
    })
    .default({}),

  endpoints: z
    .object({
      popular_url: z.string().url().default('https://api.bilibili.com/x/web-interface/popular'),
      view_url: z.string().url().default('https://api.bilibili.com/x/web-interface/view'),
      video_page_url: z.string().url().default('https://www.bilibili.com/video/'),
      space_url: z.string().url().default('https://space.bilibili.com/'),
    })
    .default({}),

  credentials: z
    .object({
      cookie_file: z.string().default('cookie.token'),
    })
    .default({}),

  listing: z
    .object({
      page_size: z.number().int().min(1).max(100).default(50),
      start_page: z.number().int().min(1).default(1),
      max_pages: z.number().int().min(1).default(1),
    })
    .default({}),

  output: z
    .object({
      dir: z.string().default('.'),
      time_zone: z
        .string()
        .refine(isValidTimeZone, { message: 'Unknown IANA time zone' })
        .default(DEFAULT_TIME_ZONE),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('bilirank', {
    searchPlaces: [
      'bilirank.config.yaml',
      'bilirank.config.yml',
      '.bilirankrc.yaml',
      '.bilirankrc.yml',
    ],
  });

  const envConfigPath = process.env['BILIRANK_CONFIG'];
  const defaultConfigPath = path.join(getAppDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asRecord(result?.config);
  } else {
    const result = await explorer.search();
    if (result) {
      logger.debug({ file: result.filepath }, 'Loaded project config');
      rawConfig = asRecord(result.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const envCookieFile = process.env['BILIRANK_COOKIE_FILE'];
  if (envCookieFile) {
    const credentials = asRecord(rawConfig['credentials']);
    credentials['cookie_file'] = envCookieFile;
    rawConfig['credentials'] = credentials;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
