import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getPostwatchDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  x: z
    .object({
      bearer_token: z.string().default(''),
      base_url: z.string().default('https://api.x.com/2'),
      timeout_ms: z.number().int().positive().default(15000),
    })
    .default({}),

  // Two-tier pacing: a short delay between accounts models the per-window
  // request ceiling, the batch cool-down models the longer window.
  pacing: z
    .object({
      request_delay_ms: z.number().int().nonnegative().default(1000),
      batch_size: z.number().int().positive().default(10),
      batch_delay_ms: z.number().int().nonnegative().default(60000),
      settle_delay_ms: z.number().int().nonnegative().default(500),
      page_size: z.number().int().min(5).max(100).default(100),
      bootstrap_hours: z.number().positive().default(24),
      window_hours: z.number().positive().default(24),
    })
    .default({}),

  quota: z
    .object({
      policy: z.enum(['skip', 'backoff']).default('skip'),
      max_retries: z.number().int().nonnegative().default(3),
      base_delay_ms: z.number().int().nonnegative().default(15000),
      max_delay_ms: z.number().int().nonnegative().default(900000),
      starvation_threshold: z.number().int().positive().default(3),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().default(4000),
      temperature: z.number().default(0.7),
      timeout_ms: z.number().default(60000),
    })
    .default({}),

  schedule: z
    .object({
      report_cron: z.string().default('0 8 * * *'),
      timezone: z.string().default('UTC'),
    })
    .default({}),

  report: z
    .object({
      output_dir: z.string().default('~/.postwatch/reports'),
      max_posts_per_account: z.number().int().positive().default(10),
    })
    .default({}),

  delivery: z
    .object({
      email: z
        .object({
          enabled: z.boolean().default(false),
          smtp_host: z.string().default('smtp.gmail.com'),
          smtp_port: z.number().default(587),
          smtp_user: z.string().default(''),
          smtp_pass: z.string().default(''),
          from: z.string().default(''),
          to: z.array(z.string()).default([]),
        })
        .default({}),
      telegram: z
        .object({
          enabled: z.boolean().default(false),
          bot_token: z.string().default(''),
          chat_id: z.string().default(''),
          api_base_url: z.string().default('https://api.telegram.org'),
        })
        .default({}),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.postwatch/postwatch.db'),
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
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, ...keys: string[]): Record<string, unknown> {
  let node = raw;
  for (const key of keys) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  return node;
}

/**
 * Secrets may come from the environment instead of the YAML file.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const bearer = env['POSTWATCH_X_BEARER_TOKEN'];
  if (bearer) section(rawConfig, 'x')['bearer_token'] = bearer;

  const llmOverrides: Array<[string, string | undefined]> = [
    ['api_key', env['POSTWATCH_LLM_API_KEY']],
    ['base_url', env['POSTWATCH_LLM_BASE_URL']],
    ['model', env['POSTWATCH_LLM_MODEL']],
  ];
  for (const [key, value] of llmOverrides) {
    if (value) section(rawConfig, 'llm')[key] = value;
  }

  const botToken = env['POSTWATCH_TELEGRAM_BOT_TOKEN'];
  const chatId = env['POSTWATCH_TELEGRAM_CHAT_ID'];
  if (botToken) section(rawConfig, 'delivery', 'telegram')['bot_token'] = botToken;
  if (chatId) section(rawConfig, 'delivery', 'telegram')['chat_id'] = chatId;

  return rawConfig;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('postwatch', {
    searchPlaces: [
      'postwatch.config.yaml',
      'postwatch.config.yml',
      '.postwatchrc.yaml',
      '.postwatchrc.yml',
    ],
  });

  const envConfigPath = process.env['POSTWATCH_CONFIG'];
  const defaultConfigPath = path.join(getPostwatchDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    if (isRecord(result?.config)) rawConfig = result.config;
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    if (isRecord(result?.config)) rawConfig = result.config;
  } else {
    logger.debug('No config file found, using defaults');
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

