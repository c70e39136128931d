import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_GREETING_FALLBACK } from './contacts/index.js';
import { cleanerOptionsSchema, DEFAULT_CHANNEL, type CleanerOptions } from './phones/index.js';
import { ConfigError, errorMessage } from './utils/index.js';

export interface AppConfig {
  cleaner: CleanerOptions;
  defaultChannel: string;
  greetingFallback: string;
}

const fileConfigSchema = z.object({
  cleaner: cleanerOptionsSchema.default({}),
  defaultChannel: z.string().min(1).default(DEFAULT_CHANNEL),
  greetingFallback: z.string().default(DEFAULT_GREETING_FALLBACK),
});

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.contact-cleaner', 'config.json');

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const configPath = env.CONTACT_CLEANER_CONFIG ?? DEFAULT_CONFIG_PATH;

  const raw = await readConfigFile(configPath);
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(configPath, formatIssues(parsed.error));
  }
  const config = parsed.data;

  if (env.CONTACT_CLEANER_DEFAULT_COUNTRY_CODE) {
    const cleaner = cleanerOptionsSchema.safeParse({
      ...config.cleaner,
      defaultCountryCode: env.CONTACT_CLEANER_DEFAULT_COUNTRY_CODE,
    });
    if (!cleaner.success) {
      throw new ConfigError('CONTACT_CLEANER_DEFAULT_COUNTRY_CODE', formatIssues(cleaner.error));
    }
    config.cleaner = cleaner.data;
  }
  if (env.CONTACT_CLEANER_MX_MOBILE_ONE !== undefined) {
    config.cleaner.mexicoMobileDisambiguatorEnabled = isTruthy(env.CONTACT_CLEANER_MX_MOBILE_ONE);
  }
  if (env.CONTACT_CLEANER_GREETING_FALLBACK !== undefined) {
    config.greetingFallback = env.CONTACT_CLEANER_GREETING_FALLBACK;
  }

  return config;
}

/** Parsed JSON of the config file, or an empty object when there is none. */
async function readConfigFile(configPath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(configPath, `not valid JSON (${errorMessage(err)})`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
}

function isTruthy(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
