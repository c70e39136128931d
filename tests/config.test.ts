import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/utils/errors.js';

let dir: string;
let configPath: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'contact-cleaner-config-'));
  configPath = path.join(dir, 'config.json');
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('should use defaults when there is no config file', async () => {
    const config = await loadConfig({ CONTACT_CLEANER_CONFIG: configPath });

    expect(config).toEqual({
      cleaner: {
        defaultCountryCode: '+1',
        mexicoMobileDisambiguatorEnabled: false,
        mobileLabelKeywords: ['mobile', 'cell', 'móvil'],
      },
      defaultChannel: 'WhatsApp',
      greetingFallback: 'amig@',
    });
  });

  it('should read options from the config file', async () => {
    await fs.writeFile(configPath, JSON.stringify({
      cleaner: { mexicoMobileDisambiguatorEnabled: true, mobileLabelKeywords: ['cel'] },
      defaultChannel: 'SMS',
    }));

    const config = await loadConfig({ CONTACT_CLEANER_CONFIG: configPath });

    expect(config.cleaner).toEqual({
      defaultCountryCode: '+1',
      mexicoMobileDisambiguatorEnabled: true,
      mobileLabelKeywords: ['cel'],
    });
    expect(config.defaultChannel).toBe('SMS');
  });

  it('should let environment variables override the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ cleaner: { mexicoMobileDisambiguatorEnabled: true } }));

    const config = await loadConfig({
      CONTACT_CLEANER_CONFIG: configPath,
      CONTACT_CLEANER_DEFAULT_COUNTRY_CODE: '+52',
      CONTACT_CLEANER_MX_MOBILE_ONE: 'false',
      CONTACT_CLEANER_GREETING_FALLBACK: 'friend',
    });

    expect(config.cleaner.defaultCountryCode).toBe('+52');
    expect(config.cleaner.mexicoMobileDisambiguatorEnabled).toBe(false);
    expect(config.greetingFallback).toBe('friend');
  });

  it('should reject a config file that is not JSON', async () => {
    await fs.writeFile(configPath, '{ cleaner: ');

    await expect(loadConfig({ CONTACT_CLEANER_CONFIG: configPath })).rejects.toThrow(ConfigError);
  });

  it('should reject invalid options', async () => {
    await fs.writeFile(configPath, JSON.stringify({ cleaner: { defaultCountryCode: '52' } }));

    await expect(loadConfig({ CONTACT_CLEANER_CONFIG: configPath }))
      .rejects.toThrow('cleaner.defaultCountryCode');
  });

  it('should reject an invalid country code from the environment', async () => {
    const load = loadConfig({
      CONTACT_CLEANER_CONFIG: configPath,
      CONTACT_CLEANER_DEFAULT_COUNTRY_CODE: '52',
    });

    await expect(load).rejects.toThrow(ConfigError);
    await expect(load).rejects.toThrow('[CONTACT_CLEANER_DEFAULT_COUNTRY_CODE] defaultCountryCode:');
  });
});
