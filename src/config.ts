import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_BIRTHDAY_WINDOW_DAYS } from './contacts/index.js';
import { ConfigError } from './utils/index.js';

export interface AppConfig {
  prompt: string;
  birthdayWindowDays: number;
}

export const DEFAULT_PROMPT = 'Enter a command: ';

const configFileSchema = z.object({
  prompt: z.string().optional(),
  birthdayWindowDays: z.number().int().positive().optional(),
});

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const configPath = env.CONTACTS_ASSISTANT_CONFIG
    ?? path.join(os.homedir(), '.contacts-assistant', 'config.json');

  let raw: string | undefined;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    // No config file is fine; anything else (permissions, a directory) is not.
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
  }

  let fileConfig: z.infer<typeof configFileSchema> = {};
  if (raw !== undefined) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ConfigError(configPath, 'Config file is not valid JSON');
    }
    const result = configFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigError(configPath, result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    fileConfig = result.data;
  }

  return {
    prompt: env.CONTACTS_ASSISTANT_PROMPT ?? fileConfig.prompt ?? DEFAULT_PROMPT,
    birthdayWindowDays: fileConfig.birthdayWindowDays ?? DEFAULT_BIRTHDAY_WINDOW_DAYS,
  };
}
