import { homedir } from 'node:os';
import { join } from 'node:path';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { ConfigSchema, DEFAULT_CONFIG } from '../types/index.js';
import type { Config } from '../types/index.js';
import { ValidationError } from '../errors.js';

const ALERTCTL_DIR_NAME = '.alertctl';
const CONFIG_FILE_NAME = 'config.json';

export function getAlertctlDir(): string {
  return process.env.ALERTCTL_HOME ?? join(homedir(), ALERTCTL_DIR_NAME);
}

export async function ensureAlertctlDir(): Promise<string> {
  const dir = getAlertctlDir();
  await mkdir(dir, { recursive: true });
  return dir;
}

export function getConfigPath(): string {
  return join(getAlertctlDir(), CONFIG_FILE_NAME);
}

/**
 * Environment overrides applied on top of the file. Only the knobs an operator
 * typically flips per deployment are exposed here.
 */
function applyEnv(config: Config, env: NodeJS.ProcessEnv): Config {
  const next: Config = structuredClone(config);
  if (env.ALERTCTL_STORAGE === 'json' || env.ALERTCTL_STORAGE === 'dynamodb') {
    next.storage = env.ALERTCTL_STORAGE;
  }
  if (env.AWS_REGION) next.awsRegion = env.AWS_REGION;
  if (env.ALERTCTL_MONITOR_INTERVAL_MS) {
    next.monitoring.intervalMs = parseInt(env.ALERTCTL_MONITOR_INTERVAL_MS, 10);
  }
  if (env.ALERTCTL_FEED_URL) {
    next.feed.source = 'http';
    next.feed.url = env.ALERTCTL_FEED_URL;
  }
  if (env.ALERTCTL_SMTP_HOST) next.notification.email.smtp.host = env.ALERTCTL_SMTP_HOST;
  if (env.ALERTCTL_SMTP_USER) next.notification.email.smtp.user = env.ALERTCTL_SMTP_USER;
  if (env.ALERTCTL_SMTP_PASS) next.notification.email.smtp.pass = env.ALERTCTL_SMTP_PASS;
  const result = ConfigSchema.safeParse(next);
  if (!result.success) throw ValidationError.fromZod('configuration (environment)', result.error);
  return result.data;
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const dir = await ensureAlertctlDir();
  const configPath = join(dir, CONFIG_FILE_NAME);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
    // First run: write defaults so operators have a file to edit
    await saveConfig(DEFAULT_CONFIG);
    return applyEnv(DEFAULT_CONFIG, env);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`Config file ${configPath} is not valid JSON`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) throw ValidationError.fromZod(`configuration in ${configPath}`, result.error);
  return applyEnv(result.data, env);
}

export async function saveConfig(config: Config): Promise<void> {
  const dir = await ensureAlertctlDir();
  const configPath = join(dir, CONFIG_FILE_NAME);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}
