import fs from 'node:fs';
import path from 'node:path';
import * as dotenv from 'dotenv';
import { ConfigError } from '../../supervisor/errors';

/**
 * Merges an env file into `env` without overriding variables that are already
 * set. An explicitly named file must exist and is resolved against the current
 * directory; the implicit `.env` is optional and lives in `workDir`.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv, explicitPath?: string, workDir: string = process.cwd()): string | undefined {
  const envPath = explicitPath ? path.resolve(explicitPath) : path.resolve(workDir, '.env');
  if (!fs.existsSync(envPath)) {
    if (explicitPath) {
      throw new ConfigError(`Env file not found: ${envPath}`);
    }
    return undefined;
  }

  const parsed = dotenv.parse(fs.readFileSync(envPath));
  for (const [ key, value ] of Object.entries(parsed)) {
    if (!env[key]) {
      env[key] = value;
    }
  }
  return envPath;
}
