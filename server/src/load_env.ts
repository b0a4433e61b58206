import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

/**
 * Loads the first env file found next to the working directory or one level up.
 * Returns the file that was loaded, or null when the process env is used as-is.
 */
export function loadEnv(cwd = process.cwd()): string | null {
  const candidates = [
    path.resolve(cwd, '.env.local'),
    path.resolve(cwd, '..', '.env.local'),
    path.resolve(cwd, '.env'),
    path.resolve(cwd, '..', '.env')
  ];

  const envPath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!envPath) {
    return null;
  }
  dotenv.config({ path: envPath });
  return envPath;
}
