/**
 * Load the project-root .env file
 * Works from any package directory
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Walk up from startPath until a directory holding a .env file is found
 */
function findProjectRoot(startPath: string): string | null {
  let current = resolve(startPath);
  const root = resolve(current, '/');

  while (current !== root) {
    if (existsSync(join(current, '.env'))) {
      return current;
    }
    current = resolve(current, '..');
  }
  return null;
}

/**
 * Load environment variables from the nearest .env above this module,
 * falling back to the working directory.
 *
 * @returns the .env path that was loaded, or null for the fallback
 */
export function loadEnvFromRoot(startDir?: string): string | null {
  const here = startDir ?? dirname(fileURLToPath(import.meta.url));
  const projectRoot = findProjectRoot(here);

  if (projectRoot) {
    const envPath = join(projectRoot, '.env');
    dotenv.config({ path: envPath });
    return envPath;
  }

  dotenv.config();
  return null;
}
