import { existsSync } from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('env');

/**
 * Find the project root directory by searching upward for a .git directory
 * @param startDir - Directory to start searching from
 * @returns Path to project root, or null if not found
 */
export function findProjectRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  const root = path.parse(current).root;

  while (current !== root) {
    if (existsSync(path.join(current, '.git'))) {
      return current;
    }
    current = path.dirname(current);
  }

  return null;
}

/**
 * Load .env files in cascading order
 * Priority: process.env > <cwd>/.env > <project root>/.env
 *
 * Files are loaded most local first with override: false, so a value set
 * earlier (or already in the environment) is never replaced.
 *
 * @returns Paths of the files that were loaded
 */
export function loadEnvFiles(cwd: string): string[] {
  const loadedFiles: string[] = [];
  const envFilePaths = [path.join(cwd, '.env')];

  const projectRoot = findProjectRoot(cwd);
  if (projectRoot) {
    const rootEnv = path.join(projectRoot, '.env');
    if (!envFilePaths.includes(rootEnv)) {
      envFilePaths.push(rootEnv);
    }
  }

  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) {
      continue;
    }
    const result = dotenv.config({ path: envPath, override: false });
    if (result.error) {
      logger.warn(`Failed to load ${envPath}: ${errorMessage(result.error)}`);
      continue;
    }
    loadedFiles.push(envPath);
  }

  return loadedFiles;
}
