import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { logger } from './logger.js';

// src/utils and dist/utils both sit two levels below the project root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../../package.json');

/**
 * Version of this tool as declared in its package.json
 */
export function getVersion(): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug(`Failed to read ${packageJsonPath}`, error);
  }
  return '0.0.0';
}
