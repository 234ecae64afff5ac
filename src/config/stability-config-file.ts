import * as fs from 'fs/promises';
import { createComponentLogger } from '../utils/logger';
import { parsePatternLines } from './pattern-matcher';

const logger = createComponentLogger('stability-config-file');

/**
 * Load custom stable type patterns from a stability configuration file.
 *
 * One pattern per line; blank lines and lines starting with `#` are skipped.
 * A missing or unreadable file yields no patterns.
 */
export async function loadStabilityConfigFile(configPath: string | undefined): Promise<string[]> {
  if (!configPath) {
    return [];
  }

  try {
    const content = await fs.readFile(configPath, 'utf-8');
    const patterns = parsePatternLines(content);
    logger.debug('Loaded stability configuration', { configPath, patterns: patterns.length });
    return patterns;
  } catch (error) {
    logger.warn('Could not read stability configuration file', {
      configPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}
