import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseDocument } from 'yaml';
import { logger } from '@task-transformer/logger';
import { TemplateNotFoundError } from './errors.js';

const log = logger.builder;

export const TASK_CONFIG_FILE = 'config.yaml';

/**
 * Raw text of `<taskPath>/config.yaml`.
 * The text is returned as stored; parsing only reports malformed documents.
 */
export async function readTaskConfig(taskPath: string): Promise<string> {
  const configPath = join(taskPath, TASK_CONFIG_FILE);
  if (!existsSync(configPath)) {
    throw new TemplateNotFoundError(`${TASK_CONFIG_FILE} not found in ${taskPath}`);
  }

  const text = await readFile(configPath, 'utf-8');
  const document = parseDocument(text);
  if (document.errors.length > 0) {
    log.warn(`${configPath} is not well-formed YAML: ${document.errors[0]?.message ?? 'unknown error'}`);
  }
  return text;
}
