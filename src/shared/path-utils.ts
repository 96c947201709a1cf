import { join } from 'path';
import { existsSync } from 'fs';

/**
 * Gets the base path for static resources (prompt templates).
 * In development: the src/ folder. In production: dist/, where the build copies them.
 */
export function getResourceBasePath(): string {
  const cwd = process.cwd();

  const srcExists = existsSync(join(cwd, 'src'));
  const distPromptsExists = existsSync(join(cwd, 'dist', 'prompts'));
  const isRunningFromDist = __filename.includes('dist/') || __filename.includes('dist\\');
  const isProduction = process.env.NODE_ENV === 'production';

  if (isProduction || isRunningFromDist || (!srcExists && distPromptsExists)) {
    return join(cwd, 'dist');
  }
  return join(cwd, 'src');
}

export function getPromptsPath(): string {
  return join(getResourceBasePath(), 'prompts');
}

export function getTemplatesPath(): string {
  return join(getResourceBasePath(), 'templates');
}
