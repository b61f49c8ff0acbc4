import { readJsoncFileSync } from './jsonc.js';

/**
 * Version of the installed cratebuild package, read from its package.json
 */
export function getVersion(): string {
  const manifest = readJsoncFileSync('package.json');
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}
