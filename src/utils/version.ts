import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Version from package.json, or 'unknown'
 */
export function getCurrentVersion(): string {
  try {
    // src/utils and dist/utils both sit two levels below package.json
    const packagePath = join(__dirname, '../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return typeof packageJson.version === 'string' ? packageJson.version : 'unknown';
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}
