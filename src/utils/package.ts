import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');

/**
 * Version from the package manifest, or 0.0.0 when it cannot be read.
 */
export function getVersion(): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
