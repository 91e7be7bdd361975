import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

/**
 * Reads the version from the nearest package.json.
 * Source (src/utils) and build (dist/utils) layouts both sit two levels below the root.
 */
function getPackageVersion(): string {
  const candidates = [
    join(__dirname, '..', '..', 'package.json'),
    join(process.cwd(), 'package.json'),
  ];

  for (const packagePath of candidates) {
    if (!existsSync(packagePath)) continue;
    try {
      const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch {
      continue;
    }
  }

  return '0.0.0';
}

// Export as constant so it's only read once
export const PACKAGE_VERSION = getPackageVersion();
