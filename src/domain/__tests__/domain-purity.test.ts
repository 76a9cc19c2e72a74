import * as fs from 'fs';
import * as path from 'path';

/**
 * Domain Purity Test
 *
 * Ensures src/domain/ contains only pure computation and types.
 * Files in this directory must NOT import the logger, the container,
 * feature modules, configuration or the file system.
 */

const DOMAIN_DIR = path.resolve(__dirname, '..');
const FORBIDDEN_PATTERNS = [
  /from\s+['"].*logger/,
  /from\s+['"].*container/,
  /from\s+['"].*modules/,
  /from\s+['"].*config/,
  /from\s+['"].*cli/,
  /from\s+['"](node:)?fs(\/promises)?['"]/,
  /from\s+['"]winston['"]/,
  /import\s+['"].*logger/,
  /import\s+['"].*container/,
  /import\s+['"].*modules/,
  /import\s+['"].*config/,
  /import\s+['"](node:)?fs(\/promises)?['"]/,
];

function getAllTsFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '__tests__' || entry.name === 'node_modules') continue;
      files.push(...getAllTsFiles(fullPath));
    } else if (entry.name.endsWith('.ts') && !entry.name.endsWith('.test.ts') && !entry.name.endsWith('.spec.ts')) {
      files.push(fullPath);
    }
  }

  return files;
}

describe('Domain purity', () => {
  it('should not contain impure imports in src/domain/', () => {
    const tsFiles = getAllTsFiles(DOMAIN_DIR);
    const violations: string[] = [];

    for (const filePath of tsFiles) {
      const content = fs.readFileSync(filePath, 'utf-8');
      const lines = content.split('\n');
      const relativePath = path.relative(DOMAIN_DIR, filePath);

      for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        for (const pattern of FORBIDDEN_PATTERNS) {
          if (pattern.test(line)) {
            violations.push(`${relativePath}:${i + 1}: ${line.trim()}`);
          }
        }
      }
    }

    expect(violations).toEqual([]);
  });
});
