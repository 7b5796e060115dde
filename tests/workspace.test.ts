/**
 * Workspace manifest tests
 */

import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

function devDependencies(): Record<string, string> {
  const manifest: unknown = JSON.parse(fs.readFileSync(path.join(ROOT, 'package.json'), 'utf-8'));
  const deps: Record<string, string> = {};
  if (typeof manifest === 'object' && manifest !== null && 'devDependencies' in manifest) {
    const declared = manifest.devDependencies;
    if (typeof declared === 'object' && declared !== null) {
      for (const [name, range] of Object.entries(declared)) {
        if (typeof range === 'string') deps[name] = range;
      }
    }
  }
  return deps;
}

describe('workspace manifest', () => {
  it('declares the coverage provider the vitest config names', () => {
    const config = fs.readFileSync(path.join(ROOT, 'vitest.config.ts'), 'utf-8');
    const deps = devDependencies();

    expect(config).toContain("provider: 'v8'");
    expect(deps['@vitest/coverage-v8']).toBe(deps.vitest);
  });
});
