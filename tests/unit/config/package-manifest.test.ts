/**
 * Package Manifest Unit Tests
 *
 * The published entry points must name the build output, not the sources.
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';

function readJson(relativePath: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(new URL(relativePath, import.meta.url), 'utf8'));
  return parsed;
}

describe('package manifest', () => {
  it('should point the entry points at the compiled output', () => {
    expect(readJson('../../../package.json')).toMatchObject({
      main: './dist/index.js',
      types: './dist/index.d.ts',
      exports: { '.': { types: './dist/index.d.ts', import: './dist/index.js' } },
    });
  });

  it('should build src/index.ts into those entry points', () => {
    expect(readJson('../../../tsconfig.build.json')).toMatchObject({
      compilerOptions: { rootDir: 'src', outDir: 'dist', declaration: true },
    });
  });
});
