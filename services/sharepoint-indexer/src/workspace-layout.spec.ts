import { readFileSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import { describe, expect, it } from 'vitest';

interface PackageManifest {
  main: string;
  types: string;
  scripts?: Record<string, string>;
}

const rootDir = resolve(__dirname, '../../..');

const readJson = <T>(path: string): T => JSON.parse(readFileSync(join(rootDir, path), 'utf8'));

const { compilerOptions } = readJson<{ compilerOptions: { outDir: string; rootDir: string } }>(
  'tsconfig.json',
);

// Where `tsc -p tsconfig.json` writes the JavaScript for a source file under the repository root.
const compiledPath = (sourcePath: string): string =>
  join(rootDir, compilerOptions.outDir, relative(join(rootDir, compilerOptions.rootDir), sourcePath))
    .replace(/\.ts$/, '.js');

describe('workspace build layout', () => {
  it.each(['packages/utils', 'packages/logger', 'services/sharepoint-indexer'])(
    '%s points main at the compiled form of its typed entry',
    (packageDir) => {
      const manifest = readJson<PackageManifest>(`${packageDir}/package.json`);
      const entrySource = join(rootDir, packageDir, manifest.types);

      expect(manifest.types.endsWith('.ts')).toBe(true);
      expect(resolve(rootDir, packageDir, manifest.main)).toBe(compiledPath(entrySource));
    },
  );

  it('starts the service from the compiled entry point', () => {
    const serviceDir = join(rootDir, 'services/sharepoint-indexer');
    const manifest = readJson<PackageManifest>('services/sharepoint-indexer/package.json');
    const compiledMain = compiledPath(join(serviceDir, 'src/main.ts'));

    expect(manifest.scripts?.start).toBe(`node ${relative(serviceDir, compiledMain)}`);
    expect(readJson<PackageManifest>('package.json').scripts?.start).toBe(
      `node ${relative(rootDir, compiledMain)}`,
    );
  });
});
