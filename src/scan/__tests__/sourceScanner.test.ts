import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FACT_FILE_INCLUDES, scanSourceFiles } from '../sourceScanner';

async function mkFile(p: string, content = 'x'): Promise<void> {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content, 'utf8');
}

async function mkTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'type-relation-index-scan-'));
}

describe('scanSourceFiles', () => {
  test('returns stable sorted TypeScript sources by default', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'src/b.tsx'));
    await mkFile(path.join(dir, 'src/a.ts'));
    await mkFile(path.join(dir, 'src/C.mts'));
    await mkFile(path.join(dir, 'src/c.js'));
    await mkFile(path.join(dir, 'src/ignore.d.ts'), 'declare const x: number;');

    const r1 = await scanSourceFiles({ sourceRoot: dir });
    const r2 = await scanSourceFiles({ sourceRoot: dir });

    expect(r1).toEqual(r2);
    expect(r1).toEqual(['src/C.mts', 'src/a.ts', 'src/b.tsx']);
  });

  test('default excludes remove node_modules and tests unless includeTests=true', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'src/app.ts'));
    await mkFile(path.join(dir, 'node_modules/pkg/index.ts'));
    await mkFile(path.join(dir, 'src/__tests__/app.test.ts'));
    await mkFile(path.join(dir, 'src/foo.spec.ts'));

    const noTests = await scanSourceFiles({ sourceRoot: dir, includeTests: false });
    expect(noTests).toEqual(['src/app.ts']);

    const withTests = await scanSourceFiles({ sourceRoot: dir, includeTests: true });
    expect(withTests).toEqual(['src/__tests__/app.test.ts', 'src/app.ts', 'src/foo.spec.ts']);
  });

  test('custom includes, additional excludes and the file cap', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'a.facts.json'));
    await mkFile(path.join(dir, 'b.facts.json'));
    await mkFile(path.join(dir, 'generated/c.facts.json'));
    await mkFile(path.join(dir, 'app.ts'));

    const facts = await scanSourceFiles({ sourceRoot: dir, includeGlobs: FACT_FILE_INCLUDES });
    expect(facts).toEqual(['a.facts.json', 'b.facts.json', 'generated/c.facts.json']);

    const filtered = await scanSourceFiles({
      sourceRoot: dir,
      includeGlobs: FACT_FILE_INCLUDES,
      excludeGlobs: ['**/generated/**'],
      maxFiles: 1,
    });
    expect(filtered).toEqual(['a.facts.json']);
  });
});
