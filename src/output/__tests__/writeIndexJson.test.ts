import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createTypeFact } from '../../facts/typeFact';
import { parseFactDocument } from '../../facts/loadFactFiles';
import { TypeRegistry } from '../../registry/typeRegistry';
import { stableStringify } from '../deterministicJson';
import { serializeIndexJson, writeFactDocumentFile, writeIndexJsonFile } from '../writeIndexJson';

function makeRegistry(order: 'a' | 'b'): TypeRegistry {
  const facts = [
    createTypeFact({ name: 'Zed', library: 'z.ts', superclass: 'Alpha', interfaces: ['B', 'A'] }),
    createTypeFact({ name: 'Alpha', library: 'a.ts', typeParameters: ['T'] }),
  ];
  const r = new TypeRegistry();
  r.registerAll(order === 'a' ? facts : facts.slice().reverse());
  return r;
}

describe('index JSON writer', () => {
  it('serializes deterministically independent of registration order', () => {
    const s1 = serializeIndexJson(makeRegistry('a').export());
    const s2 = serializeIndexJson(makeRegistry('b').export());
    expect(s1).toBe(s2);
  });

  it('sorts keys and types but keeps relation order', () => {
    const parsed = JSON.parse(serializeIndexJson(makeRegistry('a').export()));
    expect(Object.keys(parsed)).toEqual(['schema', 'statistics', 'types']);
    expect(parsed.schema).toBe('type-facts-v1');
    expect(parsed.types.map((t: { name: string }) => t.name)).toEqual(['Alpha', 'Zed']);
    expect(Object.keys(parsed.types[1])).toEqual(['interfaces', 'library', 'name', 'superclass']);
    expect(parsed.types[1].interfaces).toEqual(['B', 'A']);
  });

  it('writes output that loads back as a fact document', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tri-out-'));
    const out = path.join(dir, 'nested', 'index.json');
    await writeIndexJsonFile(out, makeRegistry('a').export());

    const txt = fs.readFileSync(out, 'utf8');
    expect(txt.endsWith('}\n')).toBe(true);

    const reloaded = parseFactDocument(JSON.parse(txt));
    expect(reloaded.ok).toBe(true);
    if (reloaded.ok) expect(reloaded.facts.map((f) => f.name)).toEqual(['Alpha', 'Zed']);
  });

  it('writes bare fact documents sorted by name', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tri-facts-'));
    const out = path.join(dir, 'types.facts.json');
    await writeFactDocumentFile(out, [
      { name: 'B', library: 'b.ts' },
      { name: 'A', library: 'a.ts' },
    ]);
    expect(fs.readFileSync(out, 'utf8')).toBe(
      stableStringify({
        schema: 'type-facts-v1',
        types: [
          { library: 'a.ts', name: 'A' },
          { library: 'b.ts', name: 'B' },
        ],
      }),
    );
  });
});

describe('stableStringify', () => {
  it('sorts object keys recursively and ends with a newline', () => {
    expect(stableStringify({ b: 1, a: { d: [2, 1], c: null } }, 0)).toBe('{"a":{"c":null,"d":[2,1]},"b":1}\n');
  });
});
