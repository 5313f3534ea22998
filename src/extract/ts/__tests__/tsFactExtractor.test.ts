import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createTypeFact, type TypeFact } from '../../../facts/typeFact';
import { createEmptyReport } from '../../../report/indexReport';
import { extractTypeFacts, keepDescendants } from '../tsFactExtractor';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function writeProject(dir: string) {
  writeFile(
    path.join(dir, 'tsconfig.json'),
    JSON.stringify(
      {
        compilerOptions: { target: 'ES2020', module: 'CommonJS', strict: true, noEmit: true },
        include: ['src/**/*'],
      },
      null,
      2,
    ),
  );

  writeFile(
    path.join(dir, 'src', 'models.ts'),
    `
export interface Entity {
  id: string;
}

export interface Auditable extends Entity {
  audit(): void;
}

export class Repository<T> {
  find(id: string): T {
    throw new Error(id);
  }
}

export class User implements Entity {
  id = 'u';
}
`,
  );

  writeFile(
    path.join(dir, 'src', 'mixins.ts'),
    `
type Ctor<T = {}> = new (...args: any[]) => T;

export function Tagged<TBase extends Ctor>(Base: TBase) {
  return class extends Base {
    tag = '';
  };
}

export function Timestamped<TBase extends Ctor>(Base: TBase) {
  return class extends Base {
    createdAt = 0;
  };
}
`,
  );

  writeFile(
    path.join(dir, 'src', 'repos.ts'),
    `
import { Auditable, Repository, User } from './models';
import { Tagged, Timestamped } from './mixins';

export class UserRepo extends Repository<User> implements Auditable {
  id = 'r';
  private secret = 1;
  #hidden = 2;

  constructor(public readonly label: string, private token: string) {
    super();
  }

  audit(): void {}

  find(id: string): User;
  find(id: number): User;
  find(id: string | number): User {
    return new User();
  }

  get size(): number {
    return this.secret + this.#hidden + this.token.length;
  }

  static create(): UserRepo {
    return new UserRepo('x', 'y');
  }

  private helper(): void {}
}

export class TaggedRepo extends Timestamped(Tagged(Repository)) {}
`,
  );

  writeFile(path.join(dir, 'src', '__tests__', 'repos.test.ts'), 'export class OnlyInTests {}\n');
}

function byName(facts: TypeFact[], name: string): TypeFact {
  const found = facts.find((f) => f.name === name);
  if (!found) throw new Error(`missing fact: ${name}`);
  return found;
}

describe('extractTypeFacts', () => {
  test('reads classes and interfaces with their relations and members', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tri-extract-'));
    writeProject(dir);
    const report = createEmptyReport({ toolName: 'type-relation-index', toolVersion: 'test', sourceRoot: dir });

    const facts = await extractTypeFacts({ projectRoot: dir, report });

    expect(facts.map((f) => f.name).sort()).toEqual(['Auditable', 'Entity', 'Repository', 'TaggedRepo', 'User', 'UserRepo']);
    expect(report.filesScanned).toBe(3);
    expect(report.factsLoaded).toBe(6);
    expect(report.findings).toEqual([]);

    const entity = byName(facts, 'Entity');
    expect(entity.library).toBe('src/models.ts');
    expect(entity.properties).toEqual(['id']);

    const auditable = byName(facts, 'Auditable');
    expect(auditable.superclass).toBeUndefined();
    expect(auditable.interfaces).toEqual(['Entity']);
    expect(auditable.methods).toEqual([{ name: 'audit', returnType: 'void', parameterTypes: [], isStatic: false }]);

    const repository = byName(facts, 'Repository');
    expect(repository.typeParameters).toEqual(['T']);
    expect(repository.methods).toEqual([{ name: 'find', returnType: 'T', parameterTypes: ['string'], isStatic: false }]);

    expect(byName(facts, 'User').interfaces).toEqual(['Entity']);

    const userRepo = byName(facts, 'UserRepo');
    expect(userRepo.library).toBe('src/repos.ts');
    expect(userRepo.superclass).toBe('Repository');
    expect(userRepo.interfaces).toEqual(['Auditable']);
    expect(userRepo.mixins).toEqual([]);
    expect(userRepo.genericArguments).toEqual({ 'Repository.T': 'User' });
    expect(userRepo.properties).toEqual(['id', 'label', 'size']);
    expect(userRepo.methods).toEqual([
      { name: 'audit', returnType: 'void', parameterTypes: [], isStatic: false },
      { name: 'find', returnType: 'User', parameterTypes: ['string'], isStatic: false },
      { name: 'create', returnType: 'UserRepo', parameterTypes: [], isStatic: true },
    ]);

    const tagged = byName(facts, 'TaggedRepo');
    expect(tagged.superclass).toBe('Repository');
    expect(tagged.mixins).toEqual(['Tagged', 'Timestamped']);
    expect(tagged.genericArguments).toEqual({});
  });

  test('includeTests adds declarations from test files', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tri-extract-'));
    writeProject(dir);

    const facts = await extractTypeFacts({ projectRoot: dir, includeTests: true });
    expect(byName(facts, 'OnlyInTests').library).toBe('src/__tests__/repos.test.ts');
  });

  test('bases keeps only transitive descendants', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tri-extract-'));
    writeProject(dir);
    const report = createEmptyReport({ toolName: 'type-relation-index', toolVersion: 'test', sourceRoot: dir });

    const repos = await extractTypeFacts({ projectRoot: dir, bases: ['Repository'], report });
    expect(repos.map((f) => f.name).sort()).toEqual(['TaggedRepo', 'UserRepo']);
    expect(report.factsLoaded).toBe(2);

    const entities = await extractTypeFacts({ projectRoot: dir, bases: ['Entity'] });
    expect(entities.map((f) => f.name).sort()).toEqual(['Auditable', 'User', 'UserRepo']);
  });

  test('reports a name declared in more than one file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tri-extract-'));
    writeFile(
      path.join(dir, 'tsconfig.json'),
      JSON.stringify({ compilerOptions: { strict: true }, include: ['src/**/*'] }, null, 2),
    );
    writeFile(path.join(dir, 'src', 'a.ts'), 'export class Dup {}\n');
    writeFile(path.join(dir, 'src', 'b.ts'), 'export class Dup {}\n');
    const report = createEmptyReport({ toolName: 'type-relation-index', toolVersion: 'test', sourceRoot: dir });

    const facts = await extractTypeFacts({ projectRoot: dir, report });

    expect(facts.map((f) => f.library)).toEqual(['src/a.ts', 'src/b.ts']);
    expect(report.findings).toEqual([
      {
        kind: 'duplicateType',
        severity: 'warning',
        message: 'Dup is already declared in src/a.ts',
        location: { file: 'src/b.ts' },
        tags: { type: 'Dup' },
      },
    ]);
  });

  test('skips classes local to function bodies and reads namespace members', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tri-extract-'));
    writeFile(
      path.join(dir, 'src', 'mixed.ts'),
      `
type Ctor = new (...args: any[]) => object;

export class Base {}

export function Tagged<TBase extends Ctor>(Source: TBase) {
  class Mixed extends Source {}
  return Mixed;
}

export function Stamped<TBase extends Ctor>(Source: TBase) {
  class Mixed extends Base {}
  return Source ?? Mixed;
}

export class Real extends Tagged(Base) {}

export namespace shapes.round {
  export class Circle extends Base {}
}
`,
    );
    const report = createEmptyReport({ toolName: 'type-relation-index', toolVersion: 'test', sourceRoot: dir });

    const facts = await extractTypeFacts({ projectRoot: dir, report });

    expect(facts.map((f) => f.name)).toEqual(['Base', 'Real', 'Circle']);
    expect(byName(facts, 'Real').mixins).toEqual(['Tagged']);
    expect(byName(facts, 'Circle').superclass).toBe('Base');
    expect(report.findings).toEqual([]);
  });

  test('an explicit tsconfig that does not exist is an error', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tri-extract-'));
    writeFile(path.join(dir, 'src', 'a.ts'), 'export class A {}\n');

    await expect(extractTypeFacts({ projectRoot: dir, tsconfigPath: 'missing.json' })).rejects.toThrow(
      /Unable to find tsconfig\.json/,
    );
  });
});

describe('keepDescendants', () => {
  test('keeps input order and drops unrelated facts', () => {
    const facts = [
      createTypeFact({ name: 'Leaf', library: 'x', superclass: 'Mid' }),
      createTypeFact({ name: 'Other', library: 'x' }),
      createTypeFact({ name: 'Mid', library: 'x', mixins: ['Base'] }),
    ];
    expect(keepDescendants(facts, ['Base']).map((f) => f.name)).toEqual(['Leaf', 'Mid']);
    expect(keepDescendants(facts, ['Nothing'])).toEqual([]);
  });
});
