import { createTypeFact, type TypeFactInit } from '../../facts/typeFact';
import { TypeRegistry } from '../../registry/typeRegistry';
import { collectRegistryFindings, findSuperclassCycles, summarizeRegistry } from '../diagnostics';
import { countProblemFindings, createEmptyReport } from '../indexReport';

function registryOf(facts: Array<Omit<TypeFactInit, 'library'>>): TypeRegistry {
  const r = new TypeRegistry();
  r.registerAll(facts.map((f) => createTypeFact({ library: 'lib', ...f })));
  return r;
}

function emptyReport() {
  return createEmptyReport({ toolName: 'type-relation-index', toolVersion: 'test', sourceRoot: '/x' });
}

describe('registry diagnostics', () => {
  test('reports dangling references and superclass cycles in name order', () => {
    const r = registryOf([
      { name: 'Svc', interfaces: ['Service', 'Disposable'] },
      { name: 'User' },
      { name: 'Admin', superclass: 'User' },
      { name: 'Ghost', superclass: 'Phantom' },
      { name: 'Cache', mixins: ['Logging'] },
      { name: 'A', superclass: 'B' },
      { name: 'B', superclass: 'C' },
      { name: 'C', superclass: 'A' },
      { name: 'S', superclass: 'S' },
    ]);
    const report = emptyReport();
    collectRegistryFindings(r, report);

    expect(report.findings.map((f) => `${f.kind}: ${f.message}`)).toEqual([
      'danglingMixin: Cache mixes in unregistered type Logging',
      'danglingSuperclass: Ghost extends unregistered type Phantom',
      'danglingInterface: Svc implements unregistered type Service',
      'danglingInterface: Svc implements unregistered type Disposable',
      'superclassCycle: Superclass cycle: A -> B -> C -> A',
      'superclassCycle: Superclass cycle: S -> S',
    ]);
    expect(report.findings[0].tags).toEqual({ type: 'Cache', target: 'Logging', library: 'lib' });
    expect(countProblemFindings(report)).toBe(6);
  });

  test('cycles start at their smallest member even when entered from outside', () => {
    const r = registryOf([
      { name: 'B0', superclass: 'Z' },
      { name: 'Z', superclass: 'C' },
      { name: 'C', superclass: 'Z' },
    ]);
    expect(findSuperclassCycles(r)).toEqual([['C', 'Z']]);
  });

  test('a well-formed registry has no findings', () => {
    const r = registryOf([{ name: 'User' }, { name: 'Admin', superclass: 'User' }]);
    const report = emptyReport();
    collectRegistryFindings(r, report);
    expect(report.findings).toEqual([]);
    expect(countProblemFindings(report)).toBe(0);
  });

  test('summarizeRegistry fills statistics and relation counts', () => {
    const r = registryOf([
      { name: 'User', typeParameters: ['T'] },
      { name: 'Admin', superclass: 'User', interfaces: ['A', 'B'], mixins: ['M'] },
      { name: 'Guest', superclass: 'User' },
    ]);
    const report = emptyReport();
    summarizeRegistry(r, report);

    expect(report.statistics).toEqual({ totalTypes: 3, withSuperclass: 2, withInterfaces: 1, withMixins: 1, generic: 1 });
    expect(report.counts.relationsByKind).toEqual({ superclass: 2, interface: 2, mixin: 1 });
  });
});
