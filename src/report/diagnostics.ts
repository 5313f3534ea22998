import { compareByName } from '../facts/typeFact';
import type { TypeRegistry } from '../registry/typeRegistry';
import type { IndexReport, ReportFindingKind } from './indexReport';
import { addFinding, incCount } from './reportBuilder';

/**
 * Fill statistics and relation counts from the registry's current contents.
 */
export function summarizeRegistry(registry: TypeRegistry, report: IndexReport): void {
  report.statistics = registry.export().statistics;
  report.counts.relationsByKind = {};
  for (const fact of registry.allTypes) {
    if (fact.superclass !== undefined) incCount(report.counts.relationsByKind, 'superclass');
    if (fact.interfaces.length) incCount(report.counts.relationsByKind, 'interface', fact.interfaces.length);
    if (fact.mixins.length) incCount(report.counts.relationsByKind, 'mixin', fact.mixins.length);
  }
}

/**
 * Records what the registry tolerates silently: relation targets that are not registered,
 * and superclass chains that loop. Findings are added in name order.
 */
export function collectRegistryFindings(registry: TypeRegistry, report: IndexReport): void {
  const facts = Array.from(registry.allTypes).sort(compareByName);

  const dangling = (kind: ReportFindingKind, typeName: string, library: string, target: string, verb: string) => {
    if (registry.has(target)) return;
    addFinding(report, {
      kind,
      severity: 'warning',
      message: `${typeName} ${verb} unregistered type ${target}`,
      tags: { type: typeName, target, library },
    });
  };

  for (const fact of facts) {
    if (fact.superclass !== undefined) dangling('danglingSuperclass', fact.name, fact.library, fact.superclass, 'extends');
    for (const i of fact.interfaces) dangling('danglingInterface', fact.name, fact.library, i, 'implements');
    for (const m of fact.mixins) dangling('danglingMixin', fact.name, fact.library, m, 'mixes in');
  }

  for (const cycle of findSuperclassCycles(registry)) {
    addFinding(report, {
      kind: 'superclassCycle',
      severity: 'warning',
      message: `Superclass cycle: ${[...cycle, cycle[0]].join(' -> ')}`,
      tags: { members: cycle.join(',') },
    });
  }
}

/**
 * Each cycle in the registered superclass chains, starting at its smallest name and
 * listed in the direction of the superclass edges. Cycles are ordered by first member.
 */
export function findSuperclassCycles(registry: TypeRegistry): string[][] {
  const done = new Set<string>();
  const cycles: string[][] = [];
  const names = Array.from(registry.allTypes, (f) => f.name).sort();

  for (const start of names) {
    const path: string[] = [];
    const position = new Map<string, number>();
    let current: string | undefined = start;

    while (current !== undefined && !done.has(current)) {
      const seenAt = position.get(current);
      if (seenAt !== undefined) {
        cycles.push(rotateToSmallest(path.slice(seenAt)));
        break;
      }
      position.set(current, path.length);
      path.push(current);
      current = registry.findByName(current)?.superclass;
    }

    for (const n of path) done.add(n);
  }

  return cycles.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

function rotateToSmallest(cycle: string[]): string[] {
  let min = 0;
  for (let i = 1; i < cycle.length; i++) {
    if (cycle[i] < cycle[min]) min = i;
  }
  return [...cycle.slice(min), ...cycle.slice(0, min)];
}
