import { type TypeFact, type TypeFactJson, typeFactToJson } from '../facts/typeFact';

export type RegistryStatistics = {
  totalTypes: number;
  withSuperclass: number;
  withInterfaces: number;
  withMixins: number;
  /** Facts declaring at least one type parameter. */
  generic: number;
};

export type RegistryExport = {
  types: TypeFactJson[];
  statistics: RegistryStatistics;
};

export function computeStatistics(facts: Iterable<TypeFact>): RegistryStatistics {
  const stats: RegistryStatistics = { totalTypes: 0, withSuperclass: 0, withInterfaces: 0, withMixins: 0, generic: 0 };
  for (const f of facts) {
    stats.totalTypes++;
    if (f.superclass !== undefined) stats.withSuperclass++;
    if (f.interfaces.length > 0) stats.withInterfaces++;
    if (f.mixins.length > 0) stats.withMixins++;
    if (f.typeParameters.length > 0) stats.generic++;
  }
  return stats;
}

/**
 * Structural snapshot of a set of facts, in the order given.
 * Only plain objects, arrays, strings, numbers and booleans.
 */
export function exportFacts(facts: Iterable<TypeFact>): RegistryExport {
  const list = Array.from(facts);
  return {
    types: list.map(typeFactToJson),
    statistics: computeStatistics(list),
  };
}
