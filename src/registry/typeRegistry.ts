import {
  compareByName,
  getGenericArgument,
  qualifiedGenericKey,
  type TypeFact,
} from '../facts/typeFact';
import { exportFacts, type RegistryExport } from './exportRegistry';
import { renderHierarchyTree } from './hierarchyTree';
import { RelationIndex, type RelationKind } from './relationIndex';
import { collectReachable } from './traversal';

export type TypePredicate = (fact: TypeFact) => boolean;

/**
 * In-memory index of type facts.
 *
 * Holds the authoritative name -> fact map plus one reverse index per relation kind
 * (superclass, interface, mixin). Every query result is sorted by name so generated code
 * does not depend on ingestion order.
 *
 * Not synchronized: callers serialize writes. Instances share no state.
 */
export class TypeRegistry {
  private readonly types = new Map<string, TypeFact>();
  private readonly subclasses = new RelationIndex();
  private readonly implementers = new RelationIndex();
  private readonly mixinUsers = new RelationIndex();

  get allTypes(): IterableIterator<TypeFact> {
    return this.types.values();
  }

  get length(): number {
    return this.types.size;
  }

  get isEmpty(): boolean {
    return this.types.size === 0;
  }

  get isNotEmpty(): boolean {
    return this.types.size > 0;
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  /** Reverse index for one relation kind (read-only use). */
  relationIndex(kind: RelationKind): RelationIndex {
    switch (kind) {
      case 'superclass':
        return this.subclasses;
      case 'interface':
        return this.implementers;
      case 'mixin':
        return this.mixinUsers;
    }
  }

  /**
   * Adds or replaces the fact for `fact.name`.
   * When replacing, the previous fact's relations are removed from the reverse indexes first.
   */
  register(fact: TypeFact): void {
    const previous = this.types.get(fact.name);
    if (previous) this.unindex(previous);

    this.types.set(fact.name, fact);
    this.index(fact);
  }

  registerAll(facts: Iterable<TypeFact>): void {
    for (const fact of facts) this.register(fact);
  }

  findByName(name: string): TypeFact | undefined {
    return this.types.get(name);
  }

  findSubclassesOf(baseName: string): TypeFact[] {
    return this.resolveSorted(this.subclasses.dependentsOf(baseName));
  }

  findImplementersOf(interfaceName: string): TypeFact[] {
    return this.resolveSorted(this.implementers.dependentsOf(interfaceName));
  }

  findByMixin(mixinName: string): TypeFact[] {
    return this.resolveSorted(this.mixinUsers.dependentsOf(mixinName));
  }

  /** Types that extend, implement or mix in any of `baseNames`; each at most once. */
  findByAnyBase(baseNames: Iterable<string>): TypeFact[] {
    const found = new Set<string>();
    for (const base of baseNames) {
      for (const name of this.directDependentsOf(base)) found.add(name);
    }
    return this.resolveSorted(found);
  }

  /** Transitive closure over all three relation kinds. Terminates on cyclic data. */
  findAllDescendantsOf(baseName: string): TypeFact[] {
    return this.resolveSorted(collectReachable(baseName, (name) => this.directDependentsOf(name)));
  }

  where(predicate: TypePredicate): TypeFact[] {
    const out: TypeFact[] = [];
    for (const fact of this.types.values()) {
      if (predicate(fact)) out.push(fact);
    }
    return out.sort(compareByName);
  }

  getGenericArgument(fact: TypeFact, baseName: string, paramName: string): string | undefined {
    return getGenericArgument(fact, baseName, paramName);
  }

  /** Types binding `baseName.paramName` to exactly `argType` (plain string equality). */
  findByGenericArgument(baseName: string, paramName: string, argType: string): TypeFact[] {
    const key = qualifiedGenericKey(baseName, paramName);
    return this.where(
      (fact) => Object.prototype.hasOwnProperty.call(fact.genericArguments, key) && fact.genericArguments[key] === argType,
    );
  }

  /**
   * Maps `keySelector(fact)` (default: the name) to the fact's name, in registration order.
   * On key collisions the last applied fact wins.
   */
  createTypeMap(keySelector?: (fact: TypeFact) => string): Map<string, string> {
    const map = new Map<string, string>();
    for (const fact of this.types.values()) {
      map.set(keySelector ? keySelector(fact) : fact.name, fact.name);
    }
    return map;
  }

  export(): RegistryExport {
    return exportFacts(this.types.values());
  }

  toJSON(): RegistryExport {
    return this.export();
  }

  renderHierarchy(rootName: string): string {
    return renderHierarchyTree(this, rootName);
  }

  clear(): void {
    this.types.clear();
    this.subclasses.clear();
    this.implementers.clear();
    this.mixinUsers.clear();
  }

  private index(fact: TypeFact): void {
    if (fact.superclass !== undefined) this.subclasses.add(fact.superclass, fact.name);
    for (const iface of fact.interfaces) this.implementers.add(iface, fact.name);
    for (const mixin of fact.mixins) this.mixinUsers.add(mixin, fact.name);
  }

  private unindex(fact: TypeFact): void {
    if (fact.superclass !== undefined) this.subclasses.remove(fact.superclass, fact.name);
    for (const iface of fact.interfaces) this.implementers.remove(iface, fact.name);
    for (const mixin of fact.mixins) this.mixinUsers.remove(mixin, fact.name);
  }

  private *directDependentsOf(baseName: string): Generator<string> {
    yield* this.subclasses.dependentsOf(baseName);
    yield* this.implementers.dependentsOf(baseName);
    yield* this.mixinUsers.dependentsOf(baseName);
  }

  private resolveSorted(names: Iterable<string>): TypeFact[] {
    const out: TypeFact[] = [];
    for (const name of names) {
      const fact = this.types.get(name);
      if (fact) out.push(fact);
    }
    return out.sort(compareByName);
  }
}
