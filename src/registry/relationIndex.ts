export type RelationKind = 'superclass' | 'interface' | 'mixin';

export const RELATION_KINDS: readonly RelationKind[] = ['superclass', 'interface', 'mixin'];

/**
 * Reverse index for one relation kind: target name -> names of the types related to it.
 * Empty buckets are dropped so `targets()` only lists names something still points at.
 */
export class RelationIndex {
  private readonly byTarget = new Map<string, Set<string>>();

  add(target: string, dependent: string): void {
    let bucket = this.byTarget.get(target);
    if (!bucket) {
      bucket = new Set<string>();
      this.byTarget.set(target, bucket);
    }
    bucket.add(dependent);
  }

  remove(target: string, dependent: string): void {
    const bucket = this.byTarget.get(target);
    if (!bucket) return;
    bucket.delete(dependent);
    if (bucket.size === 0) this.byTarget.delete(target);
  }

  dependentsOf(target: string): ReadonlySet<string> {
    return this.byTarget.get(target) ?? EMPTY;
  }

  targets(): IterableIterator<string> {
    return this.byTarget.keys();
  }

  clear(): void {
    this.byTarget.clear();
  }
}

const EMPTY: ReadonlySet<string> = new Set<string>();
