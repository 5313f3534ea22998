/**
 * Breadth-first reachability from `start` following `next` edges.
 *
 * Each name is returned (and expanded) at most once, so cyclic edge data terminates.
 * `start` itself is only part of the result when some path leads back to it.
 * Result order is discovery order; callers sort as needed.
 */
export function collectReachable(start: string, next: (name: string) => Iterable<string>): string[] {
  const found = new Set<string>();
  const queue: string[] = [start];

  // Queue is consumed by index; entries are never removed.
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    for (const dependent of next(current)) {
      if (found.has(dependent)) continue;
      found.add(dependent);
      queue.push(dependent);
    }
  }

  return Array.from(found);
}
