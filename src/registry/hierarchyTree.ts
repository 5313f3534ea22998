import type { TypeFact } from '../facts/typeFact';

export type HierarchySource = {
  findByName(name: string): TypeFact | undefined;
  /** Direct subclasses, already sorted by name. */
  findSubclassesOf(baseName: string): TypeFact[];
};

const TEE = '├── ';
const CORNER = '└── ';
const PIPE = '│   ';
const SPACE = '    ';

/**
 * Renders the superclass hierarchy below `rootName` as an ASCII tree:
 *
 * ```
 * Entity
 * ├── Product
 * └── User
 *     └── Admin
 * ```
 *
 * Interfaces and mixins are not followed. Returns '' when the root is not registered.
 * A type reached a second time (only possible through a superclass cycle) is printed
 * with a ` (cycle)` suffix and not expanded.
 */
export function renderHierarchyTree(source: HierarchySource, rootName: string): string {
  if (!source.findByName(rootName)) return '';

  const lines: string[] = [rootName];
  const visited = new Set<string>([rootName]);

  type Frame = { name: string; indent: string; isLast: boolean };
  const stack: Frame[] = [];
  const pushChildren = (parent: string, indent: string) => {
    const children = source.findSubclassesOf(parent);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ name: children[i].name, indent, isLast: i === children.length - 1 });
    }
  };

  // Explicit stack: superclass chains can be deeper than the call stack.
  pushChildren(rootName, '');
  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const prefix = frame.isLast ? CORNER : TEE;
    if (visited.has(frame.name)) {
      lines.push(`${frame.indent}${prefix}${frame.name} (cycle)`);
      continue;
    }
    visited.add(frame.name);
    lines.push(`${frame.indent}${prefix}${frame.name}`);
    pushChildren(frame.name, frame.indent + (frame.isLast ? SPACE : PIPE));
  }

  return lines.join('\n') + '\n';
}
