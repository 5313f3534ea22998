import { describeTypeFact, formatMethodSignature, type TypeFact } from '../facts/typeFact';
import type { TypeRegistry } from '../registry/typeRegistry';

export const QUERY_OPERATIONS = [
  'show',
  'subclasses',
  'implementers',
  'mixin',
  'any-base',
  'descendants',
  'generic',
  'generic-arg',
  'tree',
  'type-map',
] as const;

export type QueryOperation = (typeof QUERY_OPERATIONS)[number];

export type QueryResult = { ok: true; lines: string[] } | { ok: false; error: string };

export function isQueryOperation(s: string): s is QueryOperation {
  return QUERY_OPERATIONS.some((op) => op === s);
}

/** [min, max] argument count per operation. */
const ARITY: Record<QueryOperation, [number, number]> = {
  show: [1, 1],
  subclasses: [1, 1],
  implementers: [1, 1],
  mixin: [1, 1],
  'any-base': [1, Infinity],
  descendants: [1, 1],
  generic: [3, 3],
  'generic-arg': [3, 3],
  tree: [1, 1],
  'type-map': [0, 0],
};

const USAGE: Record<QueryOperation, string> = {
  show: 'show <Type>',
  subclasses: 'subclasses <Base>',
  implementers: 'implementers <Interface>',
  mixin: 'mixin <Mixin>',
  'any-base': 'any-base <Base...>',
  descendants: 'descendants <Base>',
  generic: 'generic <Base> <Param> <ConcreteType>',
  'generic-arg': 'generic-arg <Type> <Base> <Param>',
  tree: 'tree <Root>',
  'type-map': 'type-map',
};

const names = (facts: TypeFact[]) => facts.map((f) => f.name);

function showType(fact: TypeFact): string[] {
  const lines = [describeTypeFact(fact)];
  if (fact.superclass !== undefined) lines.push(`  extends ${fact.superclass}`);
  if (fact.interfaces.length) lines.push(`  implements ${fact.interfaces.join(', ')}`);
  if (fact.mixins.length) lines.push(`  mixins ${fact.mixins.join(', ')}`);
  if (fact.typeParameters.length) lines.push(`  type parameters ${fact.typeParameters.join(', ')}`);
  for (const key of Object.keys(fact.genericArguments).sort()) {
    lines.push(`  ${key} = ${fact.genericArguments[key]}`);
  }
  for (const m of fact.methods) lines.push(`  method ${formatMethodSignature(m)}`);
  for (const p of fact.properties) lines.push(`  property ${p}`);
  return lines;
}

/**
 * Runs one query against a populated registry and returns the output lines.
 * Unknown types give empty output, not an error; only bad usage fails.
 */
export function executeQuery(registry: TypeRegistry, operation: string, args: string[]): QueryResult {
  if (!isQueryOperation(operation)) {
    return { ok: false, error: `Unknown query operation: ${operation} (expected one of ${QUERY_OPERATIONS.join(', ')})` };
  }
  const [min, max] = ARITY[operation];
  if (args.length < min || args.length > max) {
    return { ok: false, error: `Usage: query ${USAGE[operation]}` };
  }

  switch (operation) {
    case 'show': {
      const fact = registry.findByName(args[0]);
      return { ok: true, lines: fact ? showType(fact) : [] };
    }
    case 'subclasses':
      return { ok: true, lines: names(registry.findSubclassesOf(args[0])) };
    case 'implementers':
      return { ok: true, lines: names(registry.findImplementersOf(args[0])) };
    case 'mixin':
      return { ok: true, lines: names(registry.findByMixin(args[0])) };
    case 'any-base':
      return { ok: true, lines: names(registry.findByAnyBase(new Set(args))) };
    case 'descendants':
      return { ok: true, lines: names(registry.findAllDescendantsOf(args[0])) };
    case 'generic':
      return { ok: true, lines: names(registry.findByGenericArgument(args[0], args[1], args[2])) };
    case 'generic-arg': {
      const fact = registry.findByName(args[0]);
      const value = fact ? registry.getGenericArgument(fact, args[1], args[2]) : undefined;
      return { ok: true, lines: value !== undefined ? [value] : [] };
    }
    case 'tree': {
      const tree = registry.renderHierarchy(args[0]);
      return { ok: true, lines: tree === '' ? [] : tree.replace(/\n$/, '').split('\n') };
    }
    case 'type-map':
      return {
        ok: true,
        lines: Array.from(registry.createTypeMap(), ([key, name]) => `${key}\t${name}`),
      };
  }
}
