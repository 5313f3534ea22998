/**
 * Fact model: normalized, immutable records describing declared types.
 *
 * Facts are produced by an extractor (see extract/ts) or loaded from fact documents,
 * and are the only input the registry understands.
 */

export type MethodFact = {
  readonly name: string;
  /** Display string of the return type (e.g. `Promise<User>`). */
  readonly returnType: string;
  readonly parameterTypes: readonly string[];
  readonly isStatic: boolean;
};

export type TypeFact = {
  /** Type name (e.g. `UserRepository`); unique within one registry. */
  readonly name: string;
  /** Identifier of the declaring unit. Opaque to the registry. */
  readonly library: string;
  /** Superclass name; undefined for a root type. */
  readonly superclass?: string;
  readonly interfaces: readonly string[];
  readonly mixins: readonly string[];
  /** Type parameter names, e.g. `['T', 'U']` for `Pair<T, U>`. */
  readonly typeParameters: readonly string[];
  /**
   * Resolved generic bindings keyed by `Base.Param`.
   * Example: `{ 'Repository.T': 'User' }` for `UserRepository extends Repository<User>`.
   */
  readonly genericArguments: Readonly<Record<string, string>>;
  readonly methods: readonly MethodFact[];
  /** Field and accessor names. */
  readonly properties: readonly string[];
};

export type TypeFactInit = {
  name: string;
  library: string;
  superclass?: string | null;
  interfaces?: readonly string[];
  mixins?: readonly string[];
  typeParameters?: readonly string[];
  genericArguments?: Readonly<Record<string, string>>;
  methods?: readonly (MethodFact | MethodFactInit)[];
  properties?: readonly string[];
};

export type MethodFactInit = {
  name: string;
  returnType: string;
  parameterTypes?: readonly string[];
  isStatic?: boolean;
};

/** Serialized form shared by fact documents and the registry export. */
export type MethodFactJson = {
  name: string;
  returnType: string;
  parameterTypes: string[];
  isStatic: boolean;
};

export type TypeFactJson = {
  name: string;
  library: string;
  superclass?: string;
  interfaces?: string[];
  mixins?: string[];
  typeParameters?: string[];
  genericArguments?: Record<string, string>;
  methods?: MethodFactJson[];
  properties?: string[];
};

export function createMethodFact(init: MethodFactInit): MethodFact {
  return Object.freeze({
    name: init.name,
    returnType: init.returnType,
    parameterTypes: Object.freeze([...(init.parameterTypes ?? [])]),
    isStatic: init.isStatic ?? false,
  });
}

export function createTypeFact(init: TypeFactInit): TypeFact {
  const fact: TypeFact = {
    name: init.name,
    library: init.library,
    ...(init.superclass ? { superclass: init.superclass } : {}),
    interfaces: Object.freeze([...(init.interfaces ?? [])]),
    mixins: Object.freeze([...(init.mixins ?? [])]),
    typeParameters: Object.freeze([...(init.typeParameters ?? [])]),
    genericArguments: Object.freeze({ ...(init.genericArguments ?? {}) }),
    methods: Object.freeze((init.methods ?? []).map((m) => createMethodFact(m))),
    properties: Object.freeze([...(init.properties ?? [])]),
  };
  return Object.freeze(fact);
}

/** `Base.Param` key under which a generic binding is stored. */
export function qualifiedGenericKey(baseName: string, paramName: string): string {
  return `${baseName}.${paramName}`;
}

/** True when the fact extends, implements or mixes in `baseName` directly. */
export function inheritsFrom(fact: TypeFact, baseName: string): boolean {
  return fact.superclass === baseName || fact.interfaces.includes(baseName) || fact.mixins.includes(baseName);
}

/**
 * Concrete type bound to `baseName`'s parameter `paramName`, or undefined.
 * For `UserRepository extends Repository<User>`, `('Repository', 'T')` gives `'User'`.
 */
export function getGenericArgument(fact: TypeFact, baseName: string, paramName: string): string | undefined {
  const key = qualifiedGenericKey(baseName, paramName);
  return Object.prototype.hasOwnProperty.call(fact.genericArguments, key) ? fact.genericArguments[key] : undefined;
}

export function describeTypeFact(fact: TypeFact): string {
  return `TypeFact(${fact.name} from ${fact.library})`;
}

export function formatMethodSignature(method: MethodFact): string {
  const sig = `${method.returnType} ${method.name}(${method.parameterTypes.join(', ')})`;
  return method.isStatic ? `static ${sig}` : sig;
}

export function methodFactToJson(method: MethodFact): MethodFactJson {
  return {
    name: method.name,
    returnType: method.returnType,
    parameterTypes: [...method.parameterTypes],
    isStatic: method.isStatic,
  };
}

/** Empty lists/maps and a missing superclass are omitted. */
export function typeFactToJson(fact: TypeFact): TypeFactJson {
  const out: TypeFactJson = { name: fact.name, library: fact.library };
  if (fact.superclass !== undefined) out.superclass = fact.superclass;
  if (fact.interfaces.length > 0) out.interfaces = [...fact.interfaces];
  if (fact.mixins.length > 0) out.mixins = [...fact.mixins];
  if (fact.typeParameters.length > 0) out.typeParameters = [...fact.typeParameters];
  if (Object.keys(fact.genericArguments).length > 0) out.genericArguments = { ...fact.genericArguments };
  if (fact.methods.length > 0) out.methods = fact.methods.map(methodFactToJson);
  if (fact.properties.length > 0) out.properties = [...fact.properties];
  return out;
}

/** Ascending code-unit order on names; the one ordering every query result uses. */
export function compareByName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
