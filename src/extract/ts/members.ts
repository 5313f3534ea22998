import ts from 'typescript';
import { createMethodFact, type MethodFact } from '../../facts/typeFact';

export type MemberFacts = {
  methods: MethodFact[];
  properties: string[];
};

function memberName(name: ts.PropertyName | undefined): string | undefined {
  if (!name) return undefined;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
  // #private names and computed keys are not part of the public surface.
  return undefined;
}

function hasFlag(node: ts.Declaration, flag: ts.ModifierFlags): boolean {
  return (ts.getCombinedModifierFlags(node) & flag) !== 0;
}

function isHidden(node: ts.Declaration): boolean {
  return hasFlag(node, ts.ModifierFlags.Private);
}

function toMethodFact(
  m: ts.MethodDeclaration | ts.MethodSignature,
  name: string,
  checker: ts.TypeChecker,
): MethodFact {
  const sig = checker.getSignatureFromDeclaration(m);
  return createMethodFact({
    name,
    returnType: sig ? checker.typeToString(checker.getReturnTypeOfSignature(sig)) : 'unknown',
    parameterTypes: m.parameters.map((p) => checker.typeToString(checker.getTypeAtLocation(p))),
    isStatic: hasFlag(m, ts.ModifierFlags.Static),
  });
}

/**
 * Public methods and property names of a class or interface, in declaration order.
 * Overloads contribute one method (the first signature). Properties list fields
 * (including constructor parameter properties) first, then getters that are not fields.
 */
export function readMembers(node: ts.ClassDeclaration | ts.InterfaceDeclaration, checker: ts.TypeChecker): MemberFacts {
  const methods: MethodFact[] = [];
  const seenMethods = new Set<string>();
  const fields: string[] = [];
  const getters: string[] = [];

  for (const m of node.members) {
    if (ts.isMethodDeclaration(m) || ts.isMethodSignature(m)) {
      const name = memberName(m.name);
      if (name === undefined || isHidden(m) || seenMethods.has(name)) continue;
      seenMethods.add(name);
      methods.push(toMethodFact(m, name, checker));
    } else if (ts.isPropertyDeclaration(m) || ts.isPropertySignature(m)) {
      const name = memberName(m.name);
      if (name !== undefined && !isHidden(m)) fields.push(name);
    } else if (ts.isGetAccessorDeclaration(m)) {
      const name = memberName(m.name);
      if (name !== undefined && !isHidden(m)) getters.push(name);
    } else if (ts.isConstructorDeclaration(m)) {
      for (const p of m.parameters) {
        if (!ts.isParameterPropertyDeclaration(p, m) || isHidden(p) || !ts.isIdentifier(p.name)) continue;
        fields.push(p.name.text);
      }
    }
  }

  const fieldSet = new Set(fields);
  return {
    methods,
    properties: [...fields, ...getters.filter((g) => !fieldSet.has(g))],
  };
}
