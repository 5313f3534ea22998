import ts from 'typescript';
import { qualifiedGenericKey } from '../../facts/typeFact';

export type HeritageFacts = {
  superclass?: string;
  interfaces: string[];
  mixins: string[];
  genericArguments: Record<string, string>;
};

/** Name a heritage expression refers to: `Base` or the right-most part of `models.Base`. */
export function referenceName(expr: ts.Expression): string | undefined {
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isPropertyAccessExpression(expr)) return expr.name.text;
  return undefined;
}

/** Type parameter names declared by whatever `expr` refers to (class, interface or generic function). */
function declaredTypeParameterNames(expr: ts.Expression, checker: ts.TypeChecker): string[] {
  const at = ts.isPropertyAccessExpression(expr) ? expr.name : expr;
  let sym = checker.getSymbolAtLocation(at);
  if (sym && sym.flags & ts.SymbolFlags.Alias) sym = checker.getAliasedSymbol(sym);

  for (const decl of sym?.declarations ?? []) {
    if ((ts.isClassLike(decl) || ts.isInterfaceDeclaration(decl) || ts.isFunctionLike(decl)) && decl.typeParameters) {
      return decl.typeParameters.map((p) => p.name.text);
    }
    if (ts.isVariableDeclaration(decl) && decl.initializer && ts.isFunctionLike(decl.initializer)) {
      return (decl.initializer.typeParameters ?? []).map((p) => p.name.text);
    }
  }
  return [];
}

function bindGenericArguments(
  out: Record<string, string>,
  baseExpr: ts.Expression,
  baseName: string,
  typeArgs: ts.NodeArray<ts.TypeNode> | undefined,
  checker: ts.TypeChecker,
): void {
  if (!typeArgs || typeArgs.length === 0) return;
  const params = declaredTypeParameterNames(baseExpr, checker);
  typeArgs.forEach((arg, i) => {
    if (i >= params.length) return;
    out[qualifiedGenericKey(baseName, params[i])] = checker.typeToString(checker.getTypeFromTypeNode(arg));
  });
}

/**
 * Reads `extends` for a class. A call chain is a mixin application:
 * `class C extends Timestamped(Tagged(Base))` has superclass `Base` and mixins
 * `['Tagged', 'Timestamped']` (innermost applied first).
 */
function readClassExtends(t: ts.ExpressionWithTypeArguments, out: HeritageFacts, checker: ts.TypeChecker): void {
  let expr: ts.Expression = t.expression;
  let typeArgs = t.typeArguments;
  const applied: string[] = [];

  while (ts.isCallExpression(expr) && expr.arguments.length > 0) {
    const mixin = referenceName(expr.expression);
    if (!mixin) break;
    applied.push(mixin);
    bindGenericArguments(out.genericArguments, expr.expression, mixin, expr.typeArguments, checker);
    expr = expr.arguments[0];
    typeArgs = undefined;
  }

  // Instantiation expression inside a mixin call: `Tagged(Repository<User>)`.
  if (ts.isExpressionWithTypeArguments(expr)) {
    typeArgs = expr.typeArguments;
    expr = expr.expression;
  }

  out.mixins.push(...applied.reverse());
  const superclass = referenceName(expr);
  if (superclass) {
    out.superclass = superclass;
    bindGenericArguments(out.genericArguments, expr, superclass, typeArgs, checker);
  }
}

function readInterfaceRef(t: ts.ExpressionWithTypeArguments, out: HeritageFacts, checker: ts.TypeChecker): void {
  const name = referenceName(t.expression);
  if (!name) return;
  out.interfaces.push(name);
  bindGenericArguments(out.genericArguments, t.expression, name, t.typeArguments, checker);
}

/**
 * Relations of a class or interface declaration. For interfaces every `extends` entry is
 * recorded as an interface; they have no superclass.
 */
export function readHeritage(node: ts.ClassDeclaration | ts.InterfaceDeclaration, checker: ts.TypeChecker): HeritageFacts {
  const out: HeritageFacts = { interfaces: [], mixins: [], genericArguments: {} };
  const isClass = ts.isClassDeclaration(node);

  for (const hc of node.heritageClauses ?? []) {
    for (const t of hc.types) {
      if (isClass && hc.token === ts.SyntaxKind.ExtendsKeyword) readClassExtends(t, out, checker);
      else readInterfaceRef(t, out, checker);
    }
  }
  return out;
}
