import ts from 'typescript';
import path from 'node:path';

import { createTypeFact, type TypeFact } from '../../facts/typeFact';
import { TypeRegistry } from '../../registry/typeRegistry';
import type { IndexReport } from '../../report/indexReport';
import { addFinding } from '../../report/reportBuilder';
import { scanSourceFiles } from '../../scan/sourceScanner';
import { toPosixPath } from '../../util/path';
import { readHeritage } from './heritage';
import { readMembers } from './members';
import { createProgramFromScan } from './program/createProgram';

export type TsFactExtractOptions = {
  projectRoot: string;
  tsconfigPath?: string;
  excludeGlobs?: string[];
  includeTests?: boolean;
  maxFiles?: number;
  /** Keep only types that transitively extend, implement or mix in one of these names. */
  bases?: string[];
  /** Optional report to populate (files scanned, facts, duplicate names). */
  report?: IndexReport;
};

/**
 * Produces one fact per named top-level class and interface (namespaces included) in the
 * scanned files. Classes local to a function body, such as those built by mixin functions, are skipped.
 * `library` is the declaring file, relative to projectRoot.
 */
export async function extractTypeFacts(opts: TsFactExtractOptions): Promise<TypeFact[]> {
  const projectRoot = path.resolve(opts.projectRoot);
  const scannedRel = await scanSourceFiles({
    sourceRoot: projectRoot,
    excludeGlobs: opts.excludeGlobs ?? [],
    includeTests: !!opts.includeTests,
    maxFiles: opts.maxFiles,
  });
  const scannedAbs = scannedRel.map((r) => path.resolve(projectRoot, r));

  const { program, checker } = createProgramFromScan({
    projectRoot,
    rootNamesAbs: scannedAbs,
    tsconfigPath: opts.tsconfigPath,
  });

  const wanted = new Set(scannedAbs);
  const facts: TypeFact[] = [];
  const definedIn = new Map<string, string>();

  for (const sf of program.getSourceFiles()) {
    if (!wanted.has(path.resolve(sf.fileName))) continue;
    const library = toPosixPath(path.relative(projectRoot, sf.fileName));

    const visit = (node: ts.Statement) => {
      if (ts.isModuleDeclaration(node)) {
        // `namespace a.b {}` nests declarations; function bodies are not visited.
        let body = node.body;
        while (body && ts.isModuleDeclaration(body)) body = body.body;
        if (body && ts.isModuleBlock(body)) body.statements.forEach(visit);
        return;
      }
      if ((ts.isClassDeclaration(node) || ts.isInterfaceDeclaration(node)) && node.name) {
        const name = node.name.text;
        const previous = definedIn.get(name);
        if (previous !== undefined && previous !== library && opts.report) {
          addFinding(opts.report, {
            kind: 'duplicateType',
            severity: 'warning',
            message: `${name} is already declared in ${previous}`,
            location: { file: library },
            tags: { type: name },
          });
        }
        definedIn.set(name, library);

        // Declaration merging (interface + interface) yields one fact per declaration;
        // the registry keeps the last one.
        const heritage = readHeritage(node, checker);
        const members = readMembers(node, checker);
        facts.push(
          createTypeFact({
            name,
            library,
            superclass: heritage.superclass,
            interfaces: heritage.interfaces,
            mixins: heritage.mixins,
            typeParameters: (node.typeParameters ?? []).map((p) => p.name.text),
            genericArguments: heritage.genericArguments,
            methods: members.methods,
            properties: members.properties,
          }),
        );
      }
    };
    sf.statements.forEach(visit);
  }

  const kept = opts.bases && opts.bases.length > 0 ? keepDescendants(facts, opts.bases) : facts;

  if (opts.report) {
    opts.report.filesScanned = scannedRel.length;
    opts.report.factsLoaded = kept.length;
  }
  return kept;
}

/** Facts reachable from any of `bases` through superclass, interface or mixin relations. */
export function keepDescendants(facts: TypeFact[], bases: string[]): TypeFact[] {
  const registry = new TypeRegistry();
  registry.registerAll(facts);
  const keep = new Set<string>();
  for (const base of bases) {
    for (const f of registry.findAllDescendantsOf(base)) keep.add(f.name);
  }
  return facts.filter((f) => keep.has(f.name));
}
