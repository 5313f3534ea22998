import Ajv from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { IndexReport } from '../report/indexReport';
import { addFinding } from '../report/reportBuilder';
import { FACT_FILE_INCLUDES, scanSourceFiles } from '../scan/sourceScanner';
import factSchema from './schema/type-facts-v1.json';
import { createTypeFact, type MethodFactInit, type TypeFact } from './typeFact';

/** A fact document as accepted on input (`superclass` may be null). */
export type FactDocumentJson = {
  schema?: 'type-facts-v1';
  types: Array<{
    name: string;
    library: string;
    superclass?: string | null;
    interfaces?: string[];
    mixins?: string[];
    typeParameters?: string[];
    genericArguments?: Record<string, string>;
    methods?: MethodFactInit[];
    properties?: string[];
  }>;
  statistics?: Record<string, number>;
};

export type ParsedFactDocument =
  | { ok: true; facts: TypeFact[] }
  | { ok: false; error: string };

export type LoadFactFilesOptions = {
  sourceRoot: string;
  /** Globs selecting fact documents; defaults to `**\/*.facts.json`. */
  includeGlobs?: string[];
  excludeGlobs?: string[];
  maxFiles?: number;
  /** Collects invalid documents and duplicate names. */
  report?: IndexReport;
};

export type LoadedFacts = {
  /** Relative (posix) paths of every document found, valid or not. */
  files: string[];
  /** Facts in file order, then document order. */
  facts: TypeFact[];
};

let validator: ValidateFunction<FactDocumentJson> | undefined;

function getValidator(): ValidateFunction<FactDocumentJson> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    validator = ajv.compile<FactDocumentJson>(factSchema);
  }
  return validator;
}

/**
 * Validate a parsed JSON value against the fact document schema and build facts from it.
 */
export function parseFactDocument(value: unknown): ParsedFactDocument {
  const validate = getValidator();
  if (!validate(value)) {
    const detail = (validate.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    return { ok: false, error: `Schema validation failed: ${detail}` };
  }
  return { ok: true, facts: value.types.map((t) => createTypeFact(t)) };
}

/**
 * Finds fact documents under sourceRoot and loads them.
 *
 * A document that cannot be read, parsed or validated is skipped with an `invalidFactFile`
 * error finding; the others still load. A name defined again (in the same or a later
 * document) is reported as `duplicateType`; registering the result keeps the later fact.
 */
export async function loadFactFiles(opts: LoadFactFilesOptions): Promise<LoadedFacts> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const files = await scanSourceFiles({
    sourceRoot,
    includeGlobs: opts.includeGlobs && opts.includeGlobs.length > 0 ? opts.includeGlobs : FACT_FILE_INCLUDES,
    excludeGlobs: opts.excludeGlobs,
    includeTests: true,
    maxFiles: opts.maxFiles,
  });

  const facts: TypeFact[] = [];
  const definedIn = new Map<string, string>();

  for (const rel of files) {
    const parsed = await readFactDocument(path.join(sourceRoot, rel));
    if (!parsed.ok) {
      if (opts.report) {
        addFinding(opts.report, {
          kind: 'invalidFactFile',
          severity: 'error',
          message: parsed.error,
          location: { file: rel },
        });
      }
      continue;
    }

    parsed.facts.forEach((fact, typeIndex) => {
      const previous = definedIn.get(fact.name);
      if (previous !== undefined && opts.report) {
        addFinding(opts.report, {
          kind: 'duplicateType',
          severity: 'warning',
          message: `${fact.name} is already defined in ${previous}`,
          location: { file: rel, typeIndex },
          tags: { type: fact.name },
        });
      }
      definedIn.set(fact.name, rel);
      facts.push(fact);
    });
  }

  if (opts.report) {
    opts.report.filesScanned = files.length;
    opts.report.factsLoaded = facts.length;
  }

  return { files, facts };
}

async function readFactDocument(absPath: string): Promise<ParsedFactDocument> {
  let text: string;
  try {
    text = await fs.readFile(absPath, 'utf8');
  } catch (e: unknown) {
    return { ok: false, error: `Unable to read file: ${e instanceof Error ? e.message : String(e)}` };
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e: unknown) {
    return { ok: false, error: `Invalid JSON: ${e instanceof Error ? e.message : String(e)}` };
  }

  return parseFactDocument(value);
}
