import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import { compareByName, type TypeFactJson } from '../facts/typeFact';
import type { RegistryExport } from '../registry/exportRegistry';
import { stableStringify } from './deterministicJson';

export const FACT_DOCUMENT_SCHEMA = 'type-facts-v1';

export type WriteIndexJsonOptions = {
  /** Pretty-print indentation (default 2). */
  space?: number;
};

/**
 * Types sorted by name. Relation lists keep their recorded order: it is part of the fact.
 */
export function canonicalizeExport(data: RegistryExport): RegistryExport {
  return {
    types: data.types.slice().sort(compareByName),
    statistics: { ...data.statistics },
  };
}

/**
 * Serialize a registry export to a deterministic JSON string. The result is itself a
 * valid fact document and can be loaded back.
 */
export function serializeIndexJson(data: RegistryExport, options: WriteIndexJsonOptions = {}): string {
  return stableStringify({ schema: FACT_DOCUMENT_SCHEMA, ...canonicalizeExport(data) }, options.space ?? 2);
}

export async function writeIndexJsonFile(
  filePath: string,
  data: RegistryExport,
  options: WriteIndexJsonOptions = {},
): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeIndexJson(data, options), 'utf8');
}

/** Write a bare fact document (no statistics), as produced by the extractor. */
export async function writeFactDocumentFile(
  filePath: string,
  types: TypeFactJson[],
  options: WriteIndexJsonOptions = {},
): Promise<void> {
  const json = stableStringify({ schema: FACT_DOCUMENT_SCHEMA, types: types.slice().sort(compareByName) }, options.space ?? 2);
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, json, 'utf8');
}
