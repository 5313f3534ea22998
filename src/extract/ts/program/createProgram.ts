import ts from 'typescript';
import path from 'node:path';
import { loadTsConfig } from '../loadTsConfig';

export type CreateProgramOptions = {
  projectRoot: string;
  /** Absolute paths to files to include as rootNames (scanner-controlled). */
  rootNamesAbs: string[];
  /** Optional tsconfig path (relative to projectRoot or absolute). */
  tsconfigPath?: string;
};

export type CreatedProgram = {
  projectRoot: string;
  configPath?: string;
  compilerOptions: ts.CompilerOptions;
  program: ts.Program;
  checker: ts.TypeChecker;
};

const NO_INPUTS = 'No inputs were found in config file';

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Creates a TypeScript program using compilerOptions from tsconfig.json when available,
 * but always uses the provided rootNamesAbs (scanner-controlled inventory).
 *
 * Throws if a tsconfigPath is provided but cannot be loaded/parsed.
 */
export function createProgramFromScan(opts: CreateProgramOptions): CreatedProgram {
  const projectRoot = path.resolve(opts.projectRoot);

  let compilerOptions: ts.CompilerOptions = { allowJs: false, noEmit: true };
  let configPath: string | undefined;

  if (opts.tsconfigPath) {
    // An explicit tsconfig must load.
    const loaded = loadTsConfig(projectRoot, opts.tsconfigPath);
    compilerOptions = { ...loaded.options, noEmit: true };
    configPath = loaded.tsconfigPath;
  } else {
    const found = ts.findConfigFile(projectRoot, ts.sys.fileExists, 'tsconfig.json');
    if (found && ts.sys.fileExists(found)) {
      try {
        const loaded = loadTsConfig(projectRoot, found);
        compilerOptions = { ...loaded.options, noEmit: true };
        configPath = loaded.tsconfigPath;
      } catch (e: unknown) {
        // rootNames always come from the scanner, so an auto-discovered tsconfig whose
        // include globs match nothing is not an error.
        if (!errorMessage(e).includes(NO_INPUTS)) throw e;
      }
    }
  }

  const program = ts.createProgram({
    rootNames: opts.rootNamesAbs,
    options: compilerOptions,
  });
  const checker = program.getTypeChecker();

  return { projectRoot, configPath, compilerOptions, program, checker };
}
