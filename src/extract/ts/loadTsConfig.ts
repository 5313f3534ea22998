import ts from 'typescript';
import path from 'node:path';

export type LoadedTsConfig = {
  projectRoot: string;
  tsconfigPath: string;
  options: ts.CompilerOptions;
  fileNames: string[];
};

function flatten(diagnostics: readonly ts.Diagnostic[]): string {
  return diagnostics.map((d) => ts.flattenDiagnosticMessageText(d.messageText, '\n')).join('\n');
}

/**
 * Loads tsconfig.json (or a provided config path) and returns parsed compiler options + file list.
 * Throws with the compiler's diagnostic text when the file is missing or invalid.
 */
export function loadTsConfig(projectRoot: string, tsconfigPath?: string): LoadedTsConfig {
  const resolvedConfigPath = tsconfigPath
    ? path.resolve(projectRoot, tsconfigPath)
    : ts.findConfigFile(projectRoot, ts.sys.fileExists, 'tsconfig.json');

  if (!resolvedConfigPath || !ts.sys.fileExists(resolvedConfigPath)) {
    throw new Error(`Unable to find tsconfig.json under: ${projectRoot}`);
  }

  const read = ts.readConfigFile(resolvedConfigPath, ts.sys.readFile);
  if (read.error) {
    throw new Error(`Failed to read tsconfig: ${resolvedConfigPath}\n${flatten([read.error])}`);
  }

  const parsed = ts.parseJsonConfigFileContent(
    read.config,
    ts.sys,
    path.dirname(resolvedConfigPath),
    /*existingOptions*/ undefined,
    resolvedConfigPath,
  );

  if (parsed.errors.length) {
    throw new Error(`Failed to parse tsconfig: ${resolvedConfigPath}\n${flatten(parsed.errors)}`);
  }

  return {
    projectRoot,
    tsconfigPath: resolvedConfigPath,
    options: parsed.options,
    fileNames: parsed.fileNames,
  };
}
