// Public library surface.

export const VERSION = '0.1.0';

export * from './facts/typeFact';
export * from './facts/loadFactFiles';
export * from './registry/typeRegistry';
export * from './registry/relationIndex';
export * from './registry/exportRegistry';
export * from './registry/hierarchyTree';
export * from './registry/traversal';
export * from './output/deterministicJson';
export * from './output/writeIndexJson';
export * from './report/indexReport';
export * from './report/diagnostics';
export * from './scan/sourceScanner';

export * from './extract/ts/tsFactExtractor';
