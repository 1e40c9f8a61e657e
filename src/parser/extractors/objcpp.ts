import type { ParsedDependency, ParsedFile, ParsedSymbol, SymbolKind } from '../../types.js';
import type { SyntaxProvider } from '../syntax.js';
import type { ExtractionOutcome, LanguageExtractor } from './types.js';
import { readSourceFile } from './base.js';
import { cppExtractor } from './cpp.js';
import { objcExtractor } from './objc.js';

// Entries the Objective-C grammar reads more faithfully than the C++ one
const OBJC_PREFERRED = new Set<SymbolKind>(['class', 'interface', 'implementation', 'protocol', 'category']);

function symbolKey(symbol: ParsedSymbol): string {
  return `${symbol.kind}:${symbol.name}`;
}

function rangeKey(symbol: ParsedSymbol): string {
  return `${symbolKey(symbol)}@${symbol.span.startByte}-${symbol.span.endByte}`;
}

function dependencyKey(dep: ParsedDependency): string {
  return `${dep.type}:${dep.source}:${dep.target}`;
}

/**
 * Every C++ symbol is kept, overloads included. An Objective-C symbol of a
 * kind the Objective-C grammar owns replaces the first C++ symbol of the same
 * kind and name; any other Objective-C symbol is appended unless a symbol of
 * the same kind, name and range is already there. Dependencies are unique on
 * type, source and target.
 */
export function mergeResults(cpp: ParsedFile, objc: ParsedFile): ParsedFile {
  const symbols = [...cpp.symbols];
  const ranges = new Set(symbols.map(rangeKey));
  const replaced = new Set<number>();

  for (const symbol of objc.symbols) {
    if (OBJC_PREFERRED.has(symbol.kind)) {
      const at = symbols.findIndex(
        (existing, i) => !replaced.has(i) && i < cpp.symbols.length && symbolKey(existing) === symbolKey(symbol)
      );
      if (at >= 0) {
        symbols[at] = symbol;
        replaced.add(at);
        ranges.add(rangeKey(symbol));
        continue;
      }
    }
    if (ranges.has(rangeKey(symbol))) continue;
    symbols.push(symbol);
    ranges.add(rangeKey(symbol));
  }

  const dependencies = new Map<string, ParsedDependency>();
  for (const dep of [...cpp.dependencies, ...objc.dependencies]) {
    const key = dependencyKey(dep);
    if (!dependencies.has(key)) dependencies.set(key, dep);
  }

  return {
    ...cpp,
    language: 'objcpp',
    tree: cpp.tree ?? objc.tree,
    symbols,
    dependencies: [...dependencies.values()],
  };
}

function extractSource(filePath: string, content: string, syntax?: SyntaxProvider): ExtractionOutcome {
  const cpp = cppExtractor.extractSource(filePath, content, syntax);
  const objc = objcExtractor.extractSource(filePath, content, syntax);

  // Each grammar trips over the other half of the language; only a file both reject is broken
  const error = cpp.error && objc.error ? cpp.error : null;
  return { file: mergeResults(cpp.file, objc.file), error };
}

export const objcppExtractor: LanguageExtractor = {
  language: 'objcpp',
  displayName: 'Objective-C++',
  extensions: ['.mm'],
  async extract(file, syntax) {
    const read = await readSourceFile(file, 'objcpp');
    if (!read.ok) return read.outcome;
    return extractSource(file.path, read.content, syntax);
  },
  extractSource,
};
