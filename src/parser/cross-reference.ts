import { basename, dirname, extname, join } from 'path';
import type { LanguageTag, ParsedFile, ParsedSymbol, SymbolKind } from '../types.js';
import { createLogger } from '../logger.js';
import { HEADER_EXTENSIONS } from './extractors/base.js';
import { addDependency, innermostScope, splitQualifiedName } from './extractors/helpers.js';

const log = createLogger('link');

const DECLARATION_KINDS = new Set<SymbolKind>([
  'function_declaration',
  'method',
  'virtual_method',
  'constructor',
  'destructor',
  'operator',
  'function',
  'function_template',
  'static_function',
  'inline_function',
]);

const DEFINITION_KINDS = new Set<SymbolKind>([
  'function',
  'static_function',
  'inline_function',
  'method',
  'constructor',
  'destructor',
  'operator',
  'function_template',
  'method_implementation',
]);

export const IMPLEMENTATION_EXTENSIONS = ['.c', '.cpp', '.cc', '.cxx', '.m', '.mm'];

const HEADER_LANGUAGES = new Set<LanguageTag>(['c', 'cpp', 'objc', 'objcpp']);

interface Declaration {
  name: string;
  /** Enclosing type for members; null at file level. */
  scope: string | null;
  used: boolean;
}

interface Definition {
  symbol: ParsedSymbol;
  member: string;
  scope: string | null;
}

function collectDeclarations(symbols: ParsedSymbol[]): Declaration[] {
  const declarations: Declaration[] = [];
  for (const symbol of symbols) {
    if (DECLARATION_KINDS.has(symbol.kind)) {
      declarations.push({ name: symbol.name, scope: null, used: false });
    }
    for (const child of symbol.children) {
      if (DECLARATION_KINDS.has(child.kind)) {
        declarations.push({ name: child.name, scope: symbol.name, used: false });
      }
    }
  }
  return declarations;
}

function collectDefinitions(symbols: ParsedSymbol[]): Definition[] {
  const definitions: Definition[] = [];
  for (const symbol of symbols) {
    if (DEFINITION_KINDS.has(symbol.kind)) {
      const { scope, member } = splitQualifiedName(symbol.name);
      definitions.push({ symbol, member, scope });
    }
    for (const child of symbol.children) {
      if (DEFINITION_KINDS.has(child.kind)) {
        definitions.push({ symbol: child, member: child.name, scope: symbol.name });
      }
    }
  }
  return definitions;
}

function matches(definition: Definition, declaration: Declaration): boolean {
  if (declaration.used || declaration.name !== definition.member) return false;
  if (definition.scope === null) return true;
  return declaration.scope === innermostScope(definition.scope);
}

/**
 * Links an implementation file to the header it implements. Appends one
 * `implements_header` edge, then one `implements_declaration` edge per
 * definition that finds an unused declaration of the same name and scope.
 * Overloads pair up in declaration order. Returns the number of
 * declaration links added.
 */
export function linkDeclarations(declFile: ParsedFile, implFile: ParsedFile): number {
  addDependency(implFile, 'implements_header', implFile.path, declFile.path);

  const declarations = collectDeclarations(declFile.symbols);
  let linked = 0;
  for (const definition of collectDefinitions(implFile.symbols)) {
    const declaration = declarations.find(candidate => matches(definition, candidate));
    if (!declaration) continue;

    declaration.used = true;
    const target = declaration.scope ? `${declaration.scope}::${declaration.name}` : declaration.name;
    addDependency(implFile, 'implements_declaration', definition.symbol.name, target);
    linked++;
  }
  return linked;
}

/** Same directory, same base name, an implementation extension. */
export function findImplementationPath(header: string, candidates: readonly string[]): string | undefined {
  const ext = extname(header);
  if (!HEADER_EXTENSIONS.has(ext.toLowerCase())) return undefined;

  const stem = join(dirname(header), basename(header, ext));
  return candidates.find(candidate => {
    const candidateExt = extname(candidate);
    return (
      IMPLEMENTATION_EXTENSIONS.includes(candidateExt.toLowerCase()) &&
      join(dirname(candidate), basename(candidate, candidateExt)) === stem
    );
  });
}

/** Pairs each header with its implementation and links them, one pair at a time. */
export function associateHeaders(files: readonly ParsedFile[]): number {
  const byPath = new Map(files.map(file => [file.path, file]));
  const paths = files.map(file => file.path);

  let total = 0;
  for (const header of files) {
    if (!HEADER_LANGUAGES.has(header.language)) continue;
    const implPath = findImplementationPath(header.path, paths);
    const impl = implPath ? byPath.get(implPath) : undefined;
    if (!impl) continue;

    const linked = linkDeclarations(header, impl);
    log.debug(`${impl.path} -> ${header.path}: ${linked} declaration(s) linked`);
    total += linked;
  }
  return total;
}
