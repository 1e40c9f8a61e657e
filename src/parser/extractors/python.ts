import type { SyntaxNode } from '../syntax.js';
import type { ParsedSymbol, SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { defineExtractor } from './base.js';
import {
  CallerIndex,
  addCallDependencies,
  addDependency,
  declarationHeader,
  findDescendants,
  makeSymbol,
} from './helpers.js';

const CALLABLE_KINDS = new Set<SymbolKind>([
  'function',
  'async_function',
  'method',
  'async_method',
  'static_method',
  'class_method',
]);

export const MODULE_SYMBOL = '__module__';

/** Top-level directory of a relative path, or '' for files at the root. */
function topLevelPackage(filePath: string): string {
  const parts = filePath.replace(/\\/g, '/').split('/');
  return parts.length > 1 ? parts[0] : '';
}

/**
 * Relative and single-segment imports are internal. Dotted imports are
 * external unless they start with the file's own top-level package.
 */
export function isExternalPythonImport(moduleName: string, filePath: string): boolean {
  if (moduleName.startsWith('.')) return false;
  if (!moduleName.includes('.')) return false;
  const pkg = topLevelPackage(filePath);
  return !(pkg && moduleName.split('.')[0] === pkg);
}

export function cleanDocstring(raw: string): string {
  return raw
    .trim()
    .replace(/^[rRbBuUfF]{0,2}("""|''')/, '')
    .replace(/("""|''')$/, '')
    .replace(/^[rRbBuUfF]{0,2}["']/, '')
    .replace(/["']$/, '')
    .trim();
}

/** String literal opening a block, if its first statement is one. */
function blockDocstring(block: SyntaxNode | null): string | undefined {
  const first = block?.namedChildren.find(child => child.type !== 'comment');
  if (!first || first.type !== 'expression_statement') return undefined;
  const literal = first.namedChildren[0];
  if (!literal || literal.type !== 'string') return undefined;
  const doc = cleanDocstring(literal.text);
  return doc.length > 0 ? doc : undefined;
}

interface Definition {
  /** function_definition or class_definition */
  node: SyntaxNode;
  /** decorated_definition when decorated, else `node` */
  outer: SyntaxNode;
  decorators: string[];
}

function unwrapDefinition(node: SyntaxNode): Definition | null {
  if (node.type === 'function_definition' || node.type === 'class_definition') {
    return { node, outer: node, decorators: [] };
  }
  if (node.type !== 'decorated_definition') return null;

  const inner = node.childForFieldName('definition');
  if (!inner) return null;
  const decorators = node.namedChildren
    .filter(child => child.type === 'decorator')
    .map(decorator => decorator.text.trim());
  return { node: inner, outer: node, decorators };
}

function signatureOf(def: Definition): string {
  const header = declarationHeader(def.node, def.node.childForFieldName('body'));
  return [...def.decorators, header].join('\n');
}

function isAsync(fn: SyntaxNode): boolean {
  return fn.children.some(child => child.type === 'async');
}

function hasDecorator(def: Definition, name: string): boolean {
  return def.decorators.some(decorator => new RegExp(`^@${name}\\b`).test(decorator));
}

function methodKind(def: Definition): SymbolKind {
  if (hasDecorator(def, 'staticmethod')) return 'static_method';
  if (hasDecorator(def, 'classmethod')) return 'class_method';
  return isAsync(def.node) ? 'async_method' : 'method';
}

function functionSymbol(def: Definition, kind: SymbolKind): ParsedSymbol | null {
  const name = def.node.childForFieldName('name');
  if (!name) return null;
  return makeSymbol(name.text, kind, def.outer, {
    signature: signatureOf(def),
    docstring: blockDocstring(def.node.childForFieldName('body')),
  });
}

function classMethods(body: SyntaxNode | null): ParsedSymbol[] {
  if (!body) return [];
  const methods: ParsedSymbol[] = [];
  for (const child of body.namedChildren) {
    const def = unwrapDefinition(child);
    if (!def || def.node.type !== 'function_definition') continue;
    const symbol = functionSymbol(def, methodKind(def));
    if (symbol) methods.push(symbol);
  }
  return methods;
}

function extractModuleDoc(ctx: ExtractionContext): void {
  const docstring = blockDocstring(ctx.root);
  if (!docstring) return;
  ctx.file.symbols.push(makeSymbol(MODULE_SYMBOL, 'module', ctx.root, { docstring }));
}

function extractImports(ctx: ExtractionContext): void {
  const record = (moduleName: string) => {
    if (!moduleName) return;
    addDependency(ctx.file, 'import', '', moduleName, {
      targetModule: moduleName,
      isExternal: isExternalPythonImport(moduleName, ctx.file.path),
    });
  };

  for (const node of findDescendants(ctx.root, 'import_statement')) {
    for (const name of node.childrenForFieldName('name')) {
      record(name.type === 'aliased_import' ? name.childForFieldName('name')?.text ?? '' : name.text);
    }
  }
  for (const node of findDescendants(ctx.root, 'import_from_statement')) {
    record(node.childForFieldName('module_name')?.text ?? '');
  }
}

function extractDefinitions(ctx: ExtractionContext): void {
  // Only module-level definitions; nested functions and classes stay inside their owner
  for (const child of ctx.root.namedChildren) {
    const def = unwrapDefinition(child);
    if (!def) continue;

    if (def.node.type === 'function_definition') {
      const symbol = functionSymbol(def, isAsync(def.node) ? 'async_function' : 'function');
      if (symbol) ctx.file.symbols.push(symbol);
      continue;
    }

    const name = def.node.childForFieldName('name');
    if (!name) continue;
    const superclasses = def.node.childForFieldName('superclasses');
    for (const base of superclasses?.namedChildren ?? []) {
      if (base.type === 'identifier' || base.type === 'attribute') {
        addDependency(ctx.file, 'extends', name.text, base.text);
      }
    }

    const body = def.node.childForFieldName('body');
    ctx.file.symbols.push(
      makeSymbol(name.text, 'class', def.outer, {
        signature: signatureOf(def),
        docstring: blockDocstring(body),
        children: classMethods(body),
      })
    );
  }
}

function extractCalls(ctx: ExtractionContext): void {
  const index = new CallerIndex(ctx.file.symbols, CALLABLE_KINDS);
  const sites = findDescendants(ctx.root, 'call').flatMap(call => {
    const fn = call.childForFieldName('function');
    if (!fn || (fn.type !== 'identifier' && fn.type !== 'attribute')) return [];
    return [{ node: call, target: fn.text }];
  });
  addCallDependencies(ctx.file, index, sites);
}

export const pythonExtractor = defineExtractor({
  language: 'python',
  displayName: 'Python',
  grammar: 'python',
  extensions: ['.py', '.pyi'],
  steps: {
    module: extractModuleDoc,
    imports: extractImports,
    definitions: extractDefinitions,
    calls: extractCalls,
  },
});
