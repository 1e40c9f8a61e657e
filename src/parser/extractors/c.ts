import type { SyntaxNode } from '../syntax.js';
import type { SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { defineExtractor } from './base.js';
import {
  aggregateChildren,
  aggregateKeyword,
  declarationSignature,
  declaredFunctionName,
  declaredIdentifier,
  doxygenDoc,
  extractCFamilyCalls,
  extractIncludes,
  functionDeclarator,
  hasSpecifier,
  isExternalInclude,
  isIncludeGuard,
  typedefSymbol,
} from './c-family.js';
import { declarationHeader, makeSymbol } from './helpers.js';

const CALLABLE_KINDS = new Set<SymbolKind>(['function', 'static_function']);

// Conditional-compilation blocks keep their contents at file scope
const TRANSPARENT_SCOPES = new Set([
  'preproc_if',
  'preproc_ifdef',
  'preproc_else',
  'preproc_elif',
  'preproc_elifdef',
  'linkage_specification',
  'declaration_list',
]);

function visitNode(node: SyntaxNode, ctx: ExtractionContext): void {
  switch (node.type) {
    case 'function_definition':
      extractFunction(node, ctx);
      return;
    case 'declaration':
      extractDeclaration(node, ctx);
      return;
    case 'struct_specifier':
    case 'union_specifier':
    case 'enum_specifier':
      extractAggregate(node, ctx);
      return;
    case 'type_definition':
      extractTypedef(node, ctx);
      return;
    case 'preproc_def':
    case 'preproc_function_def':
      extractMacro(node, ctx);
      return;
  }

  if (TRANSPARENT_SCOPES.has(node.type)) {
    for (const child of node.namedChildren) {
      visitNode(child, ctx);
    }
  }
}

function extractFunction(node: SyntaxNode, ctx: ExtractionContext): void {
  const fn = functionDeclarator(node.childForFieldName('declarator'));
  if (!fn) return;

  const name = declaredFunctionName(fn);
  if (!name) return;

  const kind: SymbolKind = hasSpecifier(node, 'storage_class_specifier', 'static') ? 'static_function' : 'function';
  ctx.file.symbols.push(
    makeSymbol(name, kind, node, {
      signature: declarationHeader(node, node.childForFieldName('body')),
      docstring: doxygenDoc(node),
    })
  );
}

function extractDeclaration(node: SyntaxNode, ctx: ExtractionContext): void {
  // `struct Point { ... } origin;` declares the aggregate as well as the variable
  const typeNode = node.childForFieldName('type');
  if (typeNode && typeNode.childForFieldName('body')) {
    extractAggregate(typeNode, ctx);
  }

  const isExtern = hasSpecifier(node, 'storage_class_specifier', 'extern');
  for (const declarator of node.childrenForFieldName('declarator')) {
    const fn = functionDeclarator(declarator);
    if (fn) {
      const name = declaredFunctionName(fn);
      if (!name) continue;
      ctx.file.symbols.push(
        makeSymbol(name, 'function_declaration', node, {
          signature: declarationHeader(node),
          docstring: doxygenDoc(node),
        })
      );
      continue;
    }

    const ident = declaredIdentifier(declarator);
    if (!ident) continue;
    ctx.file.symbols.push(
      makeSymbol(ident.text, isExtern ? 'extern_variable' : 'variable', node, {
        signature: declarationSignature(node, declarator),
        docstring: doxygenDoc(node),
      })
    );
  }
}

function extractAggregate(node: SyntaxNode, ctx: ExtractionContext): void {
  const nameNode = node.childForFieldName('name');
  // Forward declarations and anonymous bodies are not symbols of their own
  if (!nameNode || !node.childForFieldName('body')) return;

  const keyword = aggregateKeyword(node);
  const kind: SymbolKind = keyword === 'union' ? 'union' : keyword === 'enum' ? 'enum' : 'struct';
  ctx.file.symbols.push(
    makeSymbol(nameNode.text, kind, node, {
      signature: `${keyword} ${nameNode.text}`,
      docstring: doxygenDoc(node),
      children: aggregateChildren(node),
    })
  );
}

function extractTypedef(node: SyntaxNode, ctx: ExtractionContext): void {
  const symbol = typedefSymbol(node);
  if (symbol) ctx.file.symbols.push(symbol);
}

function extractMacro(node: SyntaxNode, ctx: ExtractionContext): void {
  const name = node.childForFieldName('name');
  if (!name) return;

  const params = node.childForFieldName('parameters');
  if (!params && isIncludeGuard(node, name.text)) return;

  ctx.file.symbols.push(
    makeSymbol(name.text, params ? 'function_macro' : 'macro', node, {
      signature: `#define ${name.text}${params ? params.text : ''}`,
      docstring: doxygenDoc(node),
    })
  );
}

export const cExtractor = defineExtractor({
  language: 'c',
  displayName: 'C',
  grammar: 'c',
  extensions: ['.c', '.h'],
  steps: {
    includes: ctx => extractIncludes(ctx, path => isExternalInclude(path, 'c')),
    declarations: ctx => {
      for (const child of ctx.root.namedChildren) {
        visitNode(child, ctx);
      }
    },
    calls: ctx => extractCFamilyCalls(ctx, CALLABLE_KINDS),
  },
});
