import type { SyntaxNode } from '../syntax.js';
import type { ParsedSymbol, SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { getKnownModules } from './known-modules.js';
import {
  CallerIndex,
  addCallDependencies,
  addDependency,
  collapseWhitespace,
  findDescendant,
  findDescendants,
  isDocComment,
  leadingComments,
  makeSymbol,
  trailingMemberComment,
  unquote,
} from './helpers.js';

const LOCAL_HEADER = /\.(h|hpp|hh|hxx)$/;

export type IncludeDialect = 'c' | 'cpp';

export function isExternalInclude(includePath: string, dialect: IncludeDialect): boolean {
  const known = getKnownModules();
  if (known.cStandardHeaders.has(includePath)) return false;
  if (dialect === 'cpp' && known.cppStandardHeaders.has(includePath)) return false;
  if (known.thirdPartyIncludePrefixes.some(prefix => includePath.startsWith(prefix))) return true;
  if (known.systemIncludePrefixes.some(prefix => includePath.startsWith(prefix))) return true;
  if (LOCAL_HEADER.test(includePath) && !includePath.includes('/')) return false;
  return true;
}

/** `#include` / `#import` directives anywhere in the file, including conditional blocks. */
export function extractIncludes(ctx: ExtractionContext, classify: (path: string) => boolean): void {
  for (const include of findDescendants(ctx.root, 'preproc_include')) {
    const pathNode = include.childForFieldName('path');
    if (!pathNode) continue;
    const includePath = unquote(pathNode.text.trim());
    if (!includePath) continue;

    addDependency(ctx.file, 'import', '', includePath, {
      targetModule: includePath,
      isExternal: classify(includePath),
    });
  }
}

/** Doxygen / HeaderDoc comments (`/** *\/`, `/*! *\/`, `///`, `//!`) directly above a node. */
export function doxygenDoc(node: SyntaxNode): string | undefined {
  return leadingComments(node, isDocComment) ?? trailingMemberComment(node);
}

const DECLARATOR_WRAPPERS = new Set([
  'pointer_declarator',
  'reference_declarator',
  'parenthesized_declarator',
  'attributed_declarator',
]);

/** The function_declarator under pointer/reference wrappers, if any. */
export function functionDeclarator(declarator: SyntaxNode | null): SyntaxNode | null {
  let current = declarator;
  while (current) {
    if (current.type === 'function_declarator') return current;
    if (!DECLARATOR_WRAPPERS.has(current.type)) return null;
    current = current.childForFieldName('declarator') ?? current.namedChildren[current.namedChildren.length - 1] ?? null;
  }
  return null;
}

/** Name written in a function declarator: `add`, `Widget::draw`, `operator+`, `~Widget`. */
export function declaredFunctionName(fnDeclarator: SyntaxNode): string {
  const target = fnDeclarator.childForFieldName('declarator');
  return target ? collapseWhitespace(target.text) : '';
}

/** Identifier introduced by a variable/field declarator, through init/pointer/array wrappers. */
export function declaredIdentifier(declarator: SyntaxNode): SyntaxNode | null {
  switch (declarator.type) {
    case 'identifier':
    case 'field_identifier':
    case 'type_identifier':
      return declarator;
    case 'init_declarator':
    case 'pointer_declarator':
    case 'reference_declarator':
    case 'array_declarator':
    case 'parenthesized_declarator':
    case 'attributed_declarator': {
      const inner = declarator.childForFieldName('declarator') ?? declarator.namedChildren[0] ?? null;
      return inner ? declaredIdentifier(inner) : null;
    }
    default:
      return null;
  }
}

/** `#define FOO_H` directly inside `#ifndef FOO_H`. */
export function isIncludeGuard(node: SyntaxNode, name: string): boolean {
  const parent = node.parent;
  return (
    node.childForFieldName('value') === null &&
    parent?.type === 'preproc_ifdef' &&
    parent.childForFieldName('name')?.text === name
  );
}

export function hasSpecifier(node: SyntaxNode, type: string, text: string): boolean {
  return node.children.some(child => child.type === type && child.text === text);
}

/** `int x = 1` minus initializer: leading specifiers and type, then the declarator. */
export function declarationSignature(node: SyntaxNode, declarator: SyntaxNode): string {
  const typeNode = node.childForFieldName('type');
  const head = typeNode ? node.text.slice(0, typeNode.endIndex - node.startIndex) : '';
  const target =
    declarator.type === 'init_declarator' ? declarator.childForFieldName('declarator') ?? declarator : declarator;
  return collapseWhitespace(`${head} ${target.text}`);
}

/** One `field` symbol per declarator of a data member declaration. */
export function fieldSymbols(decl: SyntaxNode): ParsedSymbol[] {
  if (functionDeclarator(decl.childForFieldName('declarator'))) return [];

  const fields: ParsedSymbol[] = [];
  for (const declarator of decl.childrenForFieldName('declarator')) {
    const ident = declaredIdentifier(declarator);
    if (!ident) continue;
    fields.push(
      makeSymbol(ident.text, 'field', decl, {
        signature: declarationSignature(decl, declarator),
        docstring: doxygenDoc(decl),
      })
    );
  }
  return fields;
}

export function aggregateFields(body: SyntaxNode): ParsedSymbol[] {
  return body.namedChildren
    .filter(decl => decl.type === 'field_declaration')
    .flatMap(decl => fieldSymbols(decl));
}

export function enumConstants(body: SyntaxNode): ParsedSymbol[] {
  return body.namedChildren
    .filter(child => child.type === 'enumerator')
    .flatMap(enumerator => {
      const name = enumerator.childForFieldName('name');
      if (!name) return [];
      return [
        makeSymbol(name.text, 'enum_constant', enumerator, {
          signature: collapseWhitespace(enumerator.text),
          docstring: doxygenDoc(enumerator),
        }),
      ];
    });
}

const AGGREGATE_KEYWORDS: Record<string, string> = {
  struct_specifier: 'struct',
  union_specifier: 'union',
  enum_specifier: 'enum',
  class_specifier: 'class',
};

/** Children for the body of a struct/union/enum specifier (fields or enumerators). */
export function aggregateChildren(specifier: SyntaxNode): ParsedSymbol[] {
  const body = specifier.childForFieldName('body');
  if (!body) return [];
  return specifier.type === 'enum_specifier' ? enumConstants(body) : aggregateFields(body);
}

/** `typedef struct Point Point2D`-style signature without the body. */
export function typedefSymbol(node: SyntaxNode): ParsedSymbol | null {
  const declarator = node.childForFieldName('declarator');
  const nameNode = declarator ? findDescendant(declarator, 'type_identifier') ?? declaredIdentifier(declarator) : null;
  if (!nameNode) return null;

  const typeNode = node.childForFieldName('type');
  let signature: string;
  let children: ParsedSymbol[] = [];
  if (typeNode && typeNode.childForFieldName('body')) {
    const keyword = AGGREGATE_KEYWORDS[typeNode.type] ?? typeNode.type;
    const tag = typeNode.childForFieldName('name');
    signature = collapseWhitespace(`typedef ${keyword} ${tag ? tag.text : ''} ${nameNode.text}`);
    children = aggregateChildren(typeNode);
  } else {
    signature = collapseWhitespace(node.text).replace(/;$/, '');
  }

  return makeSymbol(nameNode.text, 'typedef', node, {
    signature,
    docstring: doxygenDoc(node),
    children,
  });
}

export function aggregateKeyword(specifier: SyntaxNode): string {
  return AGGREGATE_KEYWORDS[specifier.type] ?? specifier.type;
}

/** Callee text for a call_expression: plain, qualified, or the member name after `.`/`->`. */
export function calleeName(call: SyntaxNode): string {
  const fn = call.childForFieldName('function');
  if (!fn) return '';
  switch (fn.type) {
    case 'identifier':
    case 'qualified_identifier':
      return collapseWhitespace(fn.text);
    case 'field_expression':
      return fn.childForFieldName('field')?.text ?? '';
    case 'template_function':
      return fn.childForFieldName('name')?.text ?? '';
    default:
      return '';
  }
}

export function extractCFamilyCalls(ctx: ExtractionContext, callableKinds: ReadonlySet<SymbolKind>): void {
  // Declaration files only restate signatures
  if (ctx.isHeader) return;
  const index = new CallerIndex(ctx.file.symbols, callableKinds);
  const sites = findDescendants(ctx.root, 'call_expression').map(call => ({
    node: call,
    target: calleeName(call),
  }));
  addCallDependencies(ctx.file, index, sites);
}
