import type { SyntaxNode } from '../syntax.js';
import type { ParsedSymbol, SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { defineExtractor } from './base.js';
import { getKnownModules } from './known-modules.js';
import {
  CallerIndex,
  addCallDependencies,
  addDependency,
  childOfType,
  childrenOfType,
  collapseWhitespace,
  declarationHeader,
  findDescendant,
  findDescendants,
  isDocComment,
  leadingComments,
  makeSymbol,
} from './helpers.js';

const CALLABLE_KINDS = new Set<SymbolKind>(['function', 'method', 'constructor']);

const TYPE_BODIES = ['class_body', 'enum_class_body', 'protocol_body'];

export function isExternalSwiftImport(moduleName: string): boolean {
  return getKnownModules().appleFrameworks.some(
    framework => moduleName === framework || moduleName.startsWith(`${framework}.`)
  );
}

function swiftDoc(node: SyntaxNode): string | undefined {
  return leadingComments(node, isDocComment);
}

/** `class`, `struct`, `enum`, `extension` or `actor`. */
function declarationKind(node: SyntaxNode): string {
  const keyword = node.childForFieldName('declaration_kind');
  if (keyword) return keyword.text;
  return node.children.find(c => ['class', 'struct', 'enum', 'extension', 'actor'].includes(c.type))?.type ?? '';
}

/** Type names listed after `:`, in order. */
function inheritedTypes(node: SyntaxNode): string[] {
  return childrenOfType(node, 'inheritance_specifier').flatMap(spec => {
    const ident = findDescendant(spec, 'type_identifier');
    return ident ? [ident.text] : [];
  });
}

function typeBody(node: SyntaxNode): SyntaxNode | null {
  return node.childForFieldName('body') ?? childOfType(node, ...TYPE_BODIES);
}

function propertySymbol(node: SyntaxNode): ParsedSymbol | null {
  const pattern = node.childForFieldName('name') ?? childOfType(node, 'pattern');
  const ident = pattern ? findDescendant(pattern, 'simple_identifier') : null;
  if (!ident) return null;

  const observed = findDescendant(node, 'willset_didset_block') !== null || /\b(willSet|didSet)\b/.test(node.text);
  return makeSymbol(ident.text, observed ? 'property_observer' : 'property', node, {
    signature: declarationHeader(node),
    docstring: swiftDoc(node),
  });
}

function functionSymbol(node: SyntaxNode, kind: SymbolKind): ParsedSymbol | null {
  const name = node.childForFieldName('name') ?? childOfType(node, 'simple_identifier');
  if (!name) return null;
  return makeSymbol(name.text, kind, node, {
    signature: declarationHeader(node, node.childForFieldName('body')),
    docstring: swiftDoc(node),
  });
}

function enumCases(entry: SyntaxNode): ParsedSymbol[] {
  const names = entry.childrenForFieldName('name');
  const idents = names.length > 0 ? names : childrenOfType(entry, 'simple_identifier');
  return idents.map(ident =>
    makeSymbol(ident.text, 'enum_case', entry, {
      signature: collapseWhitespace(entry.text),
      docstring: swiftDoc(entry),
    })
  );
}

function members(body: SyntaxNode | null, ctx: ExtractionContext): ParsedSymbol[] {
  if (!body) return [];
  const result: ParsedSymbol[] = [];
  const push = (symbol: ParsedSymbol | null) => {
    if (symbol) result.push(symbol);
  };

  for (const child of body.namedChildren) {
    switch (child.type) {
      case 'property_declaration':
      case 'protocol_property_declaration':
        push(propertySymbol(child));
        break;
      case 'function_declaration':
      case 'protocol_function_declaration':
        push(functionSymbol(child, 'method'));
        break;
      case 'init_declaration':
        push(
          makeSymbol('init', 'constructor', child, {
            signature: declarationHeader(child, child.childForFieldName('body')),
            docstring: swiftDoc(child),
          })
        );
        break;
      case 'enum_entry':
        result.push(...enumCases(child));
        break;
      case 'class_declaration':
      case 'protocol_declaration':
        push(typeSymbol(child, ctx));
        break;
    }
  }
  return result;
}

function protocolSymbol(node: SyntaxNode, ctx: ExtractionContext): ParsedSymbol | null {
  const name = node.childForFieldName('name') ?? childOfType(node, 'type_identifier');
  if (!name) return null;
  for (const parent of inheritedTypes(node)) {
    addDependency(ctx.file, 'extends', name.text, parent);
  }
  const body = typeBody(node);
  return makeSymbol(name.text, 'protocol', node, {
    signature: declarationHeader(node, body),
    docstring: swiftDoc(node),
    children: members(body, ctx),
  });
}

function extensionSymbol(node: SyntaxNode, ctx: ExtractionContext): ParsedSymbol | null {
  const extended = node.childForFieldName('name') ?? childOfType(node, 'user_type');
  const ident = extended ? findDescendant(extended, 'type_identifier') : null;
  if (!ident) return null;

  const name = `extension_${ident.text}`;
  addDependency(ctx.file, 'extends', name, ident.text);
  for (const protocol of inheritedTypes(node)) {
    addDependency(ctx.file, 'conforms', name, protocol);
  }

  const body = typeBody(node);
  return makeSymbol(name, 'extension', node, {
    signature: declarationHeader(node, body),
    docstring: swiftDoc(node),
    children: members(body, ctx),
  });
}

function typeSymbol(node: SyntaxNode, ctx: ExtractionContext): ParsedSymbol | null {
  if (node.type === 'protocol_declaration') return protocolSymbol(node, ctx);
  if (node.type !== 'class_declaration') return null;

  const keyword = declarationKind(node);
  if (keyword === 'extension') return extensionSymbol(node, ctx);

  const name = node.childForFieldName('name') ?? childOfType(node, 'type_identifier');
  if (!name) return null;

  const kind: SymbolKind = keyword === 'struct' ? 'struct' : keyword === 'enum' ? 'enum' : 'class';
  inheritedTypes(node).forEach((parent, i) => {
    // Only a class can have a superclass, and it must come first
    const type = kind === 'class' && i === 0 ? 'extends' : 'conforms';
    addDependency(ctx.file, type, name.text, parent);
  });

  const body = typeBody(node);
  return makeSymbol(name.text, kind, node, {
    signature: declarationHeader(node, body),
    docstring: swiftDoc(node),
    children: members(body, ctx),
  });
}

function extractImports(ctx: ExtractionContext): void {
  for (const decl of findDescendants(ctx.root, 'import_declaration')) {
    const ident = childOfType(decl, 'identifier');
    const moduleName = ident
      ? ident.text.replace(/\s+/g, '')
      : collapseWhitespace(decl.text).replace(/^.*\bimport\s+/, '').split(' ')[0] ?? '';
    if (!moduleName) continue;
    addDependency(ctx.file, 'import', '', moduleName, {
      targetModule: moduleName,
      isExternal: isExternalSwiftImport(moduleName),
    });
  }
}

function extractDeclarations(ctx: ExtractionContext): void {
  // Members and nested types belong to their enclosing type
  for (const child of ctx.root.namedChildren) {
    let symbol: ParsedSymbol | null = null;
    switch (child.type) {
      case 'class_declaration':
      case 'protocol_declaration':
        symbol = typeSymbol(child, ctx);
        break;
      case 'function_declaration':
        symbol = functionSymbol(child, 'function');
        break;
      case 'property_declaration':
        symbol = propertySymbol(child);
        break;
    }
    if (symbol) ctx.file.symbols.push(symbol);
  }
}

/** `foo` for `foo(...)`, `bar` for `a.b.bar(...)`. */
function callTarget(call: SyntaxNode): string {
  const callee = call.namedChildren[0];
  if (!callee) return '';
  if (callee.type === 'simple_identifier') return callee.text;
  if (callee.type !== 'navigation_expression') return '';
  const suffix = callee.childForFieldName('suffix') ?? childOfType(callee, 'navigation_suffix');
  const ident = suffix ? findDescendant(suffix, 'simple_identifier') : null;
  return ident?.text ?? '';
}

function extractCalls(ctx: ExtractionContext): void {
  const index = new CallerIndex(ctx.file.symbols, CALLABLE_KINDS);
  const sites = findDescendants(ctx.root, 'call_expression').map(call => ({ node: call, target: callTarget(call) }));
  addCallDependencies(ctx.file, index, sites);
}

export const swiftExtractor = defineExtractor({
  language: 'swift',
  displayName: 'Swift',
  grammar: 'swift',
  extensions: ['.swift'],
  steps: {
    imports: extractImports,
    declarations: extractDeclarations,
    calls: extractCalls,
  },
});
