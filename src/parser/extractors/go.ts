import type { SyntaxNode } from '../syntax.js';
import type { ParsedSymbol, SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { defineExtractor } from './base.js';
import {
  CallerIndex,
  addCallDependencies,
  addDependency,
  captureNode,
  childOfType,
  collapseWhitespace,
  declarationHeader,
  leadingComments,
  makeSymbol,
  unquote,
} from './helpers.js';

const IMPORT_QUERY = '(import_spec path: (interpreted_string_literal) @path)';
const FUNCTION_QUERY = '(function_declaration name: (identifier) @name) @def';
const METHOD_QUERY = '(method_declaration receiver: (parameter_list) name: (field_identifier) @name) @def';
const CALL_QUERY = '(call_expression function: [(identifier) (selector_expression)] @target)';

const CALLABLE_KINDS = new Set<SymbolKind>(['function', 'method']);

function packageName(ctx: ExtractionContext): string {
  return ctx.file.symbols.find(s => s.kind === 'package')?.name ?? '';
}

function extractPackage(ctx: ExtractionContext): void {
  const clause = childOfType(ctx.root, 'package_clause');
  const ident = clause ? childOfType(clause, 'package_identifier') : null;
  if (!clause || !ident) return;

  ctx.file.symbols.push(
    makeSymbol(ident.text, 'package', clause, {
      signature: `package ${ident.text}`,
      docstring: leadingComments(clause),
      spanNode: ident,
    })
  );
}

function extractImports(ctx: ExtractionContext): void {
  const pkg = packageName(ctx);
  for (const match of ctx.query(IMPORT_QUERY)) {
    const pathNode = captureNode(match, 'path');
    if (!pathNode) continue;

    const importPath = unquote(pathNode.text);
    addDependency(ctx.file, 'import', pkg, importPath, {
      targetModule: importPath,
      // Module paths carry a host name; standard library paths never do
      isExternal: importPath.includes('.'),
    });
  }
}

function extractCallables(ctx: ExtractionContext, query: string, kind: SymbolKind): void {
  for (const match of ctx.query(query)) {
    const def = captureNode(match, 'def');
    const name = captureNode(match, 'name');
    if (!def || !name) continue;

    ctx.file.symbols.push(
      makeSymbol(name.text, kind, def, {
        signature: declarationHeader(def, def.childForFieldName('body')),
        docstring: leadingComments(def),
      })
    );
  }
}

function extractStructFields(structType: SyntaxNode): ParsedSymbol[] {
  const list = childOfType(structType, 'field_declaration_list');
  if (!list) return [];

  const fields: ParsedSymbol[] = [];
  for (const decl of list.namedChildren) {
    if (decl.type !== 'field_declaration') continue;
    const fieldType = decl.childForFieldName('type')?.text ?? '';
    for (const ident of decl.namedChildren) {
      if (ident.type !== 'field_identifier') continue;
      fields.push(
        makeSymbol(ident.text, 'field', decl, {
          signature: collapseWhitespace(`${ident.text} ${fieldType}`),
          docstring: leadingComments(decl),
        })
      );
    }
  }
  return fields;
}

function extractInterfaceMethods(interfaceType: SyntaxNode): ParsedSymbol[] {
  const methods: ParsedSymbol[] = [];
  for (const elem of interfaceType.namedChildren) {
    // method_spec in older grammar releases
    if (elem.type !== 'method_elem' && elem.type !== 'method_spec') continue;
    const name = elem.childForFieldName('name');
    if (!name) continue;
    methods.push(
      makeSymbol(name.text, 'method', elem, {
        signature: collapseWhitespace(elem.text),
        docstring: leadingComments(elem),
      })
    );
  }
  return methods;
}

function typeSymbol(spec: SyntaxNode, declaration: SyntaxNode): ParsedSymbol | null {
  const name = spec.childForFieldName('name');
  if (!name) return null;

  const docstring = leadingComments(spec) ?? leadingComments(declaration);
  const typeNode = spec.childForFieldName('type');

  switch (typeNode?.type) {
    case 'struct_type':
      return makeSymbol(name.text, 'struct', spec, {
        signature: `type ${name.text} struct`,
        docstring,
        children: extractStructFields(typeNode),
      });
    case 'interface_type':
      return makeSymbol(name.text, 'interface', spec, {
        signature: `type ${name.text} interface`,
        docstring,
        children: extractInterfaceMethods(typeNode),
      });
    default:
      return makeSymbol(name.text, 'type', spec, {
        signature: `type ${collapseWhitespace(spec.text)}`,
        docstring,
      });
  }
}

function extractTypes(ctx: ExtractionContext): void {
  // File-scope declarations only; types local to a function body are skipped
  for (const decl of ctx.root.namedChildren) {
    if (decl.type !== 'type_declaration') continue;
    for (const spec of decl.namedChildren) {
      if (spec.type !== 'type_spec' && spec.type !== 'type_alias') continue;
      const symbol = typeSymbol(spec, decl);
      if (symbol) ctx.file.symbols.push(symbol);
    }
  }
}

function extractCalls(ctx: ExtractionContext): void {
  const index = new CallerIndex(ctx.file.symbols, CALLABLE_KINDS);
  const sites = ctx.query(CALL_QUERY).flatMap(match =>
    match.captures.map(capture => ({ node: capture.node, target: capture.node.text }))
  );
  addCallDependencies(ctx.file, index, sites);
}

export const goExtractor = defineExtractor({
  language: 'go',
  displayName: 'Go',
  grammar: 'go',
  extensions: ['.go'],
  steps: {
    package: extractPackage,
    imports: extractImports,
    functions: ctx => extractCallables(ctx, FUNCTION_QUERY, 'function'),
    methods: ctx => extractCallables(ctx, METHOD_QUERY, 'method'),
    types: extractTypes,
    calls: extractCalls,
  },
});
