import type { SyntaxNode } from '../syntax.js';
import type { ParsedSymbol, SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { defineExtractor } from './base.js';
import {
  aggregateChildren,
  aggregateKeyword,
  declaredFunctionName,
  doxygenDoc,
  extractCFamilyCalls,
  extractIncludes,
  fieldSymbols,
  functionDeclarator,
  hasSpecifier,
  isExternalInclude,
  isIncludeGuard,
  typedefSymbol,
} from './c-family.js';
import {
  addDependency,
  collapseWhitespace,
  declarationHeader,
  findDescendant,
  findDescendants,
  innermostScope,
  makeSymbol,
  splitQualifiedName,
} from './helpers.js';

const CPP_CALLABLE_KINDS = new Set<SymbolKind>([
  'function',
  'static_function',
  'inline_function',
  'function_template',
  'method',
  'virtual_method',
  'constructor',
  'destructor',
  'operator',
]);

const TRANSPARENT_SCOPES = new Set([
  'preproc_if',
  'preproc_ifdef',
  'preproc_else',
  'preproc_elif',
  'preproc_elifdef',
  'linkage_specification',
  'declaration_list',
]);

const CLASS_SPECIFIERS = new Set(['class_specifier', 'struct_specifier']);

/** Enclosing `template<...>` when a declaration is the body of one. */
interface TemplateScope {
  node: SyntaxNode;
  parameters: string;
}

function templateScope(node: SyntaxNode): TemplateScope {
  const params = node.childForFieldName('parameters');
  return { node, parameters: `template${params ? collapseWhitespace(params.text) : '<>'}` };
}

function withTemplate(signature: string, template?: TemplateScope): string {
  return template ? `${template.parameters} ${signature}` : signature;
}

function visitNode(node: SyntaxNode, ctx: ExtractionContext): void {
  switch (node.type) {
    case 'namespace_definition':
      extractNamespace(node, ctx);
      return;
    case 'class_specifier':
    case 'struct_specifier':
      pushSymbol(ctx, classSymbol(node, ctx));
      return;
    case 'union_specifier':
    case 'enum_specifier':
      pushSymbol(ctx, aggregateSymbol(node));
      return;
    case 'function_definition':
      pushSymbol(ctx, functionSymbol(node, ctx));
      return;
    case 'declaration':
      extractDeclaration(node, ctx);
      return;
    case 'template_declaration':
      extractTemplate(node, ctx);
      return;
    case 'type_definition':
      pushSymbol(ctx, typedefSymbol(node));
      return;
    case 'alias_declaration':
      pushSymbol(ctx, aliasSymbol(node));
      return;
    case 'preproc_def':
    case 'preproc_function_def':
      pushSymbol(ctx, macroSymbol(node));
      return;
  }

  if (TRANSPARENT_SCOPES.has(node.type)) {
    for (const child of node.namedChildren) {
      visitNode(child, ctx);
    }
  }
}

function pushSymbol(ctx: ExtractionContext, symbol: ParsedSymbol | null): void {
  if (symbol) ctx.file.symbols.push(symbol);
}

function extractNamespace(node: SyntaxNode, ctx: ExtractionContext): void {
  const name = node.childForFieldName('name');
  if (name) {
    ctx.file.symbols.push(
      makeSymbol(name.text, 'namespace', node, {
        signature: `namespace ${name.text}`,
        docstring: doxygenDoc(node),
      })
    );
  }

  // Members of a namespace are file-scope declarations of their own
  const body = node.childForFieldName('body');
  if (body) visitNode(body, ctx);
}

function extractDeclaration(node: SyntaxNode, ctx: ExtractionContext, template?: TemplateScope): void {
  const typeNode = node.childForFieldName('type');
  if (typeNode && CLASS_SPECIFIERS.has(typeNode.type)) {
    pushSymbol(ctx, classSymbol(typeNode, ctx, template));
  } else if (typeNode && (typeNode.type === 'enum_specifier' || typeNode.type === 'union_specifier')) {
    pushSymbol(ctx, aggregateSymbol(typeNode));
  }

  for (const declarator of node.childrenForFieldName('declarator')) {
    const fn = functionDeclarator(declarator);
    if (!fn) continue;
    const name = declaredFunctionName(fn);
    if (!name) continue;
    ctx.file.symbols.push(
      makeSymbol(name, 'function_declaration', template?.node ?? node, {
        signature: withTemplate(declarationHeader(node), template),
        docstring: doxygenDoc(template?.node ?? node),
      })
    );
  }
}

function extractTemplate(node: SyntaxNode, ctx: ExtractionContext): void {
  const scope = templateScope(node);
  for (const inner of node.namedChildren) {
    if (CLASS_SPECIFIERS.has(inner.type)) {
      pushSymbol(ctx, classSymbol(inner, ctx, scope));
    } else if (inner.type === 'function_definition') {
      pushSymbol(ctx, functionSymbol(inner, ctx, scope));
    } else if (inner.type === 'declaration') {
      extractDeclaration(inner, ctx, scope);
    }
  }
}

function aggregateSymbol(node: SyntaxNode): ParsedSymbol | null {
  const name = node.childForFieldName('name');
  if (!name || !node.childForFieldName('body')) return null;

  const keyword = aggregateKeyword(node);
  return makeSymbol(name.text, keyword === 'union' ? 'union' : 'enum', node, {
    signature: `${keyword} ${name.text}`,
    docstring: doxygenDoc(node),
    children: aggregateChildren(node),
  });
}

function aliasSymbol(node: SyntaxNode): ParsedSymbol | null {
  const name = node.childForFieldName('name');
  if (!name) return null;
  return makeSymbol(name.text, 'type', node, {
    signature: collapseWhitespace(node.text).replace(/;$/, ''),
    docstring: doxygenDoc(node),
  });
}

function macroSymbol(node: SyntaxNode): ParsedSymbol | null {
  const name = node.childForFieldName('name');
  if (!name) return null;
  const params = node.childForFieldName('parameters');
  if (!params && isIncludeGuard(node, name.text)) return null;
  return makeSymbol(name.text, params ? 'function_macro' : 'macro', node, {
    signature: `#define ${name.text}${params ? params.text : ''}`,
    docstring: doxygenDoc(node),
  });
}

function isVirtual(node: SyntaxNode): boolean {
  return (
    node.children.some(child => child.type === 'virtual' || child.type === 'virtual_function_specifier') ||
    /^virtual\b/.test(node.text)
  );
}

function isOverride(fn: SyntaxNode): boolean {
  return findDescendants(fn, 'virtual_specifier').some(spec => spec.text === 'override');
}

function memberKind(node: SyntaxNode, fn: SyntaxNode, name: string, className: string): SymbolKind {
  const target = fn.childForFieldName('declarator');
  if (target?.type === 'operator_name') return 'operator';
  if (target?.type === 'destructor_name') return 'destructor';
  if (name === className) return 'constructor';
  if (isVirtual(node)) return 'virtual_method';
  return 'method';
}

const NESTED_TYPES = new Set(['class_specifier', 'struct_specifier']);

/** Member functions, data members and nested classes of a class body, in source order. */
function classMembers(body: SyntaxNode, className: string, ctx: ExtractionContext): ParsedSymbol[] {
  const members: ParsedSymbol[] = [];

  const addMember = (node: SyntaxNode, scopeNode: SyntaxNode, hasBody: boolean) => {
    const fn = functionDeclarator(node.childForFieldName('declarator'));
    if (!fn) {
      if (node.type === 'field_declaration') members.push(...fieldSymbols(node));
      return;
    }

    const name = declaredFunctionName(fn);
    if (!name) return;
    members.push(
      makeSymbol(name, memberKind(node, fn, name, className), scopeNode, {
        signature: declarationHeader(node, hasBody ? node.childForFieldName('body') : null),
        docstring: doxygenDoc(scopeNode),
      })
    );
    if (isOverride(fn)) {
      addDependency(ctx.file, 'overrides', `${className}::${name}`, name);
    }
  };

  const addNested = (node: SyntaxNode) => {
    const nested = classSymbol(node, ctx);
    if (nested) members.push(nested);
  };

  for (const child of body.namedChildren) {
    switch (child.type) {
      case 'class_specifier':
      case 'struct_specifier':
        addNested(child);
        break;
      case 'field_declaration':
      case 'declaration': {
        const type = child.childForFieldName('type');
        if (type && NESTED_TYPES.has(type.type)) addNested(type);
        addMember(child, child, false);
        break;
      }
      case 'function_definition':
        addMember(child, child, true);
        break;
      case 'template_declaration': {
        const inner = child.namedChildren.find(n =>
          n.type === 'function_definition' || n.type === 'field_declaration' || n.type === 'declaration'
        );
        if (inner) addMember(inner, child, inner.type === 'function_definition');
        break;
      }
    }
  }
  return members;
}

function baseClassNames(node: SyntaxNode): string[] {
  const clause = node.namedChildren.find(child => child.type === 'base_class_clause');
  if (!clause) return [];

  const names: string[] = [];
  for (const base of clause.namedChildren) {
    switch (base.type) {
      case 'type_identifier':
      case 'qualified_identifier':
        names.push(collapseWhitespace(base.text));
        break;
      case 'template_type':
        names.push(base.childForFieldName('name')?.text ?? collapseWhitespace(base.text));
        break;
    }
  }
  return names;
}

function classSymbol(node: SyntaxNode, ctx: ExtractionContext, template?: TemplateScope): ParsedSymbol | null {
  const nameNode = node.childForFieldName('name');
  const body = node.childForFieldName('body');
  // Forward declarations carry no members
  if (!nameNode || !body) return null;

  const className = nameNode.text;
  const keyword = node.type === 'struct_specifier' ? 'struct' : 'class';
  const kind: SymbolKind = template ? 'class_template' : keyword;

  for (const base of baseClassNames(node)) {
    addDependency(ctx.file, 'extends', className, base);
  }

  return makeSymbol(className, kind, template?.node ?? node, {
    signature: withTemplate(`${keyword} ${className}`, template),
    docstring: doxygenDoc(template?.node ?? node),
    children: classMembers(body, className, ctx),
  });
}

/** Kind of a file-scope function definition, qualified (`Widget::draw`) or free. */
function definitionKind(node: SyntaxNode, fn: SyntaxNode, name: string, template?: TemplateScope): SymbolKind {
  const target = fn.childForFieldName('declarator');
  const isOperator = target !== null && findDescendant(target, 'operator_name') !== null;
  const { scope, member } = splitQualifiedName(name);

  if (scope !== null) {
    if (isOperator) return 'operator';
    if (member.startsWith('~')) return 'destructor';
    if (member === innermostScope(scope)) return 'constructor';
    return 'method';
  }

  if (isOperator) return 'operator';
  if (template) return 'function_template';
  if (hasSpecifier(node, 'storage_class_specifier', 'static')) return 'static_function';
  if (hasSpecifier(node, 'storage_class_specifier', 'inline')) return 'inline_function';
  return 'function';
}

function functionSymbol(node: SyntaxNode, ctx: ExtractionContext, template?: TemplateScope): ParsedSymbol | null {
  const fn = functionDeclarator(node.childForFieldName('declarator'));
  if (!fn) return null;
  const name = declaredFunctionName(fn);
  if (!name) return null;

  if (isOverride(fn)) {
    const { scope, member } = splitQualifiedName(name);
    if (scope !== null) addDependency(ctx.file, 'overrides', name, member);
  }

  return makeSymbol(name, definitionKind(node, fn, name, template), template?.node ?? node, {
    signature: withTemplate(declarationHeader(node, node.childForFieldName('body')), template),
    docstring: doxygenDoc(template?.node ?? node),
  });
}

function extractCppDeclarations(ctx: ExtractionContext): void {
  for (const child of ctx.root.namedChildren) {
    visitNode(child, ctx);
  }
}

function extractCppIncludes(ctx: ExtractionContext): void {
  extractIncludes(ctx, path => isExternalInclude(path, 'cpp'));
}

export const cppExtractor = defineExtractor({
  language: 'cpp',
  displayName: 'C++',
  grammar: 'cpp',
  extensions: ['.cpp', '.cc', '.cxx', '.c++', '.hpp', '.hh', '.hxx'],
  steps: {
    includes: extractCppIncludes,
    declarations: extractCppDeclarations,
    calls: ctx => extractCFamilyCalls(ctx, CPP_CALLABLE_KINDS),
  },
});
