import type { SyntaxNode } from '../syntax.js';
import type { ParsedSymbol, SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { defineExtractor } from './base.js';
import { JAVA_SOURCE_ROOTS } from './java.js';
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
  hasAncestor,
  inferPackageFromPath,
  isExternalPackage,
  leadingComments,
  makeSymbol,
  qualify,
} from './helpers.js';

const SOURCE_ROOTS = ['src/main/kotlin/', 'src/test/kotlin/', ...JAVA_SOURCE_ROOTS];
const INTERNAL_PREFIXES = ['kotlin.', 'kotlinx.', 'java.', 'javax.'];

const CALLABLE_KINDS = new Set<SymbolKind>([
  'function',
  'extension_function',
  'suspend_function',
  'method',
  'suspend_method',
]);

const TYPE_SCOPES = new Set(['class_declaration', 'object_declaration', 'companion_object']);
const FUNCTION_SCOPES = new Set(['function_declaration', 'anonymous_function', 'lambda_literal']);

function packageName(ctx: ExtractionContext): string {
  return ctx.file.symbols.find(s => s.kind === 'package')?.name ?? '';
}

function extractPackage(ctx: ExtractionContext): void {
  const header = childOfType(ctx.root, 'package_header');
  const ident = header ? childOfType(header, 'identifier') : null;
  if (header && ident) {
    ctx.file.symbols.push(
      makeSymbol(ident.text, 'package', header, { signature: `package ${ident.text}`, spanNode: ident })
    );
    return;
  }

  const inferred = inferPackageFromPath(ctx.file.path, SOURCE_ROOTS);
  if (!inferred) return;
  ctx.file.symbols.push({
    ...makeSymbol(inferred, 'package', ctx.root, { signature: `package ${inferred}` }),
    span: { startLine: 0, endLine: 0, startByte: 0, endByte: 0 },
  });
}

function extractImports(ctx: ExtractionContext): void {
  const pkg = packageName(ctx);
  for (const header of findDescendants(ctx.root, 'import_header')) {
    const ident = childOfType(header, 'identifier');
    if (!ident) continue;
    const target = ident.text.replace(/\s+/g, '');
    addDependency(ctx.file, 'import', pkg, target, {
      targetModule: target,
      isExternal: isExternalPackage(target, pkg, INTERNAL_PREFIXES),
    });
  }
}

function modifierText(node: SyntaxNode): string {
  return childOfType(node, 'modifiers')?.text ?? '';
}

function hasModifier(node: SyntaxNode, modifier: string): boolean {
  return new RegExp(`\\b${modifier}\\b`).test(modifierText(node));
}

function classKind(node: SyntaxNode): SymbolKind {
  if (node.type === 'object_declaration') return 'object';
  if (node.children.some(child => child.type === 'interface')) return 'interface';
  if (childOfType(node, 'enum_class_body') || hasModifier(node, 'enum')) return 'enum';
  if (hasModifier(node, 'data')) return 'data_class';
  if (hasModifier(node, 'sealed')) return 'sealed_class';
  return 'class';
}

function superTypes(node: SyntaxNode): string[] {
  return childrenOfType(node, 'delegation_specifier').flatMap(spec => {
    const ident = findDescendant(spec, 'type_identifier');
    return ident ? [ident.text] : [];
  });
}

function functionName(fn: SyntaxNode): SyntaxNode | null {
  return childOfType(fn, 'simple_identifier');
}

function propertyName(prop: SyntaxNode): SyntaxNode | null {
  const variable = childOfType(prop, 'variable_declaration');
  return variable ? childOfType(variable, 'simple_identifier') : null;
}

function propertySymbol(prop: SyntaxNode): ParsedSymbol | null {
  const name = propertyName(prop);
  if (!name) return null;
  return makeSymbol(name.text, 'property', prop, {
    signature: declarationHeader(prop),
    docstring: leadingComments(prop),
  });
}

function bodyMembers(body: SyntaxNode, scope: string, ctx: ExtractionContext): ParsedSymbol[] {
  const members: ParsedSymbol[] = [];
  for (const child of body.namedChildren) {
    switch (child.type) {
      case 'property_declaration': {
        const symbol = propertySymbol(child);
        if (symbol) members.push(symbol);
        break;
      }
      case 'function_declaration': {
        const name = functionName(child);
        if (!name) break;
        members.push(
          makeSymbol(name.text, hasModifier(child, 'suspend') ? 'suspend_method' : 'method', child, {
            signature: declarationHeader(child),
            docstring: leadingComments(child),
          })
        );
        break;
      }
      case 'enum_entry': {
        const name = childOfType(child, 'simple_identifier');
        if (!name) break;
        members.push(makeSymbol(name.text, 'enum_constant', child, { signature: name.text }));
        break;
      }
      case 'class_declaration':
      case 'object_declaration': {
        const nested = typeSymbol(child, scope, ctx);
        if (nested) members.push(nested);
        break;
      }
    }
  }
  return members;
}

function typeSymbol(node: SyntaxNode, scope: string, ctx: ExtractionContext): ParsedSymbol | null {
  const name = childOfType(node, 'type_identifier');
  if (!name) return null;

  const qualified = qualify(scope, name.text);
  for (const parent of superTypes(node)) {
    addDependency(ctx.file, 'extends', qualified, parent);
  }

  const body = childOfType(node, 'class_body', 'enum_class_body');
  return makeSymbol(qualified, classKind(node), node, {
    signature: declarationHeader(node, body),
    docstring: leadingComments(node),
    children: body ? bodyMembers(body, qualified, ctx) : [],
  });
}

function extractTypes(ctx: ExtractionContext): void {
  const pkg = packageName(ctx);
  for (const child of ctx.root.namedChildren) {
    if (child.type !== 'class_declaration' && child.type !== 'object_declaration') continue;
    const symbol = typeSymbol(child, pkg, ctx);
    if (symbol) ctx.file.symbols.push(symbol);
  }
}

function isExtensionFunction(fn: SyntaxNode): boolean {
  const head = fn.text.split('(')[0] ?? '';
  return head.includes('.');
}

function extractFunctions(ctx: ExtractionContext): void {
  for (const fn of findDescendants(ctx.root, 'function_declaration')) {
    if (hasAncestor(fn, TYPE_SCOPES) || hasAncestor(fn, FUNCTION_SCOPES)) continue;
    const name = functionName(fn);
    if (!name) continue;

    let kind: SymbolKind = isExtensionFunction(fn) ? 'extension_function' : 'function';
    if (hasModifier(fn, 'suspend')) kind = 'suspend_function';

    ctx.file.symbols.push(
      makeSymbol(name.text, kind, fn, {
        signature: declarationHeader(fn),
        docstring: leadingComments(fn),
      })
    );
  }
}

function extractProperties(ctx: ExtractionContext): void {
  for (const child of ctx.root.namedChildren) {
    if (child.type !== 'property_declaration') continue;
    const symbol = propertySymbol(child);
    if (symbol) ctx.file.symbols.push(symbol);
  }
}

function extractAnnotations(ctx: ExtractionContext): void {
  const seen = new Set<string>();
  for (const annotation of findDescendants(ctx.root, 'annotation')) {
    const userType = findDescendant(annotation, 'user_type');
    const ident = userType ? childOfType(userType, 'type_identifier') : null;
    if (!ident || seen.has(ident.text)) continue;
    seen.add(ident.text);
    ctx.file.symbols.push(
      makeSymbol(ident.text, 'annotation', annotation, { signature: collapseWhitespace(annotation.text) })
    );
  }
}

/** `foo` for `foo(...)`, `bar` for `a.b.bar(...)`. */
function callTarget(call: SyntaxNode): string {
  const callee = call.namedChildren[0];
  if (!callee) return '';
  if (callee.type === 'simple_identifier') return callee.text;
  if (callee.type !== 'navigation_expression') return '';
  const suffix = childrenOfType(callee, 'navigation_suffix').pop();
  return suffix ? childOfType(suffix, 'simple_identifier')?.text ?? '' : '';
}

function extractCalls(ctx: ExtractionContext): void {
  const index = new CallerIndex(ctx.file.symbols, CALLABLE_KINDS);
  const sites = findDescendants(ctx.root, 'call_expression').map(call => ({ node: call, target: callTarget(call) }));
  addCallDependencies(ctx.file, index, sites);
}

export const kotlinExtractor = defineExtractor({
  language: 'kotlin',
  displayName: 'Kotlin',
  grammar: 'kotlin',
  extensions: ['.kt', '.kts'],
  steps: {
    package: extractPackage,
    imports: extractImports,
    types: extractTypes,
    functions: extractFunctions,
    properties: extractProperties,
    annotations: extractAnnotations,
    calls: extractCalls,
  },
});
