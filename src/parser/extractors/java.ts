import type { SyntaxNode } from '../syntax.js';
import type { ParsedSymbol, SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { defineExtractor } from './base.js';
import {
  CallerIndex,
  addCallDependencies,
  addDependency,
  childOfType,
  collapseWhitespace,
  declarationHeader,
  findDescendants,
  inferPackageFromPath,
  isExternalPackage,
  leadingComments,
  makeSymbol,
  qualify,
} from './helpers.js';

export const JAVA_SOURCE_ROOTS = ['src/main/java/', 'src/test/java/', 'src/', 'java/'];
const INTERNAL_PREFIXES = ['java.', 'javax.'];

const CALLABLE_KINDS = new Set<SymbolKind>(['method', 'constructor']);

const TYPE_DECLARATIONS: Record<string, SymbolKind> = {
  class_declaration: 'class',
  interface_declaration: 'interface',
  enum_declaration: 'enum',
  annotation_type_declaration: 'annotation',
};

function packageName(ctx: ExtractionContext): string {
  return ctx.file.symbols.find(s => s.kind === 'package')?.name ?? '';
}

function extractPackage(ctx: ExtractionContext): void {
  const decl = childOfType(ctx.root, 'package_declaration');
  const ident = decl ? childOfType(decl, 'scoped_identifier', 'identifier') : null;
  if (decl && ident) {
    ctx.file.symbols.push(
      makeSymbol(ident.text, 'package', decl, { signature: `package ${ident.text}`, spanNode: ident })
    );
    return;
  }

  const inferred = inferPackageFromPath(ctx.file.path, JAVA_SOURCE_ROOTS);
  if (!inferred) return;
  // Not written in the source, so there is no location to report
  ctx.file.symbols.push({
    ...makeSymbol(inferred, 'package', ctx.root, { signature: `package ${inferred}` }),
    span: { startLine: 0, endLine: 0, startByte: 0, endByte: 0 },
  });
}

/** `java.util.List`, `java.util.*` or `static org.junit.Assert.assertEquals`, without keywords. */
function importPath(decl: SyntaxNode): string {
  return collapseWhitespace(decl.text)
    .replace(/^import\s+/, '')
    .replace(/^static\s+/, '')
    .replace(/\s*;$/, '')
    .replace(/\s+/g, '');
}

function extractImports(ctx: ExtractionContext): void {
  const pkg = packageName(ctx);
  for (const decl of ctx.root.namedChildren) {
    if (decl.type !== 'import_declaration') continue;
    const target = importPath(decl);
    if (!target) continue;
    addDependency(ctx.file, 'import', pkg, target, {
      targetModule: target.replace(/\.\*$/, ''),
      isExternal: isExternalPackage(target, pkg, INTERNAL_PREFIXES),
    });
  }
}

/** Bare type name of `Foo`, `Foo<T>` or `a.b.Foo`. */
function typeName(node: SyntaxNode): string {
  switch (node.type) {
    case 'generic_type': {
      const base = node.namedChildren.find(c => c.type !== 'type_arguments');
      return base ? typeName(base) : collapseWhitespace(node.text);
    }
    default:
      return collapseWhitespace(node.text);
  }
}

function typeListNames(container: SyntaxNode | null): string[] {
  if (!container) return [];
  const list = childOfType(container, 'type_list');
  const types = list ? list.namedChildren : container.namedChildren;
  return types.map(typeName).filter(name => name.length > 0);
}

function memberSymbols(body: SyntaxNode, pkg: string, owner: string, ctx: ExtractionContext): ParsedSymbol[] {
  const members: ParsedSymbol[] = [];

  for (const child of body.namedChildren) {
    switch (child.type) {
      case 'field_declaration':
      case 'constant_declaration': {
        const signature = declarationHeader(child);
        for (const declarator of child.childrenForFieldName('declarator')) {
          const name = declarator.childForFieldName('name');
          if (!name) continue;
          members.push(makeSymbol(name.text, 'field', child, { signature, docstring: leadingComments(child) }));
        }
        break;
      }
      case 'method_declaration':
      case 'constructor_declaration':
      case 'annotation_type_element_declaration': {
        const name = child.childForFieldName('name');
        if (!name) break;
        members.push(
          makeSymbol(name.text, child.type === 'constructor_declaration' ? 'constructor' : 'method', child, {
            signature: declarationHeader(child, child.childForFieldName('body')),
            docstring: leadingComments(child),
          })
        );
        break;
      }
      case 'enum_constant': {
        const name = child.childForFieldName('name');
        if (!name) break;
        members.push(
          makeSymbol(name.text, 'enum_constant', child, {
            signature: name.text,
            docstring: leadingComments(child),
          })
        );
        break;
      }
      case 'enum_body_declarations':
        members.push(...memberSymbols(child, pkg, owner, ctx));
        break;
      default: {
        // Nested types stay under their owner, qualified by its name
        const nested = typeSymbol(child, qualify(pkg, owner), ctx);
        if (nested) members.push(nested);
      }
    }
  }
  return members;
}

function typeSymbol(node: SyntaxNode, scope: string, ctx: ExtractionContext): ParsedSymbol | null {
  const kind = TYPE_DECLARATIONS[node.type];
  const name = node.childForFieldName('name');
  if (!kind || !name) return null;

  const simpleName = name.text;
  if (node.type === 'interface_declaration') {
    for (const parent of typeListNames(childOfType(node, 'extends_interfaces'))) {
      addDependency(ctx.file, 'extends', simpleName, parent);
    }
  } else {
    const superclass = node.childForFieldName('superclass');
    const superType = superclass?.namedChildren[0];
    if (superType) addDependency(ctx.file, 'extends', simpleName, typeName(superType));
    for (const iface of typeListNames(node.childForFieldName('interfaces'))) {
      addDependency(ctx.file, 'implements', simpleName, iface);
    }
  }

  const body = node.childForFieldName('body');
  return makeSymbol(qualify(scope, simpleName), kind, node, {
    signature: declarationHeader(node, body),
    docstring: leadingComments(node),
    children: body ? memberSymbols(body, scope, simpleName, ctx) : [],
  });
}

function extractTypes(ctx: ExtractionContext): void {
  const pkg = packageName(ctx);
  for (const child of ctx.root.namedChildren) {
    const symbol = typeSymbol(child, pkg, ctx);
    if (symbol) ctx.file.symbols.push(symbol);
  }
}

const ANNOTATED_DECLARATIONS = new Set([
  'class_declaration',
  'interface_declaration',
  'enum_declaration',
  'annotation_type_declaration',
  'method_declaration',
  'constructor_declaration',
  'field_declaration',
]);

/** Name of the declaration an annotation is attached to. */
function annotationTarget(annotation: SyntaxNode): string {
  for (let current = annotation.parent; current; current = current.parent) {
    if (!ANNOTATED_DECLARATIONS.has(current.type)) continue;
    if (current.type === 'field_declaration') {
      return current.childForFieldName('declarator')?.childForFieldName('name')?.text ?? '';
    }
    return current.childForFieldName('name')?.text ?? '';
  }
  return '';
}

function extractAnnotations(ctx: ExtractionContext): void {
  const seen = new Set<string>();
  const annotations = [
    ...findDescendants(ctx.root, 'marker_annotation'),
    ...findDescendants(ctx.root, 'annotation'),
  ].sort((a, b) => a.startIndex - b.startIndex);

  for (const annotation of annotations) {
    const name = annotation.childForFieldName('name');
    const target = annotationTarget(annotation);
    if (!name || !target) continue;

    const key = `${target}:${name.text}`;
    if (seen.has(key)) continue;
    seen.add(key);
    addDependency(ctx.file, 'annotated_with', target, name.text);
  }
}

function extractCalls(ctx: ExtractionContext): void {
  const index = new CallerIndex(ctx.file.symbols, CALLABLE_KINDS);
  const sites: Array<{ node: SyntaxNode; target: string }> = [];

  for (const node of findDescendants(ctx.root, 'method_invocation').concat(
    findDescendants(ctx.root, 'object_creation_expression')
  )) {
    const target =
      node.type === 'method_invocation' ? node.childForFieldName('name') : node.childForFieldName('type');
    if (target) sites.push({ node, target: typeName(target) });
  }

  sites.sort((a, b) => a.node.startIndex - b.node.startIndex);
  addCallDependencies(ctx.file, index, sites);
}

export const javaExtractor = defineExtractor({
  language: 'java',
  displayName: 'Java',
  grammar: 'java',
  extensions: ['.java'],
  steps: {
    package: extractPackage,
    imports: extractImports,
    types: extractTypes,
    annotations: extractAnnotations,
    calls: extractCalls,
  },
});
