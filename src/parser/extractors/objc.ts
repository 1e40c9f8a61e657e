import type { SyntaxNode } from '../syntax.js';
import type { ParsedSymbol, SymbolKind } from '../../types.js';
import type { ExtractionContext } from './types.js';
import { defineExtractor } from './base.js';
import { doxygenDoc, extractIncludes, isExternalInclude } from './c-family.js';
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
  makeSymbol,
} from './helpers.js';

const CALLABLE_KINDS = new Set<SymbolKind>(['method_implementation']);

export function isExternalObjCImport(importPath: string): boolean {
  const isFramework = getKnownModules().appleFrameworks.some(
    framework => importPath.startsWith(`${framework}/`) || importPath === `${framework}.h`
  );
  return isFramework || isExternalInclude(importPath, 'c');
}

/** First line of a container declaration: `@interface Person : NSObject <NSCoding>`. */
function headline(node: SyntaxNode): string {
  const firstLine = node.text.split('\n')[0] ?? '';
  return collapseWhitespace(firstLine).replace(/\s*\{$/, '');
}

/** Selector of a method declaration or definition: `greet`, `initWithName:age:`. */
export function methodSelector(method: SyntaxNode): string {
  const parts: string[] = [];
  for (const child of method.children) {
    switch (child.type) {
      case 'identifier':
        parts.push(child.text);
        break;
      case 'method_parameter':
        if (parts.length > 0) parts[parts.length - 1] += ':';
        break;
      case 'keyword_declarator': {
        const keyword = child.childForFieldName('keyword') ?? childOfType(child, 'identifier');
        if (keyword) parts.push(`${keyword.text}:`);
        break;
      }
    }
  }
  return parts.join('');
}

function sameNode(a: SyntaxNode, b: SyntaxNode): boolean {
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

/** Full selector of a message send: `[obj greet]` gives `greet`, `[p setName:n age:a]` gives `setName:age:`. */
export function messageSelector(message: SyntaxNode): string {
  const receiver = message.childForFieldName('receiver');
  const methods = message.childrenForFieldName('method');
  const isSelectorPart = (child: SyntaxNode) =>
    methods.length > 0
      ? methods.some(method => sameNode(method, child))
      : child.type === 'identifier' && !(receiver && sameNode(receiver, child));

  const parts: string[] = [];
  for (const child of message.children) {
    if (isSelectorPart(child)) {
      parts.push(child.text);
    } else if (child.type === ':') {
      if (parts.length > 0) parts[parts.length - 1] += ':';
    } else if (child.type === 'keyword_argument') {
      const keyword = child.childForFieldName('keyword') ?? childOfType(child, 'identifier');
      if (keyword) parts.push(`${keyword.text}:`);
    }
  }
  return parts.join('');
}

function propertyName(property: SyntaxNode): string {
  const declaration = childOfType(property, 'struct_declaration');
  const declarator = declaration ? childOfType(declaration, 'struct_declarator') : null;
  const target = declarator ?? declaration;
  if (!target) return '';
  return findDescendant(target, 'identifier')?.text ?? '';
}

/** `@property` and method declarations directly inside a container. */
function declaredMembers(container: SyntaxNode): ParsedSymbol[] {
  const members: ParsedSymbol[] = [];
  for (const child of container.namedChildren) {
    if (child.type === 'property_declaration') {
      const name = propertyName(child);
      if (!name) continue;
      members.push(
        makeSymbol(name, 'property', child, {
          signature: collapseWhitespace(child.text).replace(/;$/, ''),
          docstring: doxygenDoc(child),
        })
      );
    } else if (child.type === 'method_declaration') {
      const selector = methodSelector(child);
      if (!selector) continue;
      members.push(
        makeSymbol(selector, 'method', child, {
          signature: declarationHeader(child),
          docstring: doxygenDoc(child),
        })
      );
    }
  }
  return members;
}

function firstIdentifier(node: SyntaxNode): SyntaxNode | null {
  return childOfType(node, 'identifier');
}

function isCategory(node: SyntaxNode): boolean {
  return node.children.some(child => child.type === '(');
}

function superclassName(node: SyntaxNode): string {
  const field = node.childForFieldName('superclass');
  if (field) return field.text;
  let afterColon = false;
  for (const child of node.children) {
    if (child.type === ':') afterColon = true;
    else if (afterColon && child.type === 'identifier') return child.text;
  }
  return '';
}

function adoptedProtocols(node: SyntaxNode): string[] {
  return childrenOfType(node, 'protocol_qualifiers', 'parameterized_arguments').flatMap(list =>
    list.namedChildren.flatMap(item => {
      if (item.type === 'identifier' || item.type === 'type_identifier') return [item.text];
      if (item.type === 'type_name') {
        const ident = findDescendant(item, 'type_identifier');
        return ident ? [ident.text] : [];
      }
      return [];
    })
  );
}

function interfaceSymbol(node: SyntaxNode, ctx: ExtractionContext): ParsedSymbol | null {
  const name = firstIdentifier(node);
  if (!name) return null;

  const superclass = superclassName(node);
  if (superclass) addDependency(ctx.file, 'extends', name.text, superclass);
  for (const protocol of adoptedProtocols(node)) {
    addDependency(ctx.file, 'conforms', name.text, protocol);
  }

  return makeSymbol(name.text, 'interface', node, {
    signature: headline(node),
    docstring: doxygenDoc(node),
    children: declaredMembers(node),
  });
}

function categorySymbol(node: SyntaxNode, ctx: ExtractionContext): ParsedSymbol | null {
  const identifiers = childrenOfType(node, 'identifier');
  const className = identifiers[0]?.text;
  const categoryName = node.childForFieldName('category')?.text ?? identifiers[1]?.text ?? '';
  if (!className) return null;

  const name = `${className}(${categoryName})`;
  addDependency(ctx.file, 'extends', name, className);
  for (const protocol of adoptedProtocols(node)) {
    addDependency(ctx.file, 'conforms', name, protocol);
  }

  return makeSymbol(name, 'category', node, {
    signature: headline(node),
    docstring: doxygenDoc(node),
    children: declaredMembers(node),
  });
}

function implementationSymbol(node: SyntaxNode): ParsedSymbol | null {
  const name = firstIdentifier(node);
  if (!name) return null;

  const methods: ParsedSymbol[] = [];
  for (const section of childrenOfType(node, 'implementation_definition')) {
    for (const method of childrenOfType(section, 'method_definition')) {
      const selector = methodSelector(method);
      if (!selector) continue;
      methods.push(
        makeSymbol(selector, 'method_implementation', method, {
          signature: declarationHeader(method, childOfType(method, 'compound_statement')),
          docstring: doxygenDoc(method),
        })
      );
    }
  }

  return makeSymbol(name.text, 'implementation', node, {
    signature: headline(node),
    docstring: doxygenDoc(node),
    children: methods,
  });
}

function protocolSymbol(node: SyntaxNode, ctx: ExtractionContext): ParsedSymbol | null {
  const name = firstIdentifier(node);
  if (!name) return null;

  for (const parent of adoptedProtocols(node)) {
    addDependency(ctx.file, 'extends', name.text, parent);
  }

  // Requirements sit directly in the body or in @required / @optional sections
  const children = [
    ...declaredMembers(node),
    ...childrenOfType(node, 'qualified_protocol_interface_declaration').flatMap(declaredMembers),
  ].sort((a, b) => a.span.startByte - b.span.startByte);

  return makeSymbol(name.text, 'protocol', node, {
    signature: headline(node),
    docstring: doxygenDoc(node),
    children,
  });
}

const CONTAINER_TYPES = new Set(['class_interface', 'class_implementation', 'protocol_declaration']);

function containerSymbol(node: SyntaxNode, ctx: ExtractionContext): ParsedSymbol | null {
  switch (node.type) {
    case 'class_interface':
      return isCategory(node) ? categorySymbol(node, ctx) : interfaceSymbol(node, ctx);
    case 'class_implementation':
      return implementationSymbol(node);
    default:
      return protocolSymbol(node, ctx);
  }
}

function extractDeclarations(ctx: ExtractionContext): void {
  const visit = (node: SyntaxNode) => {
    for (const child of node.namedChildren) {
      if (CONTAINER_TYPES.has(child.type)) {
        const symbol = containerSymbol(child, ctx);
        if (symbol) ctx.file.symbols.push(symbol);
      } else {
        visit(child);
      }
    }
  };
  visit(ctx.root);
}

function extractCalls(ctx: ExtractionContext): void {
  const index = new CallerIndex(ctx.file.symbols, CALLABLE_KINDS);
  const sites = findDescendants(ctx.root, 'message_expression').map(message => ({
    node: message,
    target: messageSelector(message),
  }));
  addCallDependencies(ctx.file, index, sites);
}

export const objcExtractor = defineExtractor({
  language: 'objc',
  displayName: 'Objective-C',
  grammar: 'objc',
  extensions: ['.m'],
  steps: {
    imports: ctx => extractIncludes(ctx, isExternalObjCImport),
    declarations: extractDeclarations,
    calls: extractCalls,
  },
});
