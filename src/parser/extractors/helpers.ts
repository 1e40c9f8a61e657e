import type { SyntaxNode, QueryMatch } from '../syntax.js';
import { posix } from 'path';
import type {
  DependencyType,
  ParsedDependency,
  ParsedFile,
  ParsedSpan,
  ParsedSymbol,
  SymbolKind,
} from '../../types.js';

export function findDescendant(node: SyntaxNode, type: string): SyntaxNode | null {
  if (node.type === type) return node;
  for (const child of node.children) {
    const found = findDescendant(child, type);
    if (found) return found;
  }
  return null;
}

export function findDescendants(node: SyntaxNode, type: string): SyntaxNode[] {
  const results: SyntaxNode[] = [];
  if (node.type === type) results.push(node);
  for (const child of node.children) {
    results.push(...findDescendants(child, type));
  }
  return results;
}

export function childOfType(node: SyntaxNode, ...types: string[]): SyntaxNode | null {
  return node.children.find(child => types.includes(child.type)) ?? null;
}

export function childrenOfType(node: SyntaxNode, ...types: string[]): SyntaxNode[] {
  return node.children.filter(child => types.includes(child.type));
}

/** True when some ancestor (not the node itself) has one of the given types. */
export function hasAncestor(node: SyntaxNode, types: ReadonlySet<string>): boolean {
  for (let current = node.parent; current; current = current.parent) {
    if (types.has(current.type)) return true;
  }
  return false;
}

export function captureNode(match: QueryMatch, name: string): SyntaxNode | null {
  return match.captures.find(capture => capture.name === name)?.node ?? null;
}

export function nodeSpan(node: SyntaxNode): ParsedSpan {
  return {
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
    startByte: node.startIndex,
    endByte: node.endIndex,
  };
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Declaration text before its body (or the whole node when there is none),
 * whitespace-collapsed and without a trailing `{`, `;` or `:`.
 */
export function declarationHeader(node: SyntaxNode, body?: SyntaxNode | null): string {
  let text = node.text;
  if (body && body.startIndex >= node.startIndex) {
    text = text.slice(0, body.startIndex - node.startIndex);
  } else {
    const brace = text.indexOf('{');
    if (brace >= 0) text = text.slice(0, brace);
  }
  return collapseWhitespace(text).replace(/\s*[{;:]$/, '');
}

export function unquote(text: string): string {
  return text.replace(/^["'`<]+|["'`>]+$/g, '');
}

/** Strips comment markers from a `//`, `///`, `//!`, `/* *\/`, `/** *\/` or `/*! *\/` comment, and the `<` of a member comment. */
export function cleanComment(text: string): string {
  const trimmed = text.trim();
  let lines: string[];
  if (trimmed.startsWith('/*')) {
    const body = trimmed.replace(/^\/\*[*!]?<?/, '').replace(/\*\/$/, '');
    lines = body.split('\n').map(line => line.trim().replace(/^\*+/, '').trim());
  } else {
    lines = trimmed.split('\n').map(line => line.trim().replace(/^\/\/[/!]?<?/, '').trim());
  }
  return lines.filter(line => line.length > 0).join('\n');
}

const COMMENT_TYPES = new Set(['comment', 'line_comment', 'block_comment', 'multiline_comment']);

/** `/**<`, `/*!<`, `///<` and `//!<` document the declaration before them. */
export function isMemberComment(comment: SyntaxNode): boolean {
  return /^(\/\*[*!]<|\/\/[/!]<)/.test(comment.text);
}

/** A comment that starts on the line where the preceding named sibling ends belongs to that sibling. */
function isTrailingComment(comment: SyntaxNode): boolean {
  if (isMemberComment(comment)) return true;
  const previous = comment.previousNamedSibling;
  return previous !== null && previous.endPosition.row === comment.startPosition.row;
}

/**
 * Comments directly above `node`: the run of comment siblings with no blank
 * line between them and the declaration, cleaned and joined in source order.
 * Trailing comments of the previous declaration are not part of the run.
 */
export function leadingComments(
  node: SyntaxNode,
  accept: (comment: SyntaxNode) => boolean = () => true
): string | undefined {
  const collected: string[] = [];
  let expectedRow = node.startPosition.row;

  for (let sibling = node.previousSibling; sibling; sibling = sibling.previousSibling) {
    if (!COMMENT_TYPES.has(sibling.type)) break;
    if (sibling.endPosition.row < expectedRow - 1) break;
    if (isTrailingComment(sibling) || !accept(sibling)) break;
    collected.unshift(cleanComment(sibling.text));
    expectedRow = sibling.startPosition.row;
  }

  const doc = collected.filter(line => line.length > 0).join('\n');
  return doc.length > 0 ? doc : undefined;
}

/** A `/**<`-style member comment on the line where `node` ends. */
export function trailingMemberComment(node: SyntaxNode): string | undefined {
  const next = node.nextSibling;
  if (!next || !COMMENT_TYPES.has(next.type)) return undefined;
  if (next.startPosition.row !== node.endPosition.row || !isMemberComment(next)) return undefined;
  const doc = cleanComment(next.text);
  return doc.length > 0 ? doc : undefined;
}

export function isDocComment(comment: SyntaxNode): boolean {
  return /^(\/\*\*|\/\*!|\/\/\/|\/\/!)/.test(comment.text);
}

export interface SymbolInit {
  signature?: string;
  docstring?: string;
  children?: ParsedSymbol[];
  /** Span source when it differs from the scope node. */
  spanNode?: SyntaxNode;
}

export function makeSymbol(
  name: string,
  kind: SymbolKind,
  node: SyntaxNode,
  init: SymbolInit = {}
): ParsedSymbol {
  const symbol: ParsedSymbol = {
    name,
    kind,
    signature: init.signature ?? '',
    span: nodeSpan(init.spanNode ?? node),
    children: init.children ?? [],
    node,
  };
  if (init.docstring) symbol.docstring = init.docstring;
  return symbol;
}

export function addDependency(
  file: ParsedFile,
  type: DependencyType,
  source: string,
  target: string,
  extra: Partial<Pick<ParsedDependency, 'targetModule' | 'isExternal'>> = {}
): void {
  const dependency: ParsedDependency = {
    type,
    source,
    target,
    isExternal: extra.isExternal ?? false,
  };
  if (extra.targetModule !== undefined) dependency.targetModule = extra.targetModule;
  file.dependencies.push(dependency);
}

function nodeKey(node: SyntaxNode): string {
  return `${node.type}:${node.startIndex}:${node.endIndex}`;
}

/** Maps syntax nodes of recorded callable symbols back to their names. */
export class CallerIndex {
  private readonly callers = new Map<string, string>();

  constructor(symbols: ParsedSymbol[], kinds: ReadonlySet<SymbolKind>) {
    this.register(symbols, kinds);
  }

  private register(symbols: ParsedSymbol[], kinds: ReadonlySet<SymbolKind>): void {
    for (const symbol of symbols) {
      if (symbol.node && kinds.has(symbol.kind)) {
        const key = nodeKey(symbol.node);
        if (!this.callers.has(key)) this.callers.set(key, symbol.name);
      }
      this.register(symbol.children, kinds);
    }
  }

  /** Name of the nearest enclosing recorded callable, or null outside any. */
  callerOf(node: SyntaxNode): string | null {
    for (let current = node.parent; current; current = current.parent) {
      const name = this.callers.get(nodeKey(current));
      if (name !== undefined) return name;
    }
    return null;
  }
}

/** Records one call edge per call site that sits inside a recorded callable. */
export function addCallDependencies(
  file: ParsedFile,
  index: CallerIndex,
  sites: Array<{ node: SyntaxNode; target: string }>
): void {
  for (const site of sites) {
    if (!site.target) continue;
    const caller = index.callerOf(site.node);
    if (caller !== null) {
      addDependency(file, 'call', caller, site.target);
    }
  }
}

/** First two dot-separated segments, e.g. `com.acme` for `com.acme.billing.Invoice`. */
export function basePackage(qualified: string): string {
  return qualified.split('.').slice(0, 2).join('.');
}

/**
 * Dot-free paths are standard library; dotted paths are external unless they
 * match a known internal prefix or share the current file's base package.
 */
export function isExternalPackage(
  importPath: string,
  currentPackage: string,
  internalPrefixes: readonly string[] = []
): boolean {
  if (!importPath.includes('.')) return false;
  if (internalPrefixes.some(prefix => importPath.startsWith(prefix))) return false;
  if (currentPackage && basePackage(importPath) === basePackage(currentPackage)) return false;
  return true;
}

/** Package implied by the directories under the first matching source root. */
export function inferPackageFromPath(filePath: string, roots: readonly string[]): string {
  const normalized = filePath.replace(/\\/g, '/');
  for (const root of roots) {
    let rest: string | null = null;
    if (normalized.startsWith(root)) {
      rest = normalized.slice(root.length);
    } else {
      const at = normalized.indexOf(`/${root}`);
      if (at >= 0) rest = normalized.slice(at + root.length + 1);
    }
    if (rest === null) continue;
    const dir = posix.dirname(rest);
    return dir === '.' ? '' : dir.split('/').join('.');
  }
  return '';
}

export function qualify(pkg: string, name: string): string {
  return pkg ? `${pkg}.${name}` : name;
}

export interface QualifiedName {
  /** `ns::Widget` for `ns::Widget::draw`; null when unqualified. */
  scope: string | null;
  member: string;
}

/** Splits a `::`-qualified name, ignoring template arguments in the scope. */
export function splitQualifiedName(name: string): QualifiedName {
  let plain = name;
  for (let previous = ''; previous !== plain; ) {
    previous = plain;
    plain = plain.replace(/<[^<>]*>(?=::)/g, '');
  }
  const at = plain.lastIndexOf('::');
  if (at < 0) return { scope: null, member: plain };
  return { scope: plain.slice(0, at), member: plain.slice(at + 2) };
}

/** Last segment of a `::`-qualified scope. */
export function innermostScope(scope: string): string {
  const at = scope.lastIndexOf('::');
  return at < 0 ? scope : scope.slice(at + 2);
}
