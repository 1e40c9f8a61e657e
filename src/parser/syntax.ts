import Parser from 'tree-sitter';
import WebParser from 'web-tree-sitter';
import { createRequire } from 'module';
import { dirname, join } from 'path';
import { describeError } from '../errors.js';

const require = createRequire(import.meta.url);

type NativeGrammarName = 'c' | 'cpp' | 'objc' | 'go' | 'python' | 'java' | 'kotlin';
type WasmGrammarName = 'swift';
export type GrammarName = NativeGrammarName | WasmGrammarName;

const NATIVE_PACKAGES: Record<NativeGrammarName, string> = {
  c: 'tree-sitter-c',
  cpp: 'tree-sitter-cpp',
  objc: 'tree-sitter-objc',
  go: 'tree-sitter-go',
  python: 'tree-sitter-python',
  java: 'tree-sitter-java',
  kotlin: 'tree-sitter-kotlin',
};

// Prebuilt grammars shipped by tree-sitter-wasms, loaded through web-tree-sitter
const WASM_FILES: Record<WasmGrammarName, string> = {
  swift: 'tree-sitter-swift.wasm',
};

// The binding's default input buffer is 32 KiB; larger inputs need an explicit size.
const DEFAULT_BUFFER_SIZE = 32 * 1024;

export interface SyntaxPoint {
  row: number;
  column: number;
}

/** The node surface extractors read; both tree-sitter runtimes provide it. */
export interface SyntaxNode {
  readonly type: string;
  readonly text: string;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly startPosition: SyntaxPoint;
  readonly endPosition: SyntaxPoint;
  readonly parent: SyntaxNode | null;
  readonly previousSibling: SyntaxNode | null;
  readonly nextSibling: SyntaxNode | null;
  readonly previousNamedSibling: SyntaxNode | null;
  readonly children: SyntaxNode[];
  readonly namedChildren: SyntaxNode[];
  childForFieldName(fieldName: string): SyntaxNode | null;
  childrenForFieldName(fieldName: string): SyntaxNode[];
}

export interface SyntaxTree {
  readonly rootNode: SyntaxNode;
}

export interface QueryCapture {
  name: string;
  node: SyntaxNode;
}

export interface QueryMatch {
  captures: QueryCapture[];
}

export interface SyntaxIssue {
  message: string;
  /** 1-based; 0 when unknown. */
  line: number;
  column: number;
}

export interface ParseOutcome {
  tree: SyntaxTree | null;
  error: SyntaxIssue | null;
}

interface GrammarHandle {
  parse(source: string): ParseOutcome;
  query(tree: SyntaxTree, pattern: string): QueryMatch[];
}

function issueAt(node: { startPosition: SyntaxPoint }): SyntaxIssue {
  return {
    message: 'parse tree contains errors',
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

class NativeGrammar implements GrammarHandle {
  private readonly parser = new Parser();
  private readonly trees = new WeakMap<SyntaxTree, Parser.Tree>();
  private readonly queries = new Map<string, Parser.Query>();

  constructor(private readonly name: GrammarName, private readonly language: unknown) {
    this.parser.setLanguage(language);
  }

  parse(source: string): ParseOutcome {
    const tree = this.parser.parse(source, undefined, {
      bufferSize: Math.max(DEFAULT_BUFFER_SIZE, source.length * 2 + 1),
    });
    this.trees.set(tree, tree);

    if (!tree.rootNode.hasError) return { tree, error: null };
    return { tree, error: issueAt(firstNativeError(tree.rootNode) ?? tree.rootNode) };
  }

  query(tree: SyntaxTree, pattern: string): QueryMatch[] {
    const native = this.trees.get(tree);
    if (!native) throw new Error(`tree was not parsed with the ${this.name} grammar`);

    let compiled = this.queries.get(pattern);
    if (!compiled) {
      compiled = new Parser.Query(this.language, pattern);
      this.queries.set(pattern, compiled);
    }
    return compiled.matches(native.rootNode);
  }
}

function firstNativeError(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (node.type === 'ERROR' || node.isMissing) return node;
  for (const child of node.children) {
    if (!child.hasError && !child.isMissing) continue;
    const found = firstNativeError(child);
    if (found) return found;
  }
  return null;
}

class WasmGrammar implements GrammarHandle {
  private readonly parser = new WebParser();
  private readonly trees = new WeakMap<SyntaxTree, WebParser.Tree>();
  private readonly queries = new Map<string, WebParser.Query>();

  constructor(private readonly name: GrammarName, private readonly language: WebParser.Language) {
    this.parser.setLanguage(language);
  }

  parse(source: string): ParseOutcome {
    const tree = this.parser.parse(source);
    this.trees.set(tree, tree);

    if (!tree.rootNode.hasError) return { tree, error: null };
    return { tree, error: issueAt(firstWasmError(tree.rootNode) ?? tree.rootNode) };
  }

  query(tree: SyntaxTree, pattern: string): QueryMatch[] {
    const wasm = this.trees.get(tree);
    if (!wasm) throw new Error(`tree was not parsed with the ${this.name} grammar`);

    let compiled = this.queries.get(pattern);
    if (!compiled) {
      compiled = this.language.query(pattern);
      this.queries.set(pattern, compiled);
    }
    return compiled.matches(wasm.rootNode);
  }
}

function firstWasmError(node: WebParser.SyntaxNode): WebParser.SyntaxNode | null {
  if (node.type === 'ERROR' || node.isMissing) return node;
  for (const child of node.children) {
    if (!child.hasError && !child.isMissing) continue;
    const found = firstWasmError(child);
    if (found) return found;
  }
  return null;
}

function isWasmGrammar(grammar: GrammarName): grammar is WasmGrammarName {
  return grammar in WASM_FILES;
}

let webRuntime: Promise<void> | null = null;

function initWebRuntime(): Promise<void> {
  if (!webRuntime) webRuntime = WebParser.init();
  return webRuntime;
}

function wasmPath(file: string): string {
  const pkg = require.resolve('tree-sitter-wasms/package.json');
  return join(dirname(pkg), 'out', file);
}

/**
 * Grammar tables loaded on first use and then only read. Each grammar gets one
 * parser configured once; parse calls never touch another grammar's state.
 * Native grammars load on demand; WebAssembly grammars must be prepared first.
 */
export class SyntaxProvider {
  private readonly handles = new Map<GrammarName, GrammarHandle>();
  private readonly pending = new Map<WasmGrammarName, Promise<void>>();
  private readonly failures = new Map<GrammarName, string>();

  /** Loads a grammar ahead of parsing. Never rejects; a failure surfaces at parse time. */
  async prepare(grammar: GrammarName): Promise<void> {
    if (this.handles.has(grammar) || this.failures.has(grammar)) return;
    if (!isWasmGrammar(grammar)) {
      try {
        this.handle(grammar);
      } catch (err) {
        this.failures.set(grammar, describeError(err));
      }
      return;
    }

    let loading = this.pending.get(grammar);
    if (!loading) {
      loading = this.loadWasm(grammar);
      this.pending.set(grammar, loading);
    }
    await loading;
  }

  parse(source: string, grammar: GrammarName): ParseOutcome {
    if (source.length === 0) {
      return { tree: null, error: { message: 'empty content', line: 0, column: 0 } };
    }
    return this.handle(grammar).parse(source);
  }

  /** Runs a structural pattern over a tree this provider parsed; compiled patterns are cached per grammar. */
  query(tree: SyntaxTree, pattern: string, grammar: GrammarName): QueryMatch[] {
    return this.handle(grammar).query(tree, pattern);
  }

  loadedGrammars(): GrammarName[] {
    return Array.from(this.handles.keys());
  }

  private handle(grammar: GrammarName): GrammarHandle {
    const cached = this.handles.get(grammar);
    if (cached) return cached;

    const failure = this.failures.get(grammar);
    if (failure) throw new Error(failure);

    if (isWasmGrammar(grammar)) {
      throw new Error(`grammar ${grammar} is not loaded; prepare it before parsing`);
    }

    const pkg = NATIVE_PACKAGES[grammar];
    let language: unknown;
    try {
      language = require(pkg);
    } catch (err) {
      throw new Error(`grammar package ${pkg} could not be loaded: ${describeError(err)}`);
    }

    const handle = new NativeGrammar(grammar, language);
    this.handles.set(grammar, handle);
    return handle;
  }

  private async loadWasm(grammar: WasmGrammarName): Promise<void> {
    try {
      await initWebRuntime();
      const language = await WebParser.Language.load(wasmPath(WASM_FILES[grammar]));
      this.handles.set(grammar, new WasmGrammar(grammar, language));
    } catch (err) {
      this.failures.set(grammar, `grammar ${WASM_FILES[grammar]} could not be loaded: ${describeError(err)}`);
    }
  }
}

let shared: SyntaxProvider | null = null;

export function getSyntaxProvider(): SyntaxProvider {
  if (!shared) {
    shared = new SyntaxProvider();
  }
  return shared;
}
