import type { SyntaxNode, SyntaxTree } from './parser/syntax.js';

export type LanguageTag =
  | 'c' | 'cpp' | 'objc' | 'objcpp'
  | 'go' | 'python' | 'java' | 'kotlin' | 'swift';

export type SymbolKind =
  // shared
  | 'module' | 'package' | 'namespace' | 'type' | 'typedef'
  | 'class' | 'struct' | 'union' | 'enum' | 'interface' | 'annotation'
  | 'function' | 'method' | 'constructor' | 'destructor' | 'field' | 'property' | 'variable'
  // C family
  | 'class_template' | 'function_template' | 'function_declaration' | 'static_function'
  | 'inline_function' | 'virtual_method' | 'operator' | 'enum_constant' | 'macro'
  | 'function_macro' | 'extern_variable'
  // Objective-C
  | 'implementation' | 'method_implementation' | 'protocol' | 'category'
  // Python
  | 'async_function' | 'async_method' | 'static_method' | 'class_method'
  // Kotlin
  | 'data_class' | 'sealed_class' | 'object' | 'extension_function' | 'suspend_function'
  | 'suspend_method'
  // Swift
  | 'extension' | 'enum_case' | 'property_observer';

export type DependencyType =
  | 'import' | 'call' | 'extends' | 'implements' | 'conforms'
  | 'overrides' | 'annotated_with'
  | 'implements_header' | 'implements_declaration';

/** Input descriptor produced by file discovery. */
export interface SourceFile {
  path: string;
  absolutePath: string;
  language: LanguageTag;
  size: number;
}

/** 1-based lines, 0-based offsets into the parsed content. */
export interface ParsedSpan {
  startLine: number;
  endLine: number;
  startByte: number;
  endByte: number;
}

export interface ParsedSymbol {
  name: string;
  kind: SymbolKind;
  signature: string;
  span: ParsedSpan;
  docstring?: string;
  children: ParsedSymbol[];
  /**
   * Syntax node the symbol was read from. Only meaningful while the owning
   * ParsedFile keeps its tree; never persisted.
   */
  node?: SyntaxNode;
}

export interface ParsedDependency {
  type: DependencyType;
  /** Issuing symbol name; empty for file-level imports. */
  source: string;
  target: string;
  targetModule?: string;
  isExternal: boolean;
}

export interface ParsedFile {
  path: string;
  language: LanguageTag;
  content: string;
  checksum: string;
  tree: SyntaxTree | null;
  symbols: ParsedSymbol[];
  dependencies: ParsedDependency[];
}

export interface ProgressStats {
  totalFiles: number;
  filesProcessed: number;
  filesFailed: number;
  symbolsExtracted: number;
  dependenciesExtracted: number;
  startTime?: number;
  stage?: string;
  stageNumber?: number;
  totalStages?: number;
  currentItem?: string;
}
