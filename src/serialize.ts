import type { LanguageTag, ParsedDependency, ParsedFile, ParsedSpan, ParsedSymbol, SymbolKind } from './types.js';
import type { DetailedParseError, ParseErrorKind } from './errors.js';

export interface SerializedSymbol {
  name: string;
  kind: SymbolKind;
  signature: string;
  span: ParsedSpan;
  docstring?: string;
  children: SerializedSymbol[];
}

export interface SerializedFile {
  path: string;
  language: LanguageTag;
  checksum: string;
  symbols: SerializedSymbol[];
  dependencies: ParsedDependency[];
}

export interface SerializedError {
  file: string;
  kind: ParseErrorKind;
  line: number;
  column: number;
  reason: string;
  message: string;
}

export interface SerializedBatch {
  files: SerializedFile[];
  errors: SerializedError[];
}

export function serializeSymbol(symbol: ParsedSymbol): SerializedSymbol {
  const out: SerializedSymbol = {
    name: symbol.name,
    kind: symbol.kind,
    signature: symbol.signature,
    span: { ...symbol.span },
    children: symbol.children.map(serializeSymbol),
  };
  if (symbol.docstring !== undefined) out.docstring = symbol.docstring;
  return out;
}

/** Drops the syntax tree, node handles and raw content. */
export function serializeFile(file: ParsedFile): SerializedFile {
  return {
    path: file.path,
    language: file.language,
    checksum: file.checksum,
    symbols: file.symbols.map(serializeSymbol),
    dependencies: file.dependencies.map(dep => ({ ...dep })),
  };
}

export function serializeError(error: DetailedParseError): SerializedError {
  return {
    file: error.file,
    kind: error.kind,
    line: error.line,
    column: error.column,
    reason: error.reason,
    message: error.message,
  };
}

export function serializeBatch(files: readonly ParsedFile[], errors: readonly DetailedParseError[]): SerializedBatch {
  return {
    files: [...files].sort((a, b) => a.path.localeCompare(b.path)).map(serializeFile),
    errors: errors.map(serializeError),
  };
}
