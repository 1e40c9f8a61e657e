export type {
  LanguageTag,
  SymbolKind,
  DependencyType,
  SourceFile,
  ParsedSpan,
  ParsedSymbol,
  ParsedDependency,
  ParsedFile,
  ProgressStats,
} from './types.js';
export { DetailedParseError, ConfigError, renderParseError, describeError } from './errors.js';
export type { ParseErrorKind, ParseErrorInit } from './errors.js';
export { loadConfig, LOG_LEVELS } from './config.js';
export type { ExtractorConfig, LogLevel } from './config.js';
export { createLogger, setLogLevel, getLogLevel } from './logger.js';
export type { Logger } from './logger.js';
export { SyntaxProvider, getSyntaxProvider } from './parser/syntax.js';
export type { GrammarName, ParseOutcome, SyntaxIssue } from './parser/syntax.js';
export {
  getExtractor,
  getExtractorForFile,
  detectLanguage,
  getSupportedExtensions,
  getRegisteredLanguages,
  isLanguageTag,
  defaultRegistry,
} from './parser/extractors/index.js';
export type { ExtractorRegistry, LanguageExtractor, ExtractionOutcome } from './parser/extractors/index.js';
export { ParserPool, optimalWorkerCount } from './parser/pool.js';
export type { ParserPoolOptions, ProgressReporter, BatchResult } from './parser/pool.js';
export { linkDeclarations, findImplementationPath, associateHeaders } from './parser/cross-reference.js';
export { collectFiles, headerLanguage } from './parser/scanner.js';
export { serializeFile, serializeBatch, serializeSymbol, serializeError } from './serialize.js';
export type { SerializedFile, SerializedBatch, SerializedSymbol, SerializedError } from './serialize.js';
