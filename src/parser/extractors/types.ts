import type { LanguageTag, ParsedFile, SourceFile } from '../../types.js';
import type { DetailedParseError } from '../../errors.js';
import type { GrammarName, SyntaxProvider, SyntaxNode, QueryMatch } from '../syntax.js';

export interface ExtractionOutcome {
  /** Always present; may be partial when `error` is set. */
  file: ParsedFile;
  error: DetailedParseError | null;
}

export interface ExtractionContext {
  file: ParsedFile;
  root: SyntaxNode;
  grammar: GrammarName;
  /** `.h`/`.hpp`-style declaration file. */
  isHeader: boolean;
  /** Structural pattern matches over the whole file. */
  query(pattern: string): QueryMatch[];
}

export type ExtractionStep = (ctx: ExtractionContext) => void;

export interface LanguageExtractor {
  language: LanguageTag;
  displayName: string;
  extensions: string[];
  /** Reads the file, then extracts. Never rejects. */
  extract(file: SourceFile, syntax?: SyntaxProvider): Promise<ExtractionOutcome>;
  extractSource(filePath: string, content: string, syntax?: SyntaxProvider): ExtractionOutcome;
}
