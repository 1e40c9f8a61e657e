import { readFile } from 'fs/promises';
import { createHash } from 'crypto';
import { extname } from 'path';
import type { LanguageTag, ParsedFile, SourceFile } from '../../types.js';
import { DetailedParseError, describeError } from '../../errors.js';
import { createLogger } from '../../logger.js';
import { getSyntaxProvider, type GrammarName, type ParseOutcome, type SyntaxProvider, type SyntaxTree } from '../syntax.js';
import type { ExtractionContext, ExtractionOutcome, ExtractionStep, LanguageExtractor } from './types.js';

const log = createLogger('extract');

export const HEADER_EXTENSIONS = new Set(['.h', '.hpp', '.hh', '.hxx']);

export function isHeaderPath(filePath: string): boolean {
  return HEADER_EXTENSIONS.has(extname(filePath).toLowerCase());
}

export interface ExtractorDefinition {
  language: LanguageTag;
  displayName: string;
  grammar: GrammarName;
  extensions: string[];
  /** Run in insertion order; a throwing step is logged and skipped. */
  steps: Record<string, ExtractionStep>;
}

export function createParsedFile(path: string, language: LanguageTag, content: string): ParsedFile {
  return {
    path,
    language,
    content,
    checksum: content ? createHash('sha256').update(content).digest('hex') : '',
    tree: null,
    symbols: [],
    dependencies: [],
  };
}

export type ReadResult =
  | { ok: true; content: string }
  | { ok: false; outcome: ExtractionOutcome };

export async function readSourceFile(file: SourceFile, language: LanguageTag): Promise<ReadResult> {
  try {
    const content = await readFile(file.absolutePath, 'utf-8');
    return { ok: true, content };
  } catch (err) {
    return {
      ok: false,
      outcome: {
        file: createParsedFile(file.path, language, ''),
        error: new DetailedParseError({
          file: file.path,
          kind: 'filesystem',
          reason: `failed to read file: ${describeError(err)}`,
        }),
      },
    };
  }
}

function safeParse(syntax: SyntaxProvider, content: string, grammar: GrammarName): ParseOutcome {
  try {
    return syntax.parse(content, grammar);
  } catch (err) {
    return { tree: null, error: { message: describeError(err), line: 0, column: 0 } };
  }
}

export function runSteps(ctx: ExtractionContext, steps: Record<string, ExtractionStep>): void {
  for (const [name, step] of Object.entries(steps)) {
    try {
      step(ctx);
    } catch (err) {
      log.debug(`${name} step failed for ${ctx.file.path}: ${describeError(err)}`);
    }
  }
}

function createContext(
  file: ParsedFile,
  tree: SyntaxTree,
  grammar: GrammarName,
  syntax: SyntaxProvider
): ExtractionContext {
  return {
    file,
    root: tree.rootNode,
    grammar,
    isHeader: isHeaderPath(file.path),
    query: pattern => syntax.query(tree, pattern, grammar),
  };
}

export function defineExtractor(definition: ExtractorDefinition): LanguageExtractor {
  const { language, displayName, grammar, extensions, steps } = definition;

  const extractSource = (
    filePath: string,
    content: string,
    syntax: SyntaxProvider = getSyntaxProvider()
  ): ExtractionOutcome => {
    const file = createParsedFile(filePath, language, content);
    const parsed = safeParse(syntax, content, grammar);

    if (!parsed.tree) {
      return {
        file,
        error: new DetailedParseError({
          file: filePath,
          kind: 'parse',
          reason: `failed to parse ${displayName} file: ${parsed.error?.message ?? 'no syntax tree'}`,
        }),
      };
    }

    file.tree = parsed.tree;
    runSteps(createContext(file, parsed.tree, grammar, syntax), steps);

    if (parsed.error) {
      return {
        file,
        error: new DetailedParseError({
          file: filePath,
          kind: 'parse',
          reason: `syntax error in ${displayName} file: ${parsed.error.message}`,
          line: parsed.error.line,
          column: parsed.error.column,
        }),
      };
    }
    return { file, error: null };
  };

  return {
    language,
    displayName,
    extensions,
    async extract(file, syntax = getSyntaxProvider()) {
      const read = await readSourceFile(file, language);
      if (!read.ok) return read.outcome;
      await syntax.prepare(grammar);
      return extractSource(file.path, read.content, syntax);
    },
    extractSource,
  };
}
