import type { LanguageTag, ParsedDependency, ParsedFile, ParsedSymbol } from '../types.js';
import { cyan, dim, magenta, yellow } from './colors.js';

export interface LanguageSummary {
  language: LanguageTag;
  files: number;
  symbols: number;
  dependencies: number;
}

export function countSymbols(symbols: readonly ParsedSymbol[]): number {
  return symbols.reduce((sum, symbol) => sum + 1 + countSymbols(symbol.children), 0);
}

/** Per-language totals, ordered by language tag. Nested symbols count. */
export function summarizeByLanguage(files: readonly ParsedFile[]): LanguageSummary[] {
  const byLanguage = new Map<LanguageTag, LanguageSummary>();
  for (const file of files) {
    let entry = byLanguage.get(file.language);
    if (!entry) {
      entry = { language: file.language, files: 0, symbols: 0, dependencies: 0 };
      byLanguage.set(file.language, entry);
    }
    entry.files++;
    entry.symbols += countSymbols(file.symbols);
    entry.dependencies += file.dependencies.length;
  }
  return [...byLanguage.values()].sort((a, b) => a.language.localeCompare(b.language));
}

export function formatLanguageSummary(summary: LanguageSummary): string {
  return `  ${summary.language.padEnd(8)} ${yellow(String(summary.files))} files, ${magenta(String(summary.symbols))} symbols, ${cyan(String(summary.dependencies))} dependencies`;
}

function lineRange(symbol: ParsedSymbol): string {
  const { startLine, endLine } = symbol.span;
  return startLine === endLine ? `L${startLine}` : `L${startLine}-${endLine}`;
}

/** One line per symbol, children indented two spaces under their parent. */
export function formatSymbolTree(symbols: readonly ParsedSymbol[], depth: number = 0): string[] {
  const lines: string[] = [];
  for (const symbol of symbols) {
    lines.push(`${'  '.repeat(depth)}${symbol.kind} ${symbol.name} ${dim(lineRange(symbol))}`);
    lines.push(...formatSymbolTree(symbol.children, depth + 1));
  }
  return lines;
}

export function formatDependency(dep: ParsedDependency): string {
  const source = dep.source || '<file>';
  const external = dep.isExternal ? ` ${dim('(external)')}` : '';
  return `${dep.type} ${source} -> ${dep.target}${external}`;
}
