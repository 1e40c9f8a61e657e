import { describe, it, expect } from 'vitest';
import { mergeResults, objcppExtractor } from '../../../src/parser/extractors/objcpp.js';
import { createParsedFile } from '../../../src/parser/extractors/base.js';
import type { ParsedFile, ParsedSymbol, SymbolKind } from '../../../src/types.js';

function symbol(name: string, kind: SymbolKind, signature = '', line = 1): ParsedSymbol {
  return {
    name,
    kind,
    signature,
    span: { startLine: line, endLine: line, startByte: line * 10, endByte: line * 10 + 9 },
    children: [],
  };
}

function file(language: 'cpp' | 'objc', symbols: ParsedSymbol[], deps: ParsedFile['dependencies'] = []): ParsedFile {
  return { ...createParsedFile('Bridge.mm', language, 'content'), symbols, dependencies: deps };
}

describe('mergeResults', () => {
  it('keeps C++ symbols first and adds new Objective-C ones', () => {
    const cpp = file('cpp', [symbol('Engine', 'class'), symbol('start', 'function')]);
    const objc = file('objc', [symbol('start', 'function'), symbol('Bridge', 'interface')]);

    const merged = mergeResults(cpp, objc);

    expect(merged.language).toBe('objcpp');
    expect(merged.symbols.map(s => `${s.kind}:${s.name}`)).toEqual(['class:Engine', 'function:start', 'interface:Bridge']);
  });

  it('prefers the Objective-C reading of Objective-C container kinds', () => {
    const cpp = file('cpp', [symbol('Bridge', 'class', 'from cpp')]);
    const objc = file('objc', [symbol('Bridge', 'class', 'from objc'), symbol('run', 'function', 'objc run')]);
    const withRun = file('cpp', [...cpp.symbols, symbol('run', 'function', 'cpp run')]);

    const merged = mergeResults(withRun, objc);

    expect(merged.symbols.map(s => s.signature)).toEqual(['from objc', 'cpp run']);
  });

  it('keeps C++ overloads and repeated out-of-line definitions', () => {
    const cpp = file('cpp', [
      symbol('f', 'function', 'void f(int)', 1),
      symbol('f', 'function', 'void f(double)', 2),
      symbol('Calc::add', 'method', 'int Calc::add(int)', 3),
      symbol('Calc::add', 'method', 'int Calc::add(int, int)', 4),
    ]);
    const objc = file('objc', [symbol('f', 'function', 'void f(int)', 1)]);

    const merged = mergeResults(cpp, objc);

    expect(merged.symbols.map(s => s.signature)).toEqual([
      'void f(int)',
      'void f(double)',
      'int Calc::add(int)',
      'int Calc::add(int, int)',
    ]);
  });

  it('appends Objective-C symbols found at a different range', () => {
    const cpp = file('cpp', [symbol('go', 'function', 'cpp go', 1)]);
    const objc = file('objc', [symbol('go', 'function', 'objc go', 5)]);

    expect(mergeResults(cpp, objc).symbols.map(s => s.signature)).toEqual(['cpp go', 'objc go']);
  });

  it('deduplicates dependencies on type, source and target', () => {
    const cpp = file('cpp', [], [
      { type: 'import', source: '', target: 'vector', isExternal: false },
      { type: 'call', source: 'run', target: 'go', isExternal: false },
    ]);
    const objc = file('objc', [], [
      { type: 'import', source: '', target: 'vector', isExternal: false },
      { type: 'call', source: 'run', target: 'stop', isExternal: false },
    ]);

    const merged = mergeResults(cpp, objc);

    expect(merged.dependencies.map(d => `${d.type}:${d.target}`)).toEqual(['import:vector', 'call:go', 'call:stop']);
  });
});

describe('Objective-C++ Extractor', () => {
  it('accepts a file that only the C++ grammar reads cleanly', () => {
    const { file: parsed, error } = objcppExtractor.extractSource('Engine.mm', 'class Engine {};\n');

    expect(error).toBeNull();
    expect(parsed.language).toBe('objcpp');
    expect(parsed.symbols.map(s => `${s.kind}:${s.name}`)).toContain('class:Engine');
  });

  it('keeps every C++ overload of a source file', () => {
    const source = [
      'void f(int a) {}',
      'void f(double a) {}',
      'int Calc::add(int a) { return a; }',
      'int Calc::add(int a, int b) { return a + b; }',
      '',
    ].join('\n');

    const { file: parsed } = objcppExtractor.extractSource('Calc.mm', source);

    expect(parsed.symbols.map(s => `${s.kind}:${s.name}`)).toEqual([
      'function:f',
      'function:f',
      'method:Calc::add',
      'method:Calc::add',
    ]);
  });

  it('reports empty content as a parse error', () => {
    const { error } = objcppExtractor.extractSource('Empty.mm', '');

    expect(error?.kind).toBe('parse');
    expect(error?.reason).toBe('failed to parse C++ file: empty content');
  });
});
