import { describe, it, expect } from 'vitest';
import { SyntaxProvider, getSyntaxProvider } from '../../../src/parser/syntax.js';

describe('SyntaxProvider', () => {
  it('parses valid input without an error', () => {
    const provider = new SyntaxProvider();
    const { tree, error } = provider.parse('package main\n\nfunc main() {}\n', 'go');

    expect(error).toBeNull();
    expect(tree?.rootNode.type).toBe('source_file');
    expect(provider.loadedGrammars()).toEqual(['go']);
  });

  it('reports empty input without building a tree', () => {
    const provider = new SyntaxProvider();
    const { tree, error } = provider.parse('', 'python');

    expect(tree).toBeNull();
    expect(error).toEqual({ message: 'empty content', line: 0, column: 0 });
    expect(provider.loadedGrammars()).toEqual([]);
  });

  it('keeps the tree and locates the first error for broken input', () => {
    const provider = new SyntaxProvider();
    const { tree, error } = provider.parse('def ok():\n    return 1\n\ndef broken(:\n', 'python');

    expect(tree).not.toBeNull();
    expect(error?.message).toBe('parse tree contains errors');
    expect(error?.line).toBeGreaterThan(0);
  });

  it('parses inputs larger than the default buffer', () => {
    const provider = new SyntaxProvider();
    const lines = Array.from({ length: 3000 }, (_, i) => `var value${i} = ${i}`);
    const source = `package big\n\n${lines.join('\n')}\n`;

    const { tree, error } = provider.parse(source, 'go');

    expect(source.length).toBeGreaterThan(32 * 1024);
    expect(error).toBeNull();
    expect(tree?.rootNode.namedChildren).toHaveLength(3001);
  });

  it('runs structural queries against a parsed tree', () => {
    const provider = new SyntaxProvider();
    const { tree } = provider.parse('package main\nfunc a() {}\nfunc b() {}\n', 'go');
    if (!tree) throw new Error('expected a tree');

    const pattern = '(function_declaration name: (identifier) @name)';
    const first = provider.query(tree, pattern, 'go');
    const second = provider.query(tree, pattern, 'go');

    expect(first.map(m => m.captures[0].node.text)).toEqual(['a', 'b']);
    expect(second).toHaveLength(2);
  });

  it('rejects trees parsed by another provider', () => {
    const tree = new SyntaxProvider().parse('package main\n', 'go').tree;
    if (!tree) throw new Error('expected a tree');

    expect(() => new SyntaxProvider().query(tree, '(package_clause) @pkg', 'go')).toThrow(
      'tree was not parsed with the go grammar'
    );
  });

  it('parses WebAssembly grammars once prepared', async () => {
    const provider = new SyntaxProvider();

    expect(() => provider.parse('struct Point {}\n', 'swift')).toThrow(
      'grammar swift is not loaded; prepare it before parsing'
    );

    await provider.prepare('swift');
    const { tree, error } = provider.parse('struct Point {}\n', 'swift');

    expect(error).toBeNull();
    expect(tree?.rootNode.type).toBe('source_file');
    expect(provider.loadedGrammars()).toEqual(['swift']);
  });

  it('locates errors in WebAssembly grammar trees', async () => {
    const provider = new SyntaxProvider();
    await provider.prepare('swift');

    const { tree, error } = provider.parse('struct Point {\n  let x: = \n', 'swift');

    expect(tree).not.toBeNull();
    expect(error?.message).toBe('parse tree contains errors');
    expect(error?.line).toBeGreaterThan(0);
  });

  it('shares one provider per process', () => {
    expect(getSyntaxProvider()).toBe(getSyntaxProvider());
  });
});
