import { describe, it, expect } from 'vitest';
import {
  associateHeaders,
  findImplementationPath,
  linkDeclarations,
} from '../../../src/parser/cross-reference.js';
import { createParsedFile } from '../../../src/parser/extractors/base.js';
import { cppExtractor } from '../../../src/parser/extractors/cpp.js';
import type { LanguageTag, ParsedFile, ParsedSymbol, SymbolKind } from '../../../src/types.js';

function symbol(name: string, kind: SymbolKind, children: ParsedSymbol[] = []): ParsedSymbol {
  return {
    name,
    kind,
    signature: '',
    span: { startLine: 1, endLine: 1, startByte: 0, endByte: 0 },
    children,
  };
}

function parsed(path: string, symbols: ParsedSymbol[], language: LanguageTag = 'cpp'): ParsedFile {
  return { ...createParsedFile(path, language, 'content'), symbols };
}

function links(file: ParsedFile): string[] {
  return file.dependencies.map(d => `${d.type} ${d.source} -> ${d.target}`);
}

describe('linkDeclarations', () => {
  it('links an out-of-line Class::method definition to its declaration', () => {
    const header = cppExtractor.extractSource('src/widget.hpp', 'class Widget {\npublic:\n  void draw();\n};\n').file;
    const impl = cppExtractor.extractSource('src/widget.cpp', 'void Widget::draw() {}\n').file;

    const linked = linkDeclarations(header, impl);

    expect(linked).toBe(1);
    expect(links(impl)).toEqual([
      'implements_header src/widget.cpp -> src/widget.hpp',
      'implements_declaration Widget::draw -> Widget::draw',
    ]);
  });

  it('links free functions to their prototypes by name', () => {
    const header = parsed('util.h', [symbol('parse', 'function_declaration'), symbol('render', 'function_declaration')], 'c');
    const impl = parsed('util.c', [symbol('render', 'function'), symbol('helper', 'static_function')], 'c');

    expect(linkDeclarations(header, impl)).toBe(1);
    expect(links(impl)).toEqual([
      'implements_header util.c -> util.h',
      'implements_declaration render -> render',
    ]);
  });

  it('matches a qualified definition only within the named scope', () => {
    const header = parsed('shapes.hpp', [
      symbol('Circle', 'class', [symbol('draw', 'method')]),
      symbol('Square', 'class', [symbol('draw', 'method')]),
    ]);
    const impl = parsed('shapes.cpp', [symbol('Square::draw', 'method')]);

    linkDeclarations(header, impl);

    expect(links(impl)).toEqual([
      'implements_header shapes.cpp -> shapes.hpp',
      'implements_declaration Square::draw -> Square::draw',
    ]);
  });

  it('uses the innermost scope of a namespaced definition', () => {
    const header = parsed('app.hpp', [symbol('Server', 'class', [symbol('Server', 'constructor')])]);
    const impl = parsed('app.cpp', [symbol('net::Server::Server', 'constructor')]);

    linkDeclarations(header, impl);

    expect(links(impl)).toContain('implements_declaration net::Server::Server -> Server::Server');
  });

  it('pairs overloads in declaration order, one definition per declaration', () => {
    const header = parsed('math.hpp', [
      symbol('Calc', 'class', [symbol('add', 'method'), symbol('add', 'method')]),
    ]);
    const impl = parsed('math.cpp', [
      symbol('Calc::add', 'method'),
      symbol('Calc::add', 'method'),
      symbol('Calc::add', 'method'),
    ]);

    expect(linkDeclarations(header, impl)).toBe(2);
    expect(impl.dependencies.filter(d => d.type === 'implements_declaration')).toHaveLength(2);
  });

  it('links Objective-C method implementations to interface methods', () => {
    const header = parsed(
      'Person.h',
      [symbol('Person', 'interface', [symbol('greet', 'method'), symbol('initWithName:', 'method')])],
      'objc'
    );
    const impl = parsed(
      'Person.m',
      [symbol('Person', 'implementation', [symbol('initWithName:', 'method_implementation')])],
      'objc'
    );

    expect(linkDeclarations(header, impl)).toBe(1);
    expect(links(impl)).toContain('implements_declaration initWithName: -> Person::initWithName:');
  });

  it('leaves unmatched definitions unlinked', () => {
    const header = parsed('a.h', [symbol('Point', 'struct')], 'c');
    const impl = parsed('a.c', [symbol('main', 'function')], 'c');

    expect(linkDeclarations(header, impl)).toBe(0);
    expect(links(impl)).toEqual(['implements_header a.c -> a.h']);
  });

  it('only mutates the implementation file', () => {
    const header = parsed('b.h', [symbol('run', 'function_declaration')], 'c');
    const impl = parsed('b.c', [symbol('run', 'function')], 'c');

    linkDeclarations(header, impl);

    expect(header.dependencies).toEqual([]);
  });
});

describe('findImplementationPath', () => {
  const candidates = ['src/net/socket.cpp', 'src/net/socket.h', 'src/ui/View.m', 'src/util.c', 'lib/util.h'];

  it('finds the implementation beside a header', () => {
    expect(findImplementationPath('src/net/socket.h', candidates)).toBe('src/net/socket.cpp');
    expect(findImplementationPath('src/ui/View.h', candidates)).toBe('src/ui/View.m');
  });

  it('requires the same directory', () => {
    expect(findImplementationPath('lib/util.h', candidates)).toBeUndefined();
  });

  it('ignores paths that are not headers', () => {
    expect(findImplementationPath('src/util.c', candidates)).toBeUndefined();
  });
});

describe('associateHeaders', () => {
  it('links every header that has an implementation and counts the links', () => {
    const widgetH = parsed('src/widget.hpp', [symbol('Widget', 'class', [symbol('draw', 'method')])]);
    const widgetCpp = parsed('src/widget.cpp', [symbol('Widget::draw', 'method')]);
    const lonelyH = parsed('src/lonely.h', [symbol('alone', 'function_declaration')], 'c');
    const main = parsed('src/main.py', [symbol('run', 'function')], 'python');

    const total = associateHeaders([widgetH, widgetCpp, lonelyH, main]);

    expect(total).toBe(1);
    expect(links(widgetCpp)).toEqual([
      'implements_header src/widget.cpp -> src/widget.hpp',
      'implements_declaration Widget::draw -> Widget::draw',
    ]);
    expect(lonelyH.dependencies).toEqual([]);
    expect(main.dependencies).toEqual([]);
  });
});
