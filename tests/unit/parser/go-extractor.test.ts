import { describe, it, expect } from 'vitest';
import { goExtractor } from '../../../src/parser/extractors/go.js';

function extract(source: string, path = 'cmd/server/main.go') {
  return goExtractor.extractSource(path, source);
}

describe('Go Extractor', () => {
  it('extracts the package and a function with no dependencies', () => {
    const { file, error } = extract(`package main\n\nfunc Hello() string { return "hi" }\n`);

    expect(error).toBeNull();
    expect(file.symbols.map(s => [s.kind, s.name])).toEqual([
      ['package', 'main'],
      ['function', 'Hello'],
    ]);
    expect(file.dependencies).toHaveLength(0);
    expect(file.symbols[1].signature).toBe('func Hello() string');
  });

  it('classifies imports by whether the path names a host', () => {
    const source = `package main

import (
\t"fmt"
\t"net/http"
\t"github.com/acme/lib"
)
`;
    const { file } = extract(source);

    expect(file.dependencies.map(d => [d.target, d.isExternal])).toEqual([
      ['fmt', false],
      ['net/http', false],
      ['github.com/acme/lib', true],
    ]);
    expect(file.dependencies.every(d => d.type === 'import' && d.source === 'main')).toBe(true);
  });

  it('extracts methods with receivers', () => {
    const source = `package server

func (s *Server) Start() error { return nil }
`;
    const { file } = extract(source);

    const method = file.symbols.find(s => s.kind === 'method');
    expect(method?.name).toBe('Start');
    expect(method?.signature).toBe('func (s *Server) Start() error');
  });

  it('extracts structs with fields and interfaces with methods', () => {
    const source = `package shapes

type Point struct {
\tX, Y int
}

type Shape interface {
\tArea() float64
}

type ID string
`;
    const { file } = extract(source);

    const point = file.symbols.find(s => s.name === 'Point');
    expect(point?.kind).toBe('struct');
    expect(point?.signature).toBe('type Point struct');
    expect(point?.children.map(c => [c.name, c.signature])).toEqual([
      ['X', 'X int'],
      ['Y', 'Y int'],
    ]);

    const shape = file.symbols.find(s => s.name === 'Shape');
    expect(shape?.kind).toBe('interface');
    expect(shape?.children.map(c => c.name)).toEqual(['Area']);

    const id = file.symbols.find(s => s.name === 'ID');
    expect(id?.kind).toBe('type');
    expect(id?.signature).toBe('type ID string');
  });

  it('records calls from functions and methods', () => {
    const source = `package main

import "fmt"

func helper() {}

func main() {
\thelper()
\tfmt.Println("hi")
}
`;
    const { file } = extract(source);

    const calls = file.dependencies.filter(d => d.type === 'call');
    expect(calls.map(d => `${d.source}->${d.target}`)).toEqual(['main->helper', 'main->fmt.Println']);
  });

  it('attaches doc comments directly above a declaration', () => {
    const source = `package main

// Hello greets.
// It returns a string.
func Hello() string { return "hi" }
`;
    const { file } = extract(source);

    expect(file.symbols[1].docstring).toBe('Hello greets.\nIt returns a string.');
  });
});
