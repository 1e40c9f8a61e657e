import { describe, it, expect } from 'vitest';
import {
  MODULE_SYMBOL,
  cleanDocstring,
  isExternalPythonImport,
  pythonExtractor,
} from '../../../src/parser/extractors/python.js';

const SHAPES = `"""Utilities for shapes."""
import os
import xml.etree.ElementTree as ET
from .models import Shape
from app.core import config
from requests.adapters import HTTPAdapter


class Circle(Shape):
    """A circle."""

    def __init__(self, r):
        self.r = r

    @staticmethod
    def unit():
        return Circle(1)

    @classmethod
    def make(cls, r):
        return cls(r)

    async def load(self):
        await fetch(self.r)


async def main():
    c = Circle.unit()
    print(c)
`;

describe('Python Extractor', () => {
  const { file, error } = pythonExtractor.extractSource('app/shapes.py', SHAPES);

  it('parses without errors', () => {
    expect(error).toBeNull();
  });

  it('emits a module symbol carrying the module docstring', () => {
    expect(file.symbols[0].name).toBe(MODULE_SYMBOL);
    expect(file.symbols[0].kind).toBe('module');
    expect(file.symbols[0].docstring).toBe('Utilities for shapes.');
  });

  it('extracts top-level classes and functions', () => {
    expect(file.symbols.map(s => [s.kind, s.name])).toEqual([
      ['module', MODULE_SYMBOL],
      ['class', 'Circle'],
      ['async_function', 'main'],
    ]);
    expect(file.symbols[1].docstring).toBe('A circle.');
    expect(file.symbols[1].signature).toBe('class Circle(Shape)');
  });

  it('classifies methods by decorator and async', () => {
    const circle = file.symbols[1];
    expect(circle.children.map(c => [c.kind, c.name])).toEqual([
      ['method', '__init__'],
      ['static_method', 'unit'],
      ['class_method', 'make'],
      ['async_method', 'load'],
    ]);
    expect(circle.children[1].signature).toBe('@staticmethod\ndef unit()');
  });

  it('classifies imports', () => {
    const imports = file.dependencies.filter(d => d.type === 'import');
    expect(imports.map(d => [d.target, d.isExternal])).toEqual([
      ['os', false],
      ['xml.etree.ElementTree', true],
      ['.models', false],
      ['app.core', false],
      ['requests.adapters', true],
    ]);
  });

  it('records base classes as extends edges', () => {
    const extendsEdges = file.dependencies.filter(d => d.type === 'extends');
    expect(extendsEdges).toEqual([{ type: 'extends', source: 'Circle', target: 'Shape', isExternal: false }]);
  });

  it('records calls from functions and methods', () => {
    const calls = file.dependencies.filter(d => d.type === 'call');
    expect(calls.map(d => `${d.source}->${d.target}`)).toEqual([
      'unit->Circle',
      'make->cls',
      'load->fetch',
      'main->Circle.unit',
      'main->print',
    ]);
  });

  it('omits the module symbol without a module docstring', () => {
    const result = pythonExtractor.extractSource('tool.py', 'def run():\n    pass\n');
    expect(result.file.symbols.map(s => s.name)).toEqual(['run']);
  });
});

describe('isExternalPythonImport', () => {
  it('treats relative and single-segment imports as internal', () => {
    expect(isExternalPythonImport('..utils', 'pkg/mod.py')).toBe(false);
    expect(isExternalPythonImport('json', 'pkg/mod.py')).toBe(false);
  });

  it('treats dotted imports of the same top-level package as internal', () => {
    expect(isExternalPythonImport('pkg.sub.mod', 'pkg/mod.py')).toBe(false);
    expect(isExternalPythonImport('other.mod', 'pkg/mod.py')).toBe(true);
  });

  it('treats dotted imports from a root-level file as external', () => {
    expect(isExternalPythonImport('pkg.mod', 'main.py')).toBe(true);
  });
});

describe('cleanDocstring', () => {
  it('strips triple and single quotes with prefixes', () => {
    expect(cleanDocstring('"""  Hello.  """')).toBe('Hello.');
    expect(cleanDocstring("r'''raw'''")).toBe('raw');
    expect(cleanDocstring('"short"')).toBe('short');
  });
});
