import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ChunkingService,
  extractPythonDefinitions,
  extractTypeScriptDeclarations,
  isBinaryContent,
  splitIntoBlocks,
} from '../chunking.js';

function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `value_${i + 1} = ${i + 1}`).join('\n');
}

const GREETER_SOURCE = [
  'export function greet(name: string): string {',
  "  return 'Hello, ' + name;",
  '}',
  '',
  'export class Greeter {',
  '  constructor(private readonly prefix: string) {}',
  '',
  '  greet(name: string): string {',
  "    return this.prefix + ' ' + name;",
  '  }',
  '}',
].join('\n');

const HELLO_SOURCE = 'def hello():\n    return "hello"\n\nclass MyClass:\n    def method(self):\n        return 42\n';

describe('splitIntoBlocks', () => {
  it('splits a 100-line file into two 50-line blocks', () => {
    const chunks = splitIntoBlocks('app.py', numberedLines(100), 'python', 50);

    expect(chunks.map((chunk) => [chunk.lineStart, chunk.lineEnd])).toEqual([
      [1, 50],
      [51, 100],
    ]);
    expect(chunks.every((chunk) => chunk.chunkType === 'block')).toBe(true);
    expect(chunks[0]?.chunkText.split('\n')).toHaveLength(50);
    expect(chunks[1]?.chunkText.startsWith('value_51 = 51')).toBe(true);
  });

  it('tiles every line exactly once when the last window is short', () => {
    const chunks = splitIntoBlocks('main.go', numberedLines(120), 'go', 50);

    expect(chunks.map((chunk) => [chunk.lineStart, chunk.lineEnd])).toEqual([
      [1, 50],
      [51, 100],
      [101, 120],
    ]);
  });

  it('produces no chunks for an empty file', () => {
    expect(splitIntoBlocks('empty.rb', '', 'ruby', 50)).toEqual([]);
  });

  it('drops whitespace-only windows', () => {
    const content = [...Array.from({ length: 10 }, () => '   '), 'puts 1', 'puts 2'].join('\n');

    const chunks = splitIntoBlocks('script.rb', content, 'ruby', 10);

    expect(chunks).toEqual([
      {
        filePath: 'script.rb',
        chunkText: 'puts 1\nputs 2',
        chunkType: 'block',
        lineStart: 11,
        lineEnd: 12,
        language: 'ruby',
      },
    ]);
  });

  it('rejects a non-positive window size', () => {
    expect(() => splitIntoBlocks('a.py', 'x = 1', 'python', 0)).toThrow('Chunk size must be a positive integer, got 0');
  });
});

describe('extractTypeScriptDeclarations', () => {
  it('finds the function and the class with their members', () => {
    const chunks = extractTypeScriptDeclarations('src/greeter.ts', GREETER_SOURCE, 'typescript');

    expect(chunks.map((chunk) => [chunk.chunkType, chunk.lineStart, chunk.lineEnd])).toEqual([
      ['function', 1, 3],
      ['class', 5, 11],
      ['function', 6, 6],
      ['function', 8, 10],
    ]);
    expect(chunks[0]?.chunkText).toBe("export function greet(name: string): string {\n  return 'Hello, ' + name;\n}");
    expect(chunks[1]?.chunkText.startsWith('export class Greeter {')).toBe(true);
  });

  it('treats a function-valued const as a function chunk spanning the statement', () => {
    const chunks = extractTypeScriptDeclarations('math.ts', 'const add = (a: number, b: number) => a + b;\nconst zero = 0;\n', 'typescript');

    expect(chunks).toEqual([
      {
        filePath: 'math.ts',
        chunkText: 'const add = (a: number, b: number) => a + b;',
        chunkType: 'function',
        lineStart: 1,
        lineEnd: 1,
        language: 'typescript',
      },
    ]);
  });

  it('classifies interfaces as class chunks', () => {
    const chunks = extractTypeScriptDeclarations('shape.ts', 'interface Shape {\n  area(): number;\n}\n', 'typescript');

    expect(chunks.map((chunk) => [chunk.chunkType, chunk.lineStart, chunk.lineEnd])).toEqual([['class', 1, 3]]);
  });

  it('returns nothing for source that does not parse', () => {
    expect(extractTypeScriptDeclarations('broken.ts', 'function broken( {\n  return 1;\n', 'typescript')).toEqual([]);
  });
});

describe('extractPythonDefinitions', () => {
  it('emits a function chunk and a class chunk with their methods', () => {
    const chunks = extractPythonDefinitions('example.py', HELLO_SOURCE, 'python');

    expect(chunks.map((chunk) => [chunk.chunkType, chunk.lineStart, chunk.lineEnd])).toEqual([
      ['function', 1, 2],
      ['class', 4, 6],
      ['function', 5, 6],
    ]);
    expect(chunks[0]).toEqual({
      filePath: 'example.py',
      chunkText: 'def hello():\n    return "hello"',
      chunkType: 'function',
      lineStart: 1,
      lineEnd: 2,
      language: 'python',
    });
    expect(chunks[1]?.chunkText).toBe('class MyClass:\n    def method(self):\n        return 42');
  });

  it('includes nested and async functions', () => {
    const content = [
      'def outer():',
      '    def inner():',
      '        return 1',
      '    return inner',
      '',
      'async def fetch():',
      '    return await outer()()',
    ].join('\n');

    const chunks = extractPythonDefinitions('nested.py', content, 'python');

    expect(chunks.map((chunk) => [chunk.chunkType, chunk.lineStart, chunk.lineEnd])).toEqual([
      ['function', 1, 4],
      ['function', 2, 3],
      ['function', 6, 7],
    ]);
  });

  it('returns nothing for source with a syntax error', () => {
    expect(extractPythonDefinitions('broken.py', 'def broken(:\n    return 1\n', 'python')).toEqual([]);
  });

  it('returns nothing for a module without definitions', () => {
    expect(extractPythonDefinitions('script.py', 'import os\nprint(os.getcwd())\n', 'python')).toEqual([]);
  });
});

describe('isBinaryContent', () => {
  it('flags NUL bytes', () => {
    expect(isBinaryContent('abc\0def')).toBe(true);
  });

  it('flags text dominated by control characters', () => {
    expect(isBinaryContent('\x01\x02\x03abc')).toBe(true);
  });

  it('accepts ordinary source', () => {
    expect(isBinaryContent('def main():\n\treturn 0\r\n')).toBe(false);
  });
});

describe('ChunkingService', () => {
  let root: string;
  const chunker = new ChunkingService({ chunkSizeLines: 50 });

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'chunking-test-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('chunks a TypeScript file structurally with a POSIX relative path', async () => {
    await mkdir(path.join(root, 'src'), { recursive: true });
    const file = path.join(root, 'src', 'greeter.ts');
    await writeFile(file, GREETER_SOURCE);

    const chunks = await chunker.chunkFile(file, root);

    expect(chunks).toHaveLength(4);
    expect(new Set(chunks.map((chunk) => chunk.chunkType))).toEqual(new Set(['function', 'class']));
    expect(chunks.every((chunk) => chunk.filePath === 'src/greeter.ts' && chunk.language === 'typescript')).toBe(true);
  });

  it('chunks a Python file by its definitions', async () => {
    const file = path.join(root, 'example.py');
    await writeFile(file, HELLO_SOURCE);

    const chunks = await chunker.chunkFile(file, root);

    expect(chunks.map((chunk) => [chunk.chunkType, chunk.lineStart, chunk.lineEnd])).toEqual([
      ['function', 1, 2],
      ['class', 4, 6],
      ['function', 5, 6],
    ]);
    expect(chunks.every((chunk) => chunk.filePath === 'example.py' && chunk.language === 'python')).toBe(true);
  });

  it('falls back to blocks when a Python file has a syntax error', async () => {
    const file = path.join(root, 'broken.py');
    await writeFile(file, 'def broken(:\n    return 1\n');

    const chunks = await chunker.chunkFile(file, root);

    expect(chunks).toEqual([
      {
        filePath: 'broken.py',
        chunkText: 'def broken(:\n    return 1\n',
        chunkType: 'block',
        lineStart: 1,
        lineEnd: 3,
        language: 'python',
      },
    ]);
  });

  it('falls back to blocks when a TypeScript file declares nothing', async () => {
    const file = path.join(root, 'constants.ts');
    await writeFile(file, 'export const LIMIT = 10;\nexport const NAME = "x";\n');

    const chunks = await chunker.chunkFile(file, root);

    expect(chunks.map((chunk) => [chunk.chunkType, chunk.lineStart, chunk.lineEnd])).toEqual([['block', 1, 3]]);
  });

  it('falls back to blocks when a TypeScript file has a syntax error', async () => {
    const file = path.join(root, 'broken.ts');
    await writeFile(file, 'function broken( {\n  return 1;\n');

    const chunks = await chunker.chunkFile(file, root);

    expect(chunks.map((chunk) => [chunk.chunkType, chunk.lineStart, chunk.lineEnd])).toEqual([['block', 1, 3]]);
  });

  it('returns no chunks for an empty file', async () => {
    const file = path.join(root, 'empty.ts');
    await writeFile(file, '');

    await expect(chunker.chunkFile(file, root)).resolves.toEqual([]);
  });

  it('skips files that are not valid UTF-8', async () => {
    const file = path.join(root, 'latin1.py');
    await writeFile(file, Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));

    await expect(chunker.chunkFile(file, root)).resolves.toEqual([]);
  });

  it('skips binary files', async () => {
    const file = path.join(root, 'blob.c');
    await writeFile(file, Buffer.from([0x7f, 0x45, 0x4c, 0x46, 0x00, 0x01]));

    await expect(chunker.chunkFile(file, root)).resolves.toEqual([]);
  });

  it('skips files it cannot read', async () => {
    await expect(chunker.chunkFile(path.join(root, 'missing.py'), root)).resolves.toEqual([]);
  });

  it('keeps line_start <= line_end for every chunk', async () => {
    const file = path.join(root, 'big.java');
    await writeFile(file, numberedLines(137));

    const chunks = await chunker.chunkFile(file, root);

    expect(chunks).toHaveLength(3);
    expect(chunks.every((chunk) => chunk.lineStart <= chunk.lineEnd)).toBe(true);
    expect(chunks[2]).toMatchObject({ lineStart: 101, lineEnd: 137, language: 'java' });
  });
});
