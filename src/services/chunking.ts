import { parser as pythonParser } from '@lezer/python';
import { readFile } from 'fs/promises';
import path from 'path';
import * as ts from 'typescript';
import { CodeChunkDraft } from '../models/code-chunk.js';
import { detectLanguage, strategyFor } from './languages.js';

export const DEFAULT_CHUNK_SIZE_LINES = 50;

export interface ChunkingOptions {
  chunkSizeLines?: number;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function toPosixPath(input: string): string {
  return input.split(path.sep).join(path.posix.sep);
}

/**
 * Simple check to detect binary content
 */
export function isBinaryContent(content: string): boolean {
  if (content.includes('\0')) {
    return true;
  }

  let nonPrintable = 0;
  for (let i = 0; i < content.length; i += 1) {
    const code = content.charCodeAt(i);
    if (code < 32 && code !== 9 && code !== 10 && code !== 13) {
      nonPrintable += 1;
    }
  }

  return nonPrintable > content.length * 0.1;
}

/**
 * Fixed windows of `size` lines. Window i covers [i*size+1, min((i+1)*size, total)];
 * whitespace-only windows are dropped.
 */
export function splitIntoBlocks(
  filePath: string,
  content: string,
  language: string,
  size: number = DEFAULT_CHUNK_SIZE_LINES,
): CodeChunkDraft[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Chunk size must be a positive integer, got ${size}`);
  }

  const lines = content.split('\n');
  const chunks: CodeChunkDraft[] = [];

  for (let i = 0; i < lines.length; i += size) {
    const text = lines.slice(i, i + size).join('\n');
    if (!text.trim()) {
      continue;
    }
    chunks.push({
      filePath,
      chunkText: text,
      chunkType: 'block',
      lineStart: i + 1,
      lineEnd: Math.min(i + size, lines.length),
      language,
    });
  }

  return chunks;
}

function scriptKindFromFilePath(filePath: string): ts.ScriptKind {
  return path.extname(filePath) === '.tsx' ? ts.ScriptKind.TSX : ts.ScriptKind.TS;
}

function hasSyntaxErrors(filePath: string, content: string): boolean {
  const { diagnostics } = ts.transpileModule(content, {
    fileName: filePath,
    reportDiagnostics: true,
  });
  // Option diagnostics carry no file; only parse errors matter here.
  return (diagnostics ?? []).some(
    (diagnostic) => diagnostic.file !== undefined && diagnostic.category === ts.DiagnosticCategory.Error,
  );
}

function isFunctionValued(node: ts.VariableDeclaration): boolean {
  const { initializer } = node;
  return initializer !== undefined && (ts.isArrowFunction(initializer) || ts.isFunctionExpression(initializer));
}

// `const handler = () => {}` is chunked as the whole statement when it declares a single name.
function variableSpan(node: ts.VariableDeclaration): ts.Node {
  const list = node.parent;
  if (ts.isVariableDeclarationList(list) && list.declarations.length === 1 && ts.isVariableStatement(list.parent)) {
    return list.parent;
  }
  return node;
}

function classify(node: ts.Node): { span: ts.Node; chunkType: 'function' | 'class' } | null {
  if (ts.isClassDeclaration(node) || ts.isInterfaceDeclaration(node)) {
    return { span: node, chunkType: 'class' };
  }
  if (
    (ts.isFunctionDeclaration(node) ||
      ts.isMethodDeclaration(node) ||
      ts.isConstructorDeclaration(node) ||
      ts.isGetAccessorDeclaration(node) ||
      ts.isSetAccessorDeclaration(node)) &&
    node.body !== undefined
  ) {
    return { span: node, chunkType: 'function' };
  }
  if (ts.isVariableDeclaration(node) && isFunctionValued(node)) {
    return { span: variableSpan(node), chunkType: 'function' };
  }
  return null;
}

/**
 * One chunk per function-like or class-like declaration, nested ones included.
 * Returns [] when the source does not parse cleanly or declares nothing.
 */
export function extractTypeScriptDeclarations(filePath: string, content: string, language: string): CodeChunkDraft[] {
  if (hasSyntaxErrors(filePath, content)) {
    return [];
  }

  const sourceFile = ts.createSourceFile(
    filePath,
    content,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFromFilePath(filePath),
  );
  const chunks: CodeChunkDraft[] = [];

  function visit(node: ts.Node): void {
    const match = classify(node);
    if (match) {
      const startPos = match.span.getStart(sourceFile);
      const endPos = match.span.getEnd();
      chunks.push({
        filePath,
        chunkText: content.slice(startPos, endPos),
        chunkType: match.chunkType,
        lineStart: sourceFile.getLineAndCharacterOfPosition(startPos).line + 1,
        lineEnd: sourceFile.getLineAndCharacterOfPosition(endPos).line + 1,
        language,
      });
    }
    ts.forEachChild(node, visit);
  }

  visit(sourceFile);

  chunks.sort((a, b) => a.lineStart - b.lineStart || a.lineEnd - b.lineEnd);
  return chunks;
}

function lineStartOffsets(content: string): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i += 1) {
    if (content[i] === '\n') {
      starts.push(i + 1);
    }
  }
  return starts;
}

// 1-based line containing `offset`.
function lineAt(starts: number[], offset: number): number {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if ((starts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}

/**
 * `def`, `async def` and `class` statements at any depth, methods and nested
 * functions included. Decorators are not part of the span. Returns [] when
 * the parse tree contains an error node or no definitions.
 */
export function extractPythonDefinitions(filePath: string, content: string, language: string): CodeChunkDraft[] {
  const tree = pythonParser.parse(content);
  const starts = lineStartOffsets(content);
  const chunks: CodeChunkDraft[] = [];
  let broken = false;

  tree.iterate({
    enter: (node) => {
      if (node.type.isError) {
        broken = true;
        return false;
      }
      const chunkType =
        node.name === 'FunctionDefinition' ? 'function' : node.name === 'ClassDefinition' ? 'class' : null;
      if (chunkType === null) {
        return undefined;
      }
      // Bodies close on the next dedent, so the raw span can carry blank lines.
      const chunkText = content.slice(node.from, node.to).trimEnd();
      chunks.push({
        filePath,
        chunkText,
        chunkType,
        lineStart: lineAt(starts, node.from),
        lineEnd: lineAt(starts, node.from + Math.max(chunkText.length - 1, 0)),
        language,
      });
      return undefined;
    },
  });

  if (broken) {
    return [];
  }
  chunks.sort((a, b) => a.lineStart - b.lineStart || a.lineEnd - b.lineEnd);
  return chunks;
}

type StructuralExtractor = (filePath: string, content: string, language: string) => CodeChunkDraft[];

const STRUCTURAL_EXTRACTORS: Readonly<Record<string, StructuralExtractor>> = {
  python: extractPythonDefinitions,
  typescript: extractTypeScriptDeclarations,
};

/**
 * Splits source files into chunks for embedding. Declarations for Python
 * and TypeScript, fixed line windows for everything else.
 */
export class ChunkingService {
  readonly chunkSizeLines: number;

  constructor(options: ChunkingOptions = {}) {
    this.chunkSizeLines = options.chunkSizeLines ?? DEFAULT_CHUNK_SIZE_LINES;
  }

  async chunkFile(filePath: string, rootPath: string): Promise<CodeChunkDraft[]> {
    const content = await this.readSource(filePath);
    if (content === null) {
      return [];
    }

    const relativePath = toPosixPath(path.relative(rootPath, filePath));
    return this.chunkContent(relativePath, content, detectLanguage(filePath));
  }

  chunkContent(relativePath: string, content: string, language: string): CodeChunkDraft[] {
    const extract = STRUCTURAL_EXTRACTORS[language];
    if (extract !== undefined && strategyFor(language) === 'structural') {
      const declarations = extract(relativePath, content, language);
      if (declarations.length > 0) {
        return declarations;
      }
    }
    return splitIntoBlocks(relativePath, content, language, this.chunkSizeLines);
  }

  private async readSource(filePath: string): Promise<string | null> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      console.warn(`Cannot read ${filePath}:`, error);
      return null;
    }

    let content: string;
    try {
      content = utf8.decode(buffer);
    } catch (error) {
      console.warn(`Skipping ${filePath}: not valid UTF-8`, error);
      return null;
    }

    if (isBinaryContent(content)) {
      console.warn(`Skipping binary file ${filePath}`);
      return null;
    }
    return content;
  }
}
