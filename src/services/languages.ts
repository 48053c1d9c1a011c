import path from 'path';

export const UNKNOWN_LANGUAGE = 'unknown';

export const EXTENSION_LANGUAGE_MAP: Readonly<Record<string, string>> = {
  '.py': 'python',
  '.js': 'javascript',
  '.ts': 'typescript',
  '.jsx': 'javascript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.cpp': 'cpp',
  '.c': 'c',
  '.h': 'c',
  '.hpp': 'cpp',
  '.go': 'go',
  '.rs': 'rust',
  '.rb': 'ruby',
  '.php': 'php',
  '.swift': 'swift',
  '.kt': 'kotlin',
  '.scala': 'scala',
  '.cs': 'csharp',
};

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set(Object.keys(EXTENSION_LANGUAGE_MAP));

export const IGNORED_DIRS: ReadonlySet<string> = new Set([
  '.git',
  'node_modules',
  '__pycache__',
  'venv',
  '.venv',
  'dist',
  'build',
  '.next',
  '.tox',
  'env',
  '.eggs',
]);

// Languages that get declaration-level chunks.
export const STRUCTURAL_LANGUAGES: ReadonlySet<string> = new Set(['python', 'typescript']);

export type ChunkStrategy = 'structural' | 'generic';

/**
 * Extension lookup is case-sensitive: `.PY` is not `.py`.
 */
export function detectLanguage(filePath: string): string {
  return EXTENSION_LANGUAGE_MAP[path.extname(filePath)] ?? UNKNOWN_LANGUAGE;
}

export function isSupportedFile(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath));
}

export function strategyFor(language: string): ChunkStrategy {
  return STRUCTURAL_LANGUAGES.has(language) ? 'structural' : 'generic';
}
