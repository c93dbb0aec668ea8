// engine/scanner/tree-sitter.ts — Tree-sitter parser factory for the languages the bridge scans
import { createRequire } from 'node:module';
import Parser from 'tree-sitter';

const require = createRequire(import.meta.url);

export type SyntaxNode = Parser.SyntaxNode;

export type SourceLanguage = 'typescript' | 'tsx' | 'javascript' | 'python';

// Grammar packages are native bindings loaded lazily, once per language.
const LANGUAGE_MAP: Record<SourceLanguage, () => unknown> = {
  typescript: () => require('tree-sitter-typescript').typescript,
  tsx: () => require('tree-sitter-typescript').tsx,
  javascript: () => require('tree-sitter-javascript'),
  python: () => require('tree-sitter-python'),
};

const EXTENSION_MAP: Record<string, SourceLanguage> = {
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.tsx': 'tsx',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.py': 'python',
};

const parsers = new Map<SourceLanguage, Parser>();

/**
 * Returns a tree-sitter parser configured for the given language.
 * Parsers are reused; parsing is synchronous so sharing is safe.
 * Throws if the language is not supported.
 */
export function createParser(language: string): Parser {
  if (!isSupportedLanguage(language)) throw new Error(`Unsupported language: ${language}`);
  let parser = parsers.get(language);
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(LANGUAGE_MAP[language]());
    parsers.set(language, parser);
  }
  return parser;
}

/**
 * Parse source into a syntax tree root, or null when the source contains
 * syntax errors.
 */
export function parseSource(source: string, language: SourceLanguage): SyntaxNode | null {
  // The default input buffer truncates sources past 32K characters.
  const bufferSize = Math.max(32 * 1024, source.length * 2);
  const root = createParser(language).parse(source, undefined, { bufferSize }).rootNode;
  if (root.descendantsOfType('ERROR').length > 0) return null;
  return root;
}

/**
 * Detects the language from a file path based on its extension.
 * Returns null if the extension is not recognized.
 */
export function detectLanguage(filePath: string): SourceLanguage | null {
  if (filePath.endsWith('.d.ts')) return null;
  const dotIndex = filePath.lastIndexOf('.');
  if (dotIndex === -1) return null;
  const ext = filePath.slice(dotIndex);
  return EXTENSION_MAP[ext] ?? null;
}

export function isSupportedLanguage(language: string): language is SourceLanguage {
  return Object.prototype.hasOwnProperty.call(LANGUAGE_MAP, language);
}

/**
 * Returns all supported language identifiers.
 */
export function getSupportedLanguages(): SourceLanguage[] {
  return Object.keys(LANGUAGE_MAP).filter(isSupportedLanguage);
}
