import path from 'node:path';
import { createRequire } from 'node:module';
import Parser from 'tree-sitter';
import { ConfigError, ParseError } from '@repoindex/shared';

export type SupportedLanguage = 'typescript' | 'javascript' | 'python' | 'go' | 'rust' | 'java';

type TreeSitterLanguage = NonNullable<Parameters<Parser['setLanguage']>[0]>;

// Native grammar bindings, loaded on first use.
const requireGrammar = createRequire(import.meta.url);

const grammarPackages: Record<SupportedLanguage, string> = {
  typescript: 'tree-sitter-typescript',
  javascript: 'tree-sitter-javascript',
  python: 'tree-sitter-python',
  go: 'tree-sitter-go',
  rust: 'tree-sitter-rust',
  java: 'tree-sitter-java',
};

const extToLang: Record<string, SupportedLanguage> = {
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.tsx': 'typescript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.py': 'python',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(extToLang);

export function getLanguageForFile(filePath: string): SupportedLanguage | null {
  const ext = path.extname(filePath).toLowerCase();
  return extToLang[ext] ?? null;
}

function isLanguage(value: unknown): value is TreeSitterLanguage {
  return (
    typeof value === 'object' && value !== null && ('language' in value || 'nodeTypeInfo' in value)
  );
}

/** Grammar key: the language, or `tsx` for TypeScript files with JSX. */
function grammarKey(lang: SupportedLanguage, filePath?: string): string {
  if (lang === 'typescript') {
    return filePath && path.extname(filePath).toLowerCase() === '.tsx' ? 'tsx' : 'typescript';
  }
  return lang;
}

const grammars = new Map<string, TreeSitterLanguage>();
const parsers = new Map<string, Parser>();

function resolveLanguageModule(lang: SupportedLanguage, key: string): TreeSitterLanguage {
  const cached = grammars.get(key);
  if (cached) {
    return cached;
  }

  const packageName = grammarPackages[lang];
  let languageModule: unknown;
  try {
    languageModule = requireGrammar(packageName);
  } catch (cause) {
    throw new ConfigError(`Grammar package ${packageName} could not be loaded`, { cause });
  }

  // tree-sitter-typescript exposes { typescript, tsx } instead of a single language
  const candidate: unknown =
    typeof languageModule === 'object' && languageModule !== null && key in languageModule
      ? Reflect.get(languageModule, key)
      : languageModule;

  if (!isLanguage(candidate)) {
    throw new ConfigError(`Grammar package ${packageName} does not export a tree-sitter language`);
  }
  grammars.set(key, candidate);
  return candidate;
}

export function getParser(lang: SupportedLanguage, filePath?: string): Parser {
  const key = grammarKey(lang, filePath);
  const existing = parsers.get(key);
  if (existing) {
    return existing;
  }
  const parser = new Parser();
  parser.setLanguage(resolveLanguageModule(lang, key));
  parsers.set(key, parser);
  return parser;
}

export function countParseErrors(tree: Parser.Tree): number {
  const cursor = tree.walk();
  let errorsCount = 0;

  while (true) {
    if (cursor.nodeType === 'ERROR' || cursor.nodeIsMissing) {
      errorsCount++;
    }

    if (cursor.gotoFirstChild()) {
      continue;
    }

    while (!cursor.gotoNextSibling()) {
      if (!cursor.gotoParent()) {
        return errorsCount;
      }
    }
  }
}

export interface ParsedSource {
  tree: Parser.Tree;
  language: SupportedLanguage;
  errorsCount: number;
}

export interface ParseOptions {
  languageHint?: SupportedLanguage;
  timeoutMs?: number;
}

const DEFAULT_PARSE_TIMEOUT_MS = 5000;
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Parses one file. Grammars tolerate syntax errors, so the tree is returned
 * with `errorsCount` set; only a timeout or a binding failure throws.
 */
export function parseSource(
  content: string,
  filePath: string,
  options: ParseOptions = {},
): ParsedSource {
  const language = options.languageHint ?? getLanguageForFile(filePath);
  if (!language) {
    throw new ParseError(filePath, 'no grammar for this file type');
  }

  const parser = getParser(language, filePath);
  parser.setTimeoutMicros((options.timeoutMs ?? DEFAULT_PARSE_TIMEOUT_MS) * 1000);

  let tree: Parser.Tree | null;
  try {
    tree = parser.parse(content, undefined, {
      bufferSize: Math.max(MIN_BUFFER_SIZE, content.length + 1),
    });
  } catch (cause) {
    throw new ParseError(filePath, 'parser failed', { cause });
  }
  if (tree === null) {
    throw new ParseError(filePath, 'parse timed out');
  }

  return { tree, language, errorsCount: countParseErrors(tree) };
}
