export * from './scanner';
export * from './git';
export * from './indexing';
export {
  SUPPORTED_EXTENSIONS,
  getLanguageForFile,
  parseSource,
  type ParsedSource,
  type ParseOptions,
  type SupportedLanguage,
} from './tree-sitter';
