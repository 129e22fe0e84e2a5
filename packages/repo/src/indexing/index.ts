export * from './change-detector';
export * from './chunk-id';
export * from './documents';
export * from './embedding-text';
export * from './extractor';
export * from './graph';
export * from './hasher';
export * from './splitter';
export * from './structural-index';
export { LANGUAGE_TABLES, type LanguageTable } from './languages';
