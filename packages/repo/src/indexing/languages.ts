import type { ChunkKind } from '@repoindex/shared';
import type { SupportedLanguage } from '../tree-sitter';

/**
 * How one grammar spells the constructs the extractor cares about.
 */
export interface LanguageTable {
  /** Node types extracted as chunks, with the kind they map to */
  units: Readonly<Record<string, ChunkKind>>;
  /** Units whose bodies are searched for member units */
  containers: ReadonlySet<string>;
  /** Attached-declaration wrappers; never extracted, their decorators go to the inner unit */
  wrappers: ReadonlySet<string>;
  /** Decorator-like node types found on a unit or its wrapper */
  decorators: ReadonlySet<string>;
  /** Node types that precede a unit as siblings and act as decorators */
  leadingAttributes: ReadonlySet<string>;
  /** Call node types, mapped to the field that holds the callee */
  calls: Readonly<Record<string, string>>;
  /** Comment node types, read as documentation when they precede a unit */
  comments: ReadonlySet<string>;
  /** Module-level declarations that become `constant` chunks when upper-case */
  constantDeclarations: ReadonlySet<string>;
  /** Variable declarations whose function-valued declarators become `function` chunks */
  functionDeclarations: ReadonlySet<string>;
  /** Field holding a class's superclasses; `class_heritage` children are used when null */
  baseListField: string | null;
}

const none: ReadonlySet<string> = new Set();

const python: LanguageTable = {
  units: {
    function_definition: 'function',
    class_definition: 'class',
  },
  containers: new Set(['class_definition']),
  wrappers: new Set(['decorated_definition']),
  decorators: new Set(['decorator']),
  leadingAttributes: none,
  calls: { call: 'function' },
  comments: none,
  constantDeclarations: new Set(['expression_statement']),
  functionDeclarations: none,
  baseListField: 'superclasses',
};

const javascript: LanguageTable = {
  units: {
    function_declaration: 'function',
    generator_function_declaration: 'function',
    class_declaration: 'class',
    method_definition: 'method',
  },
  containers: new Set(['class_declaration']),
  wrappers: new Set(['export_statement']),
  decorators: new Set(['decorator']),
  leadingAttributes: none,
  calls: { call_expression: 'function', new_expression: 'constructor' },
  comments: new Set(['comment']),
  constantDeclarations: new Set(['lexical_declaration', 'variable_declaration']),
  functionDeclarations: new Set(['lexical_declaration', 'variable_declaration']),
  baseListField: null,
};

const typescript: LanguageTable = {
  ...javascript,
  units: {
    ...javascript.units,
    abstract_class_declaration: 'class',
    interface_declaration: 'interface',
    type_alias_declaration: 'type',
    enum_declaration: 'enum',
  },
  containers: new Set(['class_declaration', 'abstract_class_declaration']),
};

const go: LanguageTable = {
  units: {
    function_declaration: 'function',
    method_declaration: 'method',
    type_declaration: 'type',
  },
  containers: none,
  wrappers: none,
  decorators: none,
  leadingAttributes: none,
  calls: { call_expression: 'function' },
  comments: new Set(['comment']),
  constantDeclarations: none,
  functionDeclarations: none,
  baseListField: null,
};

const rust: LanguageTable = {
  units: {
    function_item: 'function',
    struct_item: 'struct',
    enum_item: 'enum',
    trait_item: 'trait',
    impl_item: 'impl',
    type_item: 'type',
    const_item: 'constant',
    static_item: 'constant',
  },
  containers: new Set(['impl_item', 'trait_item']),
  wrappers: none,
  decorators: none,
  leadingAttributes: new Set(['attribute_item']),
  calls: { call_expression: 'function' },
  comments: new Set(['line_comment', 'block_comment']),
  constantDeclarations: none,
  functionDeclarations: none,
  baseListField: null,
};

const java: LanguageTable = {
  units: {
    class_declaration: 'class',
    interface_declaration: 'interface',
    enum_declaration: 'enum',
    record_declaration: 'class',
    method_declaration: 'method',
    constructor_declaration: 'method',
  },
  containers: new Set([
    'class_declaration',
    'interface_declaration',
    'enum_declaration',
    'record_declaration',
  ]),
  wrappers: none,
  decorators: new Set(['marker_annotation', 'annotation']),
  leadingAttributes: none,
  calls: { method_invocation: 'name', object_creation_expression: 'type' },
  comments: new Set(['line_comment', 'block_comment']),
  constantDeclarations: none,
  functionDeclarations: none,
  baseListField: 'superclass',
};

export const LANGUAGE_TABLES: Readonly<Record<SupportedLanguage, LanguageTable>> = {
  python,
  javascript,
  typescript,
  go,
  rust,
  java,
};

/** Callee node types and the field holding their final identifier. */
export const MEMBER_ACCESS_FIELDS: Readonly<Record<string, string>> = {
  attribute: 'attribute',
  member_expression: 'property',
  selector_expression: 'field',
  field_expression: 'field',
  scoped_identifier: 'name',
  generic_function: 'function',
};

export const IDENTIFIER_TYPES: ReadonlySet<string> = new Set([
  'identifier',
  'property_identifier',
  'field_identifier',
  'type_identifier',
  'name',
]);

/** Receivers that are never recorded as invoked symbols. */
export const RECEIVER_KEYWORDS: ReadonlySet<string> = new Set(['self', 'this', 'cls', 'super']);

export const ROOT_NODE_TYPES: ReadonlySet<string> = new Set(['module', 'program', 'source_file']);
