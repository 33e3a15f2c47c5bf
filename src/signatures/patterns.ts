/**
 * Pattern Tables
 *
 * Per-language line-shape patterns used to pick signature lines. Matching
 * is deliberately shallow: a line is a declaration if its trimmed text
 * matches one of the table's regexes, and nothing else is consulted.
 *
 * Tables are plain frozen data. Adding a language means adding a table
 * here and its extensions in `classifier.ts`.
 */

import type { PatternTable, SignatureLanguage } from './types.js';

// ============================================================================
// SHARED FRAGMENTS
// ============================================================================

/** Comment lines in C-family syntax, including block-comment continuations */
const C_COMMENTS: readonly RegExp[] = [/^\/\//, /^\/\*/, /^\*(?![\w$])/];

/** Hash comments (Python, Ruby, shell-like) */
const HASH_COMMENTS: readonly RegExp[] = [/^#/];

/**
 * Keywords that look like `name(...) {` but are control flow or
 * expressions rather than declarations.
 */
const NOT_CONTROL =
  '(?!(?:if|for|foreach|while|switch|catch|return|throw|new|else|do|try|with|await|yield|typeof|delete|case|sizeof|lock|using|fixed|function|goto)\\b)';

/** Optional annotations in front of a JVM declaration */
const JVM_ANNOTATIONS = '(@[\\w.]+(\\([^)]*\\))?\\s+)*';

const JAVA_MODIFIERS =
  '((public|private|protected|static|final|abstract|sealed|non-sealed|synchronized|native|default|strictfp)\\s+)*';

const KOTLIN_MODIFIERS =
  '((public|private|protected|internal|open|abstract|final|override|data|sealed|inline|suspend|operator|infix|tailrec|external|enum|annotation|inner|value|expect|actual)\\s+)*';

const CSHARP_MODIFIERS =
  '((public|private|protected|internal|static|sealed|abstract|virtual|override|async|partial|readonly|unsafe|extern|const)\\s+)*';

const SWIFT_MODIFIERS =
  '((public|private|fileprivate|internal|open|static|final|override|mutating|nonmutating|class|convenience|required|@\\w+)\\s+)*';

const RUST_VISIBILITY = '(pub(\\([^)]*\\))?\\s+)?';

// ============================================================================
// JAVASCRIPT FAMILY
// ============================================================================

const JS_DECLARATIONS: readonly RegExp[] = [
  // function foo(), async function foo(), function* gen(), export default function
  /^(export\s+)?(default\s+)?(async\s+)?function\b/,
  // class Foo, export default class, abstract class (TS)
  /^(export\s+)?(default\s+)?(declare\s+)?(abstract\s+)?class\b/,
  // const foo = (...) => ..., const foo = async x => ..., const foo = function
  /^(export\s+)?(const|let|var)\s+[\w$]+\s*(:[^=]+)?=\s*(async\s+)?(function\b|(<[^>]*>)?\([^)]*\)\s*(:[^=]+)?=>|[\w$]+\s*=>)/,
  // class members: method(a) {, async load(): Promise<void> {, get value() {
  new RegExp(
    `^${NOT_CONTROL}((public|private|protected|static|readonly|override|abstract|async|get|set|declare)\\s+)*\\*?[#\\w$]+\\s*(<[^>]*>)?\\s*\\((?![^)]*\\bfunction\\b)[^;'"\`]*\\)\\s*(:\\s*[^{;=]+)?\\{\\s*$`
  ),
];

const TS_DECLARATIONS: readonly RegExp[] = [
  ...JS_DECLARATIONS,
  /^(export\s+)?(declare\s+)?interface\s+[\w$]+/,
  /^(export\s+)?(declare\s+)?type\s+[\w$]+\s*(<[^>]*>)?\s*=/,
  /^(export\s+)?(declare\s+)?(const\s+)?enum\s+[\w$]+/,
  /^(export\s+)?(declare\s+)?(namespace|module)\s+[\w$.]+\s*\{/,
];

const JS_IGNORE: readonly RegExp[] = [
  ...C_COMMENTS,
  /^import\b/,
  /^export\s+(\*|\{[^}]*\}\s*from\b)/,
  /^(const|let|var)\s+[^=]+=\s*require\(/,
];

// ============================================================================
// TABLES
// ============================================================================

export const PATTERN_TABLES: Readonly<Record<SignatureLanguage, PatternTable>> =
  Object.freeze({
    python: {
      language: 'python',
      strategy: 'indent',
      declarations: [/^(async\s+)?def\s+\w+/, /^class\s+\w+/],
      ignore: [...HASH_COMMENTS, /^(import|from)\s/, /^@/],
    },

    javascript: {
      language: 'javascript',
      strategy: 'brace',
      declarations: JS_DECLARATIONS,
      ignore: JS_IGNORE,
    },

    typescript: {
      language: 'typescript',
      strategy: 'brace',
      declarations: TS_DECLARATIONS,
      ignore: JS_IGNORE,
    },

    go: {
      language: 'go',
      strategy: 'brace',
      declarations: [/^func\b/, /^type\s+\w+/],
      ignore: [...C_COMMENTS, /^import\b/, /^package\s/],
    },

    rust: {
      language: 'rust',
      strategy: 'brace',
      declarations: [
        new RegExp(
          `^${RUST_VISIBILITY}(default\\s+)?(const\\s+)?(async\\s+)?(unsafe\\s+)?(extern\\s+("[^"]*"\\s+)?)?fn\\s+\\w+`
        ),
        new RegExp(`^${RUST_VISIBILITY}(struct|enum|union|trait|type)\\s+\\w+`),
        /^(unsafe\s+)?impl\b/,
        new RegExp(`^${RUST_VISIBILITY}mod\\s+\\w+\\s*\\{`),
        /^macro_rules!\s*\w+/,
      ],
      ignore: [...C_COMMENTS, /^use\s/, /^extern\s+crate\b/, /^#!?\[/],
    },

    java: {
      language: 'java',
      strategy: 'brace',
      declarations: [
        new RegExp(`^${JVM_ANNOTATIONS}${JAVA_MODIFIERS}(class|interface|enum|record|@interface)\\s+\\w+`),
        new RegExp(
          `^${NOT_CONTROL}${JVM_ANNOTATIONS}${JAVA_MODIFIERS}(<[^>]+>\\s+)?[\\w$.]+(<[^=;]*>)?(\\[\\])*\\s+[\\w$]+\\s*\\([^;=]*\\)\\s*(throws\\s+[\\w.,\\s]+)?(\\{|;)?\\s*$`
        ),
      ],
      ignore: [...C_COMMENTS, /^import\s/, /^package\s/],
    },

    kotlin: {
      language: 'kotlin',
      strategy: 'brace',
      declarations: [
        new RegExp(`^${JVM_ANNOTATIONS}${KOTLIN_MODIFIERS}fun\\b`),
        new RegExp(`^${JVM_ANNOTATIONS}${KOTLIN_MODIFIERS}(class|interface|object)\\s+\\w+`),
        /^companion\s+object\b/,
        /^typealias\s+\w+/,
      ],
      ignore: [...C_COMMENTS, /^import\s/, /^package\s/],
    },

    scala: {
      language: 'scala',
      strategy: 'brace',
      declarations: [
        /^((private|protected|override|final|implicit|lazy|sealed|abstract|case)\s+)*(def|class|object|trait|enum)\s+\w+/,
      ],
      ignore: [...C_COMMENTS, /^import\s/, /^package\s/],
    },

    swift: {
      language: 'swift',
      strategy: 'brace',
      declarations: [
        new RegExp(`^${SWIFT_MODIFIERS}func\\s+\\w+`),
        new RegExp(`^${SWIFT_MODIFIERS}init\\??\\s*\\(`),
        new RegExp(`^${SWIFT_MODIFIERS}(class|struct|enum|protocol|extension|actor)\\s+\\w+`),
      ],
      ignore: [...C_COMMENTS, /^import\s/],
    },

    c: {
      language: 'c',
      strategy: 'brace',
      declarations: [
        /^(typedef\s+)?(struct|union|enum)\s+\w+[^;]*$/,
        new RegExp(`^${NOT_CONTROL}[A-Za-z_][\\w\\s*]*[\\s*]\\w+\\s*\\([^;]*\\)[^;]*$`),
      ],
      ignore: [...C_COMMENTS, /^#/],
    },

    cpp: {
      language: 'cpp',
      strategy: 'brace',
      declarations: [
        /^(template\s*<[^>]*>\s*)?(typedef\s+)?(struct|class|union|enum(\s+class)?)\s+\w+[^;]*$/,
        /^namespace\s+\w+/,
        new RegExp(
          `^${NOT_CONTROL}[A-Za-z_][\\w\\s:<>,*&]*[\\s*&>](\\w+::)*~?\\w+\\s*\\([^;]*\\)[^;]*$`
        ),
      ],
      ignore: [...C_COMMENTS, /^#/, /^using\s/],
    },

    csharp: {
      language: 'csharp',
      strategy: 'brace',
      declarations: [
        new RegExp(`^(\\[[^\\]]*\\]\\s*)*${CSHARP_MODIFIERS}(class|interface|struct|enum|record)\\s+\\w+`),
        /^namespace\s+[\w.]+/,
        new RegExp(
          `^${NOT_CONTROL}${CSHARP_MODIFIERS}[\\w.<>,\\[\\]?]+\\s+\\w+\\s*(<[^>]*>)?\\s*\\([^;=]*\\)\\s*(where\\s+[^{]*)?(\\{|;|=>.*)?\\s*$`
        ),
      ],
      ignore: [...C_COMMENTS, /^using\s/, /^\[/],
    },

    ruby: {
      language: 'ruby',
      strategy: 'end',
      declarations: [/^def\s+/, /^(class|module)\s+[A-Z]/],
      ignore: [...HASH_COMMENTS, /^require(_relative)?\b/, /^=begin\b/],
    },

    php: {
      language: 'php',
      strategy: 'brace',
      declarations: [
        /^((public|private|protected|static|final|abstract)\s+)*function\s+&?\w+/,
        /^((abstract|final|readonly)\s+)*(class|interface|trait|enum)\s+\w+/,
      ],
      ignore: [
        ...C_COMMENTS,
        ...HASH_COMMENTS,
        /^<\?php/,
        /^(use|namespace|require|require_once|include|include_once)\b/,
      ],
    },
  });

/**
 * ATX heading: one or more `#`, whitespace, then text.
 * Group 1 is the run of `#` (its length is the heading level).
 */
export const MARKDOWN_HEADER = /^(#{1,6})\s+\S/;

/** Opening or closing line of a fenced code block; group 1 is the fence run */
export const MARKDOWN_FENCE = /^\s{0,3}(`{3,}|~{3,})(.*)$/;

/**
 * Whether a trimmed line is never a signature candidate.
 */
export function isIgnoredLine(trimmed: string, table: PatternTable): boolean {
  if (trimmed === '') return true;
  return table.ignore.some((pattern) => pattern.test(trimmed));
}

/**
 * Whether a trimmed line declares a function, method, class or type.
 */
export function isDeclarationLine(trimmed: string, table: PatternTable): boolean {
  return table.declarations.some((pattern) => pattern.test(trimmed));
}
