/**
 * Language Names
 *
 * Extension (lower-case, no dot) to the language name shown in the
 * statistics section and the fence tag used for code blocks.
 */

export interface LanguageInfo {
  name: string;
  /** Info string for fenced code blocks */
  fence: string;
}

const LANGUAGES: Readonly<Record<string, LanguageInfo>> = {
  py: { name: 'Python', fence: 'python' },
  pyi: { name: 'Python', fence: 'python' },
  js: { name: 'JavaScript', fence: 'javascript' },
  jsx: { name: 'JavaScript', fence: 'jsx' },
  mjs: { name: 'JavaScript', fence: 'javascript' },
  cjs: { name: 'JavaScript', fence: 'javascript' },
  ts: { name: 'TypeScript', fence: 'typescript' },
  tsx: { name: 'TypeScript', fence: 'tsx' },
  go: { name: 'Go', fence: 'go' },
  rs: { name: 'Rust', fence: 'rust' },
  java: { name: 'Java', fence: 'java' },
  kt: { name: 'Kotlin', fence: 'kotlin' },
  scala: { name: 'Scala', fence: 'scala' },
  swift: { name: 'Swift', fence: 'swift' },
  c: { name: 'C', fence: 'c' },
  h: { name: 'C', fence: 'c' },
  cpp: { name: 'C++', fence: 'cpp' },
  hpp: { name: 'C++', fence: 'cpp' },
  cc: { name: 'C++', fence: 'cpp' },
  cs: { name: 'C#', fence: 'csharp' },
  rb: { name: 'Ruby', fence: 'ruby' },
  php: { name: 'PHP', fence: 'php' },
  sh: { name: 'Shell', fence: 'bash' },
  bash: { name: 'Shell', fence: 'bash' },
  sql: { name: 'SQL', fence: 'sql' },
  html: { name: 'HTML', fence: 'html' },
  css: { name: 'CSS', fence: 'css' },
  scss: { name: 'SCSS', fence: 'scss' },
  json: { name: 'JSON', fence: 'json' },
  yml: { name: 'YAML', fence: 'yaml' },
  yaml: { name: 'YAML', fence: 'yaml' },
  toml: { name: 'TOML', fence: 'toml' },
  xml: { name: 'XML', fence: 'xml' },
  md: { name: 'Markdown', fence: 'markdown' },
  markdown: { name: 'Markdown', fence: 'markdown' },
};

/**
 * Look up the language for an extension.
 */
export function getLanguageInfo(extension: string): LanguageInfo | undefined {
  return LANGUAGES[extension.toLowerCase()];
}
