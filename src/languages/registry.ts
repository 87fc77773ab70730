import type { CommentSyntax, StringSyntax } from './lexer.js';

export interface LanguageDefinition {
  id: string;
  extensions: string[];
  fileNames: string[];
  /** null when the comment syntax is unknown. */
  comments: CommentSyntax | null;
  strings: StringSyntax;
  docstrings: boolean;
  /** Leading indentation is part of the syntax. */
  significantIndentation: boolean;
  /** Matches the first line of an import/include/using declaration. */
  imports: RegExp | null;
  /** Matches the first line of a test case. */
  testDeclarations: RegExp[];
  /** Matches a debug-only print or trace statement (without comment markers). */
  debugStatements: RegExp | null;
}

const HASH: CommentSyntax = { line: ['#'], block: [], lineNeedsBoundary: false };
const HASH_WORD: CommentSyntax = { line: ['#'], block: [], lineNeedsBoundary: true };
const SLASHES: CommentSyntax = { line: ['//'], block: [['/*', '*/']], lineNeedsBoundary: false };

const PLAIN_QUOTES: StringSyntax = { quotes: ['"', "'"], multiline: [] };
const DOUBLE_QUOTES: StringSyntax = { quotes: ['"'], multiline: [] };

export const LANGUAGES: LanguageDefinition[] = [
  {
    id: 'python',
    extensions: ['.py', '.pyi', '.pyx'],
    fileNames: [],
    comments: HASH,
    strings: { quotes: ['"""', "'''", '"', "'"], multiline: ['"""', "'''"] },
    docstrings: true,
    significantIndentation: true,
    imports: /^\s*(?:import\s+\S|from\s+\S+\s+import\b)/,
    testDeclarations: [/^\s*(?:async\s+)?def\s+test\w*\s*\(/, /^\s*class\s+Test\w*\s*[:(]/],
    debugStatements: /^\s*(?:print|pprint|breakpoint|pdb\.set_trace|(?:logging|logger|log)\.debug)\s*\(|^\s*import\s+pdb\b/,
  },
  {
    id: 'cpp',
    extensions: ['.c', '.h', '.cc', '.cpp', '.cxx', '.hpp', '.hh', '.hxx', '.cu', '.cuh', '.ino'],
    fileNames: [],
    comments: SLASHES,
    strings: PLAIN_QUOTES,
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*#\s*include\s*[<"]/,
    testDeclarations: [/^\s*(?:TEST|TEST_F|TEST_P|TEST_CASE|BOOST_AUTO_TEST_CASE)\s*\(/],
    debugStatements: /^\s*(?:printf|puts|fprintf\s*\(\s*stderr|(?:std::)?cout\s*<<|(?:std::)?cerr\s*<<)/,
  },
  {
    id: 'csharp',
    extensions: ['.cs'],
    fileNames: [],
    comments: SLASHES,
    strings: PLAIN_QUOTES,
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*using\s+(?:static\s+)?[\w.]+(?:\s*=\s*[\w.<>]+)?\s*;/,
    testDeclarations: [/^\s*\[(?:Test|TestMethod|Fact|Theory|TestCase)\b/],
    debugStatements: /^\s*(?:Console\.Write(?:Line)?|Debug\.Write(?:Line)?|Trace\.Write(?:Line)?)\s*\(/,
  },
  {
    id: 'qsharp',
    extensions: ['.qs'],
    fileNames: [],
    comments: { line: ['//'], block: [], lineNeedsBoundary: false },
    strings: DOUBLE_QUOTES,
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*open\s+[\w.]+(?:\s+as\s+[\w.]+)?\s*;/,
    testDeclarations: [/^\s*@Test\s*\(/],
    debugStatements: /^\s*(?:Message|DumpMachine|DumpRegister)\s*\(/,
  },
  {
    id: 'jvm',
    extensions: ['.java', '.kt', '.kts', '.scala'],
    fileNames: [],
    comments: SLASHES,
    strings: { quotes: ['"""', '"', "'"], multiline: ['"""'] },
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*import\s+[\w.*{}, ]+;?\s*$/,
    testDeclarations: [/^\s*@Test\b/],
    debugStatements: /^\s*(?:System\.(?:out|err)\.print(?:ln|f)?|println|print)\s*\(/,
  },
  {
    id: 'javascript',
    extensions: ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts'],
    fileNames: [],
    comments: SLASHES,
    strings: { quotes: ['"', "'", '`'], multiline: ['`'] },
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*import\s+(?:type\s+)?[\w*{'"]/,
    testDeclarations: [/^\s*(?:it|test|describe)(?:\.\w+)?\s*\(/],
    debugStatements: /^\s*(?:console\.(?:log|debug|trace|info)|debugger\b)/,
  },
  {
    id: 'go',
    extensions: ['.go'],
    fileNames: [],
    comments: SLASHES,
    strings: { quotes: ['"', '`', "'"], multiline: ['`'] },
    docstrings: false,
    significantIndentation: false,
    imports: null,
    testDeclarations: [/^\s*func\s+(?:Test|Benchmark)\w*\s*\(/],
    debugStatements: /^\s*(?:fmt\.Print(?:ln|f)?|log\.Print(?:ln|f)?|println)\s*\(/,
  },
  {
    id: 'rust',
    extensions: ['.rs'],
    fileNames: [],
    comments: SLASHES,
    strings: DOUBLE_QUOTES,
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*(?:pub\s+)?use\s+[\w:{]/,
    testDeclarations: [/^\s*#\[test\]/],
    debugStatements: /^\s*(?:println!|eprintln!|print!|dbg!)/,
  },
  {
    id: 'julia',
    extensions: ['.jl'],
    fileNames: [],
    comments: { line: ['#'], block: [['#=', '=#']], lineNeedsBoundary: false },
    strings: { quotes: ['"""', '"'], multiline: ['"""'] },
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*(?:using|import)\s+\S/,
    testDeclarations: [/^\s*@test(?:set)?\b/],
    debugStatements: /^\s*(?:println|print|@show|@debug)\b/,
  },
  {
    id: 'shell',
    extensions: ['.sh', '.bash', '.zsh'],
    fileNames: [],
    comments: HASH_WORD,
    strings: PLAIN_QUOTES,
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*(?:source|\.)\s+\S/,
    testDeclarations: [],
    debugStatements: /^\s*(?:echo|set\s+-x)\b/,
  },
  {
    id: 'quil',
    extensions: ['.quil'],
    fileNames: [],
    comments: HASH,
    strings: DOUBLE_QUOTES,
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*INCLUDE\s+"/,
    testDeclarations: [],
    debugStatements: null,
  },
  {
    id: 'openqasm',
    extensions: ['.qasm'],
    fileNames: [],
    comments: SLASHES,
    strings: DOUBLE_QUOTES,
    docstrings: false,
    significantIndentation: false,
    imports: /^\s*include\s+"/,
    testDeclarations: [],
    debugStatements: null,
  },
  {
    id: 'config',
    extensions: ['.yml', '.yaml', '.toml', '.cfg', '.ini', '.cmake'],
    fileNames: ['CMakeLists.txt', 'Makefile', 'Dockerfile', 'requirements.txt', '.gitignore'],
    comments: HASH_WORD,
    strings: PLAIN_QUOTES,
    docstrings: false,
    significantIndentation: true,
    imports: null,
    testDeclarations: [],
    debugStatements: null,
  },
  {
    id: 'json',
    extensions: ['.json'],
    fileNames: [],
    comments: { line: [], block: [], lineNeedsBoundary: false },
    strings: DOUBLE_QUOTES,
    docstrings: false,
    significantIndentation: false,
    imports: null,
    testDeclarations: [],
    debugStatements: null,
  },
];

/** Used when the extension is unknown: no comments are ever stripped. */
export const UNKNOWN_LANGUAGE: LanguageDefinition = {
  id: 'unknown',
  extensions: [],
  fileNames: [],
  comments: null,
  strings: { quotes: [], multiline: [] },
  docstrings: false,
  significantIndentation: true,
  imports: null,
  testDeclarations: [],
  debugStatements: null,
};

const BY_FILE_NAME = new Map<string, LanguageDefinition>();
const BY_EXTENSION = new Map<string, LanguageDefinition>();
for (const language of LANGUAGES) {
  for (const name of language.fileNames) BY_FILE_NAME.set(name, language);
  for (const ext of language.extensions) BY_EXTENSION.set(ext, language);
}

export function fileNameOf(path: string): string {
  return path.split('/').pop() ?? path;
}

export function extensionOf(path: string): string {
  const name = fileNameOf(path);
  const dot = name.lastIndexOf('.');
  return dot <= 0 ? '' : name.slice(dot).toLowerCase();
}

/** Resolves the language of a path by exact file name first, then by extension. */
export function languageFor(path: string): LanguageDefinition {
  const name = fileNameOf(path);
  return BY_FILE_NAME.get(name) ?? BY_EXTENSION.get(extensionOf(path)) ?? UNKNOWN_LANGUAGE;
}

export function languageById(id: string): LanguageDefinition {
  return LANGUAGES.find(l => l.id === id) ?? UNKNOWN_LANGUAGE;
}
