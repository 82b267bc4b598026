/**
 * Per-language import pattern table.
 *
 * Each entry is best-effort lexical matching: patterns may catch imports inside
 * comments or strings and will miss dynamically built paths. Adding a language
 * means adding an entry here; nothing else branches on the language id.
 */

import type { LanguageId } from '../../types/index.js';

/**
 * How the resolver turns a raw token into candidate paths.
 */
export type PathStyle = 'relative' | 'dotted' | 'rust' | 'include' | 'go' | 'php';

export interface ImportPattern {
  regex: RegExp;
  /** Turn one match into tokens. Defaults to the first non-empty capture group. */
  expand?: (match: RegExpMatchArray) => string[];
}

export interface LanguageDefinition {
  id: LanguageId;
  /** Lowercase, without the leading dot */
  extensions: string[];
  patterns: ImportPattern[];
  pathStyle: PathStyle;
  /** Extensions tried when a token names a file without one, in order */
  resolveExtensions: string[];
  /** File names that make a directory importable as a single file */
  entryFiles: string[];
  /** Imports name packages/namespaces rather than paths, so trailing-segment matching applies */
  namespaced: boolean;
}

export function firstGroup(match: RegExpMatchArray): string[] {
  for (let i = 1; i < match.length; i++) {
    const group = match[i]?.trim();
    if (group) return [group];
  }
  return [];
}

function splitNames(list: string): string[] {
  return list
    .split(',')
    .map(part => part.trim().split(/\s+as\s+/)[0]?.trim() ?? '')
    .filter(name => /^[\w.]+$/.test(name));
}

const JS_PATTERNS: ImportPattern[] = [
  { regex: /\bimport\s+(?:type\s+)?[^'";]*?\bfrom\s*['"]([^'"\n]+)['"]/g },
  { regex: /\bexport\s+(?:type\s+)?(?:\*|\{[^}]*\})(?:\s+as\s+\w+)?\s*from\s*['"]([^'"\n]+)['"]/g },
  { regex: /\bimport\s*['"]([^'"\n]+)['"]/g },
  { regex: /\brequire\s*\(\s*['"]([^'"\n]+)['"]\s*\)/g },
  { regex: /\bimport\s*\(\s*['"]([^'"\n]+)['"]\s*\)/g },
];

const JS_ENTRY_FILES = ['index.ts', 'index.tsx', 'index.js', 'index.jsx', 'index.mjs', 'index.cjs'];

const C_FAMILY: Omit<LanguageDefinition, 'id' | 'extensions'> = {
  patterns: [{ regex: /^[ \t]*#[ \t]*include[ \t]*["<]([^">\n]+)[">]/gm }],
  pathStyle: 'include',
  resolveExtensions: ['.h', '.hpp', '.hh', '.c', '.cc', '.cpp', '.cxx'],
  entryFiles: [],
  namespaced: false,
};

export const LANGUAGE_DEFINITIONS: LanguageDefinition[] = [
  {
    id: 'python',
    extensions: ['py', 'pyi'],
    patterns: [
      {
        regex: /^[ \t]*import[ \t]+([\w.]+(?:[ \t]+as[ \t]+\w+)?(?:[ \t]*,[ \t]*[\w.]+(?:[ \t]+as[ \t]+\w+)?)*)/gm,
        expand: match => splitNames(match[1] ?? ''),
      },
      {
        // `from . import a, b` names sibling modules; `from .x import y` names .x
        regex: /^[ \t]*from[ \t]+(\.*[\w.]*)[ \t]+import[ \t]+\(?[ \t]*([\w \t,]*)/gm,
        expand: match => {
          const source = match[1] ?? '';
          if (source && /^\.+$/.test(source)) {
            return splitNames(match[2] ?? '').map(name => source + name);
          }
          return source ? [source] : [];
        },
      },
    ],
    pathStyle: 'dotted',
    resolveExtensions: ['.py', '.pyi'],
    entryFiles: ['__init__.py'],
    namespaced: true,
  },
  {
    id: 'javascript',
    extensions: ['js', 'jsx', 'mjs', 'cjs'],
    patterns: JS_PATTERNS,
    pathStyle: 'relative',
    resolveExtensions: ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.json'],
    entryFiles: JS_ENTRY_FILES,
    namespaced: false,
  },
  {
    id: 'typescript',
    extensions: ['ts', 'tsx', 'mts', 'cts'],
    patterns: JS_PATTERNS,
    pathStyle: 'relative',
    resolveExtensions: ['.ts', '.tsx', '.d.ts', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs', '.json'],
    entryFiles: JS_ENTRY_FILES,
    namespaced: false,
  },
  {
    id: 'vue',
    extensions: ['vue'],
    patterns: JS_PATTERNS,
    pathStyle: 'relative',
    resolveExtensions: ['.vue', '.ts', '.js', '.tsx', '.jsx'],
    entryFiles: JS_ENTRY_FILES,
    namespaced: false,
  },
  {
    id: 'rust',
    extensions: ['rs'],
    patterns: [
      { regex: /^[ \t]*(?:pub(?:\([^)\n]*\))?[ \t]+)?use[ \t]+((?:::)?[\w]+(?:::[\w]+)*)/gm },
      {
        regex: /^[ \t]*(?:pub(?:\([^)\n]*\))?[ \t]+)?mod[ \t]+(\w+)[ \t]*;/gm,
        expand: match => (match[1] ? [`self::${match[1]}`] : []),
      },
    ],
    pathStyle: 'rust',
    resolveExtensions: ['.rs'],
    entryFiles: ['mod.rs', 'lib.rs'],
    namespaced: true,
  },
  {
    id: 'java',
    extensions: ['java'],
    patterns: [{ regex: /^[ \t]*import[ \t]+(?:static[ \t]+)?([\w.]+?)(?:\.\*)?[ \t]*;/gm }],
    pathStyle: 'dotted',
    resolveExtensions: ['.java'],
    entryFiles: [],
    namespaced: true,
  },
  {
    id: 'kotlin',
    extensions: ['kt', 'kts'],
    patterns: [{ regex: /^[ \t]*import[ \t]+([\w.]+?)(?:\.\*)?(?:[ \t]+as[ \t]+\w+)?[ \t]*;?[ \t]*$/gm }],
    pathStyle: 'dotted',
    resolveExtensions: ['.kt', '.kts'],
    entryFiles: [],
    namespaced: true,
  },
  {
    id: 'scala',
    extensions: ['scala'],
    patterns: [{ regex: /^[ \t]*import[ \t]+([\w.]+?)(?:\.[_*{][^\n]*)?[ \t]*$/gm }],
    pathStyle: 'dotted',
    resolveExtensions: ['.scala'],
    entryFiles: [],
    namespaced: true,
  },
  { id: 'c', extensions: ['c', 'h'], ...C_FAMILY },
  { id: 'cpp', extensions: ['cc', 'cpp', 'cxx', 'hpp', 'hh', 'hxx'], ...C_FAMILY },
  {
    id: 'go',
    extensions: ['go'],
    patterns: [
      { regex: /^[ \t]*import[ \t]+(?:[\w.]+[ \t]+)?"([^"\n]+)"/gm },
      {
        regex: /^[ \t]*import[ \t]*\(([^)]*)\)/gm,
        expand: match => Array.from((match[1] ?? '').matchAll(/"([^"\n]+)"/g), m => m[1] ?? '').filter(Boolean),
      },
    ],
    pathStyle: 'go',
    resolveExtensions: ['.go'],
    entryFiles: [],
    namespaced: true,
  },
  {
    id: 'csharp',
    extensions: ['cs'],
    patterns: [{ regex: /^[ \t]*(?:global[ \t]+)?using[ \t]+(?:static[ \t]+)?(?:\w+[ \t]*=[ \t]*)?([\w.]+)[ \t]*;/gm }],
    pathStyle: 'dotted',
    resolveExtensions: ['.cs'],
    entryFiles: [],
    namespaced: true,
  },
  {
    id: 'ruby',
    extensions: ['rb'],
    patterns: [
      { regex: /\brequire[ \t(]+['"]([^'"\n]+)['"]/g },
      {
        regex: /\brequire_relative[ \t(]+['"]([^'"\n]+)['"]/g,
        expand: match => {
          const token = match[1]?.trim() ?? '';
          if (!token) return [];
          return [token.startsWith('.') ? token : `./${token}`];
        },
      },
    ],
    pathStyle: 'relative',
    resolveExtensions: ['.rb'],
    entryFiles: [],
    namespaced: false,
  },
  {
    id: 'php',
    extensions: ['php'],
    patterns: [
      {
        regex: /^[ \t]*use[ \t]+(?:function[ \t]+|const[ \t]+)?\\?([\w\\]+)/gm,
      },
      { regex: /\b(?:require|include)(?:_once)?[ \t(]*['"]([^'"\n]+)['"]/g },
    ],
    pathStyle: 'php',
    resolveExtensions: ['.php'],
    entryFiles: [],
    namespaced: true,
  },
  {
    id: 'swift',
    extensions: ['swift'],
    patterns: [
      {
        regex: /^[ \t]*(?:@testable[ \t]+)?import[ \t]+(?:(?:class|struct|enum|protocol|func|var|let|typealias)[ \t]+)?([\w.]+)/gm,
      },
    ],
    pathStyle: 'dotted',
    resolveExtensions: ['.swift'],
    entryFiles: [],
    namespaced: true,
  },
  {
    id: 'dart',
    extensions: ['dart'],
    patterns: [{ regex: /^[ \t]*(?:import|export|part)[ \t]+['"]([^'"\n]+)['"]/gm }],
    pathStyle: 'relative',
    resolveExtensions: ['.dart'],
    entryFiles: [],
    namespaced: true,
  },
];

