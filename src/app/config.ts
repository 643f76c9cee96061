/**
 * Configuration loading.
 *
 * Reads the widget configuration (.yuck) and the stylesheet (.scss). Only the
 * surface the daemon acts on is interpreted: balanced forms, top-level
 * `(defwindow name ...)` declarations and `(defvar name value)` defaults.
 * Everything else inside a form is carried through untouched.
 */

import { readFileSync } from 'fs';
import { basename } from 'path';

import { ConfigError } from '@/daemon/errors.js';
import { isErrnoException } from '@/utils/errors.js';

export interface WindowDefinition {
  name: string;
  /** 1-based line of the opening parenthesis */
  line: number;
}

export interface WidgetConfig {
  /** Window definitions in declaration order */
  windows: Map<string, WindowDefinition>;
  /** Variable defaults from defvar */
  varDefaults: Map<string, string>;
}

/**
 * Loader seam used by the application state. Replaced in tests.
 */
export interface ConfigLoader {
  loadConfig(yuckPath: string): WidgetConfig;
  loadStylesheet(scssPath: string): string | null;
}

type Token =
  | { type: 'open'; line: number }
  | { type: 'close'; line: number }
  | { type: 'string'; value: string; line: number }
  | { type: 'atom'; value: string; line: number };

const ATOM_TERMINATORS = new Set(['(', ')', '"', ';']);

function tokenize(source: string, fileName: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (ch === '\n') {
      line++;
      i++;
    } else if (/\s/.test(ch)) {
      i++;
    } else if (ch === ';') {
      while (i < source.length && source.charAt(i) !== '\n') i++;
    } else if (ch === '(') {
      tokens.push({ type: 'open', line });
      i++;
    } else if (ch === ')') {
      tokens.push({ type: 'close', line });
      i++;
    } else if (ch === '"') {
      const startLine = line;
      let value = '';
      i++;
      for (;;) {
        if (i >= source.length) {
          throw new ConfigError(
            `${fileName}:${startLine}: Unterminated string`,
            'UNTERMINATED_STRING'
          );
        }
        const c = source.charAt(i);
        if (c === '\\' && i + 1 < source.length) {
          value += source.charAt(i + 1);
          i += 2;
          continue;
        }
        if (c === '"') {
          i++;
          break;
        }
        if (c === '\n') line++;
        value += c;
        i++;
      }
      tokens.push({ type: 'string', value, line: startLine });
    } else {
      let value = '';
      while (
        i < source.length &&
        !/\s/.test(source.charAt(i)) &&
        !ATOM_TERMINATORS.has(source.charAt(i))
      ) {
        value += source.charAt(i);
        i++;
      }
      tokens.push({ type: 'atom', value, line });
    }
  }

  return tokens;
}

/**
 * Split the token stream into top-level forms, checking balance.
 */
function topLevelForms(tokens: Token[], fileName: string): Token[][] {
  const forms: Token[][] = [];
  const openLines: number[] = [];
  let current: Token[] = [];

  for (const token of tokens) {
    if (token.type === 'open') {
      openLines.push(token.line);
    } else if (token.type === 'close') {
      if (openLines.pop() === undefined) {
        throw new ConfigError(
          `${fileName}:${token.line}: Unexpected ")"`,
          'UNBALANCED_PARENS'
        );
      }
    }

    if (openLines.length > 0 || token.type === 'close') {
      current.push(token);
    }
    if (openLines.length === 0 && current.length > 0) {
      forms.push(current);
      current = [];
    }
  }

  const unclosed = openLines[0];
  if (unclosed !== undefined) {
    throw new ConfigError(
      `${fileName}:${unclosed}: Unclosed "(" opened here`,
      'UNBALANCED_PARENS'
    );
  }

  return forms;
}

function nameOf(form: Token[], keyword: string, fileName: string, line: number): string {
  const token = form[2];
  if (token?.type !== 'atom') {
    throw new ConfigError(`${fileName}:${line}: ${keyword} is missing a name`, 'MISSING_NAME');
  }
  return token.value;
}

/**
 * Parse configuration source text.
 *
 * @param source - Contents of the .yuck file
 * @param fileName - Name used in error messages
 * @throws ConfigError on unbalanced forms, unterminated strings, unnamed or
 *   duplicate definitions
 *
 * @example
 * ```typescript
 * const config = parseConfig('(defvar volume 40)\n(defwindow bar (box))', 'widgetd.yuck');
 * config.windows.has('bar');          // true
 * config.varDefaults.get('volume');   // '40'
 * ```
 */
export function parseConfig(source: string, fileName: string): WidgetConfig {
  const windows = new Map<string, WindowDefinition>();
  const varDefaults = new Map<string, string>();

  for (const form of topLevelForms(tokenize(source, fileName), fileName)) {
    const open = form[0];
    const head = form[1];
    if (open?.type !== 'open' || head?.type !== 'atom') {
      continue;
    }

    if (head.value === 'defwindow') {
      const name = nameOf(form, 'defwindow', fileName, open.line);
      const existing = windows.get(name);
      if (existing) {
        throw new ConfigError(
          `${fileName}:${open.line}: Window "${name}" is already defined on line ${existing.line}`,
          'DUPLICATE_WINDOW'
        );
      }
      windows.set(name, { name, line: open.line });
    } else if (head.value === 'defvar') {
      const name = nameOf(form, 'defvar', fileName, open.line);
      const value = form[3];
      varDefaults.set(
        name,
        value?.type === 'string' || value?.type === 'atom' ? value.value : ''
      );
    }
  }

  return { windows, varDefaults };
}

/**
 * Read and parse the configuration file.
 *
 * @throws ConfigError if the file is missing, unreadable, or invalid
 */
export function loadConfig(yuckPath: string): WidgetConfig {
  let source: string;
  try {
    source = readFileSync(yuckPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${yuckPath}`, 'CONFIG_NOT_FOUND');
    }
    throw new ConfigError(
      `Failed to read ${yuckPath}: ${error instanceof Error ? error.message : String(error)}`,
      'CONFIG_READ_FAILED'
    );
  }
  return parseConfig(source, basename(yuckPath));
}

/**
 * Read the stylesheet. The stylesheet is optional.
 *
 * @returns Stylesheet text, or null when the file does not exist
 */
export function loadStylesheet(scssPath: string): string | null {
  try {
    return readFileSync(scssPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigError(
      `Failed to read ${scssPath}: ${error instanceof Error ? error.message : String(error)}`,
      'STYLESHEET_READ_FAILED'
    );
  }
}

export const fileConfigLoader: ConfigLoader = { loadConfig, loadStylesheet };
