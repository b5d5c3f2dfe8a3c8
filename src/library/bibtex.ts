/**
 * BibTeX Parser
 *
 * Reads `@type{key, field = value, ...}` entries. Values may be braced,
 * quoted, bare (numbers, macro names) or concatenated with `#`.
 * `@string` blocks define macros that later values expand; `@comment` and
 * `@preamble` blocks are skipped.
 *
 * @module library/bibtex
 */

// ============================================================================
// Types
// ============================================================================

/**
 * A parsed BibTeX entry. Field names are lowercased.
 */
export interface BibtexEntry {
  type: string;
  key: string;
  fields: Record<string, string>;
}

/**
 * Syntax error with the 1-based line where parsing stopped.
 */
export class BibtexParseError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`${message} (line ${line})`);
    this.name = 'BibtexParseError';
  }
}

/** Block types that carry no bibliography entry */
const SKIPPED_BLOCKS = new Set(['comment', 'preamble']);

/**
 * Macros every BibTeX style predefines.
 */
const MONTH_MACROS: ReadonlyArray<readonly [string, string]> = [
  ['jan', 'January'],
  ['feb', 'February'],
  ['mar', 'March'],
  ['apr', 'April'],
  ['may', 'May'],
  ['jun', 'June'],
  ['jul', 'July'],
  ['aug', 'August'],
  ['sep', 'September'],
  ['oct', 'October'],
  ['nov', 'November'],
  ['dec', 'December'],
];

/**
 * Macro name (lowercased) to its unexpanded text.
 */
type MacroTable = Map<string, string>;

// ============================================================================
// Value Cleanup
// ============================================================================

/**
 * Strip grouping braces and common escapes, collapse whitespace.
 *
 * @example
 * ```typescript
 * cleanBibtexValue('{Deep} Learning \\& {Friends}') // "Deep Learning & Friends"
 * ```
 */
export function cleanBibtexValue(value: string): string {
  return value
    .replace(/\\([&%$#_])/g, '$1')
    .replace(/[{}]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Split a BibTeX author field on the `and` separator.
 *
 * @example
 * ```typescript
 * splitAuthors('Doe, Jane and Roe, Richard') // ["Doe, Jane", "Roe, Richard"]
 * ```
 */
export function splitAuthors(field: string): string[] {
  return field
    .split(/\s+and\s+/i)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

// ============================================================================
// Parser
// ============================================================================

class Cursor {
  pos = 0;

  constructor(readonly source: string) {}

  get done(): boolean {
    return this.pos >= this.source.length;
  }

  peek(): string {
    return this.source.charAt(this.pos);
  }

  line(): number {
    return this.source.slice(0, this.pos).split('\n').length;
  }

  skipWhitespace(): void {
    while (!this.done && /\s/.test(this.peek())) {
      this.pos++;
    }
  }

  /** Read characters while they match a single-character pattern */
  readWhile(pattern: RegExp): string {
    const start = this.pos;
    while (!this.done && pattern.test(this.peek())) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  fail(message: string): never {
    throw new BibtexParseError(message, this.line());
  }

  expect(char: string): void {
    if (this.peek() !== char) {
      this.fail(`Expected "${char}"`);
    }
    this.pos++;
  }
}

/**
 * Read a `{...}` group, returning its inner text (nested braces kept).
 */
function readBraced(cursor: Cursor): string {
  cursor.expect('{');
  const start = cursor.pos;
  let depth = 1;
  while (!cursor.done) {
    const char = cursor.peek();
    if (char === '\\') {
      cursor.pos += 2;
      continue;
    }
    if (char === '{') depth++;
    if (char === '}') depth--;
    if (depth === 0) {
      const inner = cursor.source.slice(start, cursor.pos);
      cursor.pos++;
      return inner;
    }
    cursor.pos++;
  }
  return cursor.fail('Unterminated "{"');
}

/**
 * Read a `"..."` string; braces inside may contain quotes.
 */
function readQuoted(cursor: Cursor): string {
  cursor.expect('"');
  const start = cursor.pos;
  let depth = 0;
  while (!cursor.done) {
    const char = cursor.peek();
    if (char === '\\') {
      cursor.pos += 2;
      continue;
    }
    if (char === '{') depth++;
    if (char === '}') depth--;
    if (char === '"' && depth === 0) {
      const inner = cursor.source.slice(start, cursor.pos);
      cursor.pos++;
      return inner;
    }
    cursor.pos++;
  }
  return cursor.fail('Unterminated string');
}

/**
 * Read a field value: parts joined with `#`. Bare words that name a macro
 * expand to its text; numbers and unknown names stay as written.
 */
function readValue(cursor: Cursor, close: string, macros: MacroTable): string {
  const parts: string[] = [];
  for (;;) {
    cursor.skipWhitespace();
    const char = cursor.peek();
    if (char === '{') {
      parts.push(readBraced(cursor));
    } else if (char === '"') {
      parts.push(readQuoted(cursor));
    } else {
      const bare = cursor.readWhile(new RegExp(`[^,#\\s${close === '}' ? '}' : ')'}]`));
      if (bare.length === 0) {
        cursor.fail('Expected a field value');
      }
      parts.push(macros.get(bare.toLowerCase()) ?? bare);
    }
    cursor.skipWhitespace();
    if (cursor.peek() !== '#') {
      return parts.join('');
    }
    cursor.pos++;
  }
}

/**
 * Skip a balanced block body starting at its opening delimiter.
 */
function skipBlock(cursor: Cursor): void {
  if (cursor.peek() === '{') {
    readBraced(cursor);
    return;
  }
  cursor.expect('(');
  let depth = 1;
  while (!cursor.done && depth > 0) {
    const char = cursor.peek();
    if (char === '(') depth++;
    if (char === ')') depth--;
    cursor.pos++;
  }
  if (depth > 0) {
    cursor.fail('Unterminated "("');
  }
}

/**
 * Read the opening delimiter of a block and return the matching closer.
 */
function openBlock(cursor: Cursor, type: string): string {
  const open = cursor.peek();
  if (open !== '{' && open !== '(') {
    cursor.fail(`Expected "{" after @${type}`);
  }
  cursor.pos++;
  return open === '{' ? '}' : ')';
}

/**
 * Read a `@string{name = value}` body into the macro table.
 */
function readMacro(cursor: Cursor, macros: MacroTable): void {
  const close = openBlock(cursor, 'string');
  cursor.skipWhitespace();
  const name = cursor.readWhile(/[^=\s,{}()"#]/).toLowerCase();
  if (name.length === 0) {
    cursor.fail('Expected a macro name in @string');
  }
  cursor.skipWhitespace();
  cursor.expect('=');
  const value = readValue(cursor, close, macros);
  cursor.skipWhitespace();
  cursor.expect(close);
  macros.set(name, value);
}

/**
 * Read the body of an entry after its type, up to and including the closer.
 */
function readEntry(cursor: Cursor, type: string, macros: MacroTable): BibtexEntry {
  const close = openBlock(cursor, type);

  cursor.skipWhitespace();
  const key = cursor.readWhile(new RegExp(`[^,\\s${close === '}' ? '}' : ')'}]`));
  const fields: Record<string, string> = {};

  for (;;) {
    cursor.skipWhitespace();
    if (cursor.done) {
      cursor.fail(`Unterminated entry "${key}"`);
    }
    const char = cursor.peek();
    if (char === close) {
      cursor.pos++;
      return { type, key, fields };
    }
    if (char === ',') {
      cursor.pos++;
      continue;
    }

    const name = cursor.readWhile(/[^=\s,{}()"#]/).toLowerCase();
    if (name.length === 0) {
      cursor.fail(`Expected a field name in entry "${key}"`);
    }
    cursor.skipWhitespace();
    cursor.expect('=');
    fields[name] = cleanBibtexValue(readValue(cursor, close, macros));
  }
}

/**
 * Parse BibTeX source into entries, in file order.
 *
 * Text outside entries is ignored, as BibTeX itself does.
 *
 * @param source - Contents of a .bib file
 * @throws BibtexParseError on malformed entries
 */
export function parseBibtex(source: string): BibtexEntry[] {
  const cursor = new Cursor(source);
  const entries: BibtexEntry[] = [];
  const macros: MacroTable = new Map(MONTH_MACROS);

  while (!cursor.done) {
    const at = source.indexOf('@', cursor.pos);
    if (at === -1) {
      break;
    }
    cursor.pos = at + 1;

    const type = cursor.readWhile(/[A-Za-z]/).toLowerCase();
    if (type.length === 0) {
      continue;
    }
    cursor.skipWhitespace();

    // A stray "@" (an e-mail address in a comment) opens no block
    if (cursor.peek() !== '{' && cursor.peek() !== '(') {
      continue;
    }

    if (SKIPPED_BLOCKS.has(type)) {
      skipBlock(cursor);
      continue;
    }

    if (type === 'string') {
      readMacro(cursor, macros);
      continue;
    }

    entries.push(readEntry(cursor, type, macros));
  }

  return entries;
}
