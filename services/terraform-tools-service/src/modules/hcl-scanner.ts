/**
 * HCL structure scanner
 *
 * Not a parser: it tokenizes just enough of the native syntax to find
 * top-level attributes and blocks of a body while skipping over string
 * templates, heredocs and comments. Offsets are UTF-16 indexes into the
 * scanned text; use `utf8Offsets` to turn them into byte offsets.
 */

import { ExtractError } from '../errors';

export type TokenType = 'ident' | 'string' | 'heredoc' | 'open' | 'close' | 'assign' | 'newline' | 'other';

export interface Token {
  type: TokenType;
  text: string;
  start: number;
  end: number;
  line: number;
}

export interface AttributeNode {
  name: string;
  line: number;
  /** Start of the attribute name */
  start: number;
  /** First and last character of the value expression, end exclusive */
  valueStart: number;
  valueEnd: number;
  expression: string;
}

export interface BlockNode {
  type: string;
  labels: string[];
  line: number;
  start: number;
  /** Index of `{` */
  openBrace: number;
  /** Index of the matching `}` */
  closeBrace: number;
  /** One past the closing brace */
  end: number;
}

export interface BodyStructure {
  attributes: AttributeNode[];
  blocks: BlockNode[];
}

const PAIRS: Record<string, string> = { '{': '}', '[': ']', '(': ')' };
const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_-]/;
const HEREDOC_START = /<<(-?)([A-Za-z_][A-Za-z0-9_-]*)[ \t]*\r?\n/y;

export function tokenize(source: string, file: string, firstLine = 1): Token[] {
  const tokens: Token[] = [];
  const n = source.length;
  let line = firstLine;
  let i = 0;

  const fail = (atLine: number, reason: string) => ExtractError.malformed(file, atLine, reason);

  const push = (type: TokenType, start: number, end: number, startLine: number) => {
    tokens.push({ type, text: source.slice(start, end), start, end, line: startLine });
  };

  // Both scanners return the index just past what they consumed
  const scanTemplate = (from: number, startLine: number): number => {
    let depth = 1;
    let j = from;
    while (j < n) {
      const c = source[j];
      if (c === '"') {
        j = scanString(j);
        continue;
      }
      if (c === '\n') line++;
      else if (c === '{') depth++;
      else if (c === '}' && --depth === 0) return j + 1;
      j++;
    }
    throw fail(startLine, 'unterminated template interpolation');
  };

  const scanString = (start: number): number => {
    const startLine = line;
    let j = start + 1;
    while (j < n) {
      const c = source[j];
      if (c === '\\') {
        j += 2;
        continue;
      }
      if (c === '"') return j + 1;
      if (c === '\n') break;
      if ((c === '$' || c === '%') && source[j + 1] === c && source[j + 2] === '{') {
        j += 3;
        continue;
      }
      if ((c === '$' || c === '%') && source[j + 1] === '{') {
        j = scanTemplate(j + 2, startLine);
        continue;
      }
      j++;
    }
    throw fail(startLine, 'unterminated string');
  };

  const scanHeredoc = (marker: string, bodyStart: number): number => {
    const startLine = line;
    let lineStart = bodyStart;
    line++;
    while (lineStart <= n) {
      const newline = source.indexOf('\n', lineStart);
      const lineEnd = newline === -1 ? n : newline;
      if (source.slice(lineStart, lineEnd).trim() === marker) {
        return lineEnd;
      }
      if (newline === -1) break;
      line++;
      lineStart = newline + 1;
    }
    throw fail(startLine, `unterminated heredoc <<${marker}`);
  };

  while (i < n) {
    const c = source[i];
    const next = source[i + 1];

    if (c === ' ' || c === '\t' || c === '\r') {
      i++;
      continue;
    }
    if (c === '\n') {
      push('newline', i, i + 1, line);
      line++;
      i++;
      continue;
    }
    if (c === '#' || (c === '/' && next === '/')) {
      const newline = source.indexOf('\n', i);
      i = newline === -1 ? n : newline;
      continue;
    }
    if (c === '/' && next === '*') {
      const close = source.indexOf('*/', i + 2);
      if (close === -1) throw fail(line, 'unterminated comment');
      for (let k = i; k < close; k++) if (source[k] === '\n') line++;
      i = close + 2;
      continue;
    }
    if (c === '"') {
      const startLine = line;
      const end = scanString(i);
      push('string', i, end, startLine);
      i = end;
      continue;
    }
    if (c === '<' && next === '<') {
      HEREDOC_START.lastIndex = i;
      const match = HEREDOC_START.exec(source);
      if (match) {
        const startLine = line;
        const end = scanHeredoc(match[2], i + match[0].length);
        push('heredoc', i, end, startLine);
        i = end;
        continue;
      }
    }
    if (c === '{' || c === '[' || c === '(') {
      push('open', i, i + 1, line);
      i++;
      continue;
    }
    if (c === '}' || c === ']' || c === ')') {
      push('close', i, i + 1, line);
      i++;
      continue;
    }
    if (c === '=') {
      if (next === '=' || next === '>') {
        push('other', i, i + 2, line);
        i += 2;
      } else {
        push('assign', i, i + 1, line);
        i++;
      }
      continue;
    }
    if ((c === '!' || c === '<' || c === '>') && next === '=') {
      push('other', i, i + 2, line);
      i += 2;
      continue;
    }
    if (IDENT_START.test(c)) {
      let j = i + 1;
      while (j < n && IDENT_PART.test(source[j])) j++;
      push('ident', i, j, line);
      i = j;
      continue;
    }
    push('other', i, i + 1, line);
    i++;
  }

  return tokens;
}

/**
 * Find the attributes and blocks at depth 0 of a body (or of a whole file).
 * Bracket nesting is checked across the entire text.
 */
export function parseStructure(source: string, file: string, firstLine = 1): BodyStructure {
  const tokens = tokenize(source, file, firstLine);
  const attributes: AttributeNode[] = [];
  const blocks: BlockNode[] = [];
  const stack: Token[] = [];

  let statementStart = true;
  let attribute: { name: Token; first?: Token; last?: Token } | null = null;
  let block: { type: Token; labels: string[]; open: Token } | null = null;

  const finishAttribute = () => {
    if (!attribute) return;
    const { name, first, last } = attribute;
    attribute = null;
    if (!first || !last) {
      throw ExtractError.malformed(file, name.line, `missing value for attribute "${name.text}"`);
    }
    attributes.push({
      name: name.text,
      line: name.line,
      start: name.start,
      valueStart: first.start,
      valueEnd: last.end,
      expression: source.slice(first.start, last.end),
    });
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token.type === 'newline') {
      if (stack.length === 0) {
        finishAttribute();
        statementStart = true;
      }
      continue;
    }

    if (stack.length === 0 && statementStart) {
      statementStart = false;
      if (token.type === 'ident') {
        if (tokens[i + 1]?.type === 'assign') {
          attribute = { name: token };
          i++;
          continue;
        }

        let j = i + 1;
        const labels: string[] = [];
        while (tokens[j]?.type === 'string' || tokens[j]?.type === 'ident') {
          const label = tokens[j];
          labels.push(label.type === 'string' ? (unquote(label.text) ?? label.text.slice(1, -1)) : label.text);
          j++;
        }
        const open = tokens[j];
        if (open?.type === 'open' && open.text === '{') {
          block = { type: token, labels, open };
          stack.push(open);
          i = j;
          continue;
        }
      }
    }

    if (attribute) {
      attribute.first ??= token;
      attribute.last = token;
    }

    if (token.type === 'open') {
      stack.push(token);
    } else if (token.type === 'close') {
      const opener = stack.pop();
      if (!opener) {
        throw ExtractError.malformed(file, token.line, `unexpected '${token.text}'`);
      }
      if (PAIRS[opener.text] !== token.text) {
        throw ExtractError.malformed(
          file,
          token.line,
          `unexpected '${token.text}', expected '${PAIRS[opener.text]}' to close '${opener.text}' from line ${opener.line}`
        );
      }
      if (stack.length === 0 && block) {
        blocks.push({
          type: block.type.text,
          labels: block.labels,
          line: block.type.line,
          start: block.type.start,
          openBrace: block.open.start,
          closeBrace: token.start,
          end: token.end,
        });
        block = null;
      }
    }
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    throw ExtractError.malformed(file, unclosed.line, `unclosed '${unclosed.text}'`);
  }
  finishAttribute();

  return { attributes, blocks };
}

/**
 * Decode a quoted string literal. Returns undefined when the string holds a
 * template interpolation or directive and so has no static value.
 */
export function unquote(literal: string): string | undefined {
  if (literal.length < 2 || !literal.startsWith('"') || !literal.endsWith('"')) return undefined;
  const body = literal.slice(1, -1);
  let out = '';

  for (let i = 0; i < body.length; i++) {
    const c = body[i];
    if (c === '\\') {
      const escape = body[i + 1];
      i++;
      switch (escape) {
        case 'n':
          out += '\n';
          break;
        case 't':
          out += '\t';
          break;
        case 'r':
          out += '\r';
          break;
        case '"':
        case '\\':
          out += escape;
          break;
        case 'u':
        case 'U': {
          const width = escape === 'u' ? 4 : 8;
          const hex = body.slice(i + 1, i + 1 + width);
          if (!/^[0-9A-Fa-f]+$/.test(hex) || hex.length !== width) return undefined;
          out += String.fromCodePoint(parseInt(hex, 16));
          i += width;
          break;
        }
        default:
          out += `\\${escape ?? ''}`;
      }
      continue;
    }
    if ((c === '$' || c === '%') && body[i + 1] === '{') return undefined;
    if ((c === '$' || c === '%') && body[i + 1] === c && body[i + 2] === '{') {
      out += `${c}{`;
      i += 2;
      continue;
    }
    out += c;
  }
  return out;
}

const HEREDOC_LITERAL = /^<<(-?)([A-Za-z_][A-Za-z0-9_-]*)[ \t]*\r?\n([\s\S]*?)\r?\n?[ \t]*\2[ \t]*$/;

/**
 * Static text of an expression that is a single string literal or heredoc
 */
export function literalValue(expression: string): string | undefined {
  const trimmed = expression.trim();
  if (trimmed.startsWith('"')) {
    const tokens = tokenize(trimmed, '<expression>');
    return tokens.length === 1 && tokens[0].type === 'string' ? unquote(trimmed) : undefined;
  }

  const heredoc = HEREDOC_LITERAL.exec(trimmed);
  if (!heredoc) return undefined;
  const [, indented, , content] = heredoc;
  if (content.includes('${') || content.includes('%{')) return undefined;
  if (content === '') return '';

  let lines = content.split(/\r?\n/);
  if (indented) {
    const indents = lines.filter(l => l.trim() !== '').map(l => /^[ \t]*/.exec(l)?.[0].length ?? 0);
    const strip = indents.length > 0 ? Math.min(...indents) : 0;
    lines = lines.map(l => l.slice(strip));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Map UTF-16 indexes of `source` to UTF-8 byte offsets
 */
export function utf8Offsets(source: string): (index: number) => number {
  if (/^[\x00-\x7f]*$/.test(source)) {
    return index => index;
  }

  const offsets = new Uint32Array(source.length + 1);
  for (let i = 0; i < source.length; i++) {
    const code = source.charCodeAt(i);
    let width: number;
    if (code < 0x80) width = 1;
    else if (code < 0x800) width = 2;
    else if (code >= 0xd800 && code <= 0xdbff && isLowSurrogate(source.charCodeAt(i + 1))) width = 2;
    else if (code >= 0xdc00 && code <= 0xdfff && i > 0 && isHighSurrogate(source.charCodeAt(i - 1))) width = 2;
    else width = 3;
    offsets[i + 1] = offsets[i] + width;
  }
  return index => offsets[index];
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
