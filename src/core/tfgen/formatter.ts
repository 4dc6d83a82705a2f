/**
 * Canonical layout for generated terraform configuration.
 *
 * Only structure is checked: brackets must balance, quoted strings must end on
 * the line they start, heredocs and block comments must be closed. Outside list
 * and call arguments every line must be an attribute, a block opener, a closer
 * or a comment. Everything else is passed through as written.
 */

import { FormatError } from '../errors/index.js';

export type ConfigFormatter = (text: string) => string;

const INDENT = '  ';
const OPENERS: Record<string, string> = { '{': '}', '[': ']', '(': ')' };
const CLOSERS = new Set(['}', ']', ')']);
const ATTRIBUTE_PATTERN = /^([A-Za-z_][A-Za-z0-9_-]*|"(?:[^"\\]|\\.)*")\s*=(?!=)\s*(.*)$/;
const HEREDOC_PATTERN = /<<-?([A-Za-z_][A-Za-z0-9_]*)$/;
const BLOCK_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*(?:\s+(?:"(?:[^"\\]|\\.)*"|[A-Za-z_][A-Za-z0-9_-]*))*\s*\{/;
const COMMENT_PATTERN = /^(?:#|\/\/|\/\*)/;

type Frame =
  | { kind: 'bracket'; char: string; line: number }
  | { kind: 'string'; line: number }
  | { kind: 'template'; depth: number; line: number };

interface FormattedLine {
  indent: number;
  content: string;
  /** Copied verbatim (heredoc bodies, block comments) */
  verbatim: boolean;
  /** Attribute whose value ends on the same line */
  attribute?: { key: string; value: string };
}

class Scanner {
  readonly frames: Frame[] = [];
  inBlockComment = false;
  blockCommentLine = 0;

  bracketDepth(): number {
    return this.frames.filter((frame) => frame.kind === 'bracket').length;
  }

  innermostBracket(): string | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame?.kind === 'bracket') return frame.char;
    }
    return undefined;
  }

  /**
   * Advance over one line. Returns true when the line ends with a heredoc opener.
   */
  scan(text: string, lineNo: number): boolean {
    let i = 0;
    while (i < text.length) {
      const ch = text[i] ?? '';
      const next = text[i + 1] ?? '';
      const top = this.frames[this.frames.length - 1];

      if (this.inBlockComment) {
        if (ch === '*' && next === '/') {
          this.inBlockComment = false;
          i += 2;
        } else {
          i++;
        }
        continue;
      }

      if (top?.kind === 'string') {
        if (ch === '\\') {
          i += 2;
        } else if ((ch === '$' || ch === '%') && next === ch) {
          i += 2;
        } else if ((ch === '$' || ch === '%') && next === '{') {
          this.frames.push({ kind: 'template', depth: 0, line: lineNo });
          i += 2;
        } else {
          if (ch === '"') this.frames.pop();
          i++;
        }
        continue;
      }

      if (ch === '#' || (ch === '/' && next === '/')) {
        break;
      }
      if (ch === '/' && next === '*') {
        this.inBlockComment = true;
        this.blockCommentLine = lineNo;
        i += 2;
        continue;
      }
      if (ch === '"') {
        this.frames.push({ kind: 'string', line: lineNo });
        i++;
        continue;
      }

      if (top?.kind === 'template') {
        if (ch === '{') {
          top.depth++;
        } else if (ch === '}') {
          if (top.depth === 0) this.frames.pop();
          else top.depth--;
        }
        i++;
        continue;
      }

      if (ch === '<' && next === '<') {
        const heredoc = HEREDOC_PATTERN.exec(text.slice(i).trimEnd());
        if (heredoc) {
          return true;
        }
      }

      if (ch in OPENERS) {
        this.frames.push({ kind: 'bracket', char: ch, line: lineNo });
      } else if (CLOSERS.has(ch)) {
        if (top?.kind !== 'bracket' || OPENERS[top.char] !== ch) {
          throw new FormatError(`unexpected '${ch}' at line ${lineNo}`, lineNo);
        }
        this.frames.pop();
      }
      i++;
    }

    const open = this.frames[this.frames.length - 1];
    if (open && open.kind !== 'bracket') {
      throw new FormatError(`unterminated string at line ${open.line}`, open.line);
    }
    return false;
  }
}

export function formatHcl(text: string): string {
  const source = text.replace(/\r\n/g, '\n').split('\n');
  const scanner = new Scanner();
  const lines: FormattedLine[] = [];
  let heredoc: { marker: string; line: number } | null = null;

  for (const [index, raw] of source.entries()) {
    const lineNo = index + 1;

    if (heredoc) {
      lines.push({ indent: 0, content: raw, verbatim: true });
      if (raw.trim() === heredoc.marker) {
        heredoc = null;
      }
      continue;
    }

    if (scanner.inBlockComment) {
      lines.push({ indent: 0, content: raw.trimEnd(), verbatim: true });
      scanner.scan(raw, lineNo);
      continue;
    }

    const content = raw.trim();
    const depth = scanner.bracketDepth();
    const indent = Math.max(0, depth - leadingClosers(content));
    const match = ATTRIBUTE_PATTERN.exec(content);
    if (!match && !isStructural(content, scanner.innermostBracket())) {
      throw new FormatError(`expected an attribute or block at line ${lineNo}: ${content}`, lineNo);
    }
    const opensHeredoc = scanner.scan(content, lineNo);

    if (opensHeredoc) {
      const marker = HEREDOC_PATTERN.exec(content)?.[1] ?? '';
      heredoc = { marker, line: lineNo };
    }

    const line: FormattedLine = { indent, content, verbatim: false };
    if (match) {
      const key = match[1] ?? '';
      const value = match[2] ?? '';
      line.content = `${key} = ${value}`.trimEnd();
      if (scanner.bracketDepth() === depth && !opensHeredoc) {
        line.attribute = { key, value };
      }
    }
    lines.push(line);
  }

  if (heredoc) {
    throw new FormatError(`unterminated heredoc <<${heredoc.marker} at line ${heredoc.line}`, heredoc.line);
  }
  if (scanner.inBlockComment) {
    throw new FormatError(`unterminated comment at line ${scanner.blockCommentLine}`, scanner.blockCommentLine);
  }
  const unclosed = scanner.frames[scanner.frames.length - 1];
  if (unclosed && unclosed.kind === 'bracket') {
    throw new FormatError(`unclosed '${unclosed.char}' opened at line ${unclosed.line}`, unclosed.line);
  }

  alignAttributes(lines);
  return render(lines);
}

/**
 * Lines that need no `=`: blanks, comments, block openers, closers and the
 * items of a list or call spread over several lines
 */
function isStructural(content: string, enclosing: string | undefined): boolean {
  if (content === '' || COMMENT_PATTERN.test(content) || BLOCK_PATTERN.test(content)) {
    return true;
  }
  if (CLOSERS.has(content[0] ?? '')) {
    return true;
  }
  return enclosing === '[' || enclosing === '(';
}

function leadingClosers(content: string): number {
  let count = 0;
  while (count < content.length && CLOSERS.has(content[count] ?? '')) {
    count++;
  }
  return count;
}

/**
 * Pad keys so the `=` signs of consecutive single-line attributes at the
 * same depth line up.
 */
function alignAttributes(lines: FormattedLine[]): void {
  let group: FormattedLine[] = [];

  const flush = (): void => {
    const width = Math.max(0, ...group.map((line) => line.attribute?.key.length ?? 0));
    for (const line of group) {
      if (line.attribute) {
        line.content = `${line.attribute.key.padEnd(width)} = ${line.attribute.value}`.trimEnd();
      }
    }
    group = [];
  };

  for (const line of lines) {
    const previous = group[group.length - 1];
    if (!line.attribute || (previous && previous.indent !== line.indent)) {
      flush();
    }
    if (line.attribute) {
      group.push(line);
    }
  }
  flush();
}

function render(lines: FormattedLine[]): string {
  const output: string[] = [];
  let pendingBlank = false;

  for (const line of lines) {
    if (line.verbatim) {
      if (pendingBlank) output.push('');
      pendingBlank = false;
      output.push(line.content);
      continue;
    }
    if (line.content === '') {
      pendingBlank = output.length > 0;
      continue;
    }
    if (pendingBlank) output.push('');
    pendingBlank = false;
    output.push(INDENT.repeat(line.indent) + line.content);
  }

  return output.length > 0 ? `${output.join('\n')}\n` : '';
}
