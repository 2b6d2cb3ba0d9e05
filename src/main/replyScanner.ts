import { ProtocolError } from '../common/errors';

export type ScanValue = number | string;

export type ScanReply = ScanValue | ScanValue[];

type Conversion =
  | { kind: 'int' }
  | { kind: 'float' }
  | { kind: 'word'; width?: number }
  | { kind: 'char' };

type FormatToken = { kind: 'literal'; text: string } | { kind: 'space' } | { kind: 'conversion'; conversion: Conversion };

const COMMENT_START = '<!--';
const COMMENT_END = '-->';

const INT_PATTERN = /^[+-]?\d+/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|^[+-]?(?:nan|inf)/i;

export function isScanFormat(expected: string): boolean {
  return /%\d*[dfsc]/.test(expected);
}

/** Returns the text between `<!--` and `-->`, or undefined when the reply carries no comment. */
export function extractPayload(reply: string): string | undefined {
  const start = reply.indexOf(COMMENT_START);
  if (start < 0) {
    return undefined;
  }
  const end = reply.indexOf(COMMENT_END, start + COMMENT_START.length);
  if (end < 0) {
    return undefined;
  }
  return reply.slice(start + COMMENT_START.length, end);
}

function tokenizeFormat(format: string): FormatToken[] {
  const tokens: FormatToken[] = [];
  let literal = '';
  const flush = () => {
    if (literal) {
      tokens.push({ kind: 'literal', text: literal });
      literal = '';
    }
  };

  for (let i = 0; i < format.length; i += 1) {
    const char = format[i];
    if (/\s/.test(char)) {
      flush();
      if (tokens[tokens.length - 1]?.kind !== 'space') {
        tokens.push({ kind: 'space' });
      }
      continue;
    }
    if (char !== '%') {
      literal += char;
      continue;
    }

    const match = /^%(\d*)([dfsc%])/.exec(format.slice(i));
    if (!match) {
      throw new ProtocolError(`Unsupported conversion in format "${format}".`);
    }
    i += match[0].length - 1;
    if (match[2] === '%') {
      literal += '%';
      continue;
    }
    flush();
    const width = match[1] ? Number(match[1]) : undefined;
    switch (match[2]) {
      case 'd':
        tokens.push({ kind: 'conversion', conversion: { kind: 'int' } });
        break;
      case 'f':
        tokens.push({ kind: 'conversion', conversion: { kind: 'float' } });
        break;
      case 'c':
        tokens.push({ kind: 'conversion', conversion: { kind: 'char' } });
        break;
      default:
        tokens.push({ kind: 'conversion', conversion: { kind: 'word', width } });
        break;
    }
  }
  flush();
  return tokens;
}

function skipSpaces(text: string, position: number): number {
  let next = position;
  while (next < text.length && /\s/.test(text[next])) {
    next += 1;
  }
  return next;
}

function readConversion(conversion: Conversion, text: string, position: number): { value: ScanValue; next: number } | undefined {
  switch (conversion.kind) {
    case 'char':
      return position < text.length ? { value: text[position], next: position + 1 } : undefined;
    case 'int': {
      const start = skipSpaces(text, position);
      const match = INT_PATTERN.exec(text.slice(start));
      return match ? { value: Number(match[0]), next: start + match[0].length } : undefined;
    }
    case 'float': {
      const start = skipSpaces(text, position);
      const match = FLOAT_PATTERN.exec(text.slice(start));
      if (!match) {
        return undefined;
      }
      const raw = match[0].toLowerCase();
      const value = raw.endsWith('nan') ? NaN : raw.endsWith('inf') ? (raw.startsWith('-') ? -Infinity : Infinity) : Number(raw);
      return { value, next: start + match[0].length };
    }
    case 'word': {
      const start = skipSpaces(text, position);
      let end = start;
      const limit = conversion.width ? start + conversion.width : text.length;
      while (end < text.length && end < limit && !/\s/.test(text[end])) {
        end += 1;
      }
      return end > start ? { value: text.slice(start, end), next: end } : undefined;
    }
    default: {
      const unreachable: never = conversion;
      return unreachable;
    }
  }
}

/**
 * Scans `text` against a scanf-like format (`%d`, `%f`, `%s`, `%4s`, `%c`).
 * Literal characters must match exactly; trailing text is ignored.
 */
export function scanFields(text: string, format: string): ScanValue[] {
  const values: ScanValue[] = [];
  let position = 0;

  for (const token of tokenizeFormat(format)) {
    if (token.kind === 'space') {
      position = skipSpaces(text, position);
      continue;
    }
    if (token.kind === 'literal') {
      if (!text.startsWith(token.text, position)) {
        throw new ProtocolError(`Expected "${token.text}" at offset ${position} of "${text}".`, text);
      }
      position += token.text.length;
      continue;
    }
    const read = readConversion(token.conversion, text, position);
    if (!read) {
      throw new ProtocolError(`Could not read field ${values.length + 1} of "${format}" from "${text}".`, text);
    }
    values.push(read.value);
    position = read.next;
  }

  return values;
}

export function unwrapFields(values: ScanValue[]): ScanReply {
  return values.length === 1 ? values[0] : values;
}

/** Scans the comment payload of a device reply. */
export function scanReply(reply: string, format: string): ScanReply {
  const payload = extractPayload(reply);
  if (payload === undefined) {
    throw new ProtocolError('Reply carries no <!-- --> payload.', reply);
  }
  return unwrapFields(scanFields(payload.trim(), format));
}

export function toFields(reply: ScanReply): ScanValue[] {
  return Array.isArray(reply) ? reply : [reply];
}

export function numberField(fields: ScanValue[], index: number, label: string): number {
  const value = fields[index];
  if (typeof value !== 'number') {
    throw new ProtocolError(`Field ${label} is missing or not numeric.`);
  }
  return value;
}

export function stringField(fields: ScanValue[], index: number, label: string): string {
  const value = fields[index];
  if (value === undefined) {
    throw new ProtocolError(`Field ${label} is missing.`);
  }
  return String(value);
}
