import type { PageCursor } from '../types/index.js';

export interface LinkValue {
  url: string;
  params: Record<string, string>;
}

/**
 * Parses a `Link` header such as
 * `<https://api.github.com/x?page=2>; rel="next", <https://api.github.com/x?page=5>; rel="last"`.
 *
 * Returns `null` when the value does not follow the grammar; an empty or
 * missing header parses to no links.
 */
export function parseLinkHeader(value: string | null | undefined): LinkValue[] | null {
  if (value === null || value === undefined || value.trim() === '') {
    return [];
  }
  return new LinkHeaderParser(value).parse();
}

export function nextPageUrl(value: string | null | undefined): PageCursor {
  const links = parseLinkHeader(value);
  if (!links) {
    return undefined;
  }

  const next = links.find((link) => relations(link).includes('next'));
  return next?.url;
}

function relations(link: LinkValue): string[] {
  const rel = link.params.rel;
  return rel ? rel.toLowerCase().split(' ').filter(Boolean) : [];
}

class LinkHeaderParser {
  private position = 0;

  constructor(private readonly input: string) {}

  parse(): LinkValue[] | null {
    const links: LinkValue[] = [];

    for (;;) {
      this.skipWhitespace();
      const link = this.parseLink();
      if (!link) {
        return null;
      }
      links.push(link);

      this.skipWhitespace();
      if (this.atEnd()) {
        return links;
      }
      if (!this.consume(',')) {
        return null;
      }
    }
  }

  private parseLink(): LinkValue | null {
    if (!this.consume('<')) {
      return null;
    }
    const end = this.input.indexOf('>', this.position);
    if (end < 0) {
      return null;
    }
    const url = this.input.slice(this.position, end).trim();
    this.position = end + 1;
    if (url.length === 0) {
      return null;
    }

    const params: Record<string, string> = {};
    for (;;) {
      this.skipWhitespace();
      if (!this.consume(';')) {
        return { url, params };
      }

      this.skipWhitespace();
      const name = this.readToken();
      if (!name) {
        return null;
      }

      this.skipWhitespace();
      if (!this.consume('=')) {
        params[name.toLowerCase()] ??= '';
        continue;
      }

      this.skipWhitespace();
      const paramValue = this.peek() === '"' ? this.readQuoted() : this.readToken();
      if (paramValue === null) {
        return null;
      }
      // First occurrence of a parameter wins.
      params[name.toLowerCase()] ??= paramValue;
    }
  }

  private readToken(): string | null {
    const start = this.position;
    while (!this.atEnd() && !isDelimiter(this.input.charAt(this.position))) {
      this.position += 1;
    }
    return this.position > start ? this.input.slice(start, this.position) : null;
  }

  private readQuoted(): string | null {
    this.position += 1;
    let result = '';
    while (!this.atEnd()) {
      const char = this.input.charAt(this.position);
      this.position += 1;
      if (char === '"') {
        return result;
      }
      if (char === '\\') {
        if (this.atEnd()) {
          return null;
        }
        result += this.input.charAt(this.position);
        this.position += 1;
        continue;
      }
      result += char;
    }
    return null;
  }

  private skipWhitespace(): void {
    while (!this.atEnd() && isWhitespace(this.input.charAt(this.position))) {
      this.position += 1;
    }
  }

  private consume(char: string): boolean {
    if (this.peek() === char) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private peek(): string {
    return this.input.charAt(this.position);
  }

  private atEnd(): boolean {
    return this.position >= this.input.length;
  }
}

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t';
}

function isDelimiter(char: string): boolean {
  return isWhitespace(char) || char === ';' || char === ',' || char === '=' || char === '"' || char === '<' || char === '>';
}
