/**
 * A query document's text plus the name it is reported under.
 */
export class Source {
  readonly body: string;
  readonly name: string;

  constructor(body: string, name: string = 'GraphQL request') {
    this.body = body;
    this.name = name;
  }
}

/**
 * Line and column of a character offset, both 1-based
 */
export interface SourceLocation {
  line: number;
  column: number;
}

const LINE_REGEXP = /\r\n|[\n\r\u2028\u2029]/g;

/**
 * Resolve a character offset within a source to its line and column.
 */
export function getLocation(source: Source, position: number): SourceLocation {
  let line = 1;
  let column = position + 1;

  LINE_REGEXP.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = LINE_REGEXP.exec(source.body)) !== null && match.index < position) {
    line += 1;
    column = position + 1 - (match.index + match[0].length);
  }

  return { line, column };
}
