import { describe, expect, it } from 'vitest';
import { getLocation, Source } from '../src/source.js';

describe('Source', () => {
  it('defaults the name', () => {
    expect(new Source('{ a }').name).toBe('GraphQL request');
  });

  it('resolves offsets on the first line', () => {
    expect(getLocation(new Source('query { a }'), 6)).toEqual({ line: 1, column: 7 });
  });

  it('counts every kind of line break once', () => {
    const source = new Source('a\r\nb\nc\rd\u2028e');
    expect(getLocation(source, 3)).toEqual({ line: 2, column: 1 });
    expect(getLocation(source, 5)).toEqual({ line: 3, column: 1 });
    expect(getLocation(source, 7)).toEqual({ line: 4, column: 1 });
    expect(getLocation(source, 9)).toEqual({ line: 5, column: 1 });
  });

  it('places the line break itself on the line it ends', () => {
    expect(getLocation(new Source('ab\ncd'), 2)).toEqual({ line: 1, column: 3 });
  });
});
