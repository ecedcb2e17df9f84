import { describe, expect, it } from 'vitest';
import { parseType, parseValue } from '../src/parser/index.js';
import { print } from '../src/printer.js';

describe('print', () => {
  it('prints scalar values', () => {
    expect(print(parseValue('-1.5e3'))).toBe('-1.5e3');
    expect(print(parseValue('"say \\"hi\\""'))).toBe('"say \\"hi\\""');
    expect(print(parseValue('false'))).toBe('false');
    expect(print(parseValue('SIT'))).toBe('SIT');
    expect(print(parseValue('$dogName'))).toBe('$dogName');
  });

  it('prints lists and objects', () => {
    expect(print(parseValue('[1,2 , 3]'))).toBe('[1, 2, 3]');
    expect(print(parseValue('{ name: "Fido", tags: [A] }'))).toBe('{name: "Fido", tags: [A]}');
  });

  it('prints type references', () => {
    expect(print(parseType('[ Int ! ] !'))).toBe('[Int!]!');
  });
});
