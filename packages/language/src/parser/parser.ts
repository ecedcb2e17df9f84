import { Lexer } from '../lexer/lexer.js';
import { getTokenKindDesc, TokenKind } from '../lexer/token-kinds.js';
import { getTokenDesc, type Token } from '../lexer/token.js';
import { Source } from '../source.js';
import {
  Kind,
  type ArgumentNode,
  type DefinitionNode,
  type DirectiveNode,
  type DocumentNode,
  type FieldNode,
  type FragmentDefinitionNode,
  type FragmentSpreadNode,
  type InlineFragmentNode,
  type ListTypeNode,
  type ListValueNode,
  type Location,
  type NamedTypeNode,
  type NameNode,
  type ObjectFieldNode,
  type ObjectValueNode,
  type OperationDefinitionNode,
  type OperationType,
  type SelectionNode,
  type SelectionSetNode,
  type TypeNode,
  type ValueNode,
  type VariableDefinitionNode,
  type VariableNode,
} from './ast.js';
import { ParserError } from './parser-error.js';

export interface ParseOptions {
  /** Leave `loc` off every node */
  noLocation?: boolean;
}

/**
 * Parse a query document
 *
 * @throws {LexerError} On a malformed token
 * @throws {ParserError} On a token that does not fit the grammar
 *
 * @example
 * ```ts
 * const document = parse('query Dog { dog { name } }');
 * document.definitions[0].kind; // => 'OperationDefinition'
 * ```
 */
export function parse(source: string | Source, options: ParseOptions = {}): DocumentNode {
  return new Parser(toSource(source), options).parseDocument();
}

/**
 * Parse a single value literal, e.g. `[1, 2]` or `{ a: $b }`
 */
export function parseValue(source: string | Source, options: ParseOptions = {}): ValueNode {
  const parser = new Parser(toSource(source), options);
  const value = parser.parseValueLiteral(false);
  parser.expectEnd();
  return value;
}

/**
 * Parse a type reference, e.g. `[String!]!`
 */
export function parseType(source: string | Source, options: ParseOptions = {}): TypeNode {
  const parser = new Parser(toSource(source), options);
  const type = parser.parseTypeReference();
  parser.expectEnd();
  return type;
}

function toSource(source: string | Source): Source {
  return typeof source === 'string' ? new Source(source) : source;
}

const OPERATION_KEYWORDS: ReadonlySet<string> = new Set(['query', 'mutation', 'subscription']);

/**
 * Recursive descent parser for executable documents
 *
 * Pulls one token at a time from the lexer; there is no lookahead beyond the
 * current token.
 */
export class Parser {
  private readonly source: Source;
  private readonly options: ParseOptions;
  private readonly lexer: Lexer;
  private token: Token;
  private prevEnd: number = 0;

  constructor(source: Source, options: ParseOptions = {}) {
    this.source = source;
    this.options = options;
    this.lexer = new Lexer(source);
    this.token = this.lexer.nextToken();
  }

  // Token navigation

  private advance(): void {
    this.prevEnd = this.token.end;
    this.token = this.lexer.nextToken();
  }

  private peek(kind: TokenKind): boolean {
    return this.token.kind === kind;
  }

  private peekKeyword(value: string): boolean {
    return this.token.kind === TokenKind.NAME && this.token.value === value;
  }

  private skip(kind: TokenKind): boolean {
    if (this.peek(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(kind: TokenKind): Token {
    const token = this.token;
    if (token.kind === kind) {
      this.advance();
      return token;
    }
    throw this.error(token.start, `Expected ${getTokenKindDesc(kind)}, found ${getTokenDesc(token)}`);
  }

  private expectKeyword(value: string): Token {
    const token = this.token;
    if (this.peekKeyword(value)) {
      this.advance();
      return token;
    }
    throw this.error(token.start, `Expected "${value}", found ${getTokenDesc(token)}`);
  }

  expectEnd(): void {
    this.expect(TokenKind.EOF);
  }

  private unexpected(token: Token = this.token): ParserError {
    return this.error(token.start, `Unexpected ${getTokenDesc(token)}`);
  }

  private error(position: number, description: string): ParserError {
    return new ParserError(this.source, position, description);
  }

  private loc(start: number): Location | undefined {
    if (this.options.noLocation) {
      return undefined;
    }
    return { start, end: this.prevEnd, source: this.source };
  }

  /** Zero or more nodes between `open` and `close` */
  private any<T>(open: TokenKind, parseFn: () => T, close: TokenKind): T[] {
    this.expect(open);
    const nodes: T[] = [];
    while (!this.skip(close)) {
      nodes.push(parseFn());
    }
    return nodes;
  }

  /** One or more nodes between `open` and `close` */
  private many<T>(open: TokenKind, parseFn: () => T, close: TokenKind): T[] {
    this.expect(open);
    const nodes: T[] = [parseFn()];
    while (!this.skip(close)) {
      nodes.push(parseFn());
    }
    return nodes;
  }

  // Document

  parseDocument(): DocumentNode {
    const start = this.token.start;
    const definitions: DefinitionNode[] = [];
    do {
      definitions.push(this.parseDefinition());
    } while (!this.skip(TokenKind.EOF));

    return { kind: Kind.DOCUMENT, definitions, loc: this.loc(start) };
  }

  private parseDefinition(): DefinitionNode {
    if (this.peek(TokenKind.BRACE_L)) {
      return this.parseOperationDefinition();
    }

    if (this.peek(TokenKind.NAME)) {
      if (this.token.value === 'fragment') {
        return this.parseFragmentDefinition();
      }
      if (this.token.value !== undefined && OPERATION_KEYWORDS.has(this.token.value)) {
        return this.parseOperationDefinition();
      }
    }

    throw this.unexpected();
  }

  // Operations

  private parseOperationDefinition(): OperationDefinitionNode {
    const start = this.token.start;

    if (this.peek(TokenKind.BRACE_L)) {
      return {
        kind: Kind.OPERATION_DEFINITION,
        operation: 'query',
        variableDefinitions: [],
        directives: [],
        selectionSet: this.parseSelectionSet(),
        loc: this.loc(start),
      };
    }

    const operation = this.parseOperationType();
    const name = this.peek(TokenKind.NAME) ? this.parseName() : undefined;

    return {
      kind: Kind.OPERATION_DEFINITION,
      operation,
      name,
      variableDefinitions: this.parseVariableDefinitions(),
      directives: this.parseDirectives(),
      selectionSet: this.parseSelectionSet(),
      loc: this.loc(start),
    };
  }

  private parseOperationType(): OperationType {
    const token = this.expect(TokenKind.NAME);
    switch (token.value) {
      case 'query':
        return 'query';
      case 'mutation':
        return 'mutation';
      case 'subscription':
        return 'subscription';
      default:
        throw this.unexpected(token);
    }
  }

  private parseVariableDefinitions(): VariableDefinitionNode[] {
    return this.peek(TokenKind.PAREN_L)
      ? this.many(TokenKind.PAREN_L, () => this.parseVariableDefinition(), TokenKind.PAREN_R)
      : [];
  }

  private parseVariableDefinition(): VariableDefinitionNode {
    const start = this.token.start;
    const variable = this.parseVariable();
    this.expect(TokenKind.COLON);
    const type = this.parseTypeReference();
    const defaultValue = this.skip(TokenKind.EQUALS) ? this.parseValueLiteral(true) : undefined;

    return {
      kind: Kind.VARIABLE_DEFINITION,
      variable,
      type,
      defaultValue,
      loc: this.loc(start),
    };
  }

  private parseVariable(): VariableNode {
    const start = this.token.start;
    this.expect(TokenKind.DOLLAR);
    return { kind: Kind.VARIABLE, name: this.parseName(), loc: this.loc(start) };
  }

  private parseSelectionSet(): SelectionSetNode {
    const start = this.token.start;
    return {
      kind: Kind.SELECTION_SET,
      selections: this.many(TokenKind.BRACE_L, () => this.parseSelection(), TokenKind.BRACE_R),
      loc: this.loc(start),
    };
  }

  private parseSelection(): SelectionNode {
    return this.peek(TokenKind.SPREAD) ? this.parseFragment() : this.parseField();
  }

  private parseField(): FieldNode {
    const start = this.token.start;
    const nameOrAlias = this.parseName();

    let alias: NameNode | undefined;
    let name: NameNode;
    if (this.skip(TokenKind.COLON)) {
      alias = nameOrAlias;
      name = this.parseName();
    } else {
      name = nameOrAlias;
    }

    return {
      kind: Kind.FIELD,
      alias,
      name,
      arguments: this.parseArguments(),
      directives: this.parseDirectives(),
      selectionSet: this.peek(TokenKind.BRACE_L) ? this.parseSelectionSet() : undefined,
      loc: this.loc(start),
    };
  }

  private parseArguments(): ArgumentNode[] {
    return this.peek(TokenKind.PAREN_L)
      ? this.many(TokenKind.PAREN_L, () => this.parseArgument(), TokenKind.PAREN_R)
      : [];
  }

  private parseArgument(): ArgumentNode {
    const start = this.token.start;
    const name = this.parseName();
    this.expect(TokenKind.COLON);
    const value = this.parseValueLiteral(false);

    return { kind: Kind.ARGUMENT, name, value, loc: this.loc(start) };
  }

  // Fragments

  private parseFragment(): FragmentSpreadNode | InlineFragmentNode {
    const start = this.token.start;
    this.expect(TokenKind.SPREAD);

    if (this.peekKeyword('on')) {
      this.advance();
      return {
        kind: Kind.INLINE_FRAGMENT,
        typeCondition: this.parseNamedType(),
        directives: this.parseDirectives(),
        selectionSet: this.parseSelectionSet(),
        loc: this.loc(start),
      };
    }

    return {
      kind: Kind.FRAGMENT_SPREAD,
      name: this.parseFragmentName(),
      directives: this.parseDirectives(),
      loc: this.loc(start),
    };
  }

  private parseFragmentDefinition(): FragmentDefinitionNode {
    const start = this.token.start;
    this.expectKeyword('fragment');
    const name = this.parseFragmentName();
    this.expectKeyword('on');

    return {
      kind: Kind.FRAGMENT_DEFINITION,
      name,
      typeCondition: this.parseNamedType(),
      directives: this.parseDirectives(),
      selectionSet: this.parseSelectionSet(),
      loc: this.loc(start),
    };
  }

  private parseFragmentName(): NameNode {
    if (this.peekKeyword('on')) {
      throw this.unexpected();
    }
    return this.parseName();
  }

  // Values

  /**
   * `isConst` forbids variables, as in variable default values.
   */
  parseValueLiteral(isConst: boolean): ValueNode {
    const token = this.token;

    switch (token.kind) {
      case TokenKind.BRACKET_L:
        return this.parseList(isConst);
      case TokenKind.BRACE_L:
        return this.parseObject(isConst);
      case TokenKind.INT:
        this.advance();
        return { kind: Kind.INT, value: token.value ?? '', loc: this.loc(token.start) };
      case TokenKind.FLOAT:
        this.advance();
        return { kind: Kind.FLOAT, value: token.value ?? '', loc: this.loc(token.start) };
      case TokenKind.STRING:
        this.advance();
        return { kind: Kind.STRING, value: token.value ?? '', loc: this.loc(token.start) };
      case TokenKind.NAME:
        this.advance();
        if (token.value === 'true' || token.value === 'false') {
          return { kind: Kind.BOOLEAN, value: token.value === 'true', loc: this.loc(token.start) };
        }
        return { kind: Kind.ENUM, value: token.value ?? '', loc: this.loc(token.start) };
      case TokenKind.DOLLAR:
        if (!isConst) {
          return this.parseVariable();
        }
        break;
    }

    throw this.unexpected();
  }

  private parseList(isConst: boolean): ListValueNode {
    const start = this.token.start;
    return {
      kind: Kind.LIST,
      values: this.any(TokenKind.BRACKET_L, () => this.parseValueLiteral(isConst), TokenKind.BRACKET_R),
      loc: this.loc(start),
    };
  }

  private parseObject(isConst: boolean): ObjectValueNode {
    const start = this.token.start;
    this.expect(TokenKind.BRACE_L);

    const fieldNames = new Set<string>();
    const fields: ObjectFieldNode[] = [];
    while (!this.skip(TokenKind.BRACE_R)) {
      fields.push(this.parseObjectField(isConst, fieldNames));
    }

    return { kind: Kind.OBJECT, fields, loc: this.loc(start) };
  }

  private parseObjectField(isConst: boolean, fieldNames: Set<string>): ObjectFieldNode {
    const start = this.token.start;
    const name = this.parseName();
    if (fieldNames.has(name.value)) {
      throw this.error(start, `Duplicate input object field ${name.value}.`);
    }
    fieldNames.add(name.value);

    this.expect(TokenKind.COLON);
    const value = this.parseValueLiteral(isConst);

    return { kind: Kind.OBJECT_FIELD, name, value, loc: this.loc(start) };
  }

  // Directives

  private parseDirectives(): DirectiveNode[] {
    const directives: DirectiveNode[] = [];
    while (this.peek(TokenKind.AT)) {
      directives.push(this.parseDirective());
    }
    return directives;
  }

  private parseDirective(): DirectiveNode {
    const start = this.token.start;
    this.expect(TokenKind.AT);

    return {
      kind: Kind.DIRECTIVE,
      name: this.parseName(),
      arguments: this.parseArguments(),
      loc: this.loc(start),
    };
  }

  // Types

  /**
   * Type : NamedType | ListType | NonNullType
   */
  parseTypeReference(): TypeNode {
    const start = this.token.start;

    let type: NamedTypeNode | ListTypeNode;
    if (this.skip(TokenKind.BRACKET_L)) {
      const inner = this.parseTypeReference();
      this.expect(TokenKind.BRACKET_R);
      type = { kind: Kind.LIST_TYPE, type: inner, loc: this.loc(start) };
    } else {
      type = this.parseNamedType();
    }

    if (this.skip(TokenKind.BANG)) {
      return { kind: Kind.NON_NULL_TYPE, type, loc: this.loc(start) };
    }
    return type;
  }

  private parseNamedType(): NamedTypeNode {
    const start = this.token.start;
    return { kind: Kind.NAMED_TYPE, name: this.parseName(), loc: this.loc(start) };
  }

  private parseName(): NameNode {
    const token = this.expect(TokenKind.NAME);
    return { kind: Kind.NAME, value: token.value ?? '', loc: this.loc(token.start) };
  }
}
