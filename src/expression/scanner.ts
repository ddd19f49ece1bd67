import { TokenType, Token, Operator, LexError } from './types.js';

const SINGLE_CHAR_OPERATORS: Readonly<Record<string, Operator>> = {
  '^': Operator.AND,
  v: Operator.OR,
  '~': Operator.NOT,
  '(': Operator.LPAREN,
  ')': Operator.RPAREN,
};

/**
 * Scanner (lexer) for propositional statements.
 *
 * Iterating a scanner makes one left-to-right pass over the source and
 * yields tokens on demand. Malformed input throws a LexError when the
 * scanner reaches it; tokens before it have already been yielded.
 * Every iteration starts a fresh pass.
 */
export class Scanner implements Iterable<Token> {
  private readonly source: string;

  constructor(source: string) {
    this.source = source;
  }

  *[Symbol.iterator](): Iterator<Token> {
    const source = this.source;
    let position = 0;

    while (position < source.length) {
      const char = source[position];

      if (/\s/.test(char)) {
        position++;
        continue;
      }

      const single = SINGLE_CHAR_OPERATORS[char];
      if (single !== undefined) {
        yield { type: TokenType.OPERATOR, operator: single, position };
        position++;
        continue;
      }

      switch (char) {
        case '<':
          if (source[position + 1] !== '=' || source[position + 2] !== '>') {
            throw new LexError('Expected "<=>"', 'IncompleteOperator', position, source);
          }
          yield { type: TokenType.OPERATOR, operator: Operator.EQUIVALENCE, position };
          position += 3;
          continue;

        case '=':
          if (source[position + 1] !== '>') {
            throw new LexError('Expected "=>"', 'IncompleteOperator', position, source);
          }
          yield { type: TokenType.OPERATOR, operator: Operator.IMPLICATION, position };
          position += 2;
          continue;

        case ':':
          if (source[position + 1] === '=') {
            yield { type: TokenType.OPERATOR, operator: Operator.ASSIGN, position };
            position += 2;
          } else {
            // a lone colon carries no meaning
            position++;
          }
          continue;

        case '0':
        case '1':
          yield { type: TokenType.LITERAL, value: char === '1', position };
          position++;
          continue;
      }

      if (/[A-Za-z]/.test(char)) {
        yield { type: TokenType.VARIABLE, name: char, position };
        position++;
        continue;
      }

      // report the whole character, not half of a surrogate pair
      const codePoint = source.codePointAt(position);
      const unexpected = codePoint === undefined ? char : String.fromCodePoint(codePoint);
      throw new LexError(
        `Unexpected character "${unexpected}"`,
        'UnexpectedCharacter',
        position,
        source
      );
    }
  }

  /**
   * Run a full pass and collect every token
   */
  getTokens(): Token[] {
    return [...this];
  }
}

/**
 * Tokenize a source string eagerly.
 *
 * @throws LexError on the first malformed token
 */
export function tokenize(source: string): Token[] {
  return new Scanner(source).getTokens();
}
