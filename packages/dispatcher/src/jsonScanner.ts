export class JsonSyntaxError extends SyntaxError {
  public readonly offset: number;

  public constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'JsonSyntaxError';
    this.offset = offset;
  }
}

type Container = 'object' | 'array';

type Expectation = 'value' | 'value_or_array_end' | 'key_or_object_end' | 'key' | 'colon' | 'after_value' | 'done';

type NumberState = 'sign' | 'zero' | 'integer' | 'dot' | 'fraction' | 'exponent' | 'exponent_sign' | 'exponent_digits';

type Token =
  | {kind: 'none'}
  | {kind: 'string'; escape: 'none' | 'backslash' | 'unicode'; hexDigits: number}
  | {kind: 'number'; state: NumberState}
  | {kind: 'literal'; remaining: string};

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);
const SIMPLE_ESCAPES = new Set(['"', '\\', '/', 'b', 'f', 'n', 'r', 't']);
const HEX_DIGIT = /^[0-9a-fA-F]$/u;
const DIGIT = /^[0-9]$/u;
const LITERALS: Readonly<Record<string, string>> = {t: 'rue', f: 'alse', n: 'ull'};

const NUMBER_CAN_END: ReadonlySet<NumberState> = new Set(['zero', 'integer', 'fraction', 'exponent_digits']);

/**
 * Incremental JSON syntax checker. Text is fed in pieces as it is decoded; a syntax error is raised by the
 * `feed` call that contains the offending character rather than after the whole document arrived.
 */
export class JsonScanner {
  private readonly stack: Container[] = [];
  private expectation: Expectation = 'value';
  private token: Token = {kind: 'none'};
  private offset = 0;

  public feed(text: string) {
    for (const character of text) {
      this.step(character);
      this.offset += character.length;
    }
  }

  /** Checks the document is complete. */
  public end() {
    if (this.token.kind === 'number') {
      this.finishNumber();
    }

    if (this.token.kind !== 'none' || this.expectation !== 'done') {
      throw new JsonSyntaxError('Unexpected end of JSON input', this.offset);
    }
  }

  private step(character: string) {
    switch (this.token.kind) {
      case 'string':
        this.stepString(character, this.token);
        return;
      case 'literal':
        this.stepLiteral(character, this.token.remaining);
        return;
      case 'number':
        if (this.stepNumber(character, this.token.state)) {
          return;
        }
        this.finishNumber();
        break;
      case 'none':
        break;
    }

    this.stepStructure(character);
  }

  private stepStructure(character: string) {
    if (WHITESPACE.has(character)) {
      return;
    }

    switch (this.expectation) {
      case 'value':
      case 'value_or_array_end':
        if (character === ']' && this.expectation === 'value_or_array_end') {
          this.closeContainer();
          return;
        }
        this.startValue(character);
        return;
      case 'key_or_object_end':
      case 'key':
        if (character === '}' && this.expectation === 'key_or_object_end') {
          this.closeContainer();
          return;
        }
        if (character !== '"') {
          throw this.unexpected(character);
        }
        this.token = {kind: 'string', escape: 'none', hexDigits: 0};
        this.expectation = 'colon';
        return;
      case 'colon':
        if (character !== ':') {
          throw this.unexpected(character);
        }
        this.expectation = 'value';
        return;
      case 'after_value':
        this.stepAfterValue(character);
        return;
      case 'done':
        throw this.unexpected(character);
    }
  }

  private stepAfterValue(character: string) {
    const container = this.stack[this.stack.length - 1];
    if (character === ',') {
      this.expectation = container === 'object' ? 'key' : 'value';
      return;
    }

    if (character === '}' && container === 'object') {
      this.closeContainer();
      return;
    }

    if (character === ']' && container === 'array') {
      this.closeContainer();
      return;
    }

    throw this.unexpected(character);
  }

  private startValue(character: string) {
    if (character === '{') {
      this.stack.push('object');
      this.expectation = 'key_or_object_end';
      return;
    }

    if (character === '[') {
      this.stack.push('array');
      this.expectation = 'value_or_array_end';
      return;
    }

    if (character === '"') {
      this.token = {kind: 'string', escape: 'none', hexDigits: 0};
      return;
    }

    if (character === '-') {
      this.token = {kind: 'number', state: 'sign'};
      return;
    }

    if (DIGIT.test(character)) {
      this.token = {kind: 'number', state: character === '0' ? 'zero' : 'integer'};
      return;
    }

    const literal = LITERALS[character];
    if (literal !== undefined) {
      this.token = {kind: 'literal', remaining: literal};
      return;
    }

    throw this.unexpected(character);
  }

  private stepString(character: string, token: Extract<Token, {kind: 'string'}>) {
    switch (token.escape) {
      case 'backslash':
        if (character === 'u') {
          this.token = {kind: 'string', escape: 'unicode', hexDigits: 0};
          return;
        }
        if (!SIMPLE_ESCAPES.has(character)) {
          throw new JsonSyntaxError(`Invalid escape '\\${character}'`, this.offset);
        }
        this.token = {kind: 'string', escape: 'none', hexDigits: 0};
        return;
      case 'unicode':
        if (!HEX_DIGIT.test(character)) {
          throw new JsonSyntaxError('Invalid unicode escape', this.offset);
        }
        this.token =
          token.hexDigits === 3
            ? {kind: 'string', escape: 'none', hexDigits: 0}
            : {kind: 'string', escape: 'unicode', hexDigits: token.hexDigits + 1};
        return;
      case 'none':
        if (character === '"') {
          this.token = {kind: 'none'};
          // Object keys leave the expectation at 'colon'.
          if (this.expectation !== 'colon') {
            this.completeValue();
          }
          return;
        }
        if (character === '\\') {
          this.token = {kind: 'string', escape: 'backslash', hexDigits: 0};
          return;
        }
        if (character.charCodeAt(0) < 0x20) {
          throw new JsonSyntaxError('Unescaped control character in string', this.offset);
        }
        return;
    }
  }

  private stepLiteral(character: string, remaining: string) {
    if (character !== remaining[0]) {
      throw this.unexpected(character);
    }

    const rest = remaining.slice(1);
    if (rest.length > 0) {
      this.token = {kind: 'literal', remaining: rest};
      return;
    }

    this.token = {kind: 'none'};
    this.completeValue();
  }

  /** Returns false when the character does not continue the number. */
  private stepNumber(character: string, state: NumberState): boolean {
    const isDigit = DIGIT.test(character);
    const next = ((): NumberState | undefined => {
      switch (state) {
        case 'sign':
          return isDigit ? (character === '0' ? 'zero' : 'integer') : undefined;
        case 'zero':
        case 'integer':
          if (character === '.') {
            return 'dot';
          }
          if (character === 'e' || character === 'E') {
            return 'exponent';
          }
          return isDigit && state === 'integer' ? 'integer' : undefined;
        case 'dot':
          return isDigit ? 'fraction' : undefined;
        case 'fraction':
          if (character === 'e' || character === 'E') {
            return 'exponent';
          }
          return isDigit ? 'fraction' : undefined;
        case 'exponent':
          if (character === '+' || character === '-') {
            return 'exponent_sign';
          }
          return isDigit ? 'exponent_digits' : undefined;
        case 'exponent_sign':
        case 'exponent_digits':
          return isDigit ? 'exponent_digits' : undefined;
      }
    })();

    if (next === undefined) {
      if (state === 'zero' && isDigit) {
        throw new JsonSyntaxError('Leading zero in number', this.offset);
      }
      return false;
    }

    this.token = {kind: 'number', state: next};
    return true;
  }

  private finishNumber() {
    if (this.token.kind !== 'number') {
      return;
    }

    if (!NUMBER_CAN_END.has(this.token.state)) {
      throw new JsonSyntaxError('Incomplete number', this.offset);
    }

    this.token = {kind: 'none'};
    this.completeValue();
  }

  private closeContainer() {
    this.stack.pop();
    this.completeValue();
  }

  private completeValue() {
    this.expectation = this.stack.length === 0 ? 'done' : 'after_value';
  }

  private unexpected(character: string) {
    return new JsonSyntaxError(`Unexpected character '${character}'`, this.offset);
  }
}
