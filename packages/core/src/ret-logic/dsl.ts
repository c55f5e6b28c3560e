/**
 * Requirement DSL
 *
 * Infix text form of requirement trees:
 *
 *   age_ok && (region_eu || region_uk) && !flagged
 *   at_least(2, lint, tests, review)
 *
 * `and`, `or` and `not` are accepted as words, so conditions with those
 * names cannot be referenced. `all`/`and`, `any`/`or` and
 * `at_least`/`require_group` are accepted as functions; `not(x)` is the
 * prefix operator applied to a parenthesized operand.
 */

import { DslError } from '../errors/index.ts';
import type { RequirementExpr, RequirementNode } from './requirement.ts';

export const MAX_DSL_INPUT_BYTES = 16 * 1024;
export const MAX_DSL_NESTING = 32;

export interface DslLimits {
  maxBytes?: number;
  maxNesting?: number;
}

// =============================================================================
// Lexer
// =============================================================================

type TokenKind = 'and' | 'or' | 'not' | 'lparen' | 'rparen' | 'comma' | 'ident' | 'number' | 'eof';

interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

const WORD_START = /[A-Za-z0-9_]/;
const WORD_PART = /[A-Za-z0-9_.:-]/;
const DIGITS = /^[0-9]+$/;

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['and', 'and'],
  ['or', 'or'],
  ['not', 'not'],
]);

function lex(input: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  while (offset < input.length) {
    const ch = input.charAt(offset);
    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      offset++;
      continue;
    }

    const single: TokenKind | undefined =
      ch === '(' ? 'lparen' : ch === ')' ? 'rparen' : ch === ',' ? 'comma' : ch === '!' ? 'not' : undefined;
    if (single !== undefined) {
      tokens.push({ kind: single, text: ch, position: offset });
      offset++;
      continue;
    }

    if (ch === '&' || ch === '|') {
      if (input.charAt(offset + 1) !== ch) {
        throw new DslError('unexpected_token', `Expected ${ch}${ch} at position ${offset}, found ${ch}`, offset);
      }
      tokens.push({ kind: ch === '&' ? 'and' : 'or', text: `${ch}${ch}`, position: offset });
      offset += 2;
      continue;
    }

    if (WORD_START.test(ch)) {
      const start = offset;
      while (offset < input.length && WORD_PART.test(input.charAt(offset))) {
        offset++;
      }
      const text = input.slice(start, offset);
      const kind = KEYWORDS.get(text) ?? (DIGITS.test(text) ? 'number' : 'ident');
      tokens.push({ kind, text, position: start });
      continue;
    }

    throw new DslError(
      'unexpected_token',
      `Unexpected character ${JSON.stringify(ch)} at position ${offset}`,
      offset
    );
  }

  if (tokens.length === 0) {
    throw new DslError('empty_input', 'Requirement expression is empty', 0);
  }
  tokens.push({ kind: 'eof', text: 'end of input', position: offset });
  return tokens;
}

// =============================================================================
// Parser
// =============================================================================

const FUNCTION_KINDS = new Map<string, 'and' | 'or' | 'at_least'>([
  ['all', 'and'],
  ['and', 'and'],
  ['any', 'or'],
  ['or', 'or'],
  ['at_least', 'at_least'],
  ['require_group', 'at_least'],
]);

class RequirementParser {
  private index = 0;
  private nesting = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly known: ReadonlySet<string> | undefined,
    private readonly maxNesting: number
  ) {}

  parse(): RequirementExpr {
    const expr = this.parseOr();
    const trailing = this.current();
    if (trailing.kind !== 'eof') {
      throw new DslError(
        'trailing_input',
        `Unexpected ${trailing.text} at position ${trailing.position} after complete expression`,
        trailing.position
      );
    }
    return expr;
  }

  private parseOr(): RequirementExpr {
    const first = this.parseAnd();
    const children = [first];
    while (this.current().kind === 'or') {
      this.advance();
      children.push(this.parseAnd());
    }
    return children.length === 1 ? first : { kind: 'or', children };
  }

  private parseAnd(): RequirementExpr {
    const first = this.parseUnary();
    const children = [first];
    while (this.current().kind === 'and') {
      this.advance();
      children.push(this.parseUnary());
    }
    return children.length === 1 ? first : { kind: 'and', children };
  }

  private parseUnary(): RequirementExpr {
    const token = this.current();
    if (token.kind === 'not') {
      this.advance();
      return this.nested(token.position, () => ({ kind: 'not', child: this.parseUnary() }));
    }
    return this.parsePrimary();
  }

  private parsePrimary(): RequirementExpr {
    const token = this.current();

    if (this.isCall()) {
      this.advance();
      this.advance();
      return this.nested(token.position, () => this.parseCall(token));
    }

    switch (token.kind) {
      case 'ident':
      case 'number':
        this.advance();
        if (this.known !== undefined && !this.known.has(token.text)) {
          throw new DslError(
            'unknown_condition',
            `Unknown condition ${JSON.stringify(token.text)} at position ${token.position}`,
            token.position
          );
        }
        return { kind: 'leaf', conditionId: token.text };
      case 'lparen':
        this.advance();
        return this.nested(token.position, () => {
          const expr = this.parseOr();
          this.expect('rparen', ')');
          return expr;
        });
      default:
        throw this.unexpected(token, 'condition or expression');
    }
  }

  /** Current token is a name immediately followed by `(` */
  private isCall(): boolean {
    const token = this.current();
    const next = this.tokens[this.index + 1];
    const named = token.kind === 'ident' || ((token.kind === 'and' || token.kind === 'or') && /^[a-z]+$/.test(token.text));
    return named && next !== undefined && next.kind === 'lparen';
  }

  private parseCall(name: Token): RequirementExpr {
    const kind = FUNCTION_KINDS.get(name.text);
    if (kind === undefined) {
      throw new DslError(
        'unknown_function',
        `Unknown function ${JSON.stringify(name.text)} at position ${name.position}`,
        name.position
      );
    }

    if (kind === 'at_least') {
      const min = this.parseThreshold();
      this.expect('comma', ',');
      return { kind: 'at_least', min, children: this.parseArguments() };
    }

    const children = this.parseArguments();
    return kind === 'and' ? { kind: 'and', children } : { kind: 'or', children };
  }

  private parseThreshold(): number {
    const token = this.current();
    if (token.kind !== 'number') {
      throw this.unexpected(token, 'numeric threshold');
    }
    const value = Number.parseInt(token.text, 10);
    if (!Number.isSafeInteger(value)) {
      throw new DslError('invalid_number', `Invalid threshold ${token.text} at position ${token.position}`, token.position);
    }
    this.advance();
    return value;
  }

  private parseArguments(): RequirementExpr[] {
    const args = [this.parseOr()];
    while (this.current().kind === 'comma') {
      this.advance();
      args.push(this.parseOr());
    }
    this.expect('rparen', ')');
    return args;
  }

  private nested(position: number, parse: () => RequirementExpr): RequirementExpr {
    if (this.nesting + 1 > this.maxNesting) {
      throw new DslError(
        'nesting_too_deep',
        `Nesting deeper than ${this.maxNesting} at position ${position}`,
        position
      );
    }
    this.nesting++;
    try {
      return parse();
    } finally {
      this.nesting--;
    }
  }

  private expect(kind: TokenKind, label: string): void {
    const token = this.current();
    if (token.kind !== kind) {
      throw this.unexpected(token, label);
    }
    this.advance();
  }

  private unexpected(token: Token, expected: string): DslError {
    return new DslError(
      'unexpected_token',
      `Expected ${expected} at position ${token.position}, found ${token.text}`,
      token.position
    );
  }

  private current(): Token {
    const token = this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) {
      throw new DslError('empty_input', 'Requirement expression is empty', 0);
    }
    return token;
  }

  private advance(): void {
    if (this.index < this.tokens.length - 1) this.index++;
  }
}

/**
 * Parse requirement DSL text into an unvalidated expression. When
 * `knownConditions` is given, references to other ids are rejected.
 */
export function parseRequirement(
  input: string,
  knownConditions?: ReadonlySet<string>,
  limits: DslLimits = {}
): RequirementExpr {
  const maxBytes = limits.maxBytes ?? MAX_DSL_INPUT_BYTES;
  const size = Buffer.byteLength(input, 'utf8');
  if (size > maxBytes) {
    throw new DslError('input_too_large', `Requirement expression is ${size} bytes, limit is ${maxBytes}`, maxBytes);
  }
  const tokens = lex(input);
  return new RequirementParser(tokens, knownConditions, limits.maxNesting ?? MAX_DSL_NESTING).parse();
}

// =============================================================================
// Formatter
// =============================================================================

/**
 * Canonical DSL text for a tree. Groups use function form so the output
 * needs no precedence rules and parses back to an equal tree.
 */
export function formatRequirement(node: RequirementNode | RequirementExpr): string {
  switch (node.kind) {
    case 'leaf':
      return node.conditionId;
    case 'not':
      return `!${formatRequirement(node.child)}`;
    case 'and':
      return `all(${formatList(node.children)})`;
    case 'or':
      return `any(${formatList(node.children)})`;
    case 'at_least':
      return `at_least(${node.min}, ${formatList(node.children)})`;
  }
}

function formatList(children: readonly (RequirementNode | RequirementExpr)[]): string {
  return children.map((child) => formatRequirement(child)).join(', ');
}
