/**
 * Traefik router rules
 *
 * Rules are carried as the original text and only parsed to make sure they are well-formed,
 * see https://doc.traefik.io/traefik/routing/routers/#rule
 */

import { Failure, Success, type Result } from '../../domain/types/result';
import { InvariantViolationError, ValidationError } from '../../errors';

export const MATCHERS = [
  'Host',
  'HostRegexp',
  'Path',
  'PathPrefix',
  'PathRegexp',
  'Method',
  'Headers',
  'HeadersRegexp',
  'Query',
  'ClientIP',
] as const;

export type MatcherName = (typeof MATCHERS)[number];

export type RuleExpression =
  | { type: 'matcher'; name: MatcherName; args: string[] }
  | { type: 'and' | 'or'; left: RuleExpression; right: RuleExpression }
  | { type: 'not'; expression: RuleExpression };

type Token =
  | { kind: 'open' | 'close' | 'comma' | 'and' | 'or' | 'not'; position: number }
  | { kind: 'identifier' | 'string'; value: string; position: number };

const isMatcherName = (name: string): name is MatcherName =>
  (MATCHERS as readonly string[]).includes(name);

function tokenize(text: string): Result<Token[]> {
  const tokens: Token[] = [];
  let position = 0;

  while (position < text.length) {
    const char = text.charAt(position);

    if (/\s/.test(char)) {
      position++;
      continue;
    }

    if (char === '(' || char === ')' || char === ',' || char === '!') {
      const kind = char === '(' ? 'open' : char === ')' ? 'close' : char === ',' ? 'comma' : 'not';
      tokens.push({ kind, position });
      position++;
      continue;
    }

    if (text.startsWith('&&', position) || text.startsWith('||', position)) {
      tokens.push({ kind: char === '&' ? 'and' : 'or', position });
      position += 2;
      continue;
    }

    if (char === '`' || char === '"') {
      const end = text.indexOf(char, position + 1);
      if (end < 0) {
        return Failure(`Unterminated string starting at ${position}`);
      }
      tokens.push({ kind: 'string', value: text.slice(position + 1, end), position });
      position = end + 1;
      continue;
    }

    const identifier = /^[A-Za-z]+/.exec(text.slice(position));
    if (identifier) {
      tokens.push({ kind: 'identifier', value: identifier[0], position });
      position += identifier[0].length;
      continue;
    }

    return Failure(`Unexpected character "${char}" at ${position}`);
  }

  return Success(tokens);
}

class RuleParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Result<RuleExpression> {
    const expression = this.parseOr();
    if (!expression.ok) {
      return expression;
    }

    const rest = this.tokens[this.index];
    if (rest) {
      return Failure(`Unexpected token at ${rest.position}`);
    }
    return expression;
  }

  private parseOr(): Result<RuleExpression> {
    let left = this.parseAnd();
    while (left.ok && this.peek()?.kind === 'or') {
      this.index++;
      const right = this.parseAnd();
      if (!right.ok) {
        return right;
      }
      left = Success<RuleExpression>({ type: 'or', left: left.value, right: right.value });
    }
    return left;
  }

  private parseAnd(): Result<RuleExpression> {
    let left = this.parseUnary();
    while (left.ok && this.peek()?.kind === 'and') {
      this.index++;
      const right = this.parseUnary();
      if (!right.ok) {
        return right;
      }
      left = Success<RuleExpression>({ type: 'and', left: left.value, right: right.value });
    }
    return left;
  }

  private parseUnary(): Result<RuleExpression> {
    const token = this.next();
    if (!token) {
      return Failure('Unexpected end of rule');
    }

    switch (token.kind) {
      case 'not': {
        const expression = this.parseUnary();
        return expression.ok ? Success<RuleExpression>({ type: 'not', expression: expression.value }) : expression;
      }
      case 'open': {
        const expression = this.parseOr();
        if (!expression.ok) {
          return expression;
        }
        if (this.next()?.kind !== 'close') {
          return Failure(`Missing ")" for group opened at ${token.position}`);
        }
        return expression;
      }
      case 'identifier':
        return this.parseMatcher(token.value, token.position);
      default:
        return Failure(`Unexpected token at ${token.position}`);
    }
  }

  private parseMatcher(name: string, position: number): Result<RuleExpression> {
    if (!isMatcherName(name)) {
      return Failure(`Unknown matcher "${name}" at ${position}`);
    }
    if (this.next()?.kind !== 'open') {
      return Failure(`Expected "(" after ${name}`);
    }

    const args: string[] = [];
    for (;;) {
      const token = this.next();
      if (token?.kind !== 'string') {
        return Failure(`Expected a quoted argument for ${name}`);
      }
      args.push(token.value);

      const separator = this.next();
      if (separator?.kind === 'close') {
        break;
      }
      if (separator?.kind !== 'comma') {
        return Failure(`Expected "," or ")" in arguments of ${name}`);
      }
    }

    return Success<RuleExpression>({ type: 'matcher', name, args });
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.index];
    this.index++;
    return token;
  }
}

export class TraefikRouterRule {
  private constructor(
    private readonly text: string,
    readonly expression: RuleExpression,
  ) {}

  static parse(text: string): Result<TraefikRouterRule, ValidationError> {
    const tokens = tokenize(text);
    const expression = tokens.ok ? new RuleParser(tokens.value).parse() : tokens;

    if (!expression.ok) {
      return Failure(
        new ValidationError(`Invalid router rule "${text}": ${expression.error}`, 'rule', text),
      );
    }
    return Success(new TraefikRouterRule(text.trim(), expression.value));
  }

  /**
   * ``PathPrefix(`/seg1/seg2/`)`` built from path segments
   */
  static pathPrefixRule(segments: readonly string[]): TraefikRouterRule {
    return TraefikRouterRule.fromTrustedText(`PathPrefix(\`/${segments.map((s) => `${s}/`).join('')}\`)`);
  }

  static hostRule(hosts: readonly string[]): TraefikRouterRule {
    return TraefikRouterRule.fromTrustedText(`Host(${hosts.map((host) => `\`${host}\``).join(', ')})`);
  }

  private static fromTrustedText(text: string): TraefikRouterRule {
    const rule = TraefikRouterRule.parse(text);
    if (!rule.ok) {
      throw new InvariantViolationError(rule.error.message, 'generated-router-rule', { text });
    }
    return rule.value;
  }

  /**
   * Both rules must match. Disjunctions are wrapped in parentheses to keep precedence.
   */
  and(other: TraefikRouterRule): TraefikRouterRule {
    const wrap = (rule: TraefikRouterRule): string =>
      rule.expression.type === 'or' ? `(${rule.text})` : rule.text;

    return new TraefikRouterRule(`${wrap(this)} && ${wrap(other)}`, {
      type: 'and',
      left: this.expression,
      right: other.expression,
    });
  }

  /**
   * All matchers of the rule, left to right, including negated ones
   */
  matchers(): Array<{ name: MatcherName; args: string[] }> {
    const collect = (expression: RuleExpression): Array<{ name: MatcherName; args: string[] }> => {
      switch (expression.type) {
        case 'matcher':
          return [{ name: expression.name, args: expression.args }];
        case 'not':
          return collect(expression.expression);
        default:
          return [...collect(expression.left), ...collect(expression.right)];
      }
    };
    return collect(this.expression);
  }

  /**
   * Matchers outside of any negation; `!Host(...)` excludes a host rather than naming one
   */
  private affirmedMatchers(): Array<{ name: MatcherName; args: string[] }> {
    const collect = (expression: RuleExpression): Array<{ name: MatcherName; args: string[] }> => {
      switch (expression.type) {
        case 'matcher':
          return [{ name: expression.name, args: expression.args }];
        case 'not':
          return [];
        default:
          return [...collect(expression.left), ...collect(expression.right)];
      }
    };
    return collect(this.expression);
  }

  pathPrefixes(): string[] {
    return this.affirmedMatchers()
      .filter((matcher) => matcher.name === 'PathPrefix')
      .flatMap((matcher) => matcher.args);
  }

  hosts(): string[] {
    return this.affirmedMatchers()
      .filter((matcher) => matcher.name === 'Host')
      .flatMap((matcher) => matcher.args);
  }

  equals(other: TraefikRouterRule): boolean {
    return this.text === other.text;
  }

  toString(): string {
    return this.text;
  }
}
