import { Tool, ToolArguments, ToolContext, ToolParameters, ToolResult, stringArg } from './base';

type Token = { kind: 'number'; value: number } | { kind: 'op'; value: string };

const ALLOWED = /^[0-9+\-*/().%\s]+$/;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < expression.length) {
    const ch = expression[i];
    if (/\s/.test(ch)) {
      i++;
    } else if (/[0-9.]/.test(ch)) {
      let j = i;
      while (j < expression.length && /[0-9.]/.test(expression[j])) j++;
      const literal = expression.slice(i, j);
      const value = Number(literal);
      if (!Number.isFinite(value)) throw new SyntaxError(`Invalid number '${literal}'`);
      tokens.push({ kind: 'number', value });
      i = j;
    } else if (ch === '*' && expression[i + 1] === '*') {
      tokens.push({ kind: 'op', value: '**' });
      i += 2;
    } else {
      tokens.push({ kind: 'op', value: ch });
      i++;
    }
  }
  return tokens;
}

/**
 * Recursive-descent evaluator for + - * / % ** and parentheses.
 * `**` is right-associative and binds tighter than unary minus on its left.
 */
class Parser {
  private pos = 0;

  constructor(private tokens: Token[]) {}

  parse(): number {
    const value = this.expression();
    if (this.pos < this.tokens.length) {
      throw new SyntaxError('Unexpected trailing input');
    }
    return value;
  }

  private peekOp(): string | undefined {
    const token = this.tokens[this.pos];
    return token?.kind === 'op' ? token.value : undefined;
  }

  private expression(): number {
    let value = this.term();
    for (let op = this.peekOp(); op === '+' || op === '-'; op = this.peekOp()) {
      this.pos++;
      const rhs = this.term();
      value = op === '+' ? value + rhs : value - rhs;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peekOp(); op === '*' || op === '/' || op === '%'; op = this.peekOp()) {
      this.pos++;
      const rhs = this.unary();
      if ((op === '/' || op === '%') && rhs === 0) {
        throw new RangeError('Division by zero');
      }
      if (op === '*') value *= rhs;
      else if (op === '/') value /= rhs;
      // Floor modulo: the result takes the divisor's sign
      else value = ((value % rhs) + rhs) % rhs;
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp();
    if (op === '-' || op === '+') {
      this.pos++;
      const operand = this.unary();
      return op === '-' ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peekOp() === '**') {
      this.pos++;
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.tokens[this.pos];
    if (!token) throw new SyntaxError('Unexpected end of expression');
    if (token.kind === 'number') {
      this.pos++;
      return token.value;
    }
    if (token.value === '(') {
      this.pos++;
      const value = this.expression();
      if (this.peekOp() !== ')') throw new SyntaxError('Missing closing parenthesis');
      this.pos++;
      return value;
    }
    throw new SyntaxError(`Unexpected '${token.value}'`);
  }
}

export function evaluateExpression(expression: string): number {
  if (!ALLOWED.test(expression)) {
    throw new SyntaxError(
      'Expression contains invalid characters. Only numbers and operators (+, -, *, /, **, %, parentheses) are allowed.'
    );
  }
  const value = new Parser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) {
    throw new RangeError('Result is not a finite number');
  }
  return value;
}

export class CalculateTool extends Tool {
  get name() { return 'calculate'; }
  get description() { return 'Evaluate an arithmetic expression with + - * / % ** and parentheses.'; }
  get parameters(): ToolParameters {
    return {
      expression: { type: 'string', required: true, description: 'Expression such as (1200 * 0.05) / 12' },
    };
  }

  async execute(args: ToolArguments, _context: ToolContext): Promise<ToolResult> {
    const value = evaluateExpression(stringArg(args, 'expression'));
    return { content: `Result: ${value}`, data: { value } };
  }
}
