import { describe, it, expect } from 'vitest';
import {
  CompoundInterestTool,
  InvestmentReturnsTool,
  compoundInterest,
  investmentReturns,
} from '../src/agent/tools/finance';
import { CalculateTool, evaluateExpression } from '../src/agent/tools/calculator';
import { ToolContext } from '../src/agent/tools/base';

const context: ToolContext = { conversationId: 'test', signal: new AbortController().signal };

describe('compoundInterest', () => {
  it('applies A = P(1 + r/n)^(nt)', () => {
    expect(compoundInterest(1000, 10, 2, 1).amount).toBeCloseTo(1210, 9);
    const monthly = compoundInterest(5000, 5, 2, 12);
    expect(monthly.amount).toBeCloseTo(5524.7067, 4);
    expect(monthly.interestEarned).toBeCloseTo(524.7067, 4);
  });
});

describe('CompoundInterestTool', () => {
  const tool = new CompoundInterestTool(12);

  it('reports the final amount and structured data', async () => {
    const result = await tool.execute({ principal: 5000, rate: 5, time: 2 }, context);
    expect(result.content).toBe(
      [
        'Compound Interest Calculation:',
        '- Principal Amount: $5,000.00',
        '- Annual Interest Rate: 5%',
        '- Time Period: 2 years',
        '- Compounding Frequency: 12 times per year',
        '',
        'Final Amount: $5,524.71',
        'Interest Earned: $524.71',
        'Total Return: 10.49%',
      ].join('\n')
    );
    expect(result.data).toEqual({ amount: 5524.71, interestEarned: 524.71, totalReturnPct: 10.49, compoundsPerYear: 12 });
  });

  it('honours an explicit compounding frequency', async () => {
    const result = await tool.execute({ principal: 1000, rate: 10, time: 2, compounds_per_year: 1 }, context);
    expect(result.data).toMatchObject({ amount: 1210, interestEarned: 210, compoundsPerYear: 1 });
  });

  it('refuses a zero principal', async () => {
    await expect(tool.execute({ principal: 0, rate: 5, time: 1 }, context)).rejects.toThrow(
      'Principal must be greater than zero.'
    );
  });
});

describe('investment returns', () => {
  it('computes CAGR, total and average annual return', () => {
    const result = investmentReturns(1000, 1500, 2);
    expect(result.totalReturn).toBe(500);
    expect(result.totalReturnPct).toBe(50);
    expect(result.averageAnnualPct).toBe(25);
    expect(result.cagrPct).toBeCloseTo(22.4745, 4);
  });

  it('rejects a non-positive start value or period', () => {
    expect(() => investmentReturns(0, 100, 1)).toThrow(RangeError);
    expect(() => investmentReturns(100, 200, 0)).toThrow('Initial investment and years must be positive numbers.');
  });

  it('formats the analysis', async () => {
    const result = await new InvestmentReturnsTool().execute({ initial: 10000, final: 16105.1, years: 5 }, context);
    const lines = result.content.split('\n');
    expect(lines).toContain('Total Return: $6,105.10 (61.05%)');
    expect(lines).toContain('Compound Annual Growth Rate (CAGR): 10.00%');
    expect(lines).toContain('Average Annual Return: 12.21% per year');
    expect(result.data).toEqual({ totalReturn: 6105.1, totalReturnPct: 61.05, cagrPct: 10, averageAnnualPct: 12.21 });
  });
});

describe('evaluateExpression', () => {
  it.each([
    ['1 + 2 * 3', 7],
    ['(1 + 2) * 3', 9],
    ['2 ** 3 ** 2', 512],
    ['-2 ** 2', -4],
    ['7 % 3', 1],
    ['-7 % 3', 2],
    ['(1200 * 0.25) / 12', 25],
    ['10 / 4', 2.5],
  ])('%s = %s', (expression, expected) => {
    expect(evaluateExpression(expression)).toBe(expected);
  });

  it('rejects anything but numbers and operators', () => {
    expect(() => evaluateExpression('process.exit(1)')).toThrow('Expression contains invalid characters');
    expect(() => evaluateExpression('Math.PI')).toThrow(SyntaxError);
  });

  it('rejects malformed expressions', () => {
    expect(() => evaluateExpression('(1 + 2')).toThrow('Missing closing parenthesis');
    expect(() => evaluateExpression('1 +')).toThrow('Unexpected end of expression');
    expect(() => evaluateExpression('1 2')).toThrow('Unexpected trailing input');
  });

  it('rejects division by zero', () => {
    expect(() => evaluateExpression('1 / 0')).toThrow('Division by zero');
    expect(() => evaluateExpression('5 % (2 - 2)')).toThrow(RangeError);
  });
});

describe('CalculateTool', () => {
  it('returns the value as text and data', async () => {
    const result = await new CalculateTool().execute({ expression: '100 * 1.5' }, context);
    expect(result).toEqual({ content: 'Result: 150', data: { value: 150 } });
  });
});
