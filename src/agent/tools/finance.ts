import { Tool, ToolArguments, ToolContext, ToolParameters, ToolResult, numberArg } from './base';

const money = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

function dollars(value: number): string {
  return `$${money.format(value)}`;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export interface CompoundInterest {
  amount: number;
  interestEarned: number;
  totalReturnPct: number;
}

/**
 * A = P(1 + r/n)^(nt), with `ratePct` an annual percentage.
 */
export function compoundInterest(principal: number, ratePct: number, years: number, compoundsPerYear: number): CompoundInterest {
  const rate = ratePct / 100;
  const amount = principal * Math.pow(1 + rate / compoundsPerYear, compoundsPerYear * years);
  const interestEarned = amount - principal;
  return { amount, interestEarned, totalReturnPct: (interestEarned / principal) * 100 };
}

export interface InvestmentReturns {
  totalReturn: number;
  totalReturnPct: number;
  cagrPct: number;
  averageAnnualPct: number;
}

export function investmentReturns(initial: number, final: number, years: number): InvestmentReturns {
  if (initial <= 0 || years <= 0) {
    throw new RangeError('Initial investment and years must be positive numbers.');
  }
  const totalReturn = final - initial;
  const totalReturnPct = (totalReturn / initial) * 100;
  const cagrPct = (Math.pow(final / initial, 1 / years) - 1) * 100;
  return { totalReturn, totalReturnPct, cagrPct, averageAnnualPct: totalReturnPct / years };
}

export class CompoundInterestTool extends Tool {
  constructor(private defaultCompoundsPerYear: number = 12) {
    super();
  }

  get name() { return 'calculate_compound_interest'; }
  get description() { return `Calculate compound interest with A = P(1 + r/n)^(nt). Compounds ${this.defaultCompoundsPerYear} times per year unless told otherwise.`; }
  get parameters(): ToolParameters {
    return {
      principal: { type: 'number', required: true, minimum: 0, description: 'Initial amount in dollars' },
      rate: { type: 'number', required: true, description: 'Annual interest rate as a percentage, e.g. 5 for 5%' },
      time: { type: 'number', required: true, minimum: 0, description: 'Time period in years' },
      compounds_per_year: {
        type: 'integer',
        required: false,
        minimum: 1,
        description: `Compounding frequency per year (default ${this.defaultCompoundsPerYear})`,
      },
    };
  }

  async execute(args: ToolArguments, _context: ToolContext): Promise<ToolResult> {
    const principal = numberArg(args, 'principal');
    const rate = numberArg(args, 'rate');
    const time = numberArg(args, 'time');
    const n = numberArg(args, 'compounds_per_year', this.defaultCompoundsPerYear);
    if (principal === 0) {
      throw new RangeError('Principal must be greater than zero.');
    }

    const result = compoundInterest(principal, rate, time, n);
    const content = [
      'Compound Interest Calculation:',
      `- Principal Amount: ${dollars(principal)}`,
      `- Annual Interest Rate: ${rate}%`,
      `- Time Period: ${time} years`,
      `- Compounding Frequency: ${n} times per year`,
      '',
      `Final Amount: ${dollars(result.amount)}`,
      `Interest Earned: ${dollars(result.interestEarned)}`,
      `Total Return: ${result.totalReturnPct.toFixed(2)}%`,
    ].join('\n');

    return {
      content,
      data: {
        amount: round2(result.amount),
        interestEarned: round2(result.interestEarned),
        totalReturnPct: round2(result.totalReturnPct),
        compoundsPerYear: n,
      },
    };
  }
}

export class InvestmentReturnsTool extends Tool {
  get name() { return 'analyze_investment_returns'; }
  get description() { return 'Analyze an investment: total return, CAGR and average annual return from start value, end value and holding period.'; }
  get parameters(): ToolParameters {
    return {
      initial: { type: 'number', required: true, description: 'Initial investment in dollars' },
      final: { type: 'number', required: true, minimum: 0, description: 'Final value in dollars' },
      years: { type: 'number', required: true, description: 'Holding period in years' },
    };
  }

  async execute(args: ToolArguments, _context: ToolContext): Promise<ToolResult> {
    const initial = numberArg(args, 'initial');
    const final = numberArg(args, 'final');
    const years = numberArg(args, 'years');

    const result = investmentReturns(initial, final, years);
    const content = [
      'Investment Return Analysis:',
      `- Initial Investment: ${dollars(initial)}`,
      `- Final Value: ${dollars(final)}`,
      `- Time Period: ${years} years`,
      '',
      `Total Return: ${dollars(result.totalReturn)} (${result.totalReturnPct.toFixed(2)}%)`,
      `Compound Annual Growth Rate (CAGR): ${result.cagrPct.toFixed(2)}%`,
      `Average Annual Return: ${result.averageAnnualPct.toFixed(2)}% per year`,
    ].join('\n');

    return {
      content,
      data: {
        totalReturn: round2(result.totalReturn),
        totalReturnPct: round2(result.totalReturnPct),
        cagrPct: round2(result.cagrPct),
        averageAnnualPct: round2(result.averageAnnualPct),
      },
    };
  }
}
