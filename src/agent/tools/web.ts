import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { Tool, ToolArguments, ToolContext, ToolParameters, ToolResult, stringArg } from './base';
import { WebSearchConfig } from '../../config/schema';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Tools:search_web' });

// Instant Answer fields we read; everything else in the payload is ignored
const InstantAnswerSchema = z.object({
  AbstractText: z.string().optional(),
  Answer: z.unknown().optional(),
  RelatedTopics: z.array(z.unknown()).optional(),
});

const TopicSchema = z.object({ Text: z.string() });

export function noWebResultsMessage(query: string): string {
  return `Search completed but no detailed results found for: ${query}. For real-time market data, please check financial websites like Yahoo Finance or Bloomberg.`;
}

export class WebSearchTool extends Tool {
  constructor(private config: WebSearchConfig, private http: AxiosInstance = axios.create()) {
    super();
  }

  get name() { return 'search_web'; }
  get description() { return 'Search the web for external information such as market news or general financial facts. Use only after the knowledge base had nothing relevant.'; }
  get parameters(): ToolParameters {
    return {
      query: { type: 'string', required: true, description: 'Search query' },
    };
  }

  get isRetrieval(): boolean {
    return true;
  }

  async execute(args: ToolArguments, context: ToolContext): Promise<ToolResult> {
    const query = stringArg(args, 'query');

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.config.baseUrl, {
        params: { q: query, format: 'json', no_html: 1, skip_disambig: 1 },
        timeout: this.config.timeoutMs,
        signal: context.signal,
        validateStatus: () => true,
      });
    } catch (err) {
      if (axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
        throw new Error('Web search timed out');
      }
      throw err;
    }

    if (response.status !== 200) {
      throw new Error(`Unable to fetch web results at this time. Status code: ${response.status}`);
    }

    const parsed = InstantAnswerSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error('Search API returned an unexpected payload');
    }
    const data = parsed.data;

    const parts: string[] = [];
    if (data.AbstractText) {
      parts.push(`Summary: ${data.AbstractText}`);
    }
    if (typeof data.Answer === 'string' && data.Answer.length > 0) {
      parts.push(`Answer: ${data.Answer}`);
    }
    const topics = (data.RelatedTopics ?? [])
      .slice(0, this.config.maxRelatedTopics)
      .flatMap((topic) => {
        const t = TopicSchema.safeParse(topic);
        return t.success && t.data.Text ? [t.data.Text] : [];
      });
    if (topics.length > 0) {
      parts.push(`Related: ${topics.join(' | ')}`);
    }

    if (parts.length === 0) {
      log.debug(`No instant answer for "${query}"`);
      return { content: noWebResultsMessage(query), retrieval: { bestScore: null } };
    }
    return { content: parts.join('\n\n'), retrieval: { bestScore: 1 } };
  }
}

export class MarketDataTool extends Tool {
  get name() { return 'get_market_data'; }
  get description() { return 'Look up market data for a stock or crypto ticker symbol.'; }
  get parameters(): ToolParameters {
    return {
      symbol: { type: 'string', required: true, description: 'Ticker symbol, e.g. VTI or BTC' },
    };
  }

  async execute(args: ToolArguments, _context: ToolContext): Promise<ToolResult> {
    const symbol = stringArg(args, 'symbol').trim().toUpperCase();
    if (symbol.length === 0) {
      throw new Error('Symbol must not be blank');
    }
    // No market data feed is wired up yet; answer with guidance instead of numbers
    const content = [
      `Market data retrieval for ${symbol}:`,
      '',
      'Note: live market data is not connected in this environment. For real-time prices, please:',
      '1. Visit financial websites like Yahoo Finance, Bloomberg, or MarketWatch',
      "2. Use your brokerage platform's market data tools",
      '3. Check cryptocurrency exchanges for crypto prices',
    ].join('\n');
    return { content, data: { symbol, live: false } };
  }
}
