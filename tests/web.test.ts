import { describe, it, expect } from 'vitest';
import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { MarketDataTool, WebSearchTool, noWebResultsMessage } from '../src/agent/tools/web';
import { WebSearchConfigSchema } from '../src/config/schema';
import { ToolContext } from '../src/agent/tools/base';

const context: ToolContext = { conversationId: 'test', signal: new AbortController().signal };
const config = WebSearchConfigSchema.parse({ baseUrl: 'http://search.test/', maxRelatedTopics: 2 });

interface FakeSearch {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

function fakeSearch(status: number, data: unknown): FakeSearch {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (request) => {
      requests.push(request);
      return { data, status, statusText: String(status), headers: {}, config: request };
    },
  });
  return { http, requests };
}

describe('WebSearchTool', () => {
  it('composes summary, answer and related topics', async () => {
    const { http, requests } = fakeSearch(200, {
      AbstractText: 'An index fund tracks a market index.',
      Answer: 'Low cost',
      RelatedTopics: [{ Text: 'ETF' }, { Name: 'group without text' }, { Text: 'Mutual fund' }, { Text: 'Bond' }],
    });
    const tool = new WebSearchTool(config, http);

    const result = await tool.execute({ query: 'index fund' }, context);
    expect(result.content).toBe(
      'Summary: An index fund tracks a market index.\n\nAnswer: Low cost\n\nRelated: ETF'
    );
    expect(result.retrieval).toEqual({ bestScore: 1 });
    expect(requests[0].url).toBe('http://search.test/');
    expect(requests[0].params).toEqual({ q: 'index fund', format: 'json', no_html: 1, skip_disambig: 1 });
  });

  it('ignores a non-string answer', async () => {
    const { http } = fakeSearch(200, { Answer: { from: 'calculator' }, RelatedTopics: [{ Text: 'Compounding' }] });
    const result = await new WebSearchTool(config, http).execute({ query: 'interest' }, context);
    expect(result.content).toBe('Related: Compounding');
  });

  it('answers with guidance when nothing was found', async () => {
    const { http } = fakeSearch(200, { AbstractText: '', RelatedTopics: [] });
    const result = await new WebSearchTool(config, http).execute({ query: 'obscure ticker' }, context);
    expect(result.content).toBe(noWebResultsMessage('obscure ticker'));
    expect(result.retrieval).toEqual({ bestScore: null });
  });

  it('fails on a non-200 status', async () => {
    const { http } = fakeSearch(503, {});
    await expect(new WebSearchTool(config, http).execute({ query: 'q' }, context)).rejects.toThrow(
      'Unable to fetch web results at this time. Status code: 503'
    );
  });

  it('reports a timeout in plain words', async () => {
    const http = axios.create({
      adapter: async (request) => {
        throw new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED', request);
      },
    });
    await expect(new WebSearchTool(config, http).execute({ query: 'q' }, context)).rejects.toThrow('Web search timed out');
  });

  it('fails on a payload of the wrong shape', async () => {
    const { http } = fakeSearch(200, { RelatedTopics: 'none' });
    await expect(new WebSearchTool(config, http).execute({ query: 'q' }, context)).rejects.toThrow(
      'Search API returned an unexpected payload'
    );
  });
});

describe('MarketDataTool', () => {
  const tool = new MarketDataTool();

  it('names the upper-cased symbol and flags the data as not live', async () => {
    const result = await tool.execute({ symbol: ' vti ' }, context);
    expect(result.content.split('\n')[0]).toBe('Market data retrieval for VTI:');
    expect(result.data).toEqual({ symbol: 'VTI', live: false });
  });

  it('refuses a blank symbol', async () => {
    await expect(tool.execute({ symbol: '   ' }, context)).rejects.toThrow('Symbol must not be blank');
  });
});
