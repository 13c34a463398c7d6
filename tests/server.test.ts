import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import fs from 'fs-extra';
import { createAppContext, AppContext } from '../src/agent/context';
import { WebChannel } from '../src/channels/web';
import { makeTempDir, testConfig } from './helpers';

describe('WebChannel', () => {
  let dir: string;
  let context: AppContext;
  let channel: WebChannel;

  beforeEach(async () => {
    dir = await makeTempDir();
    context = await createAppContext(testConfig(dir, { maxCallsPerConversation: 3 }));
    channel = new WebChannel(context);
  });

  afterEach(async () => {
    await context.shutdown();
    await fs.remove(dir);
  });

  it('reports health with the registered tools', async () => {
    const res = await request(channel.app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'healthy',
      environment: 'development',
      passages: 0,
      tools: [
        'search_knowledge_base',
        'get_market_data',
        'calculate_compound_interest',
        'analyze_investment_returns',
        'calculate',
      ],
    });
  });

  it('reports knowledge base statistics', async () => {
    const empty = await request(channel.app).get('/api/knowledge/stats');
    expect(empty.status).toBe(200);
    expect(empty.body).toEqual({ total_documents: 0, index_size: 0, dimension: 512, embedder: 'hashing' });

    await context.knowledge.ingest([{ title: 'Trading Fees', content: 'Stock trades carry no commission.' }]);
    const res = await request(channel.app).get('/api/knowledge/stats');
    expect(res.body).toMatchObject({ total_documents: 1, index_size: 1 });
  });

  it('lists tool definitions', async () => {
    const res = await request(channel.app).get('/api/tools');
    expect(res.body.tools).toHaveLength(5);
    expect(res.body.tools[0].function.name).toBe('search_knowledge_base');
  });

  it('ingests passages and answers a knowledge search', async () => {
    const ingest = await request(channel.app)
      .post('/api/knowledge/ingest')
      .send({ passages: [{ title: 'Card Replacement', content: 'Order a replacement debit card from the cards page.' }] });
    expect(ingest.status).toBe(200);
    expect(ingest.body.total).toBe(1);
    expect(ingest.body.ids).toHaveLength(1);

    const res = await request(channel.app)
      .post('/api/tools/dispatch')
      .send({ conversation_id: 'conv-1', tool_name: 'search_knowledge_base', parameters: { query: 'lost debit card' } });
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.result.content).toBe('Result 1 - Card Replacement:\nOrder a replacement debit card from the cards page.');
    expect(res.body.budget).toMatchObject({ totalCalls: 1, unproductiveStreak: 0 });
  });

  it('rejects an ingest with a blank passage', async () => {
    const res = await request(channel.app)
      .post('/api/knowledge/ingest')
      .send({ passages: [{ title: '', content: 'text' }] });
    expect(res.status).toBe(422);
    expect(res.body).toEqual({ ok: false, error: 'Passage 0 needs a non-empty title and content' });
  });

  it('maps dispatch errors to status codes', async () => {
    const unknown = await request(channel.app)
      .post('/api/tools/dispatch')
      .send({ conversation_id: 'conv-2', tool_name: 'transfer_funds' });
    expect(unknown.status).toBe(404);
    expect(unknown.body.error.kind).toBe('unknown_tool');

    const invalid = await request(channel.app)
      .post('/api/tools/dispatch')
      .send({ conversation_id: 'conv-2', tool_name: 'calculate', parameters: { expression: 42 } });
    expect(invalid.status).toBe(400);
    expect(invalid.body.error).toEqual({
      kind: 'invalid_argument',
      tool: 'calculate',
      parameter: 'expression',
      message: "Invalid arguments for tool 'calculate': Parameter 'expression' must be of type string",
    });

    const failed = await request(channel.app)
      .post('/api/tools/dispatch')
      .send({ conversation_id: 'conv-2', tool_name: 'calculate', parameters: { expression: '1 / 0' } });
    expect(failed.status).toBe(502);
    expect(failed.body.error.message).toBe('Error executing calculate: Division by zero');
  });

  it('returns 429 once the call budget is spent and recovers after a reset', async () => {
    const call = () =>
      request(channel.app)
        .post('/api/tools/dispatch')
        .send({ conversation_id: 'conv-3', tool_name: 'calculate', parameters: { expression: '1 + 1' } });

    for (let i = 0; i < 3; i++) {
      expect((await call()).status).toBe(200);
    }
    const exhausted = await call();
    expect(exhausted.status).toBe(429);
    expect(exhausted.body.error.reason).toBe('total_calls');

    const reset = await request(channel.app).post('/api/conversations/conv-3/reset');
    expect(reset.body.budget.totalCalls).toBe(0);
    expect((await call()).status).toBe(200);
  });

  it('requires conversation_id and tool_name', async () => {
    const res = await request(channel.app).post('/api/tools/dispatch').send({ tool_name: 'calculate' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'conversation_id and tool_name are required' });
  });

  it('echoes allowed origins in development', async () => {
    const res = await request(channel.app).get('/health').set('Origin', 'http://localhost:3000');
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');

    const other = await request(channel.app).get('/health').set('Origin', 'http://elsewhere.test');
    expect(other.headers['access-control-allow-origin']).toBeUndefined();
  });
});
