import express from 'express';
import http from 'http';
import { z } from 'zod';
import { AppContext } from '../agent/context';
import { DispatchOutcome } from '../agent/dispatcher';
import { ToolErrorKind } from '../agent/tools/errors';
import { PassageInputSchema } from '../services/knowledge/service';
import { IngestError } from '../services/knowledge/errors';
import { describeError } from '../utils/errors';
import logger from '../utils/logger';

const log = logger.child({ module: 'Web' });

const ERROR_STATUS: Record<ToolErrorKind, number> = {
  unknown_tool: 404,
  invalid_argument: 400,
  budget_exceeded: 429,
  tool_execution: 502,
  duplicate_tool: 500,
};

const DispatchRequestSchema = z.object({
  conversation_id: z.string().min(1),
  tool_name: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
});

const IngestRequestSchema = z.object({
  passages: z.array(PassageInputSchema).min(1),
});

export class WebChannel {
  readonly app: express.Express;
  private server: http.Server | null = null;

  constructor(private context: AppContext) {
    this.app = express();
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(this.cors.bind(this));
    this.setupRoutes();
  }

  get name(): string {
    return 'web';
  }

  private cors(req: express.Request, res: express.Response, next: express.NextFunction) {
    const { environment, allowed_origins } = this.context.config.server;
    const origin = req.headers.origin;
    if (environment !== 'development') {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else if (origin && allowed_origins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  }

  private setupRoutes() {
    const { dispatcher, knowledge, config } = this.context;

    this.app.get('/health', (_req, res) => {
      res.json({
        status: 'healthy',
        environment: config.server.environment,
        passages: knowledge.size,
        tools: dispatcher.tools.toolNames,
      });
    });

    this.app.get('/api/knowledge/stats', (_req, res) => {
      const stats = knowledge.stats;
      res.json({
        total_documents: stats.passages,
        index_size: stats.vectors,
        dimension: stats.dimension,
        embedder: stats.embedder,
      });
    });

    this.app.get('/api/tools', (_req, res) => {
      res.json({ tools: dispatcher.tools.getDefinitions() });
    });

    this.app.post('/api/tools/dispatch', async (req, res) => {
      const body = DispatchRequestSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: 'conversation_id and tool_name are required' });
        return;
      }

      const { conversation_id, tool_name, parameters } = body.data;
      let outcome: DispatchOutcome;
      try {
        outcome = await dispatcher.dispatch(conversation_id, tool_name, parameters);
      } catch (err) {
        log.error(`Dispatch crashed for ${tool_name}: ${describeError(err)}`);
        res.status(500).json({ ok: false, error: 'Internal error' });
        return;
      }
      if (outcome.ok) {
        res.json({ ok: true, tool: outcome.tool, result: outcome.result, budget: outcome.budget });
        return;
      }
      res.status(ERROR_STATUS[outcome.error.kind]).json({
        ok: false,
        error: outcome.error.toJSON(),
        budget: outcome.budget,
      });
    });

    this.app.post('/api/conversations/:id/reset', (req, res) => {
      dispatcher.resetConversation(req.params.id);
      res.json({ ok: true, budget: dispatcher.getBudget(req.params.id) });
    });

    this.app.post('/api/knowledge/ingest', async (req, res) => {
      const body = IngestRequestSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: 'passages must be a non-empty list of {title, content}' });
        return;
      }
      try {
        const passages = await knowledge.ingest(body.data.passages);
        res.json({ ok: true, ids: passages.map((p) => p.id), total: knowledge.size });
      } catch (err) {
        if (err instanceof IngestError) {
          res.status(422).json({ ok: false, error: err.message });
          return;
        }
        log.error(`Ingest failed: ${describeError(err)}`);
        res.status(500).json({ ok: false, error: 'Internal error' });
      }
    });
  }

  start(): Promise<void> {
    const { port, host } = this.context.config.server;
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        log.info(`HTTP server listening on http://${host}:${port}`);
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
