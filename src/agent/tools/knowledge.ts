import { Tool, ToolArguments, ToolParameters, ToolResult, numberArg, stringArg } from './base';
import { KnowledgeStore } from '../../services/knowledge/service';
import { EmbeddingError } from '../../services/knowledge/errors';
import { SearchHit } from '../../services/knowledge/types';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Tools:search_knowledge_base' });

export const NO_KNOWLEDGE_RESULTS = 'No relevant information found in the knowledge base.';

export class KnowledgeSearchTool extends Tool {
  constructor(private store: KnowledgeStore, private defaultK: number = 3) {
    super();
  }

  get name(): string {
    return 'search_knowledge_base';
  }

  get description(): string {
    return 'Search the internal support knowledge base (policies, fees, account procedures). Call this first for any question about our products or accounts.';
  }

  get parameters(): ToolParameters {
    return {
      query: {
        type: 'string',
        required: true,
        description: 'What the customer is asking about, in plain language.',
      },
      k: {
        type: 'integer',
        required: false,
        minimum: 1,
        description: `Maximum number of passages to return. Defaults to ${this.defaultK}.`,
      },
    };
  }

  get isRetrieval(): boolean {
    return true;
  }

  async execute(args: ToolArguments): Promise<ToolResult> {
    const query = stringArg(args, 'query');
    const k = numberArg(args, 'k', this.defaultK);

    let hits: SearchHit[];
    try {
      hits = await this.store.search(query, k);
    } catch (err) {
      // An unembeddable query means "no answer", not a failed tool
      if (err instanceof EmbeddingError) {
        log.warn(`Query could not be embedded: ${err.message}`);
        return { content: NO_KNOWLEDGE_RESULTS, retrieval: { bestScore: null } };
      }
      throw err;
    }

    if (hits.length === 0) {
      return { content: NO_KNOWLEDGE_RESULTS, retrieval: { bestScore: null } };
    }

    const content = hits
      .map((hit, i) => `Result ${i + 1} - ${hit.passage.title}:\n${hit.passage.content}`)
      .join('\n\n');

    return {
      content,
      data: {
        results: hits.map((hit) => ({
          id: hit.passage.id,
          title: hit.passage.title,
          score: Number(hit.score.toFixed(4)),
        })),
      },
      retrieval: { bestScore: hits[0].score },
    };
  }
}
