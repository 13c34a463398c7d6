import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { Config, ConfigSchema } from '../src/config/schema';
import { Tool, ToolArguments, ToolContext, ToolParameters, ToolResult } from '../src/agent/tools/base';
import { HashingEmbeddingProvider } from '../src/services/knowledge/embedding';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'finsight-test-'));
}

export function testConfig(storagePath: string, overrides: Partial<Config['tools']> = {}): Config {
  return ConfigSchema.parse({
    knowledge_base: { storage_path: storagePath, seed_on_empty: false },
    tools: overrides,
    web_search: { enabled: false },
  });
}

/**
 * Hashing embedder whose passage embeddings (texts containing a newline) can be
 * held back until released. Queries are never held.
 */
export class GatedEmbedder extends HashingEmbeddingProvider {
  private gate: Promise<void> | null = null;
  calls = 0;

  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  async getEmbedding(text: string): Promise<number[]> {
    this.calls++;
    if (this.gate && text.includes('\n')) {
      await this.gate;
    }
    return super.getEmbedding(text);
  }
}

/** Retrieval tool whose next best score is set by the test. */
export class ScriptedRetrievalTool extends Tool {
  nextScore: number | null = 0;
  calls = 0;

  get name() { return 'scripted_search'; }
  get description() { return 'Retrieval stand-in'; }
  get parameters(): ToolParameters {
    return { query: { type: 'string', required: true, description: 'query' } };
  }
  get isRetrieval(): boolean {
    return true;
  }

  async execute(): Promise<ToolResult> {
    this.calls++;
    return { content: `score ${this.nextScore}`, retrieval: { bestScore: this.nextScore } };
  }
}

export class EchoTool extends Tool {
  get name() { return 'echo'; }
  get description() { return 'Echoes its input'; }
  get parameters(): ToolParameters {
    return {
      text: { type: 'string', required: true, description: 'text' },
      times: { type: 'integer', required: false, minimum: 1, description: 'repeat count' },
      loud: { type: 'boolean', required: false, description: 'upper-case' },
    };
  }

  async execute(args: ToolArguments): Promise<ToolResult> {
    const text = String(args.text);
    return { content: typeof args.times === 'number' ? text.repeat(args.times) : text };
  }
}

export class HangingTool extends Tool {
  aborted = false;

  get name() { return 'hanging'; }
  get description() { return 'Only settles when aborted'; }
  get parameters(): ToolParameters {
    return {};
  }

  execute(_args: ToolArguments, context: ToolContext): Promise<ToolResult> {
    return new Promise((_resolve, reject) => {
      context.signal.addEventListener('abort', () => {
        this.aborted = true;
        reject(new Error('aborted'));
      });
    });
  }
}

export class ThrowingTool extends Tool {
  get name() { return 'throwing'; }
  get description() { return 'Always fails'; }
  get parameters(): ToolParameters {
    return {};
  }

  async execute(): Promise<ToolResult> {
    throw new TypeError('upstream exploded');
  }
}
