import { Tool, ToolArguments, ToolResult } from './tools/base';
import { ToolRegistry } from './tools/registry';
import {
  BudgetExceededError,
  InvalidArgumentError,
  ToolError,
  ToolExecutionError,
  UnknownToolError,
} from './tools/errors';
import { BudgetTracker, CallBudget, CallOutcome } from './budget';
import { ToolsConfig } from '../config/schema';
import { describeError } from '../utils/errors';
import logger, { logContext } from '../utils/logger';

const log = logger.child({ module: 'Dispatcher' });

export type DispatchOutcome =
  | { ok: true; tool: string; result: ToolResult; budget: CallBudget }
  | { ok: false; tool: string; error: ToolError; budget: CallBudget };

export interface DispatcherOptions {
  timeoutMs: number;
  similarityFloor: number;
}

class TimeoutElapsed extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
  }
}

/**
 * Single choke point for tool execution: lookup, validation, call budget,
 * bounded execution and error normalization, in that order.
 */
export class ToolDispatcher {
  constructor(
    private registry: ToolRegistry,
    private budgets: BudgetTracker,
    private options: DispatcherOptions
  ) {}

  static fromConfig(registry: ToolRegistry, config: ToolsConfig): ToolDispatcher {
    const budgets = new BudgetTracker({
      maxCalls: config.maxCallsPerConversation,
      maxUnproductive: config.maxUnproductiveRetrievals,
      idleTtlMs: config.budgetIdleTtlMs,
    });
    return new ToolDispatcher(registry, budgets, {
      timeoutMs: config.timeoutMs,
      similarityFloor: config.similarityFloor,
    });
  }

  get tools(): ToolRegistry {
    return this.registry;
  }

  getBudget(conversationId: string): CallBudget {
    return this.budgets.snapshot(conversationId);
  }

  resetConversation(conversationId: string): void {
    this.budgets.reset(conversationId);
    log.info(`Reset call budget for conversation ${conversationId}`);
  }

  /**
   * Never rejects for a per-call problem; every failure comes back as a
   * structured error in the outcome.
   */
  dispatch(conversationId: string, name: string, args: ToolArguments): Promise<DispatchOutcome> {
    return this.budgets.runExclusive(conversationId, () =>
      logContext.run({ conversationId }, () => this.dispatchSerialized(conversationId, name, args))
    );
  }

  private async dispatchSerialized(conversationId: string, name: string, args: ToolArguments): Promise<DispatchOutcome> {
    const fail = (error: ToolError): DispatchOutcome => ({
      ok: false,
      tool: name,
      error,
      budget: this.budgets.snapshot(conversationId),
    });

    const tool = this.registry.get(name);
    if (!tool) {
      log.warn(`Unknown tool requested: ${name}`);
      return fail(new UnknownToolError(name, this.registry.toolNames));
    }

    const issue = tool.validateArgs(args);
    if (issue) {
      log.warn(`Rejected arguments for ${name}: ${issue.message}`);
      return fail(new InvalidArgumentError(name, issue.parameter, issue.message));
    }

    const exceeded = this.budgets.check(conversationId);
    if (exceeded) {
      log.warn(`Budget exhausted (${exceeded}), refusing ${name}`);
      return fail(new BudgetExceededError(name, exceeded, this.budgets.limitFor(exceeded)));
    }

    const started = Date.now();
    let result: ToolResult;
    try {
      result = await this.invokeWithTimeout(tool, args, conversationId);
    } catch (err) {
      this.budgets.record(conversationId, tool.isRetrieval ? 'unproductive' : 'neutral');
      const timedOut = err instanceof TimeoutElapsed;
      const error = new ToolExecutionError(name, describeError(err), timedOut);
      log.error(`Tool ${name} failed after ${Date.now() - started}ms: ${error.causeText}`);
      return fail(error);
    }

    const budget = this.budgets.record(conversationId, this.classify(tool, result));
    log.info(`Tool ${name} completed in ${Date.now() - started}ms (call ${budget.totalCalls}, unproductive streak ${budget.unproductiveStreak})`);
    return { ok: true, tool: name, result, budget };
  }

  private classify(tool: Tool, result: ToolResult): CallOutcome {
    if (!tool.isRetrieval) return 'neutral';
    const best = result.retrieval?.bestScore ?? null;
    return best !== null && best >= this.options.similarityFloor ? 'productive' : 'unproductive';
  }

  private async invokeWithTimeout(tool: Tool, args: ToolArguments, conversationId: string): Promise<ToolResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first so the race settles on the timeout, not on the tool's abort rejection
        reject(new TimeoutElapsed(this.options.timeoutMs));
        controller.abort();
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([tool.execute(args, { conversationId, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
