import { BudgetExceededReason } from './tools/errors';

export interface CallBudget {
  totalCalls: number;
  unproductiveStreak: number;
  startedAt: number;
  lastActivity: number;
}

export interface BudgetLimits {
  maxCalls: number;
  maxUnproductive: number;
  idleTtlMs: number;
}

/** How a finished call moves the unproductive-retrieval streak. */
export type CallOutcome = 'productive' | 'unproductive' | 'neutral';

/**
 * Per-conversation call counters, in memory only. Calls within one
 * conversation run one at a time; conversations never wait on each other.
 */
export class BudgetTracker {
  private budgets: Map<string, CallBudget> = new Map();
  private queues: Map<string, Promise<void>> = new Map();

  constructor(private limits: BudgetLimits, private now: () => number = Date.now) {}

  get activeConversations(): number {
    return this.budgets.size;
  }

  get(conversationId: string): CallBudget {
    this.evictIdle();
    let budget = this.budgets.get(conversationId);
    if (!budget) {
      const now = this.now();
      budget = { totalCalls: 0, unproductiveStreak: 0, startedAt: now, lastActivity: now };
      this.budgets.set(conversationId, budget);
    }
    return budget;
  }

  snapshot(conversationId: string): CallBudget {
    return { ...this.get(conversationId) };
  }

  check(conversationId: string): BudgetExceededReason | null {
    const budget = this.get(conversationId);
    if (budget.totalCalls >= this.limits.maxCalls) return 'total_calls';
    if (budget.unproductiveStreak >= this.limits.maxUnproductive) return 'unproductive_retrievals';
    return null;
  }

  limitFor(reason: BudgetExceededReason): number {
    return reason === 'total_calls' ? this.limits.maxCalls : this.limits.maxUnproductive;
  }

  record(conversationId: string, outcome: CallOutcome): CallBudget {
    const budget = this.get(conversationId);
    budget.totalCalls++;
    if (outcome === 'productive') budget.unproductiveStreak = 0;
    else if (outcome === 'unproductive') budget.unproductiveStreak++;
    budget.lastActivity = this.now();
    return { ...budget };
  }

  reset(conversationId: string): void {
    this.budgets.delete(conversationId);
  }

  /**
   * Runs `task` after every earlier task of the same conversation has settled.
   */
  runExclusive<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(conversationId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(conversationId, tail);
    void tail.then(() => {
      if (this.queues.get(conversationId) === tail) {
        this.queues.delete(conversationId);
      }
    });
    return run;
  }

  private evictIdle(): void {
    const cutoff = this.now() - this.limits.idleTtlMs;
    for (const [id, budget] of this.budgets) {
      if (budget.lastActivity < cutoff && !this.queues.has(id)) {
        this.budgets.delete(id);
      }
    }
  }
}
