export type ToolErrorKind =
  | 'unknown_tool'
  | 'invalid_argument'
  | 'budget_exceeded'
  | 'tool_execution'
  | 'duplicate_tool';

export interface SerializedToolError {
  kind: ToolErrorKind;
  tool: string;
  message: string;
  parameter?: string;
  reason?: BudgetExceededReason;
}

export type BudgetExceededReason = 'total_calls' | 'unproductive_retrievals';

/**
 * Base of every error that crosses the dispatch boundary. `kind` is stable and
 * referenced by the external agent configuration.
 */
export abstract class ToolError extends Error {
  abstract readonly kind: ToolErrorKind;

  constructor(readonly tool: string, message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): SerializedToolError {
    return { kind: this.kind, tool: this.tool, message: this.message };
  }
}

export class DuplicateToolError extends ToolError {
  readonly kind = 'duplicate_tool';

  constructor(tool: string) {
    super(tool, `Tool '${tool}' is already registered`);
  }
}

export class UnknownToolError extends ToolError {
  readonly kind = 'unknown_tool';

  constructor(tool: string, available: readonly string[]) {
    super(tool, `Tool '${tool}' not found. Available tools: ${available.join(', ')}`);
  }
}

export class InvalidArgumentError extends ToolError {
  readonly kind = 'invalid_argument';

  constructor(tool: string, readonly parameter: string, message: string) {
    super(tool, `Invalid arguments for tool '${tool}': ${message}`);
  }

  toJSON(): SerializedToolError {
    return { ...super.toJSON(), parameter: this.parameter };
  }
}

/** Terminal signal: the caller should stop calling tools and answer with a fallback. */
export class BudgetExceededError extends ToolError {
  readonly kind = 'budget_exceeded';

  constructor(tool: string, readonly reason: BudgetExceededReason, limit: number) {
    super(
      tool,
      reason === 'total_calls'
        ? `Tool call limit of ${limit} reached for this conversation`
        : `${limit} consecutive retrievals found nothing relevant`
    );
  }

  toJSON(): SerializedToolError {
    return { ...super.toJSON(), reason: this.reason };
  }
}

export class ToolExecutionError extends ToolError {
  readonly kind = 'tool_execution';

  constructor(tool: string, readonly causeText: string, readonly timedOut = false) {
    super(tool, `Error executing ${tool}: ${causeText}`);
  }
}
