export type ParameterType = 'string' | 'number' | 'integer' | 'boolean';

export interface ParameterSpec {
  type: ParameterType;
  required: boolean;
  description: string;
  minimum?: number;
}

export type ToolParameters = Record<string, ParameterSpec>;

export type ToolArguments = Record<string, unknown>;

export interface ToolContext {
  conversationId: string;
  signal: AbortSignal;
}

export interface RetrievalSignal {
  /** Best similarity of the call, or null when nothing came back */
  bestScore: number | null;
}

export interface ToolResult {
  content: string;
  data?: Record<string, unknown>;
  /** Present only for retrieval tools; drives the unproductive-call guardrail */
  retrieval?: RetrievalSignal;
}

export interface ArgumentIssue {
  parameter: string;
  message: string;
}

function matchesType(value: unknown, type: ParameterType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

// 工具基类：参数校验与 schema 输出
export abstract class Tool {
  abstract get name(): string;
  abstract get description(): string;
  abstract get parameters(): ToolParameters;

  /** Retrieval tools feed the unproductive-call counter. */
  get isRetrieval(): boolean {
    return false;
  }

  abstract execute(args: ToolArguments, context: ToolContext): Promise<ToolResult>;

  /**
   * Checks arguments against the declared parameters without coercing anything.
   * Returns the first problem found, in declaration order.
   */
  validateArgs(args: ToolArguments): ArgumentIssue | null {
    const schema = this.parameters;

    for (const [parameter, spec] of Object.entries(schema)) {
      // Own keys only: inherited names such as `constructor` are never arguments
      const value = Object.hasOwn(args, parameter) ? args[parameter] : undefined;
      if (value === undefined || value === null) {
        if (spec.required) {
          return { parameter, message: `Missing required parameter: ${parameter}` };
        }
        continue;
      }
      if (!matchesType(value, spec.type)) {
        return { parameter, message: `Parameter '${parameter}' must be of type ${spec.type}` };
      }
      if (spec.minimum !== undefined && typeof value === 'number' && value < spec.minimum) {
        return { parameter, message: `Parameter '${parameter}' must be at least ${spec.minimum}` };
      }
    }

    for (const parameter of Object.keys(args)) {
      if (!Object.hasOwn(schema, parameter)) {
        return { parameter, message: `Unknown parameter: ${parameter}` };
      }
    }
    return null;
  }

  toSchema(): Record<string, unknown> {
    const properties: Record<string, Record<string, unknown>> = {};
    for (const [parameter, spec] of Object.entries(this.parameters)) {
      properties[parameter] = {
        type: spec.type,
        description: spec.description,
        ...(spec.minimum !== undefined ? { minimum: spec.minimum } : {}),
      };
    }
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: {
          type: 'object',
          properties,
          required: Object.entries(this.parameters)
            .filter(([, spec]) => spec.required)
            .map(([parameter]) => parameter),
        },
      },
    };
  }
}

/** Narrowing helpers for use after validateArgs has passed. */
export function stringArg(args: ToolArguments, name: string): string {
  const value = Object.hasOwn(args, name) ? args[name] : undefined;
  if (typeof value !== 'string') throw new TypeError(`Argument '${name}' is not a string`);
  return value;
}

export function numberArg(args: ToolArguments, name: string): number;
export function numberArg(args: ToolArguments, name: string, fallback: number): number;
export function numberArg(args: ToolArguments, name: string, fallback?: number): number {
  const value = Object.hasOwn(args, name) ? args[name] : undefined;
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    throw new TypeError(`Argument '${name}' is missing`);
  }
  if (typeof value !== 'number') throw new TypeError(`Argument '${name}' is not a number`);
  return value;
}
