import { z, type ZodTypeAny } from 'zod';
import { ErrorCode, errorForType, type ErrorType } from '../errors/index.js';
import { formatIssues } from '../validation/toolSchemas.js';

export interface ParameterDescriptor {
  type: 'string' | 'integer' | 'boolean' | 'array';
  description: string;
  required: boolean;
  default?: string | number | boolean;
  enum?: readonly string[];
}

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: Record<string, ParameterDescriptor>;
}

export interface ToolContext {
  signal: AbortSignal;
}

export interface Tool extends ToolDescriptor {
  /** Error type raised when the arguments do not validate */
  failureType: ErrorType;
  invoke(rawArgs: unknown, context: ToolContext): Promise<unknown>;
}

interface ToolDefinition<S extends ZodTypeAny, R> extends ToolDescriptor {
  failureType: ErrorType;
  schema: S;
  handler: (args: z.output<S>, context: ToolContext) => Promise<R>;
}

export function defineTool<S extends ZodTypeAny, R>(definition: ToolDefinition<S, R>): Tool {
  const { name, description, parameters, failureType, schema, handler } = definition;
  return {
    name,
    description,
    parameters,
    failureType,
    async invoke(rawArgs, context) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw errorForType(failureType, formatIssues(parsed.error), {
          code: ErrorCode.VALIDATION_INPUT_INVALID,
          context: { service: 'ToolRegistry', operation: name },
        });
      }
      return handler(parsed.data, context);
    },
  };
}

/**
 * Name-indexed tool lookup
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: Tool[]) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  describe(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description, parameters }) => ({ name, description, parameters }));
  }
}
