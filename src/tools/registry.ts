/**
 * Tool Registration and Invocation
 *
 * Tools are registered once with zod input/output schemas and a handler.
 * The registry publishes JSON Schema descriptors for tools/list and turns
 * every invocation into a ToolOutcome value: invoke() never throws.
 */

import { z } from 'zod';
import type { ToolError } from '../protocol/errors.js';
import { type ToolCallContext, ToolCancelledError, ToolTimeoutError, executeWithTimeout } from './executor.js';

// =============================================================================
// JSON Schema Types
// =============================================================================

/**
 * JSON Schema 2020-12 compatible schema type
 */
export interface JsonSchema {
  type?: string | string[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: unknown[];
  const?: unknown;
  description?: string;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  [key: string]: unknown;
}

// =============================================================================
// Tool Annotations
// =============================================================================

/**
 * Tool behavior hints for clients
 */
export interface ToolAnnotations {
  /** Tool has no side effects (safe to call without user confirmation) */
  readOnlyHint?: boolean;
  /** Tool may modify or delete data */
  destructiveHint?: boolean;
  /** Safe to call multiple times with same arguments */
  idempotentHint?: boolean;
  /** May access external services or APIs */
  openWorldHint?: boolean;
}

// =============================================================================
// Tool Definition
// =============================================================================

/**
 * What a tool declares about itself. Schemas are zod; descriptors derive
 * their JSON Schema from them.
 */
export interface ToolDefinition<TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny> {
  /** Unique tool name (lowercase_with_underscores) */
  name: string;
  /** Human-readable display name */
  title?: string;
  /** Clear description for the model */
  description: string;
  inputSchema: TInput;
  outputSchema: TOutput;
  annotations?: ToolAnnotations;
}

export type ToolHandler<TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny> = (
  input: z.output<TInput>,
  context: ToolCallContext
) => Promise<z.input<TOutput>> | z.input<TOutput>;

/**
 * Tool as published by tools/list (no handler)
 */
export interface ToolDescriptor {
  name: string;
  title?: string;
  description: string;
  inputSchema: JsonSchema;
  outputSchema: JsonSchema;
  annotations?: ToolAnnotations;
}

export type ToolOutcome = { ok: true; value: unknown } | { ok: false; error: ToolError };

export interface InvokeOptions {
  /** Overrides the registry's default deadline */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ToolRegistryOptions {
  /** Default handler deadline in milliseconds (default: 30000) */
  toolTimeoutMs?: number;
}

/**
 * Type-erased registration: the closure keeps the tool's own schema types.
 */
interface RegisteredTool {
  descriptor: ToolDescriptor;
  run(args: unknown, options: { timeoutMs: number; signal?: AbortSignal }): Promise<ToolOutcome>;
}

// =============================================================================
// Zod Schemas for Validation
// =============================================================================

/**
 * Tool name validation pattern (lowercase_with_underscores)
 */
export const ToolNamePattern = /^[a-z][a-z0-9_]*$/;

export const ToolNameSchema = z
  .string()
  .regex(ToolNamePattern, 'Tool name must be lowercase with underscores, starting with a letter');

// =============================================================================
// Errors
// =============================================================================

export class DuplicateToolError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
  }
}

export class InvalidToolDefinitionError extends Error {
  constructor(toolName: string, reason: string) {
    super(`Invalid tool '${toolName}': ${reason}`);
    this.name = 'InvalidToolDefinitionError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

export const DEFAULT_TOOL_TIMEOUT_MS = 30000;

/**
 * One-line summary of zod issues, e.g. "location: Required; days: Expected number"
 */
export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function issueDetail(issues: z.ZodIssue[]): Array<{ path: string; message: string }> {
  return issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

function failureMessage(error: unknown): string {
  if (error instanceof ToolTimeoutError || error instanceof ToolCancelledError) {
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Tool Registry
// =============================================================================

/**
 * @example
 * ```typescript
 * const registry = new ToolRegistry({ toolTimeoutMs: 5000 });
 * registry.register(
 *   { name: 'echo', description: 'Echo text', inputSchema: EchoIn, outputSchema: EchoOut },
 *   ({ text }) => ({ text })
 * );
 *
 * const outcome = await registry.invoke('echo', { text: 'hi' });
 * if (outcome.ok) console.log(outcome.value);
 * ```
 */
export class ToolRegistry {
  private readonly tools: Map<string, RegisteredTool> = new Map();
  private readonly toolTimeoutMs: number;

  constructor(options: ToolRegistryOptions = {}) {
    this.toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  /**
   * Register a tool. Never overwrites.
   * @throws InvalidToolDefinitionError for a bad name or empty description
   * @throws DuplicateToolError if the name is taken
   */
  register<TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny>(
    definition: ToolDefinition<TInput, TOutput>,
    handler: ToolHandler<TInput, TOutput>
  ): ToolDescriptor {
    const nameValidation = ToolNameSchema.safeParse(definition.name);
    if (!nameValidation.success) {
      throw new InvalidToolDefinitionError(definition.name, formatIssues(nameValidation.error.issues));
    }
    if (definition.description.trim() === '') {
      throw new InvalidToolDefinitionError(definition.name, 'description must not be empty');
    }
    if (this.tools.has(definition.name)) {
      throw new DuplicateToolError(definition.name);
    }

    const descriptor = toDescriptor(definition);
    const { name, inputSchema, outputSchema } = definition;

    const run: RegisteredTool['run'] = async (args, options) => {
      const input = inputSchema.safeParse(args);
      if (!input.success) {
        return {
          ok: false,
          error: {
            kind: 'InvalidParams',
            message: formatIssues(input.error.issues),
            detail: issueDetail(input.error.issues),
          },
        };
      }

      let raw: unknown;
      try {
        raw = await executeWithTimeout(name, (context) => handler(input.data, context), options);
      } catch (error) {
        return { ok: false, error: { kind: 'ExecutionFailed', message: failureMessage(error) } };
      }

      const output = outputSchema.safeParse(raw);
      if (!output.success) {
        return {
          ok: false,
          error: {
            kind: 'ExecutionFailed',
            message: `Tool produced invalid output: ${formatIssues(output.error.issues)}`,
            detail: issueDetail(output.error.issues),
          },
        };
      }
      return { ok: true, value: output.data };
    };

    this.tools.set(name, { descriptor, run });
    return descriptor;
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Descriptors in registration order
   */
  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (tool) => tool.descriptor);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Validate `args`, run the handler under its deadline and validate the
   * result. Never throws.
   */
  async invoke(name: string, args: unknown, options: InvokeOptions = {}): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, error: { kind: 'UnknownTool', message: `Unknown tool: ${name}` } };
    }

    const runOptions: { timeoutMs: number; signal?: AbortSignal } = {
      timeoutMs: options.timeoutMs ?? this.toolTimeoutMs,
    };
    if (options.signal !== undefined) {
      runOptions.signal = options.signal;
    }

    try {
      return await tool.run(args, runOptions);
    } catch (error) {
      // run() handles its own failures; this only guards against schema bugs
      return { ok: false, error: { kind: 'ExecutionFailed', message: failureMessage(error) } };
    }
  }
}

function toDescriptor<TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny>(
  definition: ToolDefinition<TInput, TOutput>
): ToolDescriptor {
  const descriptor: ToolDescriptor = {
    name: definition.name,
    description: definition.description,
    inputSchema: zodToJsonSchema(definition.inputSchema),
    outputSchema: zodToJsonSchema(definition.outputSchema),
  };

  if (definition.title !== undefined) {
    descriptor.title = definition.title;
  }

  if (definition.annotations !== undefined) {
    descriptor.annotations = definition.annotations;
  }

  return descriptor;
}

// =============================================================================
// Zod to JSON Schema
// =============================================================================

/**
 * Convert a Zod schema to JSON Schema. Covers the types tool schemas use:
 * objects, strings, numbers, booleans, arrays, enums, literals and the
 * optional/nullable/default wrappers. Anything else maps to `{}`.
 */
export function zodToJsonSchema(zodType: z.ZodTypeAny): JsonSchema {
  const schema = convert(zodType);
  if (zodType.description !== undefined && schema.description === undefined) {
    schema.description = zodType.description;
  }
  return schema;
}

function convert(zodType: z.ZodTypeAny): JsonSchema {
  if (zodType instanceof z.ZodOptional) {
    return zodToJsonSchema(zodType.unwrap());
  }

  if (zodType instanceof z.ZodDefault) {
    const inner = zodToJsonSchema(zodType.removeDefault());
    return { ...inner, default: zodType._def.defaultValue() };
  }

  if (zodType instanceof z.ZodNullable) {
    const inner = zodToJsonSchema(zodType.unwrap());
    return { ...inner, nullable: true };
  }

  if (zodType instanceof z.ZodObject) {
    const properties: Record<string, JsonSchema> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries<z.ZodTypeAny>(zodType.shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    const result: JsonSchema = { type: 'object', properties };
    if (required.length > 0) {
      result.required = required;
    }
    return result;
  }

  if (zodType instanceof z.ZodString) {
    const result: JsonSchema = { type: 'string' };
    if (zodType.minLength !== null) result.minLength = zodType.minLength;
    if (zodType.maxLength !== null) result.maxLength = zodType.maxLength;
    return result;
  }

  if (zodType instanceof z.ZodNumber) {
    const result: JsonSchema = { type: zodType.isInt ? 'integer' : 'number' };
    if (zodType.minValue !== null) result.minimum = zodType.minValue;
    if (zodType.maxValue !== null) result.maximum = zodType.maxValue;
    return result;
  }

  if (zodType instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }

  if (zodType instanceof z.ZodArray) {
    return { type: 'array', items: zodToJsonSchema(zodType.element) };
  }

  if (zodType instanceof z.ZodEnum) {
    return { type: 'string', enum: [...zodType.options] };
  }

  if (zodType instanceof z.ZodLiteral) {
    return { const: zodType.value };
  }

  return {};
}
