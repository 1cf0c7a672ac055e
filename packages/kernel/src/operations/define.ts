/**
 * Toolgate Kernel: Operation Definitions
 *
 * defineOperation() turns a typed specification (zod input schema plus
 * execute/preview functions) into an OperationHandler: the type-erased form
 * the registry stores. Argument types stay precise inside the definition
 * and are checked at the boundary by bind(), which is the only way to get
 * an invocable unit out of a handler.
 */

import { z } from 'zod';
import { isJsonObject } from '../json.js';
import type { ChangePreview } from '../types/confirmation.js';
import type { JsonSchema, OperationAction, OperationCategory } from '../types/operation.js';
import { isMutatingAction } from '../types/operation.js';
import type { ValidationIssue, ValidationResult } from '../types/validation.js';

/** Per-invocation context handed to execute() and preview(). */
export interface OperationContext {
  readonly operation: string;
  /** Set when the invocation runs as a batch job. */
  readonly job_id?: string | undefined;
}

/**
 * The authoring form of an operation.
 *
 * `S` is the services object the gateway injects (e.g. a controller client).
 * Mutating actions must supply preview(); defineOperation() throws otherwise.
 * preview() must not change any external state.
 */
export interface OperationSpec<S, A, R> {
  readonly name: string;
  readonly description: string;
  readonly category: OperationCategory;
  readonly action: OperationAction;
  readonly input: z.ZodType<A>;
  readonly output?: z.ZodType<R> | undefined;
  execute(args: A, services: S, context: OperationContext): Promise<R>;
  preview?(args: A, services: S, context: OperationContext): Promise<ChangePreview>;
}

/** Arguments already validated and bound to one operation. */
export interface BoundInvocation<S> {
  execute(services: S, context: OperationContext): Promise<unknown>;
  readonly preview?: ((services: S, context: OperationContext) => Promise<ChangePreview>) | undefined;
}

/** The stored, type-erased form of an operation. */
export interface OperationHandler<S> {
  readonly name: string;
  readonly description: string;
  readonly category: OperationCategory;
  readonly action: OperationAction;
  readonly mutating: boolean;
  readonly input_schema: JsonSchema;
  readonly output_schema?: JsonSchema | undefined;
  /** Validate raw arguments and bind them for execution. */
  bind(args: unknown): ValidationResult<BoundInvocation<S>>;
}

/** Published description of the confirm flag on mutating operations. */
export const CONFIRM_PROPERTY_SCHEMA: JsonSchema = {
  type: 'boolean',
  default: false,
  description: 'Set to true to apply the change. When false, a preview is returned and nothing changes.',
};

/**
 * Build an OperationHandler from its specification.
 *
 * @throws {Error} If a mutating operation has no preview, or if a schema
 *   cannot be expressed as JSON Schema
 */
export function defineOperation<S, A, R>(spec: OperationSpec<S, A, R>): OperationHandler<S> {
  const mutating = isMutatingAction(spec.action);
  if (mutating && spec.preview === undefined) {
    throw new Error(
      `Operation ${spec.name} performs '${spec.action}' and must define preview()`,
    );
  }

  const inputSchema = toJsonSchema(spec.input, spec.name);
  const preview = spec.preview?.bind(spec);

  return {
    name: spec.name,
    description: spec.description,
    category: spec.category,
    action: spec.action,
    mutating,
    input_schema: mutating ? withConfirmProperty(inputSchema) : inputSchema,
    output_schema: spec.output !== undefined ? toJsonSchema(spec.output, spec.name) : undefined,

    bind(args: unknown): ValidationResult<BoundInvocation<S>> {
      const parsed = spec.input.safeParse(args);
      if (!parsed.success) {
        return {
          ok: false,
          errors: parsed.error.issues.map((issue) => toValidationIssue(issue.path, issue.message)),
        };
      }
      const value = parsed.data;
      return {
        ok: true,
        value: {
          execute: (services: S, context: OperationContext) => spec.execute(value, services, context),
          preview: preview && ((services: S, context: OperationContext) => preview(value, services, context)),
        },
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function toJsonSchema(schema: z.ZodType, operation: string): JsonSchema {
  const generated: unknown = z.toJSONSchema(schema, { io: 'input', unrepresentable: 'any' });
  if (!isJsonObject(generated)) {
    throw new Error(`Schema for ${operation} did not produce a JSON Schema object`);
  }
  return generated;
}

function withConfirmProperty(schema: JsonSchema): JsonSchema {
  const properties = isJsonObject(schema['properties']) ? schema['properties'] : {};
  return {
    ...schema,
    properties: { ...properties, confirm: CONFIRM_PROPERTY_SCHEMA },
  };
}

function toValidationIssue(path: ReadonlyArray<PropertyKey>, message: string): ValidationIssue {
  const context = path.map(String).join('.');
  return context === '' ? { message } : { message, context };
}
