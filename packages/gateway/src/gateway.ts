/**
 * Toolgate Gateway: Discovery/Dispatch Surface
 *
 * The four entry points a caller sees: Discovery, Dispatch, Batch Submit,
 * and Batch Status. All of them return wire objects; none of them throws.
 *
 * Invocation pipeline (shared by Dispatch and batch jobs):
 *   1. Resolve the operation in the registry (unknown / denied / load error)
 *   2. Check `confirm` is boolean when present; strip it for mutating ops
 *   3. Validate and bind arguments against the operation's input schema
 *   4. Route through the confirmation protocol (preview or execute)
 *   5. Record a DecisionLog entry, whatever happened
 *
 * Resolution precedes argument validation, so a denied operation reports
 * PERMISSION_DENIED for any arguments.
 */

import type { Logger } from 'pino';
import { pino } from 'pino';
import {
  ArgumentValidationError,
  ConfirmationProtocol,
  DecisionLogger,
  DispatchDecision,
  GatewayError,
  GatewayErrorCode,
  HandlerError,
  computeInputHash,
  errorMessage,
} from '@toolgate/kernel';
import type {
  BatchJobStatus,
  BatchStatusResponse,
  BatchSubmitResponse,
  ConfirmationRequired,
  DecisionLog,
  DiscoveryResponse,
  DispatchFailure,
  DispatchResponse,
  DispatchSuccess,
  Job,
  JobError,
  LogSink,
  OperationDescriptor,
  ToolSummary,
} from '@toolgate/kernel';
import type { OperationRegistry } from '@toolgate/operation-loader';
import { DEFAULT_MAX_PAYLOAD_CHARS, truncatePayload } from './diagnostics.js';
import { JobManager } from './job-manager.js';
import type { JobOutcome } from './job-manager.js';
import type { JobStore } from './job-store.js';
import {
  BatchStatusRequestSchema,
  BatchSubmitRequestSchema,
  DispatchRequestSchema,
  requestedTool,
  toIssues,
} from './requests.js';

/** The result of one pass through the invocation pipeline. */
export type InvocationOutcome =
  | { readonly ok: true; readonly response: DispatchSuccess | ConfirmationRequired }
  | { readonly ok: false; readonly error: GatewayError };

export interface GatewayOptions<S> {
  readonly registry: OperationRegistry<S>;
  /** Injected into every handler call. */
  readonly services: S;
  readonly confirmation?: ConfirmationProtocol | undefined;
  readonly logger?: Logger | undefined;
  /** Decision log destination. Entries are dropped when omitted. */
  readonly logSink?: LogSink | undefined;
  readonly jobs?: {
    readonly store?: JobStore | undefined;
    readonly idGenerator?: (() => string) | undefined;
  } | undefined;
  readonly clock?: (() => Date) | undefined;
  /** Cap for result payloads written to debug logs. */
  readonly maxPayloadChars?: number | undefined;
}

export class OperationGateway<S> {
  readonly jobs: JobManager;
  private readonly registry: OperationRegistry<S>;
  private readonly services: S;
  private readonly confirmation: ConfirmationProtocol;
  private readonly decisions: DecisionLogger;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly maxPayloadChars: number;

  constructor(options: GatewayOptions<S>) {
    this.registry = options.registry;
    this.services = options.services;
    this.confirmation = options.confirmation ?? new ConfirmationProtocol();
    this.decisions = new DecisionLogger(options.logSink);
    const root = options.logger ?? pino({ level: 'silent' });
    this.logger = root.child({ component: 'gateway' });
    this.clock = options.clock ?? (() => new Date());
    this.maxPayloadChars = options.maxPayloadChars ?? DEFAULT_MAX_PAYLOAD_CHARS;
    this.jobs = new JobManager((operation, args, context) => this.runJob(operation, args, context.job_id), {
      logger: root,
      clock: this.clock,
      idGenerator: options.jobs?.idGenerator,
      store: options.jobs?.store,
    });
  }

  // ---------------------------------------------------------------------------
  // Discovery
  // ---------------------------------------------------------------------------

  /**
   * List every registered operation, denied ones included, sorted by name.
   * Never loads a handler or consults the gate.
   */
  discover(): DiscoveryResponse {
    const tools = this.registry
      .snapshot()
      .map((entry): ToolSummary => ({
        name: entry.descriptor.name,
        description: entry.descriptor.description,
        category: entry.descriptor.category,
        action: entry.descriptor.action,
        mutating: entry.descriptor.mutating,
        status: entry.status,
        schema: schemaOf(entry.descriptor),
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
    return { tools, count: tools.length };
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  /** Execute (or preview) one operation and wait for it. Never throws. */
  async dispatch(request: unknown): Promise<DispatchResponse> {
    const parsed = DispatchRequestSchema.safeParse(request);
    if (!parsed.success) {
      const error = new GatewayError(
        GatewayErrorCode.ValidationError,
        'Malformed dispatch request',
        toIssues(parsed.error),
      );
      this.recordRejected(requestedTool(request), request, error);
      return toFailure(error);
    }
    const outcome = await this.invoke(parsed.data.tool, parsed.data.arguments ?? {});
    return outcome.ok ? outcome.response : toFailure(outcome.error);
  }

  // ---------------------------------------------------------------------------
  // Batch
  // ---------------------------------------------------------------------------

  /** Submit operations as background jobs. Returns one job id per operation, in order. */
  submitBatch(request: unknown): BatchSubmitResponse | DispatchFailure {
    const parsed = BatchSubmitRequestSchema.safeParse(request);
    if (!parsed.success) {
      return toFailure(
        new GatewayError(GatewayErrorCode.ValidationError, 'Malformed batch request', toIssues(parsed.error)),
      );
    }
    const jobs = parsed.data.operations.map((op, index) => ({
      index,
      tool: op.tool,
      jobId: this.jobs.submit(op.tool, op.arguments ?? {}),
    }));
    this.logger.info({ jobs: jobs.length }, 'batch submitted');
    return { jobs };
  }

  /** Report status for each job id, in request order. Unknown ids are reported, not rejected. */
  batchStatus(request: unknown): BatchStatusResponse | DispatchFailure {
    const parsed = BatchStatusRequestSchema.safeParse(request);
    if (!parsed.success) {
      return toFailure(
        new GatewayError(GatewayErrorCode.ValidationError, 'Malformed status request', toIssues(parsed.error)),
      );
    }
    return {
      jobs: this.jobs.statusBatch(parsed.data.jobIds).map(({ id, job }) => toJobStatus(id, job)),
    };
  }

  // ---------------------------------------------------------------------------
  // Invocation pipeline
  // ---------------------------------------------------------------------------

  /**
   * Run one invocation through resolve → validate → confirm → execute and
   * record the decision.
   */
  async invoke(
    operation: string,
    args: Readonly<Record<string, unknown>>,
    jobId?: string,
  ): Promise<InvocationOutcome> {
    const started = performance.now();
    let descriptor: OperationDescriptor | undefined;
    let confirmed = false;
    let decision = DispatchDecision.Failed;
    let outcome: InvocationOutcome | undefined;

    try {
      const resolved = await this.registry.resolve(operation);
      descriptor = resolved.entry?.descriptor;
      if (!resolved.ok) {
        decision = decisionFor(resolved.error.code);
        outcome = { ok: false, error: resolved.error };
        return outcome;
      }
      const { handler } = resolved;
      descriptor = resolved.entry.descriptor;

      const confirm = args['confirm'];
      if (confirm !== undefined && typeof confirm !== 'boolean') {
        decision = DispatchDecision.Invalid;
        outcome = {
          ok: false,
          error: new ArgumentValidationError(operation, [
            { message: 'confirm must be a boolean', context: 'confirm' },
          ]),
        };
        return outcome;
      }
      confirmed = this.confirmation.isConfirmed(descriptor, confirm === true);

      const bound = handler.bind(descriptor.mutating ? withoutConfirm(args) : args);
      if (!bound.ok) {
        decision = DispatchDecision.Invalid;
        outcome = { ok: false, error: new ArgumentValidationError(operation, bound.errors) };
        return outcome;
      }

      try {
        const result = await this.confirmation.run(
          descriptor,
          confirm === true,
          bound.value,
          this.services,
          { operation, job_id: jobId },
        );
        if (result.kind === 'preview') {
          decision = DispatchDecision.Previewed;
          outcome = { ok: true, response: result.response };
        } else {
          decision = DispatchDecision.Executed;
          outcome = { ok: true, response: { success: true, data: result.data } };
        }
      } catch (err: unknown) {
        decision = DispatchDecision.Failed;
        outcome = { ok: false, error: new HandlerError(operation, err) };
      }
      return outcome;
    } finally {
      const duration_ms = Math.round((performance.now() - started) * 1000) / 1000;
      const error = outcome !== undefined && !outcome.ok ? outcome.error.message : undefined;
      this.recordDecision({
        operation,
        category: descriptor?.category,
        action: descriptor?.action,
        decision,
        confirmed,
        job_id: jobId,
        input_hash: computeInputHash(operation, args),
        duration_ms,
        error,
        timestamp: this.clock().toISOString(),
      });
      this.logger.info({ operation, decision, confirmed, job_id: jobId, duration_ms }, 'invocation');
      if (outcome !== undefined && outcome.ok) {
        this.logger.debug(
          { operation, payload: truncatePayload(outcome.response, this.maxPayloadChars) },
          'invocation result',
        );
      } else if (error !== undefined) {
        this.logger.warn({ operation, err: error }, 'invocation rejected');
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private async runJob(
    operation: string,
    args: Readonly<Record<string, unknown>>,
    jobId: string,
  ): Promise<JobOutcome> {
    const outcome = await this.invoke(operation, args, jobId);
    if (outcome.ok) {
      return { ok: true, result: outcome.response };
    }
    return { ok: false, error: toJobError(outcome.error) };
  }

  /**
   * Append to the decision log. A failing sink is reported on the
   * operational log; it never replaces the outcome of the invocation.
   */
  private recordDecision(entry: DecisionLog): void {
    try {
      this.decisions.record(entry);
    } catch (err: unknown) {
      this.logger.error(
        { operation: entry.operation, decision: entry.decision, job_id: entry.job_id, err: errorMessage(err) },
        'decision log write failed',
      );
    }
  }

  private recordRejected(operation: string, request: unknown, error: GatewayError): void {
    this.recordDecision({
      operation,
      decision: DispatchDecision.Invalid,
      confirmed: false,
      input_hash: computeInputHash(operation, request),
      duration_ms: 0,
      error: error.message,
      timestamp: this.clock().toISOString(),
    });
    this.logger.warn({ operation, err: error.message }, 'malformed request');
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function schemaOf(descriptor: OperationDescriptor): ToolSummary['schema'] {
  return descriptor.output_schema !== undefined
    ? { input: descriptor.input_schema, output: descriptor.output_schema }
    : { input: descriptor.input_schema };
}

function withoutConfirm(args: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const { confirm: _confirm, ...rest } = args;
  return rest;
}

function decisionFor(code: GatewayErrorCode): DispatchDecision {
  switch (code) {
    case GatewayErrorCode.UnknownOperation:
      return DispatchDecision.Unknown;
    case GatewayErrorCode.PermissionDenied:
      return DispatchDecision.Denied;
    case GatewayErrorCode.LoadError:
      return DispatchDecision.LoadFailed;
    case GatewayErrorCode.ValidationError:
      return DispatchDecision.Invalid;
    case GatewayErrorCode.HandlerError:
      return DispatchDecision.Failed;
  }
}

function toFailure(error: GatewayError): DispatchFailure {
  return {
    success: false,
    error: error.message,
    code: error.code,
    ...(error.details !== undefined ? { details: error.details } : {}),
  };
}

function toJobError(error: GatewayError): JobError {
  return {
    code: error.code,
    message: error.message,
    ...(error.details !== undefined ? { details: error.details } : {}),
  };
}

function toJobStatus(id: string, job: Job | undefined): BatchJobStatus {
  if (job === undefined) {
    return { jobId: id, status: 'unknown', error: `Unknown job id: ${id}` };
  }
  return {
    jobId: id,
    status: job.status,
    ...(job.result !== undefined ? { result: job.result } : {}),
    ...(job.error !== undefined ? { error: job.error.message, code: job.error.code } : {}),
  };
}
