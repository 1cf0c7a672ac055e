/**
 * Toolgate Gateway: Discovery/Dispatch Surface Tests
 *
 * Scenarios:
 *   GW-S1: denied operation is discoverable but not dispatchable
 *   GW-S2: toggle preview then confirmed execution
 *   GW-S3: batch of three runs to completion, results match dispatch
 *
 * Properties:
 *   GW-I1: a denied operation returns PERMISSION_DENIED for any arguments
 *   GW-I2: an unconfirmed mutating call changes nothing and repeats identically
 *   GW-I3: consecutive Discovery calls are identical
 *   GW-I4: N submitted operations yield N ids and N status entries, all terminal
 *   GW-I5: a batch result equals the direct Dispatch result
 *   GW-I6: concurrent first dispatches of a lazy operation load once
 *
 * Unit tests (GW-U1–GW-U10):
 *   GW-U1: malformed requests are VALIDATION_ERROR
 *   GW-U2: non-boolean confirm is VALIDATION_ERROR
 *   GW-U3: arguments failing the input schema are VALIDATION_ERROR with paths
 *   GW-U4: handler failures are HANDLER_ERROR with the underlying message
 *   GW-U5: unknown operations are UNKNOWN_OPERATION
 *   GW-U6: auto-confirm executes without confirm
 *   GW-U7: every invocation writes one decision log entry
 *   GW-U8: unknown job ids report status 'unknown'
 *   GW-U9: a failing job does not affect its neighbours
 *   GW-U10: a throwing log sink does not change the outcome
 */

import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import {
  ConfirmationProtocol,
  DispatchDecision,
  GatewayErrorCode,
  JobStatus,
  OperationAction,
  OperationCategory,
  PermissionGate,
  RegistrationStatus,
  computeInputHash,
} from '@toolgate/kernel';
import type { BatchStatusResponse, BatchSubmitResponse, DispatchFailure, LogSink } from '@toolgate/kernel';
import { OperationRegistry } from '@toolgate/operation-loader';
import { OperationGateway } from '../src/gateway.js';
import {
  FIXTURE_MODULE,
  MemoryLogSink,
  countingLoader,
  fakeServices,
  fixtureRegistry,
} from './fixtures.js';
import type { FakeServices } from './fixtures.js';

function makeGateway(opts: { autoConfirm?: boolean; sink?: MemoryLogSink } = {}): {
  gateway: OperationGateway<FakeServices>;
  services: FakeServices;
} {
  const services = fakeServices();
  const gateway = new OperationGateway<FakeServices>({
    registry: fixtureRegistry(),
    services,
    confirmation: new ConfirmationProtocol(opts.autoConfirm ?? false),
    logSink: opts.sink,
  });
  return { gateway, services };
}

function isFailure(value: BatchSubmitResponse | BatchStatusResponse | DispatchFailure): value is DispatchFailure {
  return 'success' in value;
}

function submitted(value: BatchSubmitResponse | DispatchFailure): BatchSubmitResponse {
  if (isFailure(value)) throw new Error(`batch rejected: ${value.error}`);
  return value;
}

function statuses(value: BatchStatusResponse | DispatchFailure): BatchStatusResponse {
  if (isFailure(value)) throw new Error(`status rejected: ${value.error}`);
  return value;
}

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

describe('scenarios', () => {
  it('GW-S1: a denied operation is listed but not dispatchable', async () => {
    const { gateway } = makeGateway();

    const names = gateway.discover().tools.map((t) => [t.name, t.status]);
    expect(names).toContainEqual(['net.create', RegistrationStatus.Denied]);
    expect(names).toContainEqual(['stat.read', RegistrationStatus.Callable]);

    expect(await gateway.dispatch({ tool: 'stat.read' })).toEqual({
      success: true,
      data: { site: 'default', uptime: 42 },
    });
    expect(await gateway.dispatch({ tool: 'net.create', arguments: { name: 'iot' } })).toEqual({
      success: false,
      error: 'Permission denied: net.create requires create on networks',
      code: GatewayErrorCode.PermissionDenied,
    });
  });

  it('GW-S2: an unconfirmed toggle previews, a confirmed one executes', async () => {
    const { gateway, services } = makeGateway();

    const preview = await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x', confirm: false } });
    expect(preview).toEqual({
      success: false,
      requires_confirmation: true,
      action: 'toggle',
      resource_type: 'firewall_policy',
      resource_id: 'x',
      preview: { current: { enabled: true }, proposed: { enabled: false } },
      message: 'Will disable firewall_policy x. Set confirm=true to execute.',
    });
    expect(services.rules.get('x')).toBe(true);

    const executed = await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x', confirm: true } });
    expect(executed).toEqual({ success: true, data: { enabled: false } });
    expect(services.rules.get('x')).toBe(false);
  });

  it('GW-S3: a batch of three completes and matches direct dispatch', async () => {
    const { gateway } = makeGateway();
    const operations = [
      { tool: 'stat.read', arguments: { site: 'a' } },
      { tool: 'stat.read', arguments: { site: 'b' } },
      { tool: 'toggleRule', arguments: { id: 'x' } },
    ];

    const { jobs } = submitted(gateway.submitBatch({ operations }));
    expect(jobs.map((j) => [j.index, j.tool])).toEqual([
      [0, 'stat.read'],
      [1, 'stat.read'],
      [2, 'toggleRule'],
    ]);
    const ids = jobs.map((j) => j.jobId);
    expect(new Set(ids).size).toBe(3);

    const early = statuses(gateway.batchStatus({ jobIds: ids }));
    expect(early.jobs.map((j) => j.status)).toEqual([JobStatus.Pending, JobStatus.Pending, JobStatus.Pending]);

    await gateway.jobs.settled();
    const done = statuses(gateway.batchStatus({ jobIds: ids }));
    expect(done.jobs.map((j) => j.status)).toEqual([JobStatus.Done, JobStatus.Done, JobStatus.Done]);

    for (const [index, op] of operations.entries()) {
      expect(done.jobs[index]?.result).toEqual(await gateway.dispatch(op));
    }
  });
});

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe('properties', () => {
  it('GW-I1: a denied operation is denied for any arguments', async () => {
    const { gateway, services } = makeGateway();
    const argumentSets = [{}, { name: 'iot' }, { name: 5 }, { confirm: true, name: 'iot' }, { confirm: 'yes' }];
    for (const args of argumentSets) {
      const response = await gateway.dispatch({ tool: 'net.create', arguments: args });
      expect(response).toMatchObject({ success: false, code: GatewayErrorCode.PermissionDenied });
    }
    expect(services.networks).toEqual([]);
  });

  it('GW-I2: unconfirmed calls change nothing and repeat identically', async () => {
    const { gateway, services } = makeGateway();
    const first = await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x' } });
    const second = await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x' } });
    const third = await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x', confirm: false } });
    expect(second).toEqual(first);
    expect(third).toEqual(first);
    expect(services.rules.get('x')).toBe(true);
  });

  it('GW-I3: consecutive discovery calls are identical and sorted', () => {
    const { gateway } = makeGateway();
    const first = gateway.discover();
    const second = gateway.discover();
    expect(second).toEqual(first);
    expect(first.count).toBe(4);
    expect(first.tools.map((t) => t.name)).toEqual(['explode', 'net.create', 'stat.read', 'toggleRule']);
  });

  it('GW-I4: N operations yield N ids and N terminal statuses', async () => {
    const { gateway } = makeGateway();
    const operations = Array.from({ length: 7 }, (_, i) =>
      i % 2 === 0 ? { tool: 'stat.read', arguments: { site: `s${i}` } } : { tool: 'explode' },
    );
    const { jobs } = submitted(gateway.submitBatch({ operations }));
    expect(jobs).toHaveLength(7);

    await gateway.jobs.settled();
    const result = statuses(gateway.batchStatus({ jobIds: jobs.map((j) => j.jobId) }));
    expect(result.jobs).toHaveLength(7);
    for (const job of result.jobs) {
      expect([JobStatus.Done, JobStatus.Error]).toContain(job.status);
    }
  });

  it('GW-I5: a batch result equals the direct dispatch result', async () => {
    const { gateway } = makeGateway();
    const request = { tool: 'stat.read', arguments: { site: 'lab' } };
    const direct = await gateway.dispatch(request);

    const { jobs } = submitted(gateway.submitBatch({ operations: [request] }));
    await gateway.jobs.settled();
    const job = gateway.jobs.status(jobs[0]?.jobId ?? '');

    expect(job?.status).toBe(JobStatus.Done);
    expect(job?.result).toEqual(direct);
  });

  it('GW-I6: concurrent first dispatches of a lazy operation load once', async () => {
    const { load, count } = countingLoader();
    const registry = new OperationRegistry<FakeServices>(new PermissionGate());
    registry.registerDeferred(
      {
        name: 'stat.read',
        description: 'Read controller statistics',
        category: OperationCategory.Stats,
        action: OperationAction.Read,
        mutating: false,
        module_id: FIXTURE_MODULE.module_id,
        input_schema: { type: 'object' },
      },
      load,
      { precheck: false },
    );
    const gateway = new OperationGateway<FakeServices>({ registry, services: fakeServices() });

    const [a, b] = await Promise.all([
      gateway.dispatch({ tool: 'stat.read' }),
      gateway.dispatch({ tool: 'stat.read' }),
    ]);
    expect(a).toEqual({ success: true, data: { site: 'default', uptime: 42 } });
    expect(b).toEqual(a);
    expect(count()).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Unit tests
// ---------------------------------------------------------------------------

describe('OperationGateway', () => {
  it('GW-U1: malformed requests are VALIDATION_ERROR', async () => {
    const { gateway } = makeGateway();
    for (const request of [null, {}, { tool: '' }, { tool: 5 }, { tool: 'stat.read', arguments: 'none' }]) {
      const response = await gateway.dispatch(request);
      expect(response).toMatchObject({ success: false, code: GatewayErrorCode.ValidationError });
    }
    expect(gateway.submitBatch({ operations: 'all' })).toMatchObject({ code: GatewayErrorCode.ValidationError });
    expect(gateway.batchStatus({ jobIds: [1] })).toMatchObject({ code: GatewayErrorCode.ValidationError });
  });

  it('GW-U2: a non-boolean confirm is VALIDATION_ERROR', async () => {
    const { gateway, services } = makeGateway();
    const response = await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x', confirm: 'true' } });
    expect(response).toEqual({
      success: false,
      error: 'Invalid arguments for toggleRule: confirm: confirm must be a boolean',
      code: GatewayErrorCode.ValidationError,
      details: [{ message: 'confirm must be a boolean', context: 'confirm' }],
    });
    expect(services.rules.get('x')).toBe(true);
  });

  it('GW-U3: schema failures carry the failing path', async () => {
    const { gateway } = makeGateway();
    const response = await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 7 } });
    expect(response).toMatchObject({ success: false, code: GatewayErrorCode.ValidationError });
    if ('details' in response) {
      expect(response.details?.map((d) => d.context)).toEqual(['id']);
    }
  });

  it('GW-U4: handler failures are HANDLER_ERROR with the underlying message', async () => {
    const { gateway } = makeGateway();
    expect(await gateway.dispatch({ tool: 'explode' })).toEqual({
      success: false,
      error: 'explode failed: controller unreachable',
      code: GatewayErrorCode.HandlerError,
    });
    expect(await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'nope' } })).toEqual({
      success: false,
      error: 'toggleRule failed: Rule not found: nope',
      code: GatewayErrorCode.HandlerError,
    });
  });

  it('GW-U5: unknown operations are UNKNOWN_OPERATION', async () => {
    const { gateway } = makeGateway();
    expect(await gateway.dispatch({ tool: 'reboot_everything' })).toEqual({
      success: false,
      error: 'Unknown operation: reboot_everything',
      code: GatewayErrorCode.UnknownOperation,
    });
  });

  it('GW-U6: auto-confirm executes mutating calls without confirm', async () => {
    const { gateway, services } = makeGateway({ autoConfirm: true });
    const response = await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x' } });
    expect(response).toEqual({ success: true, data: { enabled: false } });
    expect(services.rules.get('x')).toBe(false);
  });

  it('GW-U7: every invocation writes one decision log entry', async () => {
    const sink = new MemoryLogSink();
    const { gateway } = makeGateway({ sink });

    await gateway.dispatch({ tool: 'stat.read' });
    await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x' } });
    await gateway.dispatch({ tool: 'net.create', arguments: { name: 'iot' } });
    await gateway.dispatch({ tool: 'nope' });
    await gateway.dispatch({ tool: 'toggleRule', arguments: {} });
    await gateway.dispatch({ tool: 'explode' });
    await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x', confirm: true } });

    expect(sink.entries.map((e) => [e.operation, e.decision, e.confirmed])).toEqual([
      ['stat.read', DispatchDecision.Executed, true],
      ['toggleRule', DispatchDecision.Previewed, false],
      ['net.create', DispatchDecision.Denied, false],
      ['nope', DispatchDecision.Unknown, false],
      ['toggleRule', DispatchDecision.Invalid, false],
      ['explode', DispatchDecision.Failed, true],
      ['toggleRule', DispatchDecision.Executed, true],
    ]);

    const [first] = sink.entries;
    expect(first?.category).toBe(OperationCategory.Stats);
    expect(first?.action).toBe(OperationAction.Read);
    expect(first?.input_hash).toBe(computeInputHash('stat.read', {}));
    expect(sink.entries[3]?.category).toBeUndefined();
    expect(sink.entries[5]?.error).toBe('explode failed: controller unreachable');
  });

  it('GW-U7: batch jobs log their job id', async () => {
    const sink = new MemoryLogSink();
    const { gateway } = makeGateway({ sink });
    const { jobs } = submitted(gateway.submitBatch({ operations: [{ tool: 'stat.read' }] }));
    await gateway.jobs.settled();
    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]?.job_id).toBe(jobs[0]?.jobId);
  });

  it('GW-U8: unknown job ids report status unknown', () => {
    const { gateway } = makeGateway();
    expect(gateway.batchStatus({ jobIds: ['missing'] })).toEqual({
      jobs: [{ jobId: 'missing', status: 'unknown', error: 'Unknown job id: missing' }],
    });
  });

  it('GW-U9: a failing job does not affect its neighbours', async () => {
    const { gateway } = makeGateway();
    const { jobs } = submitted(
      gateway.submitBatch({
        operations: [
          { tool: 'stat.read' },
          { tool: 'explode' },
          { tool: 'net.create', arguments: { name: 'iot' } },
          { tool: 'nope' },
          { tool: 'toggleRule', arguments: { id: 'x' } },
        ],
      }),
    );
    await gateway.jobs.settled();
    const result = statuses(gateway.batchStatus({ jobIds: jobs.map((j) => j.jobId) }));

    expect(result.jobs.map((j) => [j.status, j.code])).toEqual([
      [JobStatus.Done, undefined],
      [JobStatus.Error, GatewayErrorCode.HandlerError],
      [JobStatus.Error, GatewayErrorCode.PermissionDenied],
      [JobStatus.Error, GatewayErrorCode.UnknownOperation],
      [JobStatus.Done, undefined],
    ]);
    expect(result.jobs[4]?.result).toMatchObject({ requires_confirmation: true });
  });

  it('GW-U10: a throwing log sink does not change the outcome', async () => {
    const lines: string[] = [];
    const sink: LogSink = {
      append() {
        throw new Error('ENOSPC: no space left on device');
      },
    };
    const services = fakeServices();
    const gateway = new OperationGateway<FakeServices>({
      registry: fixtureRegistry(),
      services,
      confirmation: new ConfirmationProtocol(false),
      logSink: sink,
      logger: pino({ level: 'error' }, { write: (line: string) => void lines.push(line) }),
    });

    expect(await gateway.dispatch({ tool: 'stat.read' })).toEqual({
      success: true,
      data: { site: 'default', uptime: 42 },
    });
    expect(await gateway.dispatch({ tool: 'toggleRule', arguments: { id: 'x', confirm: true } })).toEqual({
      success: true,
      data: { enabled: false },
    });
    expect(await gateway.dispatch({ tool: 5 })).toMatchObject({
      success: false,
      code: GatewayErrorCode.ValidationError,
    });

    const { jobs } = submitted(gateway.submitBatch({ operations: [{ tool: 'stat.read' }] }));
    await gateway.jobs.settled();
    const result = statuses(gateway.batchStatus({ jobIds: jobs.map((j) => j.jobId) }));
    expect(result.jobs[0]?.status).toBe(JobStatus.Done);
    expect(result.jobs[0]?.result).toEqual({ site: 'default', uptime: 42 });

    expect(lines).toHaveLength(4);
    const first = JSON.parse(lines[0]!) as Record<string, unknown>;
    expect(first['msg']).toBe('decision log write failed');
    expect(first['component']).toBe('gateway');
    expect(first['operation']).toBe('stat.read');
    expect(first['err']).toBe('ENOSPC: no space left on device');
  });
});
