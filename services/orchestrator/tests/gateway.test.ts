import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { isJsonObject } from '@switchyard/shared';
import { stateKeys } from '@switchyard/state-store';
import { actionSuccess, type ActionCapability } from '../src/actions/types';
import type { BlobStore, StoredBlob } from '../src/audit/blobStore';
import { AuditMiddleware } from '../src/audit/middleware';
import { Gateway, type GatewayOptions } from '../src/gateway';
import { LearningEngine } from '../src/learning/engine';
import { PlanBuilder } from '../src/planning/planBuilder';
import type { PlanProposer, ProposalContext } from '../src/planning/proposer';
import type { WorkflowDag } from '../src/planning/types';
import { Orchestrator } from '../src/workflow/orchestrator';
import {
  failingCapability,
  memoryStore,
  recordingBus,
  recordingCapability,
  registryOf,
  testCaller
} from './helpers';

type SetupOptions = Partial<Pick<GatewayOptions, 'proposer' | 'fallbackAction' | 'defaultMode' | 'planBuilder'>> & {
  learning?: boolean;
  offloadThresholdBytes?: number;
  blobStore?: BlobStore;
};

async function setup(capabilities: ActionCapability[], options: SetupOptions = {}) {
  const registry = registryOf(...capabilities);
  const stateStore = memoryStore();
  const { bus } = await recordingBus();
  let workflowCounter = 0;
  let auditCounter = 0;
  const planBuilder = options.planBuilder ?? new PlanBuilder({ registry, idFactory: () => `wf-${++workflowCounter}` });
  const learning = options.learning ? new LearningEngine({ stateStore, planValidator: planBuilder }) : null;
  const orchestrator = new Orchestrator({
    registry,
    stateStore,
    eventBus: bus,
    retryBackoff: { baseMs: 0 },
    feedbackSink: learning
  });
  const middleware = new AuditMiddleware({
    stateStore,
    eventBus: bus,
    blobStore: options.blobStore,
    offloadThresholdBytes: options.offloadThresholdBytes,
    idFactory: () => `audit-${++auditCounter}`
  });
  const gateway = new Gateway({
    registry,
    planBuilder,
    orchestrator,
    middleware,
    stateStore,
    learning,
    proposer: options.proposer,
    fallbackAction: options.fallbackAction,
    defaultMode: options.defaultMode
  });
  return { gateway, stateStore, learning };
}

function staticProposer(plan: unknown): PlanProposer & { requests: Array<{ request: string; context: ProposalContext }> } {
  const requests: Array<{ request: string; context: ProposalContext }> = [];
  return {
    requests,
    async propose(request, context) {
      requests.push({ request, context });
      return plan;
    }
  };
}

describe('Gateway', () => {
  it('executes a direct action as a single-step workflow', async () => {
    const create = recordingCapability('files.create', () => actionSuccess({ id: 'file-1' }));
    const { gateway, stateStore } = await setup([create]);

    const result = await gateway.invoke({ caller: testCaller, action: 'files.create', params: { name: 'a.txt' }, userId: 'user-1' });

    assert.ok(result.status === 'completed');
    assert.equal(result.workflow.workflowId, 'wf-1');
    assert.equal(result.workflow.completedSteps, 1);
    assert.deepEqual(create.calls[0].params, { name: 'a.txt' });
    const conversation = await stateStore.getConversationContext('user-1');
    assert.equal(conversation?.last_workflow_id, 'wf-1');
    assert.equal(conversation?.last_file_id, 'file-1');
  });

  it('carries conversation context into the next call', async () => {
    const create = recordingCapability('files.create', () => actionSuccess({ id: 'file-1' }));
    const send = recordingCapability('mail.send');
    const { gateway } = await setup([create, send]);

    await gateway.invoke({ caller: testCaller, action: 'files.create', userId: 'user-1' });
    const result = await gateway.invoke({
      caller: testCaller,
      action: 'mail.send',
      params: { attachment: '${last_file_id}' },
      userId: 'user-1'
    });

    assert.equal(result.status, 'completed');
    assert.deepEqual(send.calls[0].params, { attachment: 'file-1' });
  });

  it('treats blank user and session ids as absent', async () => {
    const { gateway, stateStore } = await setup([recordingCapability('files.create')]);

    const result = await gateway.invoke({ caller: testCaller, action: 'files.create', userId: '', sessionId: '  ' });

    assert.equal(result.status, 'completed');
    assert.equal((await gateway.getWorkflowStatus('wf-1'))?.status, 'completed');
    assert.equal(await stateStore.getConversationContext(''), null);
  });

  it('gives concurrent runs of the same proposal their own workflow ids', async () => {
    const proposer = staticProposer({ id: 'fixed', nodes: [{ id: 'a', action: 'files.create' }] });
    const { gateway } = await setup([recordingCapability('files.create')], { proposer });

    const results = await Promise.all([
      gateway.invoke({ caller: testCaller, request: 'create a file' }),
      gateway.invoke({ caller: testCaller, request: 'create a file' })
    ]);

    const ids = results.map((result) => (result.status === 'completed' ? result.workflow.workflowId : result.status));
    assert.deepEqual([...ids].sort(), ['wf-1', 'wf-2']);
    assert.equal(await gateway.getWorkflowStatus('fixed'), null);
  });

  it('rejects unknown actions and empty calls', async () => {
    const { gateway } = await setup([recordingCapability('files.create')]);

    assert.deepEqual(await gateway.invoke({ caller: testCaller, action: 'fax.send' }), {
      status: 'error',
      errorKind: 'unknown_action',
      message: 'Action fax.send is not registered'
    });
    assert.deepEqual(await gateway.invoke({ caller: testCaller, action: '  ', request: '' }), {
      status: 'error',
      errorKind: 'invalid_request',
      message: 'Either an action or a request is required'
    });
  });

  it('returns the plan without running it in plan mode', async () => {
    const create = recordingCapability('files.create');
    const { gateway } = await setup([create]);

    const result = await gateway.invoke({ caller: testCaller, action: 'files.create', execute: false });

    assert.ok(result.status === 'planned');
    assert.ok(isJsonObject(result.plan));
    assert.equal(result.plan.name, 'files.create');
    assert.deepEqual(result.warnings, []);
    assert.deepEqual(result.suggestions, []);
    assert.equal(create.calls.length, 0);
  });

  it('honours the configured default mode', async () => {
    const create = recordingCapability('files.create');
    const { gateway } = await setup([create], { defaultMode: 'plan' });

    const planned = await gateway.invoke({ caller: testCaller, action: 'files.create' });
    const executed = await gateway.invoke({ caller: testCaller, action: 'files.create', execute: true });

    assert.equal(planned.status, 'planned');
    assert.equal(executed.status, 'completed');
    assert.equal(create.calls.length, 1);
  });

  it('plans free-text requests through the proposer', async () => {
    const create = recordingCapability('files.create', () => actionSuccess({ id: 'file-1' }));
    const send = recordingCapability('mail.send');
    const proposer = staticProposer({
      name: 'share file',
      nodes: [
        { id: 'create', action: 'files.create', params: { name: 'notes.txt' } },
        { id: 'send', action: 'mail.send', params: { fileId: '${create_result.id}' }, dependencies: ['create'] }
      ]
    });
    const { gateway } = await setup([create, send], { proposer });

    const result = await gateway.invoke({ caller: testCaller, request: 'create notes and mail them' });

    assert.equal(result.status, 'completed');
    assert.equal(proposer.requests[0].request, 'create notes and mail them');
    assert.deepEqual(
      proposer.requests[0].context.actions.map((action) => action.name),
      ['files.create', 'mail.send']
    );
    assert.deepEqual(send.calls[0].params, { fileId: 'file-1' });
  });

  it('falls back to the fallback action when the proposer fails', async () => {
    const reply = recordingCapability('assistant.reply');
    const proposer: PlanProposer = {
      async propose() {
        throw new Error('model offline');
      }
    };
    const { gateway } = await setup([reply], { proposer, fallbackAction: 'assistant.reply' });

    const result = await gateway.invoke({ caller: testCaller, request: 'what is on my calendar' });

    assert.equal(result.status, 'completed');
    assert.deepEqual(reply.calls[0].params, { prompt: 'what is on my calendar' });
  });

  it('reports an unavailable planner when there is no fallback', async () => {
    const { gateway } = await setup([recordingCapability('files.create')]);

    assert.deepEqual(await gateway.invoke({ caller: testCaller, request: 'tidy my files' }), {
      status: 'error',
      errorKind: 'planner_unavailable',
      message: 'No plan could be produced for the request'
    });
  });

  it('rejects plans with no executable nodes', async () => {
    const proposer = staticProposer({ nodes: [{ id: 'x', action: 'fax.send' }] });
    const { gateway } = await setup([recordingCapability('files.create')], { proposer });

    assert.deepEqual(await gateway.invoke({ caller: testCaller, request: 'fax the report' }), {
      status: 'error',
      errorKind: 'invalid_plan',
      message: 'Node x uses unknown action fax.send; Plan has no executable nodes'
    });
  });

  it('returns the failed workflow state', async () => {
    const { gateway } = await setup([failingCapability('crm.sync')]);

    const result = await gateway.invoke({ caller: testCaller, action: 'crm.sync' });

    assert.ok(result.status === 'failed');
    assert.equal(result.workflow.failedSteps, 1);
  });

  it('turns unexpected errors into an internal error response and audits it', async () => {
    class ExplodingPlanBuilder extends PlanBuilder {
      build(): WorkflowDag {
        throw new Error('builder exploded');
      }
    }
    const registry = registryOf(recordingCapability('files.create'));
    const { gateway, stateStore } = await setup([recordingCapability('files.create')], {
      planBuilder: new ExplodingPlanBuilder({ registry })
    });

    const result = await gateway.invoke({ caller: testCaller, action: 'files.create' });

    assert.deepEqual(result, {
      status: 'error',
      errorKind: 'internal_error',
      message: 'Internal error while handling the request'
    });
    const record = await stateStore.get(stateKeys.audit('audit-1'));
    assert.ok(isJsonObject(record));
    assert.equal(record.outcome, 'error');
  });

  it('offloads oversized responses', async () => {
    const keys: string[] = [];
    const blobStore: BlobStore = {
      kind: 'local',
      async put(key: string, body: string): Promise<StoredBlob> {
        keys.push(key);
        return { key, url: `memory://${key}`, sizeBytes: Buffer.byteLength(body) };
      }
    };
    const { gateway } = await setup([recordingCapability('files.create')], { blobStore, offloadThresholdBytes: 64 });

    const result = await gateway.invoke({ caller: testCaller, action: 'files.create' });

    assert.equal(result.status, 'offloaded');
    assert.equal(keys.length, 1);
    assert.match(keys[0], /^\d{4}-\d{2}-\d{2}\/audit-1\.json$/);
  });

  it('feeds finished workflows to the learning engine', async () => {
    const proposer = staticProposer({ nodes: [{ id: 'archive', action: 'files.archive' }] });
    const { gateway, learning } = await setup([recordingCapability('files.archive')], { proposer, learning: true });

    await gateway.invoke({ caller: testCaller, request: 'archive old invoices' });
    await learning?.drain();

    const suggestions = await gateway.getSuggestions('archive old invoices');
    assert.equal(suggestions.length, 1);
    assert.equal(suggestions[0].kind, 'success');
  });
});
