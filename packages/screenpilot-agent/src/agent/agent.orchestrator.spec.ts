import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  Action,
  AgentEvent,
  Capture,
  CaptureUnavailableError,
  Decision,
  InferenceMalformedError,
  InferenceUnavailableError,
  Monitor,
  ModelRole,
  NoDisplayFoundError,
  Outcome,
} from '@screenpilot/shared';
import { AgentConfigService } from '../config/agent-config.service';
import { DesktopPort } from '../desktop/desktop.types';
import { HardwareService } from '../hardware/hardware.service';
import { ResolutionMapperService } from '../mapping/resolution-mapper.service';
import {
  InferenceRequest,
  InferenceResult,
  ModelCapabilities,
  ModelClient,
  ModelLineup,
  ROLE_CAPABILITIES,
} from '../models/model.types';
import { AgentOrchestrator } from './agent.orchestrator';
import { AGENT_EVENT, TaskHandle } from './agent.types';
import { ScreenshotStoreService } from './screenshot-store.service';

const monitor: Monitor = {
  id: '0',
  name: 'Display 0',
  origin: { x: 0, y: 0 },
  width: 200,
  height: 100,
  scaleFactor: 1,
  primary: true,
};

// within the pixel budget, so the mapper keeps the bytes and an identity transform
const capture: Capture = {
  image: Buffer.from('fake-png'),
  sourceMonitors: [monitor],
  origin: { x: 0, y: 0 },
  realWidth: 200,
  realHeight: 100,
  timestamp: '2024-01-01T00:00:00.000Z',
};

const click = (x: number, y: number): Decision => ({
  kind: 'click',
  point: { x, y },
  button: 'left',
  clickCount: 1,
});

class FakeDesktop implements DesktopPort {
  readonly key = 'fake-desktop';
  readonly executed: Action[] = [];
  captures = 0;
  enumerateError: Error | null = null;
  captureFailures: Error[] = [];
  stalledCapture = false;
  onExecute: (action: Action) => void = () => undefined;

  async enumerate(): Promise<Monitor[]> {
    if (this.enumerateError) {
      throw this.enumerateError;
    }
    return [monitor];
  }

  async capture(): Promise<Capture> {
    this.captures++;
    if (this.stalledCapture) {
      return new Promise<Capture>(() => undefined);
    }
    const failure = this.captureFailures.shift();
    if (failure) {
      throw failure;
    }
    return capture;
  }

  async execute(action: Action): Promise<Outcome> {
    this.executed.push(action);
    this.onExecute(action);
    return { status: 'ok' };
  }
}

type ScriptStep =
  | Decision
  | Error
  | ((request: InferenceRequest) => Promise<Decision>);

class ScriptedModel implements ModelClient {
  readonly label: string;
  readonly capabilities: ModelCapabilities;
  readonly requests: InferenceRequest[] = [];

  constructor(
    readonly role: ModelRole,
    private readonly script: ScriptStep[],
    private readonly fallback: Decision = click(50, 50),
    private readonly costPerCall = 0,
  ) {
    this.label = `scripted:${role}`;
    this.capabilities = ROLE_CAPABILITIES[role];
  }

  async infer(request: InferenceRequest): Promise<InferenceResult> {
    this.requests.push(request);
    const step = this.script.shift() ?? this.fallback;
    if (step instanceof Error) {
      throw step;
    }
    const decision = typeof step === 'function' ? await step(request) : step;
    return {
      decision,
      usage: { inputTokens: 0, outputTokens: 0 },
      cost: this.costPerCall,
    };
  }
}

describe('AgentOrchestrator', () => {
  let desktop: FakeDesktop;
  let eventEmitter: EventEmitter2;

  const createOrchestrator = (
    lineup: ModelLineup,
    env: Record<string, string> = {},
  ) => {
    const agentConfig = new AgentConfigService(
      new ConfigService({
        SCREENPILOT_PIXEL_BUDGET: '1000000',
        SCREENPILOT_RETRY_BASE_DELAY_MS: '0',
        SCREENPILOT_RETRY_MAX_DELAY_MS: '0',
        ...env,
      }),
    );
    return new AgentOrchestrator(
      { connect: () => desktop },
      { lineup: () => lineup },
      new ResolutionMapperService(agentConfig, new HardwareService()),
      new ScreenshotStoreService(),
      eventEmitter,
      agentConfig,
    );
  };

  const unified = (model: ScriptedModel): ModelLineup => ({
    kind: 'unified',
    client: model,
  });

  const collect = async (handle: TaskHandle): Promise<AgentEvent[]> => {
    const events: AgentEvent[] = [];
    for await (const event of handle.events) {
      events.push(event);
    }
    return events;
  };

  beforeEach(() => {
    desktop = new FakeDesktop();
    eventEmitter = new EventEmitter2();
  });

  it('runs exactly maxIterations inferences, then fails with LimitExceeded', async () => {
    const model = new ScriptedModel('unified', []);
    const orchestrator = createOrchestrator(unified(model));

    const outcome = await orchestrator.runTask('Keep clicking', {
      maxIterations: 3,
    }).completion;

    expect(outcome).toMatchObject({
      status: 'failed',
      iterations: 3,
      error: {
        kind: 'LimitExceeded',
        message: 'Reached the limit of 3 iterations',
      },
    });
    expect(model.requests).toHaveLength(3);
    expect(desktop.executed).toHaveLength(3);
    // the first capture plus one per verified step that continued
    expect(desktop.captures).toBe(3);
  });

  it('maps decisions to screen actions and finishes on done', async () => {
    const model = new ScriptedModel('unified', [
      click(50, 40),
      { kind: 'done', summary: 'Saved' },
    ]);
    const orchestrator = createOrchestrator(unified(model));

    const handle = orchestrator.runTask('Save the file');
    const [outcome, events] = await Promise.all([
      handle.completion,
      collect(handle),
    ]);

    expect(outcome).toEqual({
      taskId: handle.taskId,
      status: 'done',
      iterations: 2,
      cost: 0,
      summary: 'Saved',
    });
    expect(desktop.executed).toEqual([
      {
        action: 'click',
        coordinates: { x: 50, y: 40 },
        button: 'left',
        clickCount: 1,
      },
    ]);
    expect(events.map((event) => event.sequence)).toEqual(
      events.map((_, index) => index),
    );
    expect(events[0]).toMatchObject({ kind: 'state', state: 'Idle' });
    expect(events.slice(1, 5).map((event) => event.state)).toEqual([
      'Capturing',
      'Inferring',
      'Mapping',
      'Executing',
    ]);
    expect(events[events.length - 1]).toMatchObject({
      kind: 'terminal',
      state: 'Done',
      status: 'done',
      iteration: 2,
    });
  });

  it('publishes every event on the event emitter', async () => {
    const model = new ScriptedModel('unified', [{ kind: 'done' }]);
    const orchestrator = createOrchestrator(unified(model));
    const published: AgentEvent[] = [];
    eventEmitter.on(AGENT_EVENT, (event: AgentEvent) => published.push(event));

    const handle = orchestrator.runTask('Nothing to do');
    const events = await collect(handle);

    expect(published).toEqual(events);
  });

  it('proceeds after two unavailable calls with a ceiling of three', async () => {
    const model = new ScriptedModel('unified', [
      new InferenceUnavailableError('down'),
      new InferenceUnavailableError('down'),
      { kind: 'done' },
    ]);
    const orchestrator = createOrchestrator(unified(model), {
      SCREENPILOT_RETRY_ATTEMPTS: '3',
    });

    const outcome = await orchestrator.runTask('Finish').completion;

    expect(outcome).toMatchObject({ status: 'done', iterations: 1 });
    expect(model.requests).toHaveLength(3);
  });

  it('fails when the model stays unavailable past the ceiling', async () => {
    const model = new ScriptedModel('unified', [
      new InferenceUnavailableError('down'),
      new InferenceUnavailableError('down'),
      new InferenceUnavailableError('down'),
      new InferenceUnavailableError('down'),
    ]);
    const orchestrator = createOrchestrator(unified(model), {
      SCREENPILOT_RETRY_ATTEMPTS: '3',
    });

    const outcome = await orchestrator.runTask('Finish').completion;

    expect(outcome).toMatchObject({
      status: 'failed',
      error: { kind: 'InferenceUnavailable', message: 'down' },
    });
    expect(model.requests).toHaveLength(3);
    expect(desktop.executed).toHaveLength(0);
  });

  it('lets an executing action finish once when cancelled, then stops', async () => {
    const model = new ScriptedModel('unified', []);
    const orchestrator = createOrchestrator(unified(model));
    let cancelled: boolean | null = null;

    const handle = orchestrator.runTask('Click forever');
    desktop.onExecute = () => {
      cancelled = orchestrator.cancel(handle.taskId);
    };
    const [outcome, events] = await Promise.all([
      handle.completion,
      collect(handle),
    ]);

    expect(cancelled).toBe(true);
    expect(outcome).toMatchObject({ status: 'cancelled', iterations: 1 });
    expect(desktop.executed).toHaveLength(1);
    const step = events.find((event) => event.kind === 'step');
    expect(step?.outcome).toEqual({ status: 'ok' });
    expect(events[events.length - 1]).toMatchObject({
      kind: 'terminal',
      state: 'Cancelled',
      status: 'cancelled',
    });
    expect(orchestrator.cancel(handle.taskId)).toBe(false);
  });

  it('stops before acting when cancelled during inference', async () => {
    let orchestrator: AgentOrchestrator | null = null;
    let taskId = '';
    const model = new ScriptedModel('unified', [
      async () => {
        orchestrator?.cancel(taskId);
        return click(10, 10);
      },
    ]);
    orchestrator = createOrchestrator(unified(model));

    const handle = orchestrator.runTask('Click once');
    taskId = handle.taskId;
    const outcome = await handle.completion;

    expect(outcome).toMatchObject({ status: 'cancelled', iterations: 1 });
    expect(desktop.executed).toHaveLength(0);
  });

  it('records a malformed response as a failed step and continues', async () => {
    const model = new ScriptedModel('unified', [
      new InferenceMalformedError('No JSON object found in model response', 'hmm', 0.25),
      { kind: 'done' },
    ]);
    const orchestrator = createOrchestrator(unified(model));

    const handle = orchestrator.runTask('Do something');
    const [outcome, events] = await Promise.all([
      handle.completion,
      collect(handle),
    ]);

    expect(outcome).toMatchObject({ status: 'done', iterations: 2, cost: 0.25 });
    expect(events.find((event) => event.kind === 'step')).toMatchObject({
      decision: null,
      action: null,
      outcome: {
        status: 'failed',
        reason: 'No JSON object found in model response',
      },
      error: {
        kind: 'InferenceMalformed',
        message: 'No JSON object found in model response',
      },
    });
    expect(model.requests[1].history).toEqual([
      {
        decision: null,
        outcome: {
          status: 'failed',
          reason: 'No JSON object found in model response',
        },
      },
    ]);
  });

  it('records an out-of-bounds point as a failed step and continues', async () => {
    const model = new ScriptedModel('unified', [click(500, 500), { kind: 'done' }]);
    const orchestrator = createOrchestrator(unified(model));

    const handle = orchestrator.runTask('Click outside');
    const [outcome, events] = await Promise.all([
      handle.completion,
      collect(handle),
    ]);

    expect(outcome).toMatchObject({ status: 'done', iterations: 2 });
    expect(desktop.executed).toHaveLength(0);
    expect(events.find((event) => event.kind === 'step')?.error?.kind).toBe(
      'OutOfBoundsCoordinate',
    );
  });

  it('hands planner sub-goals to the actor with the task as context', async () => {
    const planner = new ScriptedModel('planner', [
      { kind: 'subgoal', instruction: 'Click Save' },
      { kind: 'done', summary: 'All saved' },
    ]);
    const actor = new ScriptedModel('actor', [click(10, 20)]);
    const orchestrator = createOrchestrator({ kind: 'split', planner, actor });

    const outcome = await orchestrator.runTask('Save the document').completion;

    expect(outcome).toMatchObject({
      status: 'done',
      iterations: 2,
      summary: 'All saved',
    });
    expect(actor.requests).toHaveLength(1);
    expect(actor.requests[0]).toMatchObject({
      instruction: 'Click Save',
      context: 'Save the document',
    });
    expect(desktop.executed).toEqual([
      {
        action: 'click',
        coordinates: { x: 10, y: 20 },
        button: 'left',
        clickCount: 1,
      },
    ]);
    expect(planner.requests[1].history).toEqual([
      {
        decision: click(10, 20),
        outcome: { status: 'ok' },
        subgoal: 'Click Save',
      },
    ]);
  });

  it('treats an actor done as the end of its sub-goal only', async () => {
    const planner = new ScriptedModel('planner', [
      { kind: 'subgoal', instruction: 'Check the title' },
      { kind: 'done' },
    ]);
    const actor = new ScriptedModel('actor', [{ kind: 'done' }]);
    const orchestrator = createOrchestrator({ kind: 'split', planner, actor });

    const outcome = await orchestrator.runTask('Verify the page').completion;

    expect(outcome).toMatchObject({ status: 'done', iterations: 2 });
    expect(planner.requests).toHaveLength(2);
  });

  it('rejects coordinate actions from the planner', async () => {
    const planner = new ScriptedModel('planner', [click(10, 10), { kind: 'done' }]);
    const actor = new ScriptedModel('actor', []);
    const orchestrator = createOrchestrator({ kind: 'split', planner, actor });

    const handle = orchestrator.runTask('Do it');
    const [outcome, events] = await Promise.all([
      handle.completion,
      collect(handle),
    ]);

    expect(outcome).toMatchObject({ status: 'done', iterations: 2 });
    expect(desktop.executed).toHaveLength(0);
    expect(actor.requests).toHaveLength(0);
    expect(events.find((event) => event.kind === 'step')?.error).toEqual({
      kind: 'InferenceMalformed',
      message: 'The planner model may not emit click actions',
    });
  });

  it('rejects sub-goals from a unified model', async () => {
    const model = new ScriptedModel('unified', [
      { kind: 'subgoal', instruction: 'Anything' },
      { kind: 'done' },
    ]);
    const orchestrator = createOrchestrator(unified(model));

    const handle = orchestrator.runTask('Do it');
    const events = await collect(handle);

    expect(events.find((event) => event.kind === 'step')?.error).toEqual({
      kind: 'InferenceMalformed',
      message: 'The unified model may not delegate sub-goals',
    });
  });

  it.each([
    ['keep', 3],
    ['discard', 1],
    ['recent', 2],
  ])(
    'moves the model-visible history on replan under %s',
    async (policy, visible) => {
      const model = new ScriptedModel('unified', [
        click(1, 1),
        click(2, 2),
        { kind: 'replan', reason: 'stuck' },
        { kind: 'done' },
      ]);
      const orchestrator = createOrchestrator(unified(model), {
        SCREENPILOT_REPLAN_HISTORY: policy,
        SCREENPILOT_REPLAN_KEEP_RECENT: '1',
      });

      await orchestrator.runTask('Try again').completion;

      const history = model.requests[3].history;
      expect(history).toHaveLength(visible);
      expect(history[history.length - 1].decision).toEqual({
        kind: 'replan',
        reason: 'stuck',
      });
    },
  );

  it('limits the model-visible history to the configured window', async () => {
    const model = new ScriptedModel('unified', []);
    const orchestrator = createOrchestrator(unified(model), {
      SCREENPILOT_HISTORY_WINDOW: '2',
    });

    await orchestrator.runTask('Click', { maxIterations: 4 }).completion;

    expect(model.requests.map((request) => request.history.length)).toEqual([
      0, 1, 2, 2,
    ]);
  });

  it('fails once the cost limit is spent', async () => {
    const model = new ScriptedModel('unified', [], click(5, 5), 0.6);
    const orchestrator = createOrchestrator(unified(model));

    const outcome = await orchestrator.runTask('Spend', { maxCost: 1 })
      .completion;

    expect(outcome).toMatchObject({
      status: 'failed',
      iterations: 2,
      error: { kind: 'LimitExceeded' },
    });
    expect(outcome.cost).toBeCloseTo(1.2, 10);
  });

  it('fails on the elapsed limit while an inference is still pending', async () => {
    const model = new ScriptedModel('unified', [
      () => new Promise<Decision>(() => undefined),
    ]);
    const orchestrator = createOrchestrator(unified(model));

    const handle = orchestrator.runTask('Wait forever', { maxElapsedMs: 50 });
    const [outcome, events] = await Promise.all([
      handle.completion,
      collect(handle),
    ]);

    expect(outcome).toMatchObject({
      status: 'failed',
      iterations: 1,
      error: { kind: 'LimitExceeded' },
    });
    expect(outcome.error?.message).toMatch(/, over the limit of 50ms$/);
    expect(desktop.executed).toHaveLength(0);
    expect(events[events.length - 1]).toMatchObject({
      kind: 'terminal',
      status: 'failed',
    });
    expect(orchestrator.cancel(outcome.taskId)).toBe(false);
  });

  it('fails on the elapsed limit while a capture is stalled', async () => {
    desktop.stalledCapture = true;
    const orchestrator = createOrchestrator(
      unified(new ScriptedModel('unified', [])),
    );

    const outcome = await orchestrator.runTask('Look', { maxElapsedMs: 50 })
      .completion;

    expect(outcome).toMatchObject({
      status: 'failed',
      iterations: 0,
      error: { kind: 'LimitExceeded' },
    });
  });

  it('fails without a display', async () => {
    desktop.enumerateError = new NoDisplayFoundError();
    const orchestrator = createOrchestrator(
      unified(new ScriptedModel('unified', [])),
    );

    const outcome = await orchestrator.runTask('Anything').completion;

    expect(outcome).toEqual({
      taskId: expect.any(String),
      status: 'failed',
      iterations: 0,
      cost: 0,
      error: { kind: 'NoDisplayFound', message: 'No display attached' },
    });
  });

  it('rejects unknown monitor ids', async () => {
    const orchestrator = createOrchestrator(
      unified(new ScriptedModel('unified', [])),
    );

    const outcome = await orchestrator.runTask('Anything', {
      monitorIds: ['0', '7'],
    }).completion;

    expect(outcome.error).toEqual({
      kind: 'CaptureUnavailable',
      message: 'Unknown monitor id(s): 7',
    });
  });

  it('retries a failed capture up to the configured count', async () => {
    desktop.captureFailures = [new CaptureUnavailableError('grab failed')];
    const model = new ScriptedModel('unified', [{ kind: 'done' }]);

    const retried = await createOrchestrator(unified(model), {
      SCREENPILOT_CAPTURE_RETRIES: '1',
    }).runTask('Look').completion;
    expect(retried.status).toBe('done');

    desktop.captureFailures = [new CaptureUnavailableError('grab failed')];
    const failed = await createOrchestrator(unified(model)).runTask('Look')
      .completion;
    expect(failed).toMatchObject({
      status: 'failed',
      error: { kind: 'CaptureUnavailable', message: 'grab failed' },
    });
  });

  it('runs tasks on the same desktop one at a time', async () => {
    const order: string[] = [];
    const model = new ScriptedModel('unified', [
      async (request) => {
        order.push(`start ${request.instruction}`);
        await new Promise((resolve) => setTimeout(resolve, 20));
        order.push(`end ${request.instruction}`);
        return { kind: 'done' };
      },
      async (request) => {
        order.push(`start ${request.instruction}`);
        return { kind: 'done' };
      },
    ]);
    const orchestrator = createOrchestrator(unified(model));

    const first = orchestrator.runTask('first');
    const second = orchestrator.runTask('second');
    const outcomes = await Promise.all([first.completion, second.completion]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['done', 'done']);
    expect(order).toEqual(['start first', 'end first', 'start second']);
  });
});
