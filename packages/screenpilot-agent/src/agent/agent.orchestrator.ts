import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ReplaySubject } from 'rxjs';
import { v4 as uuid } from 'uuid';
import {
  Action,
  AgentError,
  AgentInterrupt,
  AgentEvent,
  AgentEventKind,
  AgentState,
  CaptureUnavailableError,
  Decision,
  FailureKind,
  HistoryItem,
  InferenceMalformedError,
  InferenceUnavailableError,
  KeyedSerialQueue,
  LimitExceededError,
  NoDisplayFoundError,
  OutOfBoundsCoordinateError,
  Outcome,
  ScaledCapture,
  TERMINAL_STATES,
  TaskOutcome,
  describeDecision,
  describeOutcome,
  errorMessage,
  hasCoordinates,
  isAgentInterrupt,
  mapDecision,
} from '@screenpilot/shared';
import { AgentConfigService } from '../config/agent-config.service';
import { DESKTOP_CONNECTOR, DesktopConnector } from '../desktop/desktop.types';
import { ResolutionMapperService } from '../mapping/resolution-mapper.service';
import { inferWithRetry, untilAborted } from '../models/inference-retry';
import {
  InferenceRequest,
  MODEL_LINEUP_PROVIDER,
  ModelClient,
  ModelLineupProvider,
} from '../models/model.types';
import { capabilityViolation } from './capability-guard';
import { toAsyncIterable } from './event-stream';
import {
  AGENT_EVENT,
  RunTaskOptions,
  SessionState,
  TaskHandle,
} from './agent.types';
import { ScreenshotStoreService } from './screenshot-store.service';

type StepDecision = {
  decision: Decision;
  subgoal?: string;
  // false for an actor's Done, which only closes its sub-goal
  completesTask: boolean;
};

/**
 * The control loop: capture, downsample, infer, map, execute, verify, until
 * the model is done, a limit is hit, a fatal error occurs or the task is
 * cancelled.
 */
@Injectable()
export class AgentOrchestrator {
  private readonly logger = new Logger(AgentOrchestrator.name);
  private readonly sessions = new Map<string, SessionState>();
  private readonly desktopLock = new KeyedSerialQueue();

  constructor(
    @Inject(DESKTOP_CONNECTOR)
    private readonly desktops: DesktopConnector,
    @Inject(MODEL_LINEUP_PROVIDER)
    private readonly models: ModelLineupProvider,
    private readonly resolutionMapper: ResolutionMapperService,
    private readonly screenshots: ScreenshotStoreService,
    private readonly eventEmitter: EventEmitter2,
    private readonly agentConfig: AgentConfigService,
  ) {}

  runTask(instruction: string, options: RunTaskOptions = {}): TaskHandle {
    const { limits } = this.agentConfig.config;
    const desktop = this.desktops.connect(options.desktopBaseUrl);
    const session: SessionState = {
      taskId: uuid(),
      instruction,
      desktop,
      limits: {
        maxIterations: options.maxIterations ?? limits.maxIterations,
        maxElapsedMs: options.maxElapsedMs ?? limits.maxElapsedMs,
        maxCost: options.maxCost ?? limits.maxCost,
      },
      requestedMonitorIds: options.monitorIds,
      monitors: [],
      history: [],
      windowStart: 0,
      iterationCount: 0,
      startTime: Date.now(),
      cost: 0,
      state: AgentState.Idle,
      sequence: 0,
      cancelled: false,
      timedOut: false,
      abortController: new AbortController(),
      lastScreenshotRef: null,
      lastDecision: null,
      lastAction: null,
      lastOutcome: null,
    };
    const events = new ReplaySubject<AgentEvent>();
    this.sessions.set(session.taskId, session);

    this.logger.log(
      `Task ${session.taskId} queued on ${desktop.key}: ${instruction}`,
    );
    this.emit(session, events, 'state');

    const completion = this.desktopLock
      .run(desktop.key, () => this.drive(session, events))
      .finally(() => {
        this.sessions.delete(session.taskId);
      });

    return {
      taskId: session.taskId,
      events: toAsyncIterable(events),
      completion,
    };
  }

  /**
   * Requests cancellation. Takes effect at the next transition. An in-flight
   * capture, inference or backoff is abandoned; an executing action is not.
   */
  cancel(taskId: string): boolean {
    const session = this.sessions.get(taskId);
    if (!session || TERMINAL_STATES.has(session.state)) {
      return false;
    }
    this.logger.log(`Cancelling task ${taskId}`);
    session.cancelled = true;
    session.abortController.abort();
    return true;
  }

  isRunning(taskId: string): boolean {
    return this.sessions.has(taskId);
  }

  private async drive(
    session: SessionState,
    events: ReplaySubject<AgentEvent>,
  ): Promise<TaskOutcome> {
    session.startTime = Date.now();
    let summary: string | undefined;
    // maxElapsedMs also bounds an inference or backoff that is in flight
    const deadline = setTimeout(() => {
      session.timedOut = true;
      session.abortController.abort();
    }, session.limits.maxElapsedMs);

    try {
      this.throwIfCancelled(session);
      session.monitors = await this.selectMonitors(session);
      const budget = await this.resolutionMapper.pixelBudget();
      let pending: ScaledCapture | null = null;

      for (;;) {
        // Verifying's capture, when there is one, stands in for a new one
        this.transition(session, events, AgentState.Capturing);
        const scaled: ScaledCapture =
          pending ?? (await this.capture(session, budget));
        pending = null;

        session.iterationCount++;
        this.transition(session, events, AgentState.Inferring);
        session.lastScreenshotRef = this.screenshots.save(
          session.taskId,
          scaled.image,
        );

        const step = await this.runStep(session, events, scaled);

        if (step.done) {
          summary = step.summary;
          break;
        }
        this.enforceLimits(session);
        pending = await this.capture(session, budget);
      }

      return this.finish(session, events, AgentState.Done, { summary });
    } catch (caught) {
      const error =
        isAgentInterrupt(caught) && session.timedOut && !session.cancelled
          ? this.elapsedLimitError(session)
          : caught;
      if (isAgentInterrupt(error)) {
        return this.finish(session, events, AgentState.Cancelled, {});
      }
      const failure: AgentError = {
        kind: failureKind(error),
        message: errorMessage(error),
      };
      if (failure.kind === 'InternalError') {
        this.logger.error(
          `Task ${session.taskId} crashed: ${failure.message}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
      return this.finish(session, events, AgentState.Failed, { error: failure });
    } finally {
      clearTimeout(deadline);
    }
  }

  /**
   * Inferring through Verifying for one iteration. Model faults and failed
   * actions are recorded, not thrown.
   */
  private async runStep(
    session: SessionState,
    events: ReplaySubject<AgentEvent>,
    scaled: ScaledCapture,
  ): Promise<{ done: boolean; summary?: string }> {
    let step: StepDecision | null = null;
    let action: Action | null = null;
    let error: AgentError | undefined;

    try {
      step = await this.decide(session, scaled);
    } catch (caught) {
      if (!(caught instanceof InferenceMalformedError)) {
        throw caught;
      }
      session.cost += caught.cost;
      error = { kind: 'InferenceMalformed', message: caught.message };
    }
    const decision = step?.decision ?? null;
    session.lastDecision = decision;

    if (decision) {
      if (hasCoordinates(decision)) {
        this.transition(session, events, AgentState.Mapping);
      }
      try {
        action = mapDecision(decision, scaled.transform);
      } catch (caught) {
        if (!(caught instanceof OutOfBoundsCoordinateError)) {
          throw caught;
        }
        error = { kind: 'OutOfBoundsCoordinate', message: caught.message };
      }
    }

    this.transition(session, events, AgentState.Executing);
    let outcome: Outcome;
    if (action) {
      outcome = await session.desktop.execute(action);
      if (outcome.status === 'failed') {
        error = { kind: 'ExecutionFailed', message: outcome.reason };
      }
    } else if (error) {
      outcome = { status: 'failed', reason: error.message };
    } else {
      outcome = { status: 'ok' };
    }

    session.lastAction = action;
    session.lastOutcome = outcome;
    session.lastError = error;
    session.history.push({
      iteration: session.iterationCount,
      decision,
      action,
      outcome,
      ...(step?.subgoal !== undefined && { subgoal: step.subgoal }),
      ...(error && { error }),
      ...(session.lastScreenshotRef !== null && {
        screenshotRef: session.lastScreenshotRef,
      }),
      timestamp: new Date().toISOString(),
    });
    this.logger.log(
      `Task ${session.taskId} #${session.iterationCount}: ${
        decision ? describeDecision(decision) : 'no decision'
      } -> ${describeOutcome(outcome)}`,
    );
    this.emit(session, events, 'step');

    this.transition(session, events, AgentState.Verifying);

    if (decision?.kind === 'replan') {
      this.moveWindowForReplan(session);
    }
    if (decision?.kind === 'done' && step?.completesTask) {
      return { done: true, summary: decision.summary };
    }
    return { done: false };
  }

  private async decide(
    session: SessionState,
    scaled: ScaledCapture,
  ): Promise<StepDecision> {
    const request: InferenceRequest = {
      image: scaled.image,
      size: { width: scaled.downsampledWidth, height: scaled.downsampledHeight },
      instruction: session.instruction,
      history: this.visibleHistory(session),
    };
    const lineup = this.models.lineup();

    if (lineup.kind === 'unified') {
      const decision = await this.infer(session, lineup.client, request);
      return { decision, completesTask: true };
    }

    const plan = await this.infer(session, lineup.planner, request);
    if (plan.kind !== 'subgoal') {
      return { decision: plan, completesTask: true };
    }

    const decision = await this.infer(session, lineup.actor, {
      ...request,
      instruction: plan.instruction,
      context: session.instruction,
    });
    return {
      decision,
      subgoal: plan.instruction,
      completesTask: decision.kind !== 'done',
    };
  }

  private async infer(
    session: SessionState,
    client: ModelClient,
    request: InferenceRequest,
  ): Promise<Decision> {
    const result = await inferWithRetry(
      client,
      request,
      this.agentConfig.config.retry,
      session.abortController.signal,
    );
    session.cost += result.cost;

    const violation = capabilityViolation(client, result.decision);
    if (violation) {
      throw new InferenceMalformedError(violation, result.raw);
    }
    return result.decision;
  }

  private visibleHistory(session: SessionState): HistoryItem[] {
    const { historyWindow } = this.agentConfig.config;
    if (historyWindow === 0) {
      return [];
    }
    return session.history
      .slice(session.windowStart)
      .slice(-historyWindow)
      .map(({ decision, outcome, subgoal }) =>
        subgoal === undefined
          ? { decision, outcome }
          : { decision, outcome, subgoal },
      );
  }

  // Hides earlier entries from the models; the audit history is untouched.
  private moveWindowForReplan(session: SessionState): void {
    const { replanHistory, replanKeepRecent } = this.agentConfig.config;
    const replanIndex = session.history.length - 1;

    switch (replanHistory) {
      case 'keep':
        return;
      case 'discard':
        session.windowStart = replanIndex;
        return;
      case 'recent':
        session.windowStart = Math.max(
          session.windowStart,
          replanIndex - replanKeepRecent,
        );
        return;
    }
  }

  private async selectMonitors(session: SessionState) {
    const monitors = await untilAborted(
      session.desktop.enumerate(),
      session.abortController.signal,
    );
    const requested = session.requestedMonitorIds;
    if (!requested || requested.length === 0) {
      return monitors;
    }

    const unknown = requested.filter(
      (id) => !monitors.some((monitor) => monitor.id === id),
    );
    if (unknown.length > 0) {
      throw new CaptureUnavailableError(
        `Unknown monitor id(s): ${unknown.join(', ')}`,
      );
    }
    return monitors.filter((monitor) => requested.includes(monitor.id));
  }

  private async capture(
    session: SessionState,
    budget: number,
  ): Promise<ScaledCapture> {
    const attempts = this.agentConfig.config.captureRetries + 1;
    const monitorIds = session.monitors.map((monitor) => monitor.id);

    for (let attempt = 1; ; attempt++) {
      try {
        const capture = await untilAborted(
          session.desktop.capture(monitorIds),
          session.abortController.signal,
        );
        return await this.resolutionMapper.downsample(capture, budget);
      } catch (error) {
        if (!(error instanceof CaptureUnavailableError) || attempt >= attempts) {
          throw error;
        }
        this.logger.warn(
          `Capture failed for task ${session.taskId} (attempt ${attempt}/${attempts}): ${error.message}`,
        );
        this.throwIfCancelled(session);
      }
    }
  }

  private enforceLimits(session: SessionState): void {
    const { limits } = session;
    if (session.iterationCount >= limits.maxIterations) {
      throw new LimitExceededError(
        'iterations',
        `Reached the limit of ${limits.maxIterations} iterations`,
      );
    }
    if (Date.now() - session.startTime >= limits.maxElapsedMs) {
      throw this.elapsedLimitError(session);
    }
    if (session.cost >= limits.maxCost) {
      throw new LimitExceededError(
        'cost',
        `Spent $${session.cost.toFixed(4)}, over the limit of $${limits.maxCost}`,
      );
    }
  }

  private elapsedLimitError(session: SessionState): LimitExceededError {
    const elapsed = Date.now() - session.startTime;
    return new LimitExceededError(
      'elapsed',
      `Ran for ${elapsed}ms, over the limit of ${session.limits.maxElapsedMs}ms`,
    );
  }

  private throwIfCancelled(session: SessionState): void {
    if (session.cancelled) {
      throw new AgentInterrupt();
    }
    if (session.timedOut) {
      throw this.elapsedLimitError(session);
    }
  }

  private transition(
    session: SessionState,
    events: ReplaySubject<AgentEvent>,
    state: AgentState,
  ): void {
    this.throwIfCancelled(session);
    session.state = state;
    this.emit(session, events, 'state');
  }

  private finish(
    session: SessionState,
    events: ReplaySubject<AgentEvent>,
    state: AgentState.Done | AgentState.Failed | AgentState.Cancelled,
    details: { summary?: string; error?: AgentError },
  ): TaskOutcome {
    session.state = state;
    if (details.error) {
      session.lastError = details.error;
    }
    const status =
      state === AgentState.Done
        ? 'done'
        : state === AgentState.Failed
          ? 'failed'
          : 'cancelled';

    const outcome: TaskOutcome = {
      taskId: session.taskId,
      status,
      iterations: session.iterationCount,
      cost: session.cost,
      ...(details.summary !== undefined && { summary: details.summary }),
      ...(details.error && { error: details.error }),
    };

    this.logger.log(
      `Task ${session.taskId} ${status} after ${session.iterationCount} iterations` +
        (details.error ? `: ${details.error.message}` : ''),
    );
    this.emit(session, events, 'terminal', status);
    events.complete();
    return outcome;
  }

  private emit(
    session: SessionState,
    events: ReplaySubject<AgentEvent>,
    kind: AgentEventKind,
    status?: TaskOutcome['status'],
  ): void {
    const event: AgentEvent = {
      taskId: session.taskId,
      sequence: session.sequence++,
      kind,
      state: session.state,
      iteration: session.iterationCount,
      screenshotRef: session.lastScreenshotRef,
      decision: session.lastDecision,
      action: session.lastAction,
      outcome: session.lastOutcome,
      ...(session.lastError && { error: session.lastError }),
      ...(status && { status }),
      cost: session.cost,
      timestamp: new Date().toISOString(),
    };
    events.next(event);
    this.eventEmitter.emit(AGENT_EVENT, event);
  }
}

function failureKind(error: unknown): FailureKind {
  if (error instanceof NoDisplayFoundError) {
    return 'NoDisplayFound';
  }
  if (error instanceof CaptureUnavailableError) {
    return 'CaptureUnavailable';
  }
  if (error instanceof InferenceUnavailableError) {
    return 'InferenceUnavailable';
  }
  if (error instanceof LimitExceededError) {
    return 'LimitExceeded';
  }
  return 'InternalError';
}
