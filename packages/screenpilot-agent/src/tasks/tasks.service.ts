import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { Observable, ReplaySubject } from 'rxjs';
import {
  AgentEvent,
  AgentState,
  TERMINAL_STATES,
  TaskOutcome,
  TaskStatus,
  errorMessage,
} from '@screenpilot/shared';
import { AgentOrchestrator } from '../agent/agent.orchestrator';
import { AGENT_EVENT } from '../agent/agent.types';
import { ScreenshotStoreService } from '../agent/screenshot-store.service';
import { CreateTaskDto } from './dto/create-task.dto';
import { TasksGateway } from './tasks.gateway';
import { TaskSummary } from './tasks.types';

// Finished tasks kept for listing; running ones are never dropped
const MAX_FINISHED_TASKS = 100;

type TaskRecord = {
  summary: TaskSummary;
  events: ReplaySubject<AgentEvent>;
};

function statusOf(event: AgentEvent): TaskStatus {
  if (event.status) {
    return event.status;
  }
  return event.state === AgentState.Idle ? 'queued' : 'running';
}

/**
 * Task registry for the HTTP and socket.io surfaces. Records are built from
 * the orchestrator's event stream and live in memory.
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);
  private readonly tasks = new Map<string, TaskRecord>();

  constructor(
    private readonly orchestrator: AgentOrchestrator,
    private readonly screenshots: ScreenshotStoreService,
    private readonly tasksGateway: TasksGateway,
  ) {}

  create(createTaskDto: CreateTaskDto): TaskSummary {
    const { instruction, ...options } = createTaskDto;
    const handle = this.orchestrator.runTask(instruction, options);

    const record = this.record(handle.taskId);
    record.summary.instruction = instruction;

    void handle.completion.then(
      (outcome) => this.complete(outcome),
      (error: unknown) =>
        this.logger.error(
          `Task ${handle.taskId} ended unexpectedly: ${errorMessage(error)}`,
        ),
    );

    this.logger.log(`Created task ${handle.taskId}`);
    this.tasksGateway.emitTaskCreated(record.summary);
    return record.summary;
  }

  findAll(status?: TaskStatus[]): TaskSummary[] {
    return [...this.tasks.values()]
      .map((record) => record.summary)
      .filter((summary) => !status || status.includes(summary.status))
      .reverse();
  }

  findById(id: string): TaskSummary {
    return this.get(id).summary;
  }

  cancel(id: string): { id: string; cancelled: boolean } {
    this.get(id);
    const cancelled = this.orchestrator.cancel(id);
    if (!cancelled) {
      this.logger.warn(`Task ${id} is not running, nothing to cancel`);
    }
    return { id, cancelled };
  }

  /**
   * Every event of the task so far, then live ones until the terminal event.
   */
  events(id: string): Observable<AgentEvent> {
    return this.get(id).events.asObservable();
  }

  screenshot(id: string, ref: string): Buffer {
    this.get(id);
    const image = this.screenshots.get(id, ref);
    if (!image) {
      throw new NotFoundException({
        error: 'NotFound',
        message: `Screenshot ${ref} of task ${id} not found`,
      });
    }
    return image;
  }

  @OnEvent(AGENT_EVENT)
  handleAgentEvent(event: AgentEvent) {
    const record = this.record(event.taskId);
    Object.assign(record.summary, {
      status: statusOf(event),
      state: event.state,
      iterations: event.iteration,
      cost: event.cost,
      lastScreenshotRef: event.screenshotRef,
      updatedAt: event.timestamp,
    });
    if (event.kind === 'terminal' && event.error) {
      record.summary.error = event.error;
    }

    record.events.next(event);
    if (TERMINAL_STATES.has(event.state)) {
      record.events.complete();
    }
    this.tasksGateway.emitAgentEvent(event);
  }

  private complete(outcome: TaskOutcome) {
    const record = this.tasks.get(outcome.taskId);
    if (record && outcome.summary !== undefined) {
      record.summary.summary = outcome.summary;
    }
    this.evictFinished();
  }

  // The orchestrator's first event arrives before runTask returns
  private record(id: string): TaskRecord {
    let record = this.tasks.get(id);
    if (!record) {
      const now = new Date().toISOString();
      record = {
        summary: {
          id,
          instruction: '',
          status: 'queued',
          state: AgentState.Idle,
          iterations: 0,
          cost: 0,
          lastScreenshotRef: null,
          createdAt: now,
          updatedAt: now,
        },
        events: new ReplaySubject<AgentEvent>(),
      };
      this.tasks.set(id, record);
    }
    return record;
  }

  private get(id: string): TaskRecord {
    const record = this.tasks.get(id);
    if (!record) {
      throw new NotFoundException({
        error: 'NotFound',
        message: `Task with ID ${id} not found`,
      });
    }
    return record;
  }

  private evictFinished() {
    const finished = [...this.tasks.entries()].filter(([, record]) =>
      TERMINAL_STATES.has(record.summary.state),
    );
    for (const [id] of finished.slice(0, -MAX_FINISHED_TASKS)) {
      this.tasks.delete(id);
    }
  }
}
