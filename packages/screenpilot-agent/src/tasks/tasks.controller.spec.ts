import { lastValueFrom, of, toArray } from 'rxjs';
import { AgentEvent, AgentState } from '@screenpilot/shared';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';

describe('TasksController', () => {
  const tasksService = {
    create: jest.fn(),
    findAll: jest.fn(),
    events: jest.fn(),
    screenshot: jest.fn(),
  };
  let controller: TasksController;

  beforeEach(() => {
    jest.resetAllMocks();
    controller = new TasksController(tasksService as unknown as TasksService);
  });

  it('returns the id of a created task', () => {
    tasksService.create.mockReturnValue({ id: 'task-1' });

    expect(controller.create({ instruction: 'Open the editor' })).toEqual({
      taskId: 'task-1',
    });
  });

  it('keeps only known statuses from the filter', () => {
    tasksService.findAll.mockReturnValue([]);

    controller.findAll('done, bogus,failed');

    expect(tasksService.findAll).toHaveBeenCalledWith(['done', 'failed']);
  });

  it('lists everything without a filter', () => {
    tasksService.findAll.mockReturnValue([]);

    controller.findAll();

    expect(tasksService.findAll).toHaveBeenCalledWith(undefined);
  });

  it('wraps events as server-sent messages', async () => {
    const event: AgentEvent = {
      taskId: 'task-1',
      sequence: 0,
      kind: 'state',
      state: AgentState.Idle,
      iteration: 0,
      screenshotRef: null,
      decision: null,
      action: null,
      outcome: null,
      cost: 0,
      timestamp: '2024-01-01T00:00:00.000Z',
    };
    tasksService.events.mockReturnValue(of(event));

    const messages = await lastValueFrom(
      controller.events('task-1').pipe(toArray()),
    );

    expect(messages).toEqual([{ data: event }]);
  });

  it('serves screenshots as PNG', () => {
    tasksService.screenshot.mockReturnValue(Buffer.from('png'));

    const file = controller.screenshot('task-1', 'shot-1');

    expect(tasksService.screenshot).toHaveBeenCalledWith('task-1', 'shot-1');
    expect(file.getHeaders().type).toBe('image/png');
  });
});
