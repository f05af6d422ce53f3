import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  MessageEvent,
  Param,
  Post,
  Query,
  Sse,
  StreamableFile,
  ValidationPipe,
} from '@nestjs/common';
import { Observable, map } from 'rxjs';
import { TaskStatus } from '@screenpilot/shared';
import { CreateTaskDto } from './dto/create-task.dto';
import { TasksService } from './tasks.service';
import { TaskSummary } from './tasks.types';

const TASK_STATUSES: readonly TaskStatus[] = [
  'queued',
  'running',
  'done',
  'failed',
  'cancelled',
];

function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

@Controller('tasks')
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  create(
    @Body(new ValidationPipe({ whitelist: true, transform: true }))
    createTaskDto: CreateTaskDto,
  ): { taskId: string } {
    const task = this.tasksService.create(createTaskDto);
    return { taskId: task.id };
  }

  /**
   * Newest first. `statuses` is a comma-separated filter.
   */
  @Get()
  findAll(@Query('statuses') statuses?: string): TaskSummary[] {
    const filter = statuses
      ?.split(',')
      .map((status) => status.trim())
      .filter(isTaskStatus);
    return this.tasksService.findAll(filter);
  }

  @Get(':id')
  findById(@Param('id') id: string): TaskSummary {
    return this.tasksService.findById(id);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  cancel(@Param('id') id: string): { id: string; cancelled: boolean } {
    return this.tasksService.cancel(id);
  }

  @Sse(':id/events')
  events(@Param('id') id: string): Observable<MessageEvent> {
    return this.tasksService
      .events(id)
      .pipe(map((event) => ({ data: event })));
  }

  @Get(':id/screenshots/:ref')
  screenshot(
    @Param('id') id: string,
    @Param('ref') ref: string,
  ): StreamableFile {
    return new StreamableFile(this.tasksService.screenshot(id, ref), {
      type: 'image/png',
    });
  }
}
