import { Injectable } from '@nestjs/common';
import { v4 as uuid } from 'uuid';

const MAX_SCREENSHOTS_PER_TASK = 50;
const MAX_TASKS = 20;

/**
 * In-memory store for the downsampled screenshots a task sent to its models.
 * Keeps the most recent screenshots of the most recent tasks.
 */
@Injectable()
export class ScreenshotStoreService {
  private readonly tasks = new Map<string, Map<string, Buffer>>();

  save(taskId: string, image: Buffer): string {
    let screenshots = this.tasks.get(taskId);
    if (!screenshots) {
      screenshots = new Map();
      this.tasks.set(taskId, screenshots);
      this.evictOldest(this.tasks, MAX_TASKS);
    }

    const ref = uuid();
    screenshots.set(ref, image);
    this.evictOldest(screenshots, MAX_SCREENSHOTS_PER_TASK);
    return ref;
  }

  get(taskId: string, ref: string): Buffer | undefined {
    return this.tasks.get(taskId)?.get(ref);
  }

  // Maps iterate in insertion order
  private evictOldest<V>(map: Map<string, V>, max: number): void {
    for (const key of map.keys()) {
      if (map.size <= max) {
        return;
      }
      map.delete(key);
    }
  }
}
