import { Injectable, Logger } from '@nestjs/common';
import {
  Action,
  DragAction,
  KeyedSerialQueue,
  Outcome,
  describeAction,
  errorMessage,
} from '@screenpilot/shared';
import { NutService } from '../nut/nut.service';

// The machine has one pointer and one keyboard.
const INPUT_DEVICE = 'input';

@Injectable()
export class ComputerUseService {
  private readonly logger = new Logger(ComputerUseService.name);
  private readonly queue = new KeyedSerialQueue();

  constructor(private readonly nutService: NutService) {}

  /**
   * Performs one action in real screen coordinates. Failures come back as a
   * failed Outcome; nothing is retried.
   */
  execute(action: Action): Promise<Outcome> {
    return this.queue.run(INPUT_DEVICE, async () => {
      this.logger.log(`Executing ${describeAction(action)}`);
      try {
        await this.perform(action);
        return { status: 'ok' };
      } catch (error) {
        const reason = errorMessage(error);
        this.logger.warn(`Action ${action.action} failed: ${reason}`);
        return { status: 'failed', reason };
      }
    });
  }

  private async perform(action: Action): Promise<void> {
    switch (action.action) {
      case 'move':
        await this.nutService.mouseMoveEvent(action.coordinates);
        return;
      case 'click':
        await this.nutService.mouseMoveEvent(action.coordinates);
        await this.nutService.mouseClickEvent(action.button, action.clickCount);
        return;
      case 'drag':
        await this.drag(action);
        return;
      case 'type':
        await this.nutService.typeText(action.text);
        return;
      case 'key_combo':
        await this.nutService.sendKeys(action.keys);
        return;
      case 'scroll':
        await this.nutService.mouseMoveEvent(action.coordinates);
        await this.nutService.mouseWheelEvent(action.delta);
        return;
      case 'wait':
        await new Promise((resolve) => setTimeout(resolve, action.durationMs));
        return;
    }
  }

  // press, glide, release; the button is released even if the glide fails
  private async drag({ from, to, button }: DragAction): Promise<void> {
    await this.nutService.mouseMoveEvent(from);
    await this.nutService.mouseButtonEvent(button, true);
    try {
      await this.nutService.mouseGlideEvent(to);
    } finally {
      await this.nutService.mouseButtonEvent(button, false);
    }
  }
}
