jest.mock('@nut-tree-fork/nut-js', () => ({
  keyboard: { config: {} },
  mouse: { config: {} },
  Key: {},
  Button: { LEFT: 0, MIDDLE: 1, RIGHT: 2 },
  Point: class {},
}));
jest.mock('../nut/nut.service');

import { ComputerUseService } from './computer-use.service';
import { NutService } from '../nut/nut.service';

describe('ComputerUseService', () => {
  let nut: jest.Mocked<NutService>;
  let service: ComputerUseService;

  beforeEach(() => {
    jest.clearAllMocks();
    nut = new NutService() as jest.Mocked<NutService>;
    service = new ComputerUseService(nut);
  });

  it('moves before clicking', async () => {
    const calls: string[] = [];
    nut.mouseMoveEvent.mockImplementation(async ({ x, y }) => {
      calls.push(`move ${x},${y}`);
    });
    nut.mouseClickEvent.mockImplementation(async (button, count) => {
      calls.push(`click ${button} ${count}`);
    });

    const outcome = await service.execute({
      action: 'click',
      coordinates: { x: 960, y: 540 },
      button: 'left',
      clickCount: 2,
    });

    expect(outcome).toEqual({ status: 'ok' });
    expect(calls).toEqual(['move 960,540', 'click left 2']);
  });

  it('presses, glides and releases for a drag', async () => {
    const calls: string[] = [];
    nut.mouseMoveEvent.mockImplementation(async ({ x, y }) => {
      calls.push(`move ${x},${y}`);
    });
    nut.mouseGlideEvent.mockImplementation(async ({ x, y }) => {
      calls.push(`glide ${x},${y}`);
    });
    nut.mouseButtonEvent.mockImplementation(async (button, pressed) => {
      calls.push(`${button} ${pressed ? 'down' : 'up'}`);
    });

    await service.execute({
      action: 'drag',
      from: { x: 10, y: 10 },
      to: { x: 300, y: 200 },
      button: 'left',
    });

    expect(calls).toEqual([
      'move 10,10',
      'left down',
      'glide 300,200',
      'left up',
    ]);
  });

  it('releases the button when the drag move fails', async () => {
    nut.mouseGlideEvent.mockRejectedValueOnce(
      new Error('Failed to move mouse: out of range'),
    );

    const outcome = await service.execute({
      action: 'drag',
      from: { x: 10, y: 10 },
      to: { x: 99999, y: 10 },
      button: 'right',
    });

    expect(outcome).toEqual({
      status: 'failed',
      reason: 'Failed to move mouse: out of range',
    });
    expect(nut.mouseButtonEvent).toHaveBeenLastCalledWith('right', false);
  });

  it('reports key failures without retrying', async () => {
    nut.sendKeys.mockRejectedValue(new Error("Invalid key: 'hyper'"));

    const outcome = await service.execute({ action: 'key_combo', keys: ['hyper'] });

    expect(outcome).toEqual({ status: 'failed', reason: "Invalid key: 'hyper'" });
    expect(nut.sendKeys).toHaveBeenCalledTimes(1);
  });

  it('scrolls at the given point', async () => {
    await service.execute({
      action: 'scroll',
      coordinates: { x: 5, y: 6 },
      delta: { x: 0, y: -3 },
    });

    expect(nut.mouseMoveEvent).toHaveBeenCalledWith({ x: 5, y: 6 });
    expect(nut.mouseWheelEvent).toHaveBeenCalledWith({ x: 0, y: -3 });
  });

  it('runs concurrent requests one at a time', async () => {
    let active = 0;
    let maxActive = 0;
    nut.typeText.mockImplementation(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    });

    await Promise.all([
      service.execute({ action: 'type', text: 'a' }),
      service.execute({ action: 'type', text: 'b' }),
      service.execute({ action: 'type', text: 'c' }),
    ]);

    expect(nut.typeText).toHaveBeenCalledTimes(3);
    expect(maxActive).toBe(1);
  });
});
