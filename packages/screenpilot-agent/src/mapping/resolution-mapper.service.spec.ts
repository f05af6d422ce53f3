import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import { Capture, Monitor } from '@screenpilot/shared';
import { AgentConfigService } from '../config/agent-config.service';
import { HardwareService } from '../hardware/hardware.service';
import { ResolutionMapperService } from './resolution-mapper.service';

const monitor = (
  id: string,
  x: number,
  width: number,
  height: number,
): Monitor => ({
  id,
  name: id,
  origin: { x, y: 0 },
  width,
  height,
  scaleFactor: 1,
  primary: x === 0,
});

async function captureOf(monitors: Monitor[]): Promise<Capture> {
  const realWidth = monitors.reduce((sum, m) => sum + m.width, 0);
  const realHeight = Math.max(...monitors.map((m) => m.height));
  const image = await sharp({
    create: {
      width: realWidth,
      height: realHeight,
      channels: 3,
      background: { r: 10, g: 20, b: 30 },
    },
  })
    .png()
    .toBuffer();
  return {
    image,
    sourceMonitors: monitors,
    origin: { x: 0, y: 0 },
    realWidth,
    realHeight,
    timestamp: '2026-01-01T00:00:00.000Z',
  };
}

describe('ResolutionMapperService', () => {
  const hardware = new HardwareService();

  const createService = (env: Record<string, string> = {}) =>
    new ResolutionMapperService(
      new AgentConfigService(new ConfigService(env)),
      hardware,
    );

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('resizes a 1920x1080 capture to 1000x562 at a budget of one million', async () => {
    const service = createService();
    const scaled = await service.downsample(
      await captureOf([monitor('0', 0, 1920, 1080)]),
      1_000_000,
    );

    expect([scaled.downsampledWidth, scaled.downsampledHeight]).toEqual([
      1000, 562,
    ]);
    const metadata = await sharp(scaled.image).metadata();
    expect([metadata.width, metadata.height]).toEqual([1000, 562]);
    expect(scaled.transform.inverse({ x: 500, y: 281 })).toEqual({
      x: 960,
      y: 540,
    });
  });

  it('maps the right half of a dual-monitor capture onto the second monitor', async () => {
    const service = createService();
    const scaled = await service.downsample(
      await captureOf([monitor('0', 0, 1920, 1080), monitor('1', 1920, 1920, 1080)]),
      1_000_000,
    );

    expect([scaled.downsampledWidth, scaled.downsampledHeight]).toEqual([
      1000, 281,
    ]);
    const point = scaled.transform.inverse({ x: 750, y: 140 });
    expect(point).toEqual({ x: 2880, y: 538 });
    expect(scaled.transform.regionAt({ x: 750, y: 140 }).monitorId).toBe('1');
  });

  it('keeps the original bytes when the capture fits the budget', async () => {
    const service = createService();
    const capture = await captureOf([monitor('0', 0, 64, 48)]);
    const scaled = await service.downsample(capture, 10_000);

    expect(scaled.image).toBe(capture.image);
    expect(scaled.transform.scaleX).toBe(1);
  });

  it('uses the configured budget before the hardware preset', async () => {
    const detect = jest.spyOn(hardware, 'capturePreset');
    const service = createService({ SCREENPILOT_PIXEL_BUDGET: '250000' });

    await expect(service.pixelBudget()).resolves.toBe(250000);
    expect(detect).not.toHaveBeenCalled();
  });

  it('falls back to the hardware preset', async () => {
    jest.spyOn(hardware, 'capturePreset').mockResolvedValue({
      name: 'Minimal',
      maxEdge: 896,
      pixelBudget: 802816,
    });
    const service = createService();

    await expect(service.pixelBudget()).resolves.toBe(802816);
  });
});
