jest.mock('@nut-tree-fork/nut-js', () => ({
  keyboard: { config: {} },
  mouse: { config: {} },
  Key: {},
  Button: { LEFT: 0, MIDDLE: 1, RIGHT: 2 },
  Point: class {},
}));

import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import {
  Action,
  Capture,
  CaptureUnavailableError,
  Monitor,
  NoDisplayFoundError,
  Outcome,
} from '@screenpilot/shared';
import { DisplayModule } from '../display/display.module';
import { DisplayGeometryService } from '../display/display-geometry.service';
import { ScreenCaptureService } from '../display/screen-capture.service';
import { ComputerUseModule } from '../computer-use/computer-use.module';
import { ComputerUseService } from '../computer-use/computer-use.service';
import { AppController } from '../app.controller';

const primary: Monitor = {
  id: '0',
  name: 'Main',
  origin: { x: 0, y: 0 },
  width: 1920,
  height: 1080,
  scaleFactor: 1,
  primary: true,
};

class FakeDisplayGeometry {
  monitors: Monitor[] = [primary];

  async enumerate(): Promise<Monitor[]> {
    if (this.monitors.length === 0) {
      throw new NoDisplayFoundError();
    }
    return this.monitors;
  }
}

class FakeScreenCapture {
  requested: string[][] = [];

  async capture(monitorIds: string[]): Promise<Capture> {
    this.requested.push(monitorIds);
    if (monitorIds.includes('missing')) {
      throw new CaptureUnavailableError('Unknown monitor id(s): missing');
    }
    return {
      image: Buffer.from('png-bytes'),
      sourceMonitors: [primary],
      origin: { x: 0, y: 0 },
      realWidth: 1920,
      realHeight: 1080,
      timestamp: '2026-01-01T00:00:00.000Z',
    };
  }
}

class FakeComputerUse {
  executed: Action[] = [];

  async execute(action: Action): Promise<Outcome> {
    this.executed.push(action);
    return { status: 'ok' };
  }
}

describe('desktop daemon HTTP API', () => {
  let app: INestApplication;
  const geometry = new FakeDisplayGeometry();
  const capture = new FakeScreenCapture();
  const computerUse = new FakeComputerUse();

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [DisplayModule, ComputerUseModule],
      controllers: [AppController],
    })
      .overrideProvider(DisplayGeometryService)
      .useValue(geometry)
      .overrideProvider(ScreenCaptureService)
      .useValue(capture)
      .overrideProvider(ComputerUseService)
      .useValue(computerUse)
      .compile();

    app = moduleRef.createNestApplication({ logger: false });
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('lists monitors', async () => {
    const response = await request(app.getHttpServer())
      .get('/display/monitors')
      .expect(200);

    expect(response.body).toEqual([primary]);
  });

  it('answers 503 NoDisplayFound when nothing is attached', async () => {
    geometry.monitors = [];

    const response = await request(app.getHttpServer())
      .get('/display/monitors')
      .expect(503);

    expect(response.body).toEqual({
      error: 'NoDisplayFound',
      message: 'No display attached',
    });
    geometry.monitors = [primary];
  });

  it('returns the capture image as base64', async () => {
    const response = await request(app.getHttpServer())
      .post('/display/capture')
      .send({ monitorIds: ['0'] })
      .expect(200);

    expect(response.body).toEqual({
      image: Buffer.from('png-bytes').toString('base64'),
      sourceMonitors: [primary],
      origin: { x: 0, y: 0 },
      realWidth: 1920,
      realHeight: 1080,
      timestamp: '2026-01-01T00:00:00.000Z',
    });
    expect(capture.requested.at(-1)).toEqual(['0']);
  });

  it('answers 503 CaptureUnavailable for unknown monitors', async () => {
    const response = await request(app.getHttpServer())
      .post('/display/capture')
      .send({ monitorIds: ['missing'] })
      .expect(503);

    expect(response.body.error).toBe('CaptureUnavailable');
  });

  it('executes a validated action', async () => {
    const response = await request(app.getHttpServer())
      .post('/computer-use')
      .send({ action: 'move', coordinates: { x: 12, y: 34 } })
      .expect(200);

    expect(response.body).toEqual({ status: 'ok' });
    expect(computerUse.executed.at(-1)).toEqual({
      action: 'move',
      coordinates: { x: 12, y: 34 },
    });
  });

  it('rejects an action with a bad button', async () => {
    await request(app.getHttpServer())
      .post('/computer-use')
      .send({
        action: 'click',
        coordinates: { x: 1, y: 1 },
        button: 'thumb',
        clickCount: 1,
      })
      .expect(400);
  });

  it('reports health', async () => {
    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body.status).toBe('ok');
    expect(response.body.service).toBe('screenpilotd');
  });
});
