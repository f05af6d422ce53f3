import { Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  Action,
  Capture,
  CaptureUnavailableError,
  Monitor,
  NoDisplayFoundError,
  Outcome,
  describeAction,
  errorMessage,
} from '@screenpilot/shared';
import { DesktopPort } from './desktop.types';

const coordinatesSchema = z.object({ x: z.number(), y: z.number() });

const monitorSchema = z.object({
  id: z.string(),
  name: z.string(),
  origin: coordinatesSchema,
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  scaleFactor: z.number().positive(),
  primary: z.boolean(),
});

const captureResponseSchema = z.object({
  image: z.string().min(1),
  sourceMonitors: z.array(monitorSchema).min(1),
  origin: coordinatesSchema,
  realWidth: z.number().int().positive(),
  realHeight: z.number().int().positive(),
  timestamp: z.string(),
});

const outcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok') }),
  z.object({ status: z.literal('failed'), reason: z.string() }),
]);

const errorBodySchema = z.object({
  error: z.string().optional(),
  message: z.union([z.string(), z.array(z.string())]).optional(),
});

/**
 * HTTP client for the desktop daemon.
 */
export class DesktopClient implements DesktopPort {
  private readonly logger = new Logger(DesktopClient.name);

  constructor(readonly baseUrl: string) {}

  get key(): string {
    return this.baseUrl;
  }

  async enumerate(): Promise<Monitor[]> {
    const body = await this.request('/display/monitors', { method: 'GET' });
    const result = z.array(monitorSchema).safeParse(body);
    if (!result.success) {
      throw new CaptureUnavailableError(
        `Desktop daemon returned an invalid monitor list: ${result.error.issues[0]?.message}`,
      );
    }
    if (result.data.length === 0) {
      throw new NoDisplayFoundError();
    }
    return result.data;
  }

  async capture(monitorIds: string[]): Promise<Capture> {
    const body = await this.request('/display/capture', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ monitorIds }),
    });
    const result = captureResponseSchema.safeParse(body);
    if (!result.success) {
      throw new CaptureUnavailableError(
        `Desktop daemon returned an invalid capture: ${result.error.issues[0]?.message}`,
      );
    }

    const { image, ...capture } = result.data;
    return { ...capture, image: Buffer.from(image, 'base64') };
  }

  /**
   * Never throws. A daemon that cannot be reached or rejects the action
   * yields a failed outcome.
   */
  async execute(action: Action): Promise<Outcome> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/computer-use`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(action),
      });
    } catch (error) {
      return {
        status: 'failed',
        reason: `Desktop daemon unreachable: ${errorMessage(error)}`,
      };
    }

    const body = await this.readJson(response);
    if (!response.ok) {
      const reason = this.describeErrorBody(body) ?? response.statusText;
      this.logger.warn(
        `Daemon rejected ${describeAction(action)} (${response.status}): ${reason}`,
      );
      return { status: 'failed', reason };
    }

    const outcome = outcomeSchema.safeParse(body);
    if (!outcome.success) {
      return {
        status: 'failed',
        reason: 'Desktop daemon returned an invalid outcome',
      };
    }
    return outcome.data;
  }

  private async request(path: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, init);
    } catch (error) {
      throw new CaptureUnavailableError(
        `Desktop daemon unreachable at ${this.baseUrl}: ${errorMessage(error)}`,
      );
    }

    const body = await this.readJson(response);
    if (response.ok) {
      return body;
    }

    const parsed = errorBodySchema.safeParse(body);
    const message =
      this.describeErrorBody(body) ??
      `${path} failed: ${response.status} ${response.statusText}`;
    if (parsed.success && parsed.data.error === 'NoDisplayFound') {
      throw new NoDisplayFoundError(message);
    }
    throw new CaptureUnavailableError(message);
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      return null;
    }
  }

  private describeErrorBody(body: unknown): string | undefined {
    const parsed = errorBodySchema.safeParse(body);
    if (!parsed.success || parsed.data.message === undefined) {
      return undefined;
    }
    const { message } = parsed.data;
    return Array.isArray(message) ? message.join('; ') : message;
  }
}
