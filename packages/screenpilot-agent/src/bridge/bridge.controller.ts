import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import {
  InferenceMalformedError,
  InferenceUnavailableError,
  WireDecision,
  errorMessage,
  isAgentInterrupt,
  parseInferenceRequest,
} from '@screenpilot/shared';
import { BridgeService } from './bridge.service';

@Controller()
export class BridgeController {
  private readonly logger = new Logger(BridgeController.name);

  constructor(private readonly bridgeService: BridgeService) {}

  @Post('inference')
  @HttpCode(HttpStatus.OK)
  async inference(
    @Body() body: unknown,
    @Res({ passthrough: true }) res: Response,
  ): Promise<WireDecision> {
    const parsed = parseInferenceRequest(body);
    if (!parsed.success) {
      throw new BadRequestException({
        error: 'BadRequest',
        message: parsed.error,
      });
    }

    // the caller hung up, stop paying for the answer
    const abortController = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        abortController.abort();
      }
    });

    try {
      return await this.bridgeService.infer(
        parsed.data,
        abortController.signal,
      );
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof InferenceMalformedError) {
      return new HttpException(
        { error: 'InferenceMalformed', message: error.message },
        HttpStatus.UNPROCESSABLE_ENTITY,
      );
    }
    if (error instanceof InferenceUnavailableError) {
      return new HttpException(
        { error: 'InferenceUnavailable', message: error.message },
        HttpStatus.SERVICE_UNAVAILABLE,
      );
    }
    if (isAgentInterrupt(error)) {
      this.logger.debug('Inference aborted, the caller went away');
      return new HttpException(
        { error: 'InferenceUnavailable', message: 'Request aborted' },
        HttpStatus.SERVICE_UNAVAILABLE,
      );
    }
    this.logger.error(`Bridge inference failed: ${errorMessage(error)}`);
    return new HttpException(
      { error: 'InternalError', message: errorMessage(error) },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
