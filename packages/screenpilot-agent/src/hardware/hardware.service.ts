import { Injectable, Logger } from '@nestjs/common';
import { execFile } from 'child_process';
import { promisify } from 'util';
import * as os from 'os';
import { errorMessage } from '@screenpilot/shared';
import {
  CapturePreset,
  HardwareInfo,
  parseNvidiaSmi,
  pickAccelerator,
  recommendCapturePreset,
} from './capture-preset';

const execFileAsync = promisify(execFile);

@Injectable()
export class HardwareService {
  private readonly logger = new Logger(HardwareService.name);
  private presetPromise: Promise<CapturePreset> | null = null;

  /**
   * Detects the accelerator once and caches the resulting preset.
   */
  capturePreset(): Promise<CapturePreset> {
    if (!this.presetPromise) {
      this.presetPromise = this.detect().then((info) => {
        const preset = recommendCapturePreset(info);
        this.logger.log(
          `Detected ${info.accelerator} (${info.memoryGb.toFixed(1)} GB): capture preset ${preset.name}, max edge ${preset.maxEdge}`,
        );
        return preset;
      });
    }
    return this.presetPromise;
  }

  async detect(): Promise<HardwareInfo> {
    return pickAccelerator({
      gpuMemoryGb: await this.queryNvidiaSmi(),
      platform: os.platform(),
      arch: os.arch(),
    });
  }

  private async queryNvidiaSmi(): Promise<number[]> {
    try {
      const { stdout } = await execFileAsync(
        'nvidia-smi',
        ['--query-gpu=name,memory.total', '--format=csv,noheader,nounits'],
        { timeout: 5000 },
      );
      return parseNvidiaSmi(stdout);
    } catch (error) {
      this.logger.debug(`nvidia-smi unavailable: ${errorMessage(error)}`);
      return [];
    }
  }
}
