export type Accelerator = 'cuda' | 'mps' | 'cpu';

export type HardwareInfo = {
  accelerator: Accelerator;
  // Largest GPU memory seen, 0 when unknown
  memoryGb: number;
};

export type CapturePresetName = 'Default (Maximum)' | 'Medium' | 'Minimal';

export type CapturePreset = {
  name: CapturePresetName;
  maxEdge: number;
  pixelBudget: number;
};

function preset(name: CapturePresetName, maxEdge: number): CapturePreset {
  return { name, maxEdge, pixelBudget: maxEdge * maxEdge };
}

/**
 * Capture size for the detected hardware. Smaller accelerators get smaller
 * screenshots so local vision models keep up.
 */
export function recommendCapturePreset(info: HardwareInfo): CapturePreset {
  switch (info.accelerator) {
    case 'cuda':
      if (info.memoryGb >= 16) {
        return preset('Default (Maximum)', 1344);
      }
      if (info.memoryGb >= 10) {
        return preset('Medium', 1024);
      }
      return preset('Minimal', 960);
    case 'mps':
      return preset('Medium', 1024);
    case 'cpu':
      return preset('Minimal', 896);
  }
}

/**
 * Reads `nvidia-smi --query-gpu=name,memory.total --format=csv,noheader,nounits`
 * output into per-GPU memory in GB. Unparseable lines are skipped.
 */
export function parseNvidiaSmi(stdout: string): number[] {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .flatMap((line) => {
      const fields = line.split(',').map((field) => field.trim());
      if (fields.length !== 2) {
        return [];
      }
      const mib = Number(fields[1]);
      return Number.isFinite(mib) && fields[1] !== '' ? [mib / 1024] : [];
    });
}

export function pickAccelerator(probe: {
  gpuMemoryGb: number[];
  platform: NodeJS.Platform;
  arch: string;
}): HardwareInfo {
  const memoryGb = Math.max(0, ...probe.gpuMemoryGb);

  if (probe.platform === 'darwin' && probe.arch.toLowerCase() === 'arm64') {
    return { accelerator: 'mps', memoryGb };
  }
  if (probe.gpuMemoryGb.length > 0) {
    return { accelerator: 'cuda', memoryGb };
  }
  return { accelerator: 'cpu', memoryGb };
}
