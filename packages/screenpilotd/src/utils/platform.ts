/**
 * Platform detection for the desktop daemon
 */

import * as os from 'os';

export enum Platform {
  WINDOWS = 'windows',
  LINUX = 'linux',
  MACOS = 'darwin',
  UNKNOWN = 'unknown',
}

export function getPlatform(): Platform {
  switch (os.platform()) {
    case 'win32':
      return Platform.WINDOWS;
    case 'linux':
      return Platform.LINUX;
    case 'darwin':
      return Platform.MACOS;
    default:
      return Platform.UNKNOWN;
  }
}

export function isWindows(): boolean {
  return getPlatform() === Platform.WINDOWS;
}

export function isMacOS(): boolean {
  return getPlatform() === Platform.MACOS;
}

export function logPlatformInfo(logger: { log: (message: string) => void }): void {
  logger.log(`Platform: ${getPlatform()} (${os.arch()})`);
  logger.log(`OS Release: ${os.release()}`);
}
