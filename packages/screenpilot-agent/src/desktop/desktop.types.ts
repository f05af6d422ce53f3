import { Action, Capture, Monitor, Outcome } from '@screenpilot/shared';

/**
 * One controllable desktop as the orchestrator sees it.
 */
export interface DesktopPort {
  // Tasks sharing a key never run at the same time
  readonly key: string;
  enumerate(): Promise<Monitor[]>;
  capture(monitorIds: string[]): Promise<Capture>;
  execute(action: Action): Promise<Outcome>;
}

export interface DesktopConnector {
  connect(baseUrl?: string): DesktopPort;
}

export const DESKTOP_CONNECTOR = Symbol('DESKTOP_CONNECTOR');
