import {
  Decision,
  TEXT_DECISION_KINDS,
  hasCoordinates,
} from '@screenpilot/shared';
import { ModelClient } from '../models/model.types';

/**
 * Why `client` may not emit `decision`, or null when it may.
 */
export function capabilityViolation(
  client: ModelClient,
  decision: Decision,
): string | null {
  const { capabilities, role } = client;

  if (hasCoordinates(decision) && !capabilities.canEmitCoordinateActions) {
    return `The ${role} model may not emit ${decision.kind} actions`;
  }
  if (TEXT_DECISION_KINDS.has(decision.kind) && !capabilities.canEmitTextActions) {
    return `The ${role} model may not emit ${decision.kind} actions`;
  }
  if (decision.kind === 'subgoal' && !capabilities.canDelegate) {
    return `The ${role} model may not delegate sub-goals`;
  }
  if (decision.kind === 'done' && !capabilities.canComplete) {
    return `The ${role} model may not complete the task`;
  }
  return null;
}
