import { Dialogue } from '../dialogue/types';
import { InteractionModel } from '../interaction-model/interaction-model';

export type BreakdownType =
  | 'system_failure'
  | 'dialogue_of_the_deaf'
  | 'delayed_reply'
  | 'unexpected_transition'
  | 'detector_error';

export const BREAKDOWN_TYPES: readonly BreakdownType[] = [
  'system_failure',
  'dialogue_of_the_deaf',
  'delayed_reply',
  'unexpected_transition',
  'detector_error',
];

export interface TurnRange {
  readonly start: number;
  readonly end: number;
}

/** A single breakdown detected in one dialogue */
export interface Finding {
  readonly type: BreakdownType;
  /** Identifier of the detector that produced it */
  readonly detector: string;
  readonly dialogueId: string;
  /** Turn the finding is anchored at */
  readonly turnIndex: number;
  readonly turnRange?: TurnRange;
  readonly explanation: string;
  /** Speaker-prefixed act labels of the turns up to and including the anchor */
  readonly actPath: readonly string[];
}

/** Detector that only needs the transcript */
export interface DialogueDetector {
  readonly id: string;
  readonly requiresInteractionModel: false;
  run(dialogue: Dialogue): Finding[];
}

/** Detector that checks the transcript against the interaction model */
export interface ModelDependentDetector {
  readonly id: string;
  readonly requiresInteractionModel: true;
  run(dialogue: Dialogue, model: InteractionModel): Finding[];
}

/**
 * Common contract for breakdown detectors. Implementations must be pure:
 * no state kept between calls, and the same input always gives the same
 * findings, in transcript order.
 */
export type Detector = DialogueDetector | ModelDependentDetector;
