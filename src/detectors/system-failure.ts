import { Dialogue } from '../dialogue/types';
import { createFinding } from './finding';
import { DialogueDetector, Finding } from './types';

export interface SystemFailureOptions {
  /**
   * Error types that are not system failures. A RecursionError means the
   * agent looped until the simulator gave up, which is a dialogue-of-the-deaf
   * symptom rather than a crash.
   */
  ignoredErrorTypes: readonly string[];
}

export const DEFAULT_SYSTEM_FAILURE_OPTIONS: SystemFailureOptions = {
  ignoredErrorTypes: ['RecursionError'],
};

/**
 * Flags dialogues whose generation was interrupted by an exception.
 * Produces at most one finding per dialogue, anchored at the turn where
 * generation stopped (or the last recorded turn when that is unknown).
 */
export class SystemFailureDetector implements DialogueDetector {
  readonly id = 'system_failure';
  readonly requiresInteractionModel = false;

  constructor(private readonly options: SystemFailureOptions = DEFAULT_SYSTEM_FAILURE_OPTIONS) {}

  run(dialogue: Dialogue): Finding[] {
    const error = dialogue.metadata?.error;
    if (!error || typeof error.errorType !== 'string') return [];
    if (this.options.ignoredErrorTypes.includes(error.errorType)) return [];

    const lastTurn = Math.max(dialogue.turns.length - 1, 0);
    const recorded = error.turnIndex;
    const turnIndex = typeof recorded === 'number' && Number.isInteger(recorded) && recorded >= 0 ? recorded : lastTurn;

    const detail = error.message ? `: ${error.message}` : '';
    return [
      createFinding(
        this.id,
        'system_failure',
        dialogue,
        turnIndex,
        `Generation failed with ${error.errorType}${detail} (dialogue truncated at turn ${turnIndex})`,
      ),
    ];
  }
}
