/** Who produced a turn */
export type SpeakerRole = 'agent' | 'user';

export interface SlotValue {
  readonly slot: string;
  readonly value: string;
}

export interface Utterance {
  readonly text: string;
  readonly speaker: SpeakerRole;
  readonly slots?: readonly SlotValue[];
}

export interface DialogueAct {
  readonly label: string;
}

/**
 * One speaker contribution. `index` is the turn's position in the dialogue.
 * Consecutive turns may come from the same speaker.
 */
export interface Turn {
  readonly index: number;
  readonly speaker: SpeakerRole;
  readonly utterance: Utterance;
  readonly acts: readonly DialogueAct[];
  /** Index of the earlier turn this turn answers, when the transcript is annotated with it */
  readonly repliesTo?: number;
}

/** Exception recorded while the agent or simulator generated the dialogue */
export interface GenerationError {
  readonly errorType: string;
  readonly message?: string;
  /** Turn at which generation stopped, when known */
  readonly turnIndex?: number;
}

export interface DialogueMetadata {
  readonly error?: GenerationError;
  readonly [key: string]: unknown;
}

export interface Dialogue {
  readonly id: string;
  readonly turns: readonly Turn[];
  readonly metadata: DialogueMetadata;
}

// ─── Factory input shapes ─────────────────────────────────────────

export interface TurnInput {
  speaker: SpeakerRole;
  text: string;
  acts: string[];
  slots?: SlotValue[];
  repliesTo?: number;
}

export interface DialogueInput {
  id: string;
  turns: TurnInput[];
  metadata?: {
    error?: GenerationError;
    [key: string]: unknown;
  };
}
