import { DialogueValidationError } from '../errors';
import { Dialogue, DialogueInput, DialogueMetadata, SpeakerRole, Turn, TurnInput } from './types';

const SPEAKER_ROLES: readonly SpeakerRole[] = ['agent', 'user'];

export function isSpeakerRole(value: unknown): value is SpeakerRole {
  return typeof value === 'string' && (SPEAKER_ROLES as readonly string[]).includes(value);
}

function createTurn(index: number, input: TurnInput): Turn {
  const slots = input.slots?.map((sv) => Object.freeze({ slot: sv.slot, value: sv.value }));
  const utterance = Object.freeze({
    text: input.text,
    speaker: input.speaker,
    ...(slots ? { slots: Object.freeze(slots) } : {}),
  });
  const acts = Object.freeze(input.acts.map((label) => Object.freeze({ label })));

  return Object.freeze({
    index,
    speaker: input.speaker,
    utterance,
    acts,
    ...(input.repliesTo !== undefined ? { repliesTo: input.repliesTo } : {}),
  });
}

/**
 * Build a frozen Dialogue. Turn indices are assigned from array order.
 * Throws DialogueValidationError when the input breaks a model invariant.
 */
export function createDialogue(input: DialogueInput): Dialogue {
  const turns = input.turns.map((t, i) => createTurn(i, t));
  const error = input.metadata?.error;
  const metadata: DialogueMetadata = Object.freeze({
    ...input.metadata,
    ...(error ? { error: Object.freeze({ ...error }) } : {}),
  });

  const dialogue: Dialogue = Object.freeze({
    id: input.id,
    turns: Object.freeze(turns),
    metadata,
  });
  validateDialogue(dialogue);
  return dialogue;
}

/**
 * Check the invariants detectors rely on: non-empty id, turns ordered by
 * position, a known speaker and at least one labelled act per turn, and
 * reply annotations pointing backwards.
 */
export function validateDialogue(dialogue: Dialogue): void {
  if (typeof dialogue.id !== 'string' || dialogue.id.trim() === '') {
    throw new DialogueValidationError('Dialogue id must be a non-empty string');
  }
  const fail = (msg: string): never => {
    throw new DialogueValidationError(`Dialogue ${dialogue.id}: ${msg}`, dialogue.id);
  };

  dialogue.turns.forEach((turn, position) => {
    if (turn.index !== position) {
      fail(`turn at position ${position} has index ${turn.index}`);
    }
    if (!isSpeakerRole(turn.speaker)) {
      fail(`turn ${position} has unknown speaker "${String(turn.speaker)}"`);
    }
    if (turn.utterance.speaker !== turn.speaker) {
      fail(`turn ${position} utterance speaker does not match turn speaker`);
    }
    if (typeof turn.utterance.text !== 'string') {
      fail(`turn ${position} has no utterance text`);
    }
    if (turn.acts.length === 0) {
      fail(`turn ${position} carries no dialogue act`);
    }
    if (turn.acts.some((act) => typeof act.label !== 'string' || act.label.trim() === '')) {
      fail(`turn ${position} has an empty dialogue act label`);
    }
    if (turn.repliesTo !== undefined) {
      if (!Number.isInteger(turn.repliesTo) || turn.repliesTo < 0 || turn.repliesTo >= position) {
        fail(`turn ${position} replies to ${turn.repliesTo}, which is not an earlier turn`);
      }
    }
  });

  const errorTurn = dialogue.metadata.error?.turnIndex;
  if (errorTurn !== undefined && (!Number.isInteger(errorTurn) || errorTurn < 0)) {
    fail(`generation error turn index ${errorTurn} is not a valid position`);
  }
}
