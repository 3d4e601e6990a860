import { Dialogue, SpeakerRole, Turn } from '../dialogue/types';
import { createFinding } from './finding';
import { DialogueDetector, Finding } from './types';

export interface DialogueOfTheDeafOptions {
  /** Whose turns are compared */
  speaker: SpeakerRole;
}

/**
 * Text normalization used for repeat detection: NFKC, trimmed, whitespace
 * runs collapsed to one space, lower-cased.
 */
export function normalizeUtterance(text: string): string {
  return text.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Order-independent key of a turn's act labels */
export function actSetKey(turn: Turn): string {
  return Array.from(new Set(turn.acts.map((a) => a.label)))
    .sort()
    .join('|');
}

/**
 * Detects a speaker repeating itself: consecutive turns of that speaker
 * with the same normalized text and the same set of dialogue acts. Turns of
 * the other speaker in between do not break the pair. Each repeated
 * transition is reported separately, at the later turn.
 */
export class DialogueOfTheDeafDetector implements DialogueDetector {
  readonly id = 'dialogue_of_the_deaf';
  readonly requiresInteractionModel = false;

  constructor(private readonly options: DialogueOfTheDeafOptions = { speaker: 'agent' }) {}

  run(dialogue: Dialogue): Finding[] {
    const findings: Finding[] = [];
    let previous: { turn: Turn; text: string; acts: string } | null = null;

    for (const turn of dialogue.turns) {
      if (turn.speaker !== this.options.speaker) continue;

      const current = { turn, text: normalizeUtterance(turn.utterance.text), acts: actSetKey(turn) };
      if (previous && previous.text === current.text && previous.acts === current.acts) {
        findings.push(
          createFinding(
            this.id,
            'dialogue_of_the_deaf',
            dialogue,
            turn.index,
            `The ${this.options.speaker} repeated turn ${previous.turn.index} ` +
              `("${turn.utterance.text}", acts: ${current.acts.split('|').join(', ')})`,
            { start: previous.turn.index, end: turn.index },
          ),
        );
      }
      previous = current;
    }
    return findings;
  }
}
