import { SpeakerRole, Turn } from './types';

export function speakerPrefix(speaker: SpeakerRole): 'A' | 'U' {
  return speaker === 'agent' ? 'A' : 'U';
}

/** `A_request`, or `U_inform+reveal` for a multi-act turn */
export function turnPathLabel(turn: Turn): string {
  return `${speakerPrefix(turn.speaker)}_${turn.acts.map((a) => a.label).join('+')}`;
}

/** Speaker-prefixed act labels of turns 0..upTo (inclusive) */
export function actPath(turns: readonly Turn[], upTo: number): string[] {
  return turns.slice(0, upTo + 1).map(turnPathLabel);
}
