import { actPath } from '../dialogue/act-path';
import { Dialogue } from '../dialogue/types';
import { BreakdownType, Finding, TurnRange } from './types';

export function createFinding(
  detector: string,
  type: BreakdownType,
  dialogue: Dialogue,
  turnIndex: number,
  explanation: string,
  turnRange?: TurnRange,
): Finding {
  return {
    type,
    detector,
    dialogueId: dialogue.id,
    turnIndex,
    ...(turnRange ? { turnRange } : {}),
    explanation,
    actPath: actPath(dialogue.turns, turnIndex),
  };
}
