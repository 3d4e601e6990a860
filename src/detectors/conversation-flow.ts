import { speakerPrefix } from '../dialogue/act-path';
import { Dialogue, Turn } from '../dialogue/types';
import { InteractionModel } from '../interaction-model/interaction-model';
import { DelayedReplyStrategy, createDelayedReplyStrategy } from './delayed-reply';
import { createFinding } from './finding';
import { Finding, ModelDependentDetector } from './types';

/**
 * How turns map onto interaction-model nodes: plain act labels, or labels
 * prefixed with the speaker (`A_recommend`, `U_reject`).
 */
export type NodeLabelStyle = 'act' | 'speaker_act';

export interface ConversationFlowOptions {
  nodeLabels: NodeLabelStyle;
  delayedReply: DelayedReplyStrategy;
}

/**
 * Checks every turn boundary against the interaction model.
 *
 * - unexpected transition: no (previous act, current act) pairing is an edge.
 *   One finding per boundary however many acts the turns carry.
 * - delayed reply: the turn answers something said two or more turns
 *   earlier, as decided by the configured strategy.
 *
 * Act labels missing from the model have no edges, so they surface as
 * unexpected transitions.
 */
export class ConversationFlowDetector implements ModelDependentDetector {
  readonly id = 'conversation_flow';
  readonly requiresInteractionModel = true;

  private readonly options: ConversationFlowOptions;

  constructor(options?: Partial<ConversationFlowOptions>) {
    this.options = {
      nodeLabels: options?.nodeLabels ?? 'act',
      delayedReply: options?.delayedReply ?? createDelayedReplyStrategy('default', { maxLookback: 4 }),
    };
  }

  run(dialogue: Dialogue, model: InteractionModel): Finding[] {
    const findings: Finding[] = [];
    const labelsOf = (turn: Turn): string[] => this.labelsOf(turn);

    for (let i = 1; i < dialogue.turns.length; i++) {
      const previous = dialogue.turns[i - 1];
      const turn = dialogue.turns[i];
      const from = labelsOf(previous);
      const to = labelsOf(turn);

      if (!model.anyLegal(from, to)) {
        const unknown = [...from, ...to].filter((label) => !model.hasNode(label));
        const unknownNote = unknown.length > 0 ? ` (not in model: ${Array.from(new Set(unknown)).join(', ')})` : '';
        findings.push(
          createFinding(
            this.id,
            'unexpected_transition',
            dialogue,
            i,
            `Unexpected transition ${from.join('+')} → ${to.join('+')}${unknownNote}`,
            { start: i - 1, end: i },
          ),
        );
      }

      if (i < 2) continue;
      const verdict = this.options.delayedReply.evaluate({ dialogue, turn, model, labelsOf });
      if (verdict && verdict.delayed) {
        const answered = verdict.answeredTurn;
        findings.push(
          createFinding(
            this.id,
            'delayed_reply',
            dialogue,
            i,
            `Turn ${i} (${to.join('+')}) replies to turn ${answered} ` +
              `(${labelsOf(dialogue.turns[answered]).join('+')}) instead of turn ${i - 1}`,
            { start: answered, end: i },
          ),
        );
      }
    }
    return findings;
  }

  private labelsOf(turn: Turn): string[] {
    const labels = turn.acts.map((a) => a.label);
    if (this.options.nodeLabels === 'act') return labels;
    const prefix = speakerPrefix(turn.speaker);
    return labels.map((label) => `${prefix}_${label}`);
  }
}
