import { Dialogue, Turn } from '../dialogue/types';
import { InteractionModel } from '../interaction-model/interaction-model';
import { ConfigurationError } from '../errors';

export interface DelayedReplyContext {
  readonly dialogue: Dialogue;
  readonly turn: Turn;
  readonly model: InteractionModel;
  /** Interaction-model node labels of a turn */
  readonly labelsOf: (turn: Turn) => string[];
}

/**
 * `null` means the strategy has no signal for this turn and leaves the
 * decision to the next strategy in a chain.
 */
export type DelayedReplyVerdict = { delayed: true; answeredTurn: number } | { delayed: false } | null;

export interface DelayedReplyStrategy {
  readonly name: string;
  evaluate(ctx: DelayedReplyContext): DelayedReplyVerdict;
}

export type DelayedReplyStrategyName = 'annotation' | 'slot_reference' | 'transition_graph' | 'default';

export const DELAYED_REPLY_STRATEGIES: readonly DelayedReplyStrategyName[] = [
  'annotation',
  'slot_reference',
  'transition_graph',
  'default',
];

const NOT_DELAYED = { delayed: false } as const;

/** Uses the explicit `repliesTo` annotation of the turn */
export class AnnotationStrategy implements DelayedReplyStrategy {
  readonly name = 'annotation';

  evaluate({ turn }: DelayedReplyContext): DelayedReplyVerdict {
    if (turn.repliesTo === undefined) return null;
    return turn.repliesTo <= turn.index - 2 ? { delayed: true, answeredTurn: turn.repliesTo } : NOT_DELAYED;
  }
}

/**
 * A turn whose slots share nothing with the previous turn but match an
 * earlier turn of the other speaker is answering that earlier turn.
 */
export class SlotReferenceStrategy implements DelayedReplyStrategy {
  readonly name = 'slot_reference';

  constructor(private readonly maxLookback: number) {}

  evaluate({ dialogue, turn }: DelayedReplyContext): DelayedReplyVerdict {
    const slots = slotNames(turn);
    if (slots.size === 0) return null;

    const previous = dialogue.turns[turn.index - 1];
    if (!previous || sharesAny(slots, slotNames(previous))) return NOT_DELAYED;

    for (const j of lookbackIndices(turn.index, this.maxLookback)) {
      const earlier = dialogue.turns[j];
      if (earlier.speaker !== turn.speaker && sharesAny(slots, slotNames(earlier))) {
        return { delayed: true, answeredTurn: j };
      }
    }
    return NOT_DELAYED;
  }
}

/**
 * Proxy signal from the interaction model: the turn's acts cannot follow its
 * immediate predecessor but can follow an earlier turn of the other speaker.
 * The nearest such turn is taken as the one being answered.
 */
export class TransitionGraphStrategy implements DelayedReplyStrategy {
  readonly name = 'transition_graph';

  constructor(private readonly maxLookback: number) {}

  evaluate({ dialogue, turn, model, labelsOf }: DelayedReplyContext): DelayedReplyVerdict {
    const previous = dialogue.turns[turn.index - 1];
    if (!previous) return NOT_DELAYED;

    const current = labelsOf(turn);
    if (model.anyLegal(labelsOf(previous), current)) return NOT_DELAYED;

    for (const j of lookbackIndices(turn.index, this.maxLookback)) {
      const earlier = dialogue.turns[j];
      if (earlier.speaker !== turn.speaker && model.anyLegal(labelsOf(earlier), current)) {
        return { delayed: true, answeredTurn: j };
      }
    }
    return NOT_DELAYED;
  }
}

/** First strategy with a signal decides */
export class StrategyChain implements DelayedReplyStrategy {
  readonly name: string;

  constructor(private readonly strategies: readonly DelayedReplyStrategy[]) {
    this.name = strategies.map((s) => s.name).join('>');
  }

  evaluate(ctx: DelayedReplyContext): DelayedReplyVerdict {
    for (const strategy of this.strategies) {
      const verdict = strategy.evaluate(ctx);
      if (verdict) return verdict;
    }
    return null;
  }
}

export function createDelayedReplyStrategy(name: string, options: { maxLookback: number }): DelayedReplyStrategy {
  if (!Number.isInteger(options.maxLookback) || options.maxLookback < 2) {
    throw new ConfigurationError(
      `Delayed reply lookback must be an integer of at least 2, got ${options.maxLookback}`,
      'invalid_option',
    );
  }
  switch (name) {
    case 'annotation':
      return new AnnotationStrategy();
    case 'slot_reference':
      return new SlotReferenceStrategy(options.maxLookback);
    case 'transition_graph':
      return new TransitionGraphStrategy(options.maxLookback);
    case 'default':
      return new StrategyChain([new AnnotationStrategy(), new TransitionGraphStrategy(options.maxLookback)]);
    default:
      throw new ConfigurationError(
        `Unknown delayed reply strategy "${name}" (expected one of: ${DELAYED_REPLY_STRATEGIES.join(', ')})`,
        'invalid_option',
      );
  }
}

// ─── Helpers ──────────────────────────────────────────────────────

/** i-2, i-3, ... down to i-maxLookback (never below 0) */
function lookbackIndices(index: number, maxLookback: number): number[] {
  const indices: number[] = [];
  for (let j = index - 2; j >= Math.max(0, index - maxLookback); j--) indices.push(j);
  return indices;
}

function slotNames(turn: Turn): Set<string> {
  return new Set((turn.utterance.slots ?? []).map((sv) => sv.slot));
}

function sharesAny(a: Set<string>, b: Set<string>): boolean {
  for (const item of a) {
    if (b.has(item)) return true;
  }
  return false;
}
