import { ConversationFlowDetector } from './conversation-flow';
import { createDelayedReplyStrategy } from './delayed-reply';
import { DialogueOfTheDeafDetector } from './dialogue-of-the-deaf';
import { DetectorSettings } from './settings';
import { SystemFailureDetector } from './system-failure';
import { Detector } from './types';
import { ConfigurationError } from '../errors';
import { logger } from '../observability/logger';

export type DetectorFactory = (settings: DetectorSettings) => Detector;

/** Maps detector identifiers (and their aliases) to factories */
export class DetectorRegistry {
  private factories: Map<string, DetectorFactory> = new Map();
  private aliases: Map<string, string> = new Map();

  register(id: string, factory: DetectorFactory): void {
    if (this.factories.has(id)) {
      logger.warn({ detector: id }, 'Overwriting existing detector registration');
    }
    this.factories.set(id, factory);
  }

  alias(name: string, id: string): void {
    if (!this.factories.has(id)) {
      throw new ConfigurationError(`Cannot alias "${name}" to unregistered detector "${id}"`, 'unknown_detector');
    }
    this.aliases.set(name, id);
  }

  /** Canonical id for a name or alias, undefined when unknown */
  resolve(name: string): string | undefined {
    if (this.factories.has(name)) return name;
    return this.aliases.get(name);
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  ids(): string[] {
    return Array.from(this.factories.keys());
  }

  create(name: string, settings: DetectorSettings): Detector {
    const id = this.resolve(name);
    const factory = id ? this.factories.get(id) : undefined;
    if (!factory) {
      throw new ConfigurationError(
        `Unknown breakdown detector "${name}" (known: ${this.ids().join(', ')})`,
        'unknown_detector',
      );
    }
    return factory(settings);
  }
}

export function createBuiltinRegistry(): DetectorRegistry {
  const registry = new DetectorRegistry();
  registry.register('system_failure', (s) => new SystemFailureDetector(s.systemFailure));
  registry.register('dialogue_of_the_deaf', (s) => new DialogueOfTheDeafDetector(s.dialogueOfTheDeaf));
  registry.register(
    'conversation_flow',
    (s) =>
      new ConversationFlowDetector({
        nodeLabels: s.conversationFlow.nodeLabels,
        delayedReply: createDelayedReplyStrategy(s.conversationFlow.delayedReplyStrategy, {
          maxLookback: s.conversationFlow.maxLookback,
        }),
      }),
  );
  registry.alias('flow_discontinuation', 'conversation_flow');
  return registry;
}
