import { ConversationFlowDetector } from '../../src/detectors/conversation-flow';
import { createDelayedReplyStrategy } from '../../src/detectors/delayed-reply';
import { InteractionModel } from '../../src/interaction-model/interaction-model';
import { makeDialogue } from '../helpers/dialogues';

describe('ConversationFlowDetector', () => {
  const model = InteractionModel.fromSpec({
    edges: [
      ['request', 'inform'],
      ['inform', 'recommend'],
    ],
  });
  const detector = new ConversationFlowDetector();

  it('should flag a transition missing from the model', () => {
    const d2 = makeDialogue('d2', [
      ['user', 'Can you suggest something?', ['request']],
      ['agent', 'Watch Paddington 2.', ['recommend']],
    ]);
    const findings = detector.run(d2, model);
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      type: 'unexpected_transition',
      detector: 'conversation_flow',
      dialogueId: 'd2',
      turnIndex: 1,
      turnRange: { start: 0, end: 1 },
      explanation: 'Unexpected transition request → recommend',
      actPath: ['U_request', 'A_recommend'],
    });
  });

  it('should accept a dialogue that follows the model', () => {
    const d = makeDialogue('ok', [
      ['agent', 'What do you want?', ['request']],
      ['user', 'Animation.', ['inform']],
      ['agent', 'Spirited Away.', ['recommend']],
    ]);
    expect(detector.run(d, model)).toEqual([]);
  });

  it('should accept a multi-act boundary when one pairing is legal', () => {
    const d = makeDialogue('multi', [
      ['agent', 'Hi! What do you want?', ['greeting', 'request']],
      ['user', 'A musical, and who are you?', ['inquire', 'inform']],
    ]);
    expect(detector.run(d, model)).toEqual([]);
  });

  it('should emit one finding per boundary when every pairing is illegal', () => {
    const d = makeDialogue('multi-bad', [
      ['agent', 'Hi! What do you want?', ['greeting', 'request']],
      ['user', 'Who are you? Recommend me something.', ['inquire', 'recommend']],
    ]);
    const findings = detector.run(d, model);
    expect(findings).toHaveLength(1);
    expect(findings[0].explanation).toBe(
      'Unexpected transition greeting+request → inquire+recommend (not in model: greeting, inquire)',
    );
  });

  it('should flag transitions through unknown labels instead of failing', () => {
    const d = makeDialogue('unknown', [
      ['agent', 'Hmm?', ['chitchat']],
      ['user', 'Horror.', ['inform']],
      ['agent', 'Hereditary.', ['recommend']],
    ]);
    const findings = detector.run(d, model);
    expect(findings.map((f) => [f.type, f.turnIndex])).toEqual([['unexpected_transition', 1]]);
    expect(findings[0].explanation).toBe('Unexpected transition chitchat → inform (not in model: chitchat)');
  });

  it('should not report a delayed reply when no earlier turn fits either', () => {
    const d = makeDialogue('stuck', [
      ['user', 'Find me something.', ['request']],
      ['agent', 'Sure.', ['ack']],
      ['agent', 'It has to be fun, right?', ['confirm']],
      ['user', 'Comedy.', ['inform']],
    ]);
    const findings = detector.run(d, model);
    expect(findings.map((f) => [f.type, f.turnIndex])).toEqual([
      ['unexpected_transition', 1],
      ['unexpected_transition', 2],
      ['unexpected_transition', 3],
    ]);
  });

  it('should report a delayed reply from the transition graph', () => {
    const answered = makeDialogue('answered', [
      ['agent', 'What are you after?', ['request']],
      ['agent', 'Take your time.', ['ack']],
      ['user', 'Documentaries.', ['inform']],
    ]);
    const findings = detector.run(answered, model);
    expect(findings.map((f) => [f.type, f.turnIndex, f.turnRange])).toEqual([
      ['unexpected_transition', 1, { start: 0, end: 1 }],
      ['unexpected_transition', 2, { start: 1, end: 2 }],
      ['delayed_reply', 2, { start: 0, end: 2 }],
    ]);
    expect(findings[2].explanation).toBe('Turn 2 (inform) replies to turn 0 (request) instead of turn 1');
    expect(findings[2].actPath).toEqual(['A_request', 'A_ack', 'U_inform']);
  });

  it('should prefer the reply annotation over the graph', () => {
    const d = makeDialogue('annotated', [
      { speaker: 'agent', text: 'What are you after?', acts: ['request'] },
      { speaker: 'agent', text: 'Take your time.', acts: ['ack'] },
      { speaker: 'user', text: 'Documentaries.', acts: ['inform'], repliesTo: 1 },
    ]);
    expect(detector.run(d, model).map((f) => f.type)).toEqual(['unexpected_transition', 'unexpected_transition']);
  });

  it('should use speaker-prefixed node labels when configured', () => {
    const prefixed = InteractionModel.fromSpec({
      edges: [
        ['U_request', 'A_inform'],
        ['A_inform', 'U_accept'],
      ],
    });
    const speakerDetector = new ConversationFlowDetector({
      nodeLabels: 'speaker_act',
      delayedReply: createDelayedReplyStrategy('transition_graph', { maxLookback: 4 }),
    });
    const d = makeDialogue('prefixed', [
      ['user', 'Is it long?', ['request']],
      ['agent', 'Two hours.', ['inform']],
      ['user', 'Fine.', ['accept']],
      ['agent', 'Anything else?', ['inform']],
    ]);
    const findings = speakerDetector.run(d, prefixed);
    expect(findings.map((f) => [f.type, f.turnIndex])).toEqual([
      ['unexpected_transition', 3],
      ['delayed_reply', 3],
    ]);
    expect(findings[0].explanation).toBe('Unexpected transition U_accept → A_inform');
    expect(findings[1].explanation).toBe('Turn 3 (A_inform) replies to turn 0 (U_request) instead of turn 2');
  });

  it('should be idempotent', () => {
    const d = makeDialogue('idem', [
      ['agent', 'What are you after?', ['request']],
      ['agent', 'Take your time.', ['ack']],
      ['user', 'Documentaries.', ['inform']],
    ]);
    expect(detector.run(d, model)).toEqual(detector.run(d, model));
  });
});
