import { BREAKDOWN_TYPES, BreakdownType } from '../detectors/types';
import { Report } from '../orchestrator/types';

export interface ConversationalPattern {
  /** Space-separated act labels, e.g. `U_reject A_recommend` */
  pattern: string;
  length: number;
  count: number;
}

export type PatternSummary = Record<BreakdownType, ConversationalPattern[]>;

/**
 * Problematic conversational patterns: for every finding, the trailing
 * n-grams (2..maxLength) of the act path that led to it, counted per
 * breakdown type. Sorted by count, then pattern.
 */
export function summarizePatterns(report: Report, maxLength = 3): PatternSummary {
  const counts = new Map<BreakdownType, Map<string, { length: number; count: number }>>();
  for (const type of BREAKDOWN_TYPES) counts.set(type, new Map());

  for (const id of report.dialogueIds) {
    for (const finding of report.findings[id] ?? []) {
      const bucket = counts.get(finding.type);
      if (!bucket) continue;
      const path = finding.actPath;
      for (let n = 2; n <= Math.min(maxLength, path.length); n++) {
        const pattern = path.slice(path.length - n).join(' ');
        const entry = bucket.get(pattern) ?? { length: n, count: 0 };
        entry.count++;
        bucket.set(pattern, entry);
      }
    }
  }

  const toSorted = (type: BreakdownType): ConversationalPattern[] =>
    Array.from(counts.get(type) ?? new Map<string, { length: number; count: number }>())
      .map(([pattern, { length, count }]) => ({ pattern, length, count }))
      .sort((a, b) => b.count - a.count || (a.pattern < b.pattern ? -1 : a.pattern > b.pattern ? 1 : 0));

  return {
    system_failure: toSorted('system_failure'),
    dialogue_of_the_deaf: toSorted('dialogue_of_the_deaf'),
    delayed_reply: toSorted('delayed_reply'),
    unexpected_transition: toSorted('unexpected_transition'),
    detector_error: toSorted('detector_error'),
  };
}
