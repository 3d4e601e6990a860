import { BreakdownType, Finding } from '../detectors/types';
import { Report, ReportSummary } from './types';

/**
 * Accumulates findings during a run. `build()` orders each dialogue's findings
 * by turn (stable, so detector order is kept within a turn) and freezes the
 * result.
 */
export class ReportBuilder {
  private readonly findings = new Map<string, Finding[]>();

  constructor(
    private readonly runId: string,
    private readonly startedAt: Date,
    private readonly detectors: readonly string[],
    dialogueIds: readonly string[],
  ) {
    for (const id of dialogueIds) this.findings.set(id, []);
  }

  add(dialogueId: string, findings: readonly Finding[]): void {
    const bucket = this.findings.get(dialogueId);
    if (!bucket) {
      this.findings.set(dialogueId, [...findings]);
      return;
    }
    bucket.push(...findings);
  }

  build(completedAt: Date = new Date()): Report {
    const entries = Array.from(this.findings.entries()).map(([id, list]): [string, readonly Finding[]] => [
      id,
      Object.freeze(
        list
          .map((f, order) => ({ f, order }))
          .sort((a, b) => a.f.turnIndex - b.f.turnIndex || a.order - b.order)
          .map(({ f }) => freezeFinding(f)),
      ),
    ]);

    return Object.freeze({
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      detectors: Object.freeze([...this.detectors]),
      dialogueIds: Object.freeze(entries.map(([id]) => id)),
      findings: Object.freeze(Object.fromEntries(entries)),
      summary: summarize(entries),
    });
  }
}

function freezeFinding(finding: Finding): Finding {
  return Object.freeze({
    ...finding,
    ...(finding.turnRange ? { turnRange: Object.freeze({ ...finding.turnRange }) } : {}),
    actPath: Object.freeze([...finding.actPath]),
  });
}

function summarize(entries: [string, readonly Finding[]][]): ReportSummary {
  const byType: Record<BreakdownType, number> = {
    system_failure: 0,
    dialogue_of_the_deaf: 0,
    delayed_reply: 0,
    unexpected_transition: 0,
    detector_error: 0,
  };
  const byDetector: Record<string, number> = {};
  let total = 0;
  let dialoguesWithBreakdowns = 0;

  for (const [, findings] of entries) {
    // detector errors are not breakdowns of the dialogue itself
    if (findings.some((f) => f.type !== 'detector_error')) dialoguesWithBreakdowns++;
    for (const f of findings) {
      total++;
      byType[f.type]++;
      byDetector[f.detector] = (byDetector[f.detector] ?? 0) + 1;
    }
  }

  return Object.freeze({
    total,
    byType: Object.freeze(byType),
    byDetector: Object.freeze(byDetector),
    dialoguesWithBreakdowns,
  });
}
