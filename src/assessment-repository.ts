// Interview Signal Engine - Assessment repository
// At most one Assessment per (session, indicator). AI fields and the manual
// score are written independently: re-assessment overwrites the AI fields and
// never touches the manual score.

import { NotFoundError } from "./errors.js";
import type { AiAssessmentFields, Assessment } from "./types.js";

export interface AssessmentRepository {
  /** Create or overwrite the AI fields of the pair's assessment. */
  upsertAiFields(sessionId: string, indicatorId: string, fields: AiAssessmentFields, assessedAt: Date): Promise<Assessment>;
  /**
   * Set (or clear with null) the manual score of an existing assessment.
   * @throws NotFoundError if the pair has no assessment.
   */
  setManualScore(sessionId: string, indicatorId: string, manualScore: number | null, updatedAt: Date): Promise<Assessment>;
  get(sessionId: string, indicatorId: string): Promise<Assessment | null>;
  listBySession(sessionId: string): Promise<Assessment[]>;
}

function copy(assessment: Assessment): Assessment {
  return { ...assessment, evidence: assessment.evidence.map((span) => ({ ...span })) };
}

export class InMemoryAssessmentRepository implements AssessmentRepository {
  /** sessionId → indicatorId → assessment */
  private readonly rows = new Map<string, Map<string, Assessment>>();

  async upsertAiFields(
    sessionId: string,
    indicatorId: string,
    fields: AiAssessmentFields,
    assessedAt: Date,
  ): Promise<Assessment> {
    let bySession = this.rows.get(sessionId);
    if (!bySession) {
      bySession = new Map();
      this.rows.set(sessionId, bySession);
    }

    const existing = bySession.get(indicatorId);
    const next: Assessment = {
      sessionId,
      indicatorId,
      aiScore: fields.aiScore,
      evidence: fields.evidence.map((span) => ({ ...span })),
      evidenceText: fields.evidenceText,
      reasoning: fields.reasoning,
      assessedAt,
      manualScore: existing ? existing.manualScore : null,
      manualUpdatedAt: existing ? existing.manualUpdatedAt : null,
    };
    bySession.set(indicatorId, next);
    return copy(next);
  }

  async setManualScore(
    sessionId: string,
    indicatorId: string,
    manualScore: number | null,
    updatedAt: Date,
  ): Promise<Assessment> {
    const existing = this.rows.get(sessionId)?.get(indicatorId);
    if (!existing) {
      throw new NotFoundError(`No assessment for indicator ${indicatorId} in session ${sessionId}`);
    }
    existing.manualScore = manualScore;
    existing.manualUpdatedAt = updatedAt;
    return copy(existing);
  }

  async get(sessionId: string, indicatorId: string): Promise<Assessment | null> {
    const row = this.rows.get(sessionId)?.get(indicatorId);
    return row ? copy(row) : null;
  }

  async listBySession(sessionId: string): Promise<Assessment[]> {
    return [...(this.rows.get(sessionId)?.values() ?? [])].map(copy);
  }
}
