import { Evidence } from '../../types/evidence';

export type EvidenceInit = Pick<Evidence, 'sourceId' | 'docTitle' | 'docType' | 'chunkText' | 'similarity'> &
  Partial<Omit<Evidence, 'sourceId' | 'docTitle' | 'docType' | 'chunkText' | 'similarity'>>;

export function createEvidence(init: EvidenceInit): Evidence {
  return {
    sourceId: init.sourceId,
    docTitle: init.docTitle,
    docType: init.docType,
    chunkText: init.chunkText,
    similarity: init.similarity,
    score: init.score ?? init.similarity,
    chunkIndex: init.chunkIndex ?? 0,
    sourceFile: init.sourceFile ?? 'unknown',
    metadata: init.metadata ?? {},
    retrievedAt: init.retrievedAt ?? null,
  };
}

export function formatCitation(evidence: Evidence): string {
  return `[${evidence.docTitle} - ${evidence.docType}]`;
}

export function isHighQuality(evidence: Evidence, threshold: number = 0.7): boolean {
  return evidence.score >= threshold;
}
