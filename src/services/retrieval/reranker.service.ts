import { DEFAULT_RERANKER_OPTIONS, RerankerOptions } from '../../config/agent';
import { Evidence } from '../../types/evidence';
import { logger } from '../../utils/logger';
import { isHighQuality } from './evidence';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const CONFLICT_PRONE_TYPES = ['pricing', 'policy'];

/**
 * Orders evidence by a blend of vector similarity, document recency and
 * source-type quality.
 *
 * The composite is always computed from `similarity`, never from the
 * current `score`, so reranking an already reranked list changes nothing.
 */
export class RerankerService {
  private options: RerankerOptions;

  constructor(options: Partial<RerankerOptions> = {}, private now: () => Date = () => new Date()) {
    this.options = { ...DEFAULT_RERANKER_OPTIONS, ...options };
  }

  /** Rescores and sorts in place (stable, descending). Returns the same array. */
  rerank(evidence: Evidence[]): Evidence[] {
    if (evidence.length === 0) return evidence;

    const { similarityWeight, recencyWeight, qualityWeight } = this.options;
    for (const item of evidence) {
      item.score =
        similarityWeight * item.similarity +
        recencyWeight * this.recencyScore(item) +
        qualityWeight * this.qualityScore(item);
    }

    evidence.sort((a, b) => b.score - a.score);

    logger.debug('Evidence reranked', {
      count: evidence.length,
      topScore: evidence[0].score,
      topType: evidence[0].docType,
    });
    return evidence;
  }

  filterLowQuality(evidence: Evidence[], threshold: number): Evidence[] {
    const kept = evidence.filter((item) => isHighQuality(item, threshold));
    if (kept.length < evidence.length) {
      logger.debug('Low quality evidence filtered', {
        before: evidence.length,
        after: kept.length,
        threshold,
      });
    }
    return kept;
  }

  /** True when pricing or policy sources disagree by more than the configured spread. */
  detectConflicts(evidence: Evidence[]): boolean {
    const byType = new Map<string, number[]>();
    for (const item of evidence) {
      const scores = byType.get(item.docType) ?? [];
      scores.push(item.score);
      byType.set(item.docType, scores);
    }

    for (const docType of CONFLICT_PRONE_TYPES) {
      const scores = byType.get(docType);
      if (!scores || scores.length < 2) continue;

      const spread = Math.max(...scores) - Math.min(...scores);
      if (spread > this.options.conflictSpread) {
        logger.warn('Potential conflict detected', { docType, spread, sources: scores.length });
        return true;
      }
    }

    return false;
  }

  recencyScore(evidence: Evidence): number {
    const updatedAt = evidence.metadata.updated_at;
    if (typeof updatedAt !== 'string' && !(updatedAt instanceof Date)) {
      return this.options.defaultRecency;
    }

    const timestamp = new Date(updatedAt).getTime();
    if (Number.isNaN(timestamp)) return this.options.defaultRecency;

    const daysOld = Math.floor((this.now().getTime() - timestamp) / MS_PER_DAY);
    return Math.exp(-daysOld / this.options.recencyHalfLifeDays);
  }

  qualityScore(evidence: Evidence): number {
    const docType = evidence.docType.toLowerCase();
    if (!Object.prototype.hasOwnProperty.call(this.options.qualityByDocType, docType)) {
      return this.options.defaultQuality;
    }
    return this.options.qualityByDocType[docType];
  }
}
