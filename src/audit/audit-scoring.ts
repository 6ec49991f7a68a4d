import { compareFefo } from '../batches/batch.model';
import type { BatchDoc } from '../batches/batches.types';
import { daysBetween, toIsoDate } from '../common/dates';
import { AuditReason, AuditWindow } from './audit.types';

export interface BatchScore {
    score: number;
    reasons: AuditReason[];
    daysUntilExpiry: number;
}

export interface ScoredBatch extends BatchScore {
    batch: BatchDoc;
}

const EXPIRED_POINTS = 100;
const EXPIRING_SOON_CEILING = 50;
const NEVER_CHECKED_POINTS = 40;
const STALE_CHECK_POINTS = 20;

/**
 * Scores one batch against the window. An expiry reason and an inspection
 * reason can both apply; returns null when neither does.
 */
export function scoreBatch(batch: BatchDoc, window: AuditWindow): BatchScore | null {
    const { baseDate, expiringWithinDays, staleAfterDays } = window;

    const expired = batch.expiryDate < baseDate;
    const daysUntilExpiry = daysBetween(baseDate, batch.expiryDate);
    const expiringSoon = !expired && daysUntilExpiry <= expiringWithinDays;

    const neverChecked = batch.lastCheckedAt === null;
    const staleCheck =
        batch.lastCheckedAt !== null && daysBetween(toIsoDate(batch.lastCheckedAt), baseDate) >= staleAfterDays;

    const reasons: AuditReason[] = [];
    let score = 0;

    if (expired) {
        reasons.push(AuditReason.EXPIRED);
        score += EXPIRED_POINTS;
    } else if (expiringSoon) {
        reasons.push(AuditReason.EXPIRING_SOON);
        score += Math.max(0, EXPIRING_SOON_CEILING - daysUntilExpiry);
    }

    if (neverChecked) {
        reasons.push(AuditReason.NEVER_CHECKED);
        score += NEVER_CHECKED_POINTS;
    } else if (staleCheck) {
        reasons.push(AuditReason.STALE_CHECK);
        score += STALE_CHECK_POINTS;
    }

    return reasons.length > 0 ? { score, reasons, daysUntilExpiry } : null;
}

/** Highest score first, then soonest expiry; cut to `limit`. */
export function rankCandidates(candidates: Iterable<BatchDoc>, window: AuditWindow, limit: number): ScoredBatch[] {
    if (limit <= 0) return [];

    const scored: ScoredBatch[] = [];
    for (const batch of candidates) {
        const result = scoreBatch(batch, window);
        if (result) scored.push({ batch, ...result });
    }

    return scored
        .sort((a, b) => b.score - a.score || compareFefo(a.batch, b.batch))
        .slice(0, limit);
}
