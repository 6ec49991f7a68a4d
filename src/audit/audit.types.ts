export enum AuditReason {
    EXPIRED = 'EXPIRED',
    EXPIRING_SOON = 'EXPIRING_SOON',
    NEVER_CHECKED = 'NEVER_CHECKED',
    STALE_CHECK = 'STALE_CHECK',
}

export interface AuditWindow {
    baseDate: string; // YYYY-MM-DD
    expiringWithinDays: number;
    staleAfterDays: number;
}

export interface RecommendationRequest extends AuditWindow {
    limit: number;
}

export interface AuditRecommendation {
    batchId: string;
    productId: string;
    productName: string | null;
    expiryDate: string;
    quantity: number;
    lastCheckedAt: string | null;
    daysUntilExpiry: number; // relative to baseDate
    score: number;
    reasons: AuditReason[];
}
