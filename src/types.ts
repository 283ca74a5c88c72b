export interface ProxyInput {
    useApifyProxy?: boolean;
    apifyProxyGroups?: string[];
    apifyProxyCountry?: string;
    proxyUrls?: string[];
}

export interface Input {
    baseUrl: string;
    minSavingsDollar: number;
    minSavingsPercent: number; // 0–100
    maxOriginalPrice: number;
    dedupWindowDays: number;
    notificationEmail: string | null; // null = no email
    historyStoreId?: string; // named KV store for cross-run history persistence
    maxRequestRetries: number;
    requestTimeoutSecs: number;
    proxyConfiguration?: ProxyInput;
}

export interface CouponRecord {
    productName: string;
    discountAmount: number;
    description: string;
    expiryDate: string; // free-form, or "Unknown"
}

export interface SaleRecord {
    productName: string;
    originalPrice: number; // equals salePrice when no "was" price was shown
    salePrice: number;
    saleDescription: string;
}

export type NormalizedKey = string;

// Maps, not plain objects: iteration follows insertion order even for all-digit keys such as "365".
export type CouponsByKey = Map<NormalizedKey, CouponRecord>;
export type SalesByKey = Map<NormalizedKey, SaleRecord>;

export interface Deal {
    readonly productName: string;
    readonly originalPrice: number;
    readonly salePrice: number;
    readonly couponDiscount: number;
    readonly finalPrice: number;
    readonly savings: number;
    readonly savingsPercent: number;
    readonly couponDescription: string;
    readonly expiryDate: string;
    readonly saleDescription: string;
    readonly foundDate: string; // ISO date
}

export interface DealCriteria {
    minSavingsDollar: number;
    minSavingsPercent: number;
    maxOriginalPrice: number;
}

export interface PipelineConfig extends DealCriteria {
    dedupWindowDays: number;
}

export interface HistoryEntry {
    productName: string;
    finalPrice: number;
    foundDate?: string | null; // ISO date
}

export type DealHistory = HistoryEntry[];

export interface DealSnapshot {
    coupons: CouponsByKey;
    sales: SalesByKey;
}

export interface PipelineResult {
    allDeals: Deal[];
    newDeals: Deal[];
}
