import { UNKNOWN_EXPIRY } from './constants.js';
import type { CouponRecord, Deal, DealCriteria, SaleRecord } from './types.js';
import { roundMoney } from './utils.js';

const isValidAmount = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value) && value >= 0;

/**
 * Combines a matched coupon and sale into a Deal. Returns null when either record carries a missing,
 * non-numeric or negative amount.
 */
export const buildDeal = (coupon: CouponRecord, sale: SaleRecord, now: Date): Deal | null => {
    const { discountAmount } = coupon;
    const { originalPrice, salePrice } = sale;
    if (!isValidAmount(discountAmount) || !isValidAmount(originalPrice) || !isValidAmount(salePrice)) return null;

    const finalPrice = roundMoney(Math.max(0, salePrice - discountAmount));
    // Not clamped: a coupon larger than a deep sale price can push savings past originalPrice.
    const savings = roundMoney(originalPrice - finalPrice);
    const savingsPercent = originalPrice > 0 ? (savings / originalPrice) * 100 : 0;

    return {
        productName: sale.productName,
        originalPrice,
        salePrice,
        couponDiscount: discountAmount,
        finalPrice,
        savings,
        savingsPercent,
        couponDescription: coupon.description,
        expiryDate: coupon.expiryDate || UNKNOWN_EXPIRY,
        saleDescription: sale.saleDescription,
        foundDate: now.toISOString(),
    };
};

export const meetsCriteria = (deal: Deal, criteria: DealCriteria): boolean =>
    deal.savings >= criteria.minSavingsDollar &&
    deal.savingsPercent >= criteria.minSavingsPercent &&
    deal.originalPrice <= criteria.maxOriginalPrice;

/** Highest savings first; equal savings keep their input order. */
export const sortBySavings = (deals: readonly Deal[]): Deal[] => [...deals].sort((a, b) => b.savings - a.savings);
