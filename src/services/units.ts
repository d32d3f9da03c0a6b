import { LedgerTotals } from "../models/store";

const GRAMS_PER_KG = 1000;
const CENTI_PER_POINT = 100;
const EPSILON = 1e-6;

function toScaledInteger(value: number, scale: number): number | undefined {
    if (!Number.isFinite(value)) {
        return undefined;
    }
    const scaled = value * scale;
    const rounded = Math.round(scaled);
    // Anything finer than the scale is not a representable amount.
    if (Math.abs(scaled - rounded) > EPSILON) {
        return undefined;
    }
    return rounded;
}

/** kg with at most 3 decimal places -> integer grams; undefined when finer or not finite. */
export function kgToGrams(kg: number): number | undefined {
    return toScaledInteger(kg, GRAMS_PER_KG);
}

export function gramsToKg(grams: number): number {
    return grams / GRAMS_PER_KG;
}

/** Highest material rate, 999.99 points/kg. Keeps every per-deposit amount inside a 32-bit column. */
export const MAX_POINTS_PER_KG = 999.99;

/** points/kg with at most 2 decimal places -> integer hundredths. */
export function rateToCentiPoints(pointsPerKg: number): number | undefined {
    return toScaledInteger(pointsPerKg, CENTI_PER_POINT);
}

export function centiToPoints(centiPoints: number): number {
    return centiPoints / CENTI_PER_POINT;
}

/**
 * round(weight_kg * rate, 2) in hundredths of a point, halves rounded up.
 * grams * centiPointsPerKg / 1000 is the exact value in hundredths.
 */
export function computeCentiPoints(grams: number, centiPointsPerKg: number): number {
    return Math.floor((grams * centiPointsPerKg + GRAMS_PER_KG / 2) / GRAMS_PER_KG);
}

export function addTotals(a: LedgerTotals, b: LedgerTotals): LedgerTotals {
    return {
        centiPoints: a.centiPoints + b.centiPoints,
        grams: a.grams + b.grams
    };
}

export function sameTotals(a: LedgerTotals, b: LedgerTotals): boolean {
    return a.centiPoints === b.centiPoints && a.grams === b.grams;
}

/** YYYY-MM-DD of the UTC calendar day containing `at`. */
export function utcDayKey(at: Date): string {
    return at.toISOString().slice(0, 10);
}

export function startOfUtcDay(at: Date): Date {
    return new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()));
}
