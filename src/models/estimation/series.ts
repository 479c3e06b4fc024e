// Time-range filtering and endpoint access for ordered sample series
import type { CarbAbsorptionRecord, TimedValue } from "../../api/types";

/**
 * Samples whose own [startDate, endDate] span touches [start, end].
 * Both bounds are inclusive, so a sample sitting exactly on a boundary
 * belongs to both neighbouring intervals.
 */
export function filterDateRange<T extends TimedValue>(samples: readonly T[], start?: Date, end?: Date): T[] {
    const startMs = start?.getTime();
    const endMs = end?.getTime();
    return samples.filter((s) => {
        if (startMs !== undefined && s.endDate.getTime() < startMs) return false;
        if (endMs !== undefined && s.startDate.getTime() > endMs) return false;
        return true;
    });
}

export function firstValue(samples: readonly TimedValue[]): number | undefined {
    return samples[0]?.value;
}

export function lastValue(samples: readonly TimedValue[]): number | undefined {
    return samples[samples.length - 1]?.value;
}

export function sortByStart<T extends TimedValue>(samples: readonly T[]): T[] {
    return [...samples].sort((a, b) => a.startDate.getTime() - b.startDate.getTime());
}

function observedStartMs(record: CarbAbsorptionRecord): number {
    return record.observedStart?.getTime() ?? Number.POSITIVE_INFINITY;
}

/** Ordered by observed start; records without one go last, in input order. */
export function sortCarbRecords(records: readonly CarbAbsorptionRecord[]): CarbAbsorptionRecord[] {
    return [...records].sort((a, b) => {
        const am = observedStartMs(a);
        const bm = observedStartMs(b);
        return am === bm ? 0 : am < bm ? -1 : 1;
    });
}
