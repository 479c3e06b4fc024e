// Ordered, position-addressed container of estimation intervals under assembly
import type { SessionInput } from "../../api/types";
import type { CarbTotals, EstimationInterval, EstimationIntervalType } from "./types";
import { filterDateRange } from "./series";

export type SeriesSource = Pick<SessionInput, "glucose" | "insulinEffect" | "basalEffect">;

export class IntervalList {
    private readonly items: EstimationInterval[] = [];
    private readonly series: SeriesSource;

    constructor(series: SeriesSource) {
        this.series = series;
    }

    get length(): number {
        return this.items.length;
    }

    last(): EstimationInterval | undefined {
        return this.items[this.items.length - 1];
    }

    append(type: EstimationIntervalType, startDate: Date, endDate: Date, carbs?: CarbTotals): EstimationInterval {
        const interval: EstimationInterval = {
            startDate,
            endDate,
            type,
            glucose: [],
            insulinEffect: [],
            basalEffect: [],
        };
        if (carbs) interval.carbs = { ...carbs };
        this.slice(interval);
        this.items.push(interval);
        return interval;
    }

    /** Ends the last interval at `endDate`. */
    closeLast(endDate: Date): void {
        const last = this.last();
        if (!last) return;
        last.endDate = endDate;
        this.slice(last);
    }

    /**
     * Widens the last interval to cover [startDate, endDate] and adds the carb totals.
     * An empty list gets a new carb absorption interval instead. Returns the merged end.
     */
    mergeIntoLast(startDate: Date, endDate: Date, carbs: CarbTotals): Date {
        const last = this.last();
        if (!last) return this.append("carbAbsorption", startDate, endDate, carbs).endDate;

        if (endDate.getTime() > last.endDate.getTime()) last.endDate = endDate;
        if (startDate.getTime() < last.startDate.getTime()) last.startDate = startDate;
        const previous = last.carbs ?? { entered: 0, observed: 0 };
        last.carbs = {
            entered: previous.entered + carbs.entered,
            observed: previous.observed + carbs.observed,
        };
        this.slice(last);
        return last.endDate;
    }

    /**
     * Drops every carb absorption interval ending after `cutoff`, pulling the cutoff
     * back to the earliest start among the dropped ones. Returns the resulting cutoff.
     */
    removeOverlappingAbsorptions(cutoff: Date): Date {
        let runningEnd = cutoff;
        for (let i = 0; i < this.items.length; ) {
            const interval = this.items[i]!;
            if (interval.type === "carbAbsorption" && interval.endDate.getTime() > runningEnd.getTime()) {
                this.items.splice(i, 1);
                if (interval.startDate.getTime() < runningEnd.getTime()) runningEnd = interval.startDate;
            } else {
                i++;
            }
        }
        this.truncate(runningEnd);
        return runningEnd;
    }

    /** Removes everything at or after `endDate` and clamps the interval straddling it. */
    truncate(endDate: Date): void {
        let last = this.last();
        while (last && last.startDate.getTime() >= endDate.getTime()) {
            this.items.pop();
            last = this.last();
        }
        if (last && last.endDate.getTime() > endDate.getTime()) this.closeLast(endDate);
    }

    toArray(): EstimationInterval[] {
        return [...this.items];
    }

    private slice(interval: EstimationInterval): void {
        interval.glucose = filterDateRange(this.series.glucose, interval.startDate, interval.endDate);
        interval.insulinEffect = filterDateRange(this.series.insulinEffect, interval.startDate, interval.endDate);
        interval.basalEffect = filterDateRange(this.series.basalEffect, interval.startDate, interval.endDate);
    }
}
