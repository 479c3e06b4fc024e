// Partition of the estimation window into fasting and carb absorption intervals
import type { CarbAbsorptionRecord, SessionInput } from "../../api/types";
import type { AssemblyResult, CarbTotals } from "./types";
import { STATUS } from "./types";
import { IntervalList } from "./intervalList";
import { sortCarbRecords } from "./series";

interface AbsorptionFields {
    entryStart: Date;
    entryEnd: Date;
    carbs: CarbTotals;
    timeRemaining: number;
}

export function extractAbsorption(record: CarbAbsorptionRecord): AbsorptionFields | undefined {
    const { observedStart, observedEnd, enteredCarbs, observedCarbs, timeRemaining } = record;
    if (
        observedStart === undefined ||
        observedEnd === undefined ||
        enteredCarbs === undefined ||
        observedCarbs === undefined ||
        timeRemaining === undefined
    ) {
        return undefined;
    }
    if (observedEnd.getTime() < observedStart.getTime()) return undefined;

    return {
        entryStart: observedStart,
        entryEnd: observedEnd,
        carbs: { entered: enteredCarbs, observed: observedCarbs },
        timeRemaining,
    };
}

/**
 * Walks the carb records in observed-start order and tiles the window
 * [startDate, endDate) with fasting and carb absorption intervals.
 *
 * Overlapping or touching absorptions merge into one interval. Records that
 * started before the window push the window start past their absorption. The
 * first record still absorbing ends the pass and may shrink the window:
 *   1. started before the window   -> window collapses, no intervals
 *   2. starts after the window     -> trailing fasting interval to window end
 *   3. starts after assembled span -> window ends at its start, trailing fasting interval
 *   4. starts inside assembled span -> overlapping absorptions dropped, window ends there
 */
export function assembleEstimationIntervals(input: SessionInput): AssemblyResult {
    let startDate = input.startDate;
    let endDate = input.endDate;
    let runningEnd = endDate;
    const intervals = new IntervalList(input);
    const status: string[] = [];
    const records = sortCarbRecords(input.carbRecords);

    const finish = (message: string, collapsed = false): AssemblyResult => {
        status.push(message);
        return {
            intervals: collapsed ? [] : intervals.toArray(),
            startDate,
            endDate,
            status: status.join("; "),
        };
    };

    // End of the territory already covered by intervals
    const assembledEnd = (): Date => (intervals.length === 0 ? startDate : runningEnd);

    for (let i = 0; i < records.length; i++) {
        const fields = extractAbsorption(records[i]!);
        if (!fields) {
            const message = STATUS.missingField(i);
            console.warn(`[estimation] ${message}`);
            status.push(message);
            continue;
        }
        const { entryStart, entryEnd, carbs, timeRemaining } = fields;
        const entryStartMs = entryStart.getTime();

        if (timeRemaining > 0) {
            if (entryStartMs < startDate.getTime()) {
                endDate = startDate;
                return finish(STATUS.activeBeforeStart, true);
            }

            if (entryStartMs > endDate.getTime()) {
                const from = assembledEnd();
                if (from.getTime() < endDate.getTime()) intervals.append("fasting", from, endDate);
                return finish(STATUS.activeAfterEnd);
            }

            const from = assembledEnd();
            if (entryStartMs > from.getTime()) {
                endDate = entryStart;
                intervals.append("fasting", from, endDate);
                return finish(STATUS.activeBeforeEnd);
            }

            runningEnd = intervals.removeOverlappingAbsorptions(entryStart);
            endDate = runningEnd;
            return finish(STATUS.activeTrimmed);
        }

        if (entryStartMs < startDate.getTime()) {
            const movedStartMs = Math.min(Math.max(entryEnd.getTime(), startDate.getTime()), endDate.getTime());
            startDate = new Date(movedStartMs);
            continue;
        }

        // Completed absorption entirely after the window of interest
        if (entryStartMs >= endDate.getTime()) continue;

        const absorptionEnd = entryEnd.getTime() > endDate.getTime() ? endDate : entryEnd;
        const last = intervals.last();

        if (!last) {
            if (entryStartMs > startDate.getTime()) intervals.append("fasting", startDate, entryStart);
            intervals.append("carbAbsorption", entryStart, absorptionEnd, carbs);
            runningEnd = absorptionEnd;
        } else if (last.type === "fasting") {
            intervals.closeLast(entryStart);
            intervals.append("carbAbsorption", entryStart, absorptionEnd, carbs);
            runningEnd = absorptionEnd;
        } else if (entryStartMs > last.endDate.getTime()) {
            intervals.append("fasting", last.endDate, entryStart);
            intervals.append("carbAbsorption", entryStart, absorptionEnd, carbs);
            runningEnd = absorptionEnd;
        } else {
            runningEnd = intervals.mergeIntoLast(entryStart, absorptionEnd, carbs);
        }
    }

    const from = assembledEnd();
    if (from.getTime() < endDate.getTime()) intervals.append("fasting", from, endDate);
    return finish(STATUS.completed);
}
