/**
 * Dosing parameter multiplier estimation
 *
 * Module structure:
 *   index.ts             - Session orchestration and public API, _internals barrel
 *   types.ts             - Interval, multiplier and session types, status messages, constants
 *   series.ts            - Time-range filtering of sample series
 *   projection.ts        - Projection of the nominal point onto a line or plane
 *   intervalList.ts      - Ordered interval container used during assembly
 *   assembleIntervals.ts - Fasting / carb absorption segmentation of the window
 *   estimateInterval.ts  - General, fasting, carb absorption and by-type estimators
 *   registry.ts          - Selectable estimation strategies
 *   report.ts            - Diagnostic text report
 *   __tests__/           - Unit tests
 */
import type { SessionInput } from "../../api/types";
import type { EstimationSession } from "./types";
import type { EstimationStrategy } from "./registry";
import { assembleEstimationIntervals } from "./assembleIntervals";
import { DEFAULT_ESTIMATOR_ID, getEstimator } from "./registry";
import { clearEstimate } from "./estimateInterval";
import { sortCarbRecords } from "./series";

// ─── Public re-exports ─────────────────────────────────────────────

export type {
    CarbTotals,
    EstimatedMultipliers,
    EstimationInterval,
    EstimationIntervalType,
    EstimationSession,
    AssemblyResult,
} from "./types";
export type { EstimationStrategy } from "./registry";
export type { IntervalEstimator } from "./estimateInterval";
export { MIN_GLUCOSE_SAMPLES, STATUS } from "./types";
export { assembleEstimationIntervals } from "./assembleIntervals";
export { estimateGeneral, estimateFasting, estimateCarbAbsorption, estimateByType } from "./estimateInterval";
export { projectToLine, projectToPlane } from "./projection";
export { DEFAULT_ESTIMATOR_ID, registerEstimator, getEstimator, listEstimators } from "./registry";
export { generateDiagnosticReport, renderTimeline, formatTimestamp } from "./report";

function resolveEstimator(id: string): EstimationStrategy {
    const strategy = getEstimator(id);
    if (!strategy) throw new Error(`Unknown estimator: ${id}`);
    return strategy;
}

// ─── Session lifecycle ─────────────────────────────────────────────

export function createSession(input: SessionInput): EstimationSession {
    return {
        startDate: input.startDate,
        endDate: input.endDate,
        glucose: [...input.glucose],
        insulinEffect: [...input.insulinEffect],
        basalEffect: [...input.basalEffect],
        carbRecords: sortCarbRecords(input.carbRecords),
        intervals: [],
        status: "",
    };
}

/** Replaces the session's intervals, window and status. Requires exclusive access to the session. */
export function assembleSession(session: EstimationSession): void {
    const result = assembleEstimationIntervals(session);
    session.intervals = result.intervals;
    session.startDate = result.startDate;
    session.endDate = result.endDate;
    session.status = result.status;
}

/**
 * Runs the selected estimator over every interval, filling in deltas and
 * multipliers in place. Results of an earlier run are cleared first, so
 * intervals without enough data for this estimator stay unestimated.
 * Requires exclusive access to the session.
 * @returns number of intervals that received multipliers
 */
export function estimateSession(session: EstimationSession, estimatorId: string = DEFAULT_ESTIMATOR_ID): number {
    const strategy = resolveEstimator(estimatorId);
    let estimated = 0;
    for (const interval of session.intervals) {
        clearEstimate(interval);
        if (strategy.estimate(interval)) estimated++;
    }
    return estimated;
}

/** Assembles the session's intervals, then estimates each one. */
export function updateParameterEstimates(session: EstimationSession, estimatorId: string = DEFAULT_ESTIMATOR_ID): number {
    resolveEstimator(estimatorId);
    assembleSession(session);
    return estimateSession(session, estimatorId);
}

// ─── Test internals barrel ─────────────────────────────────────────

import { filterDateRange, firstValue, lastValue } from "./series";
import { extractAbsorption } from "./assembleIntervals";
import { computeDeltas } from "./estimateInterval";
import { IntervalList } from "./intervalList";

/** @internal Exported for testing only. */
export const _internals = {
    filterDateRange,
    firstValue,
    lastValue,
    extractAbsorption,
    computeDeltas,
    IntervalList,
};
