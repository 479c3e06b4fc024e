// Type definitions and constants for parameter multiplier estimation
import type { CarbAbsorptionRecord, GlucoseEffect, GlucoseSample } from "../../api/types";

// ─── Public interfaces ─────────────────────────────────────────────

export type EstimationIntervalType = "fasting" | "carbAbsorption";

export interface CarbTotals {
    entered: number; // grams
    observed: number; // grams
}

export interface EstimatedMultipliers {
    startDate: Date;
    endDate: Date;
    basalMultiplier: number;
    insulinSensitivityMultiplier: number;
    carbSensitivityMultiplier: number;
    carbRatioMultiplier: number;
}

export interface EstimationInterval {
    startDate: Date;
    endDate: Date;
    type: EstimationIntervalType;
    glucose: GlucoseSample[];
    insulinEffect: GlucoseEffect[];
    basalEffect: GlucoseEffect[];
    carbs?: CarbTotals; // carbAbsorption only, summed across merged records
    deltaGlucose?: number;
    deltaGlucoseInsulin?: number;
    deltaGlucoseBasal?: number;
    estimatedMultipliers?: EstimatedMultipliers;
}

export interface AssemblyResult {
    intervals: EstimationInterval[];
    startDate: Date;
    endDate: Date;
    status: string;
}

/**
 * Mutable estimation state. `assembleSession` and `estimateSession` mutate it
 * in place and must not run concurrently against the same session.
 */
export interface EstimationSession {
    startDate: Date;
    endDate: Date;
    glucose: GlucoseSample[];
    insulinEffect: GlucoseEffect[];
    basalEffect: GlucoseEffect[];
    carbRecords: CarbAbsorptionRecord[];
    intervals: EstimationInterval[];
    status: string;
}

// ─── Status messages ───────────────────────────────────────────────

export const STATUS = {
    missingField: (index: number) => `Err: carb record ${index} is missing or has inconsistent absorption fields`,
    activeBeforeStart: "Err: active carb absorption started before the estimation window",
    activeAfterEnd: "Assembly completed; active absorption starts after the estimation window",
    activeBeforeEnd: "Assembly completed; window truncated at the start of an active absorption",
    activeTrimmed: "Assembly completed after trimming absorptions that overlap an active absorption",
    completed: "Assembly completed",
} as const;

// ─── Constants ─────────────────────────────────────────────────────

export const MIN_GLUCOSE_SAMPLES = 6; // fewer samples than this leave an interval unestimated
export const TIMELINE_WIDTH = 48; // report timeline columns
export const UNAVAILABLE = "unavailable";
