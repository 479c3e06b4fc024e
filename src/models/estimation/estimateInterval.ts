// Per-interval multiplier estimators
import type { EstimatedMultipliers, EstimationInterval } from "./types";
import { MIN_GLUCOSE_SAMPLES } from "./types";
import { filterDateRange, firstValue, lastValue } from "./series";
import { projectToLine, projectToPlane } from "./projection";

export type IntervalEstimator = (interval: EstimationInterval) => EstimatedMultipliers | undefined;

type Multipliers = Omit<EstimatedMultipliers, "startDate" | "endDate">;

interface IntervalDeltas {
    deltaGlucose: number;
    deltaGlucoseInsulin: number; // positive when insulin lowered glucose
    deltaGlucoseBasal: number;
}

/**
 * Glucose, insulin and basal deltas across the interval, also stored on it.
 * Undefined when there are too few glucose samples or an effect series is empty.
 */
export function computeDeltas(interval: EstimationInterval): IntervalDeltas | undefined {
    const { startDate, endDate } = interval;
    const glucose = filterDateRange(interval.glucose, startDate, endDate);
    if (glucose.length < MIN_GLUCOSE_SAMPLES) return undefined;
    const insulinEffect = filterDateRange(interval.insulinEffect, startDate, endDate);
    const basalEffect = filterDateRange(interval.basalEffect, startDate, endDate);

    const startGlucose = firstValue(glucose);
    const endGlucose = lastValue(glucose);
    const startInsulin = firstValue(insulinEffect);
    const endInsulin = lastValue(insulinEffect);
    const startBasal = firstValue(basalEffect);
    const endBasal = lastValue(basalEffect);
    if (
        startGlucose === undefined ||
        endGlucose === undefined ||
        startInsulin === undefined ||
        endInsulin === undefined ||
        startBasal === undefined ||
        endBasal === undefined
    ) {
        return undefined;
    }

    const deltas: IntervalDeltas = {
        deltaGlucose: endGlucose - startGlucose,
        deltaGlucoseInsulin: startInsulin - endInsulin,
        deltaGlucoseBasal: endBasal - startBasal,
    };
    interval.deltaGlucose = deltas.deltaGlucose;
    interval.deltaGlucoseInsulin = deltas.deltaGlucoseInsulin;
    interval.deltaGlucoseBasal = deltas.deltaGlucoseBasal;
    return deltas;
}

/** Drops deltas and multipliers left by a previous estimation run. */
export function clearEstimate(interval: EstimationInterval): void {
    delete interval.deltaGlucose;
    delete interval.deltaGlucoseInsulin;
    delete interval.deltaGlucoseBasal;
    delete interval.estimatedMultipliers;
}

function storeResult(interval: EstimationInterval, multipliers: Multipliers): EstimatedMultipliers | undefined {
    // A zero inverse multiplier leaves nothing usable to report
    if (!Object.values(multipliers).every((m) => Number.isFinite(m))) return undefined;

    const result: EstimatedMultipliers = {
        startDate: interval.startDate,
        endDate: interval.endDate,
        ...multipliers,
    };
    interval.estimatedMultipliers = result;
    return result;
}

/**
 * Solves ISF, CR and basal jointly by projecting (1, 1, 1) onto
 *   -ΔG·(1/isf) + r·(ΔG + ΔI)·(1/cr) + ΔB·basal = ΔI + ΔB
 * where r = sqrt(entered / observed) carbs, or 0 without carb totals.
 * The square root splits the observed/entered mismatch evenly between carb
 * counting error and parameter mismatch. Works for any interval type.
 */
export function estimateGeneral(interval: EstimationInterval): EstimatedMultipliers | undefined {
    const deltas = computeDeltas(interval);
    if (!deltas) return undefined;
    const { deltaGlucose, deltaGlucoseInsulin, deltaGlucoseBasal } = deltas;

    let actualOverObservedRatio = 0;
    if (interval.carbs && interval.carbs.entered > 0) {
        const observedOverEntered = interval.carbs.observed / interval.carbs.entered;
        actualOverObservedRatio = Math.sqrt(1 / observedOverEntered);
    }

    const insulinWeight = -deltaGlucose;
    const carbWeight = actualOverObservedRatio * (deltaGlucose + deltaGlucoseInsulin);
    const basalWeight = deltaGlucoseBasal;
    const insulinBasalWeight = deltaGlucoseInsulin + deltaGlucoseBasal;

    const [isfInverse, crInverse, basalMultiplier] = projectToPlane(
        insulinWeight,
        carbWeight,
        basalWeight,
        insulinBasalWeight,
    );
    const insulinSensitivityMultiplier = 1 / isfInverse;

    return storeResult(interval, {
        basalMultiplier,
        insulinSensitivityMultiplier,
        carbSensitivityMultiplier: insulinSensitivityMultiplier,
        carbRatioMultiplier: 1 / crInverse,
    });
}

/** Basal and ISF only: projects (1, 1) onto ΔB·basal - ΔG·(1/isf) = ΔB + ΔI. CR stays 1. */
export function estimateFasting(interval: EstimationInterval): EstimatedMultipliers | undefined {
    const deltas = computeDeltas(interval);
    if (!deltas) return undefined;
    const { deltaGlucose, deltaGlucoseInsulin, deltaGlucoseBasal } = deltas;

    const [basalMultiplier, isfInverse] = projectToLine(
        deltaGlucoseBasal,
        -deltaGlucose,
        deltaGlucoseBasal + deltaGlucoseInsulin,
    );
    const insulinSensitivityMultiplier = 1 / isfInverse;

    return storeResult(interval, {
        basalMultiplier,
        insulinSensitivityMultiplier,
        carbSensitivityMultiplier: insulinSensitivityMultiplier,
        carbRatioMultiplier: 1,
    });
}

/**
 * CSF and CR from the carb totals. With w = ΔG / (ΔG + ΔI), projects (1, 1) onto
 *   w·(1/csf) + (1 - w)·cr = sqrt(entered / observed)
 * and derives ISF = cr / (1/csf). Basal stays 1.
 */
export function estimateCarbAbsorption(interval: EstimationInterval): EstimatedMultipliers | undefined {
    const carbs = interval.carbs;
    if (!carbs || carbs.entered <= 0) return undefined;
    const deltas = computeDeltas(interval);
    if (!deltas) return undefined;

    const observedOverEntered = carbs.observed / carbs.entered;
    const counteraction = deltas.deltaGlucose + deltas.deltaGlucoseInsulin;
    if (counteraction === 0 || observedOverEntered === 0) return undefined;

    const actualOverObservedRatio = Math.sqrt(1 / observedOverEntered);
    const csfWeight = deltas.deltaGlucose / counteraction;
    const crWeight = 1 - csfWeight;

    const [csfInverse, carbRatioMultiplier] = projectToLine(csfWeight, crWeight, actualOverObservedRatio);

    return storeResult(interval, {
        basalMultiplier: 1,
        insulinSensitivityMultiplier: carbRatioMultiplier / csfInverse,
        carbSensitivityMultiplier: 1 / csfInverse,
        carbRatioMultiplier,
    });
}

export function estimateByType(interval: EstimationInterval): EstimatedMultipliers | undefined {
    switch (interval.type) {
        case "fasting":
            return estimateFasting(interval);
        case "carbAbsorption":
            return estimateCarbAbsorption(interval);
    }
}
