// Registry of selectable per-interval estimation strategies
import type { IntervalEstimator } from "./estimateInterval";
import { estimateByType, estimateCarbAbsorption, estimateFasting, estimateGeneral } from "./estimateInterval";

export interface EstimationStrategy {
    id: string;
    name: string;
    description: string;
    estimate: IntervalEstimator;
}

export const ESTIMATORS: Record<string, EstimationStrategy> = {};

export const DEFAULT_ESTIMATOR_ID = "general";

export function registerEstimator(strategy: EstimationStrategy): void {
    if (ESTIMATORS[strategy.id]) {
        console.warn(`[estimation] Overwriting existing estimator: ${strategy.id}`);
    }
    ESTIMATORS[strategy.id] = strategy;
}

export function getEstimator(id: string): EstimationStrategy | undefined {
    return ESTIMATORS[id];
}

export function listEstimators(): EstimationStrategy[] {
    return Object.values(ESTIMATORS);
}

registerEstimator({
    id: DEFAULT_ESTIMATOR_ID,
    name: "General",
    description: "Joint ISF, CR and basal projection applied to every interval",
    estimate: estimateGeneral,
});

// The two below are not used by the default pipeline; pick them (or "by-type") explicitly.
registerEstimator({
    id: "fasting",
    name: "Fasting",
    description: "Basal and ISF projection, carb ratio left at 1",
    estimate: estimateFasting,
});

registerEstimator({
    id: "carb-absorption",
    name: "Carb absorption",
    description: "CSF and CR projection from observed versus entered carbs, basal left at 1",
    estimate: estimateCarbAbsorption,
});

registerEstimator({
    id: "by-type",
    name: "By interval type",
    description: "Fasting estimator for fasting intervals, carb absorption estimator otherwise",
    estimate: estimateByType,
});
