import { describe, it, expect } from "vitest";
import { estimateByType, estimateCarbAbsorption, estimateFasting, estimateGeneral } from "../estimateInterval";
import { _internals } from "../index";
import { at, makeInterval } from "./fixtures/synthetic";

const { computeDeltas } = _internals;

// Default synthetic series: glucose 100 + t, insulin effect -t, basal effect 3t.

// ── computeDeltas ───────────────────────────────────────────────────

describe("computeDeltas", () => {
    it("computes and stores the three deltas", () => {
        const interval = makeInterval("fasting", 0, 30);
        expect(computeDeltas(interval)).toEqual({ deltaGlucose: 30, deltaGlucoseInsulin: 30, deltaGlucoseBasal: 90 });
        expect(interval.deltaGlucose).toBe(30);
        expect(interval.deltaGlucoseInsulin).toBe(30);
        expect(interval.deltaGlucoseBasal).toBe(90);
    });

    it("uses only samples inside the interval", () => {
        const interval = makeInterval("carbAbsorption", 30, 90);
        expect(computeDeltas(interval)).toEqual({ deltaGlucose: 60, deltaGlucoseInsulin: 60, deltaGlucoseBasal: 180 });
    });

    it("requires six glucose samples", () => {
        // 0..20 holds five samples, 0..25 holds six
        expect(computeDeltas(makeInterval("fasting", 0, 20))).toBeUndefined();
        expect(computeDeltas(makeInterval("fasting", 0, 25))).toBeDefined();
    });

    it("requires both effect series", () => {
        const noInsulin = makeInterval("fasting", 0, 30);
        noInsulin.insulinEffect = [];
        expect(computeDeltas(noInsulin)).toBeUndefined();
        expect(noInsulin.deltaGlucose).toBeUndefined();

        const noBasal = makeInterval("fasting", 0, 30);
        noBasal.basalEffect = [];
        expect(computeDeltas(noBasal)).toBeUndefined();
    });
});

// ── General estimator ───────────────────────────────────────────────

describe("estimateGeneral", () => {
    it("estimates a fasting interval", () => {
        // Plane -30·x + 0·y + 90·z = 120 → (0.8, 1, 1.6)
        const interval = makeInterval("fasting", 0, 30);
        const result = estimateGeneral(interval);

        expect(result).toBeDefined();
        expect(result!.insulinSensitivityMultiplier).toBeCloseTo(1.25, 12);
        expect(result!.carbSensitivityMultiplier).toBeCloseTo(1.25, 12);
        expect(result!.carbRatioMultiplier).toBeCloseTo(1, 12);
        expect(result!.basalMultiplier).toBeCloseTo(1.6, 12);
        expect(interval.estimatedMultipliers).toBe(result);
    });

    it("tags the result with the interval bounds", () => {
        const result = estimateGeneral(makeInterval("fasting", 0, 30));
        expect(result!.startDate).toEqual(at(0));
        expect(result!.endDate).toEqual(at(30));
    });

    it("estimates a carb absorption interval", () => {
        // entered 40 g, observed 10 g → ratio sqrt(4) = 2
        // Plane -60·x + 240·y + 180·z = 240 → (14/13, 9/13, 10/13)
        const interval = makeInterval("carbAbsorption", 30, 90, { entered: 40, observed: 10 });
        const result = estimateGeneral(interval);

        expect(result!.insulinSensitivityMultiplier).toBeCloseTo(13 / 14, 12);
        expect(result!.carbSensitivityMultiplier).toBeCloseTo(13 / 14, 12);
        expect(result!.carbRatioMultiplier).toBeCloseTo(13 / 9, 12);
        expect(result!.basalMultiplier).toBeCloseTo(10 / 13, 12);
    });

    it("ignores carb totals with nothing entered", () => {
        const withZero = estimateGeneral(makeInterval("carbAbsorption", 0, 30, { entered: 0, observed: 5 }));
        const withoutCarbs = estimateGeneral(makeInterval("fasting", 0, 30));
        expect(withZero!.insulinSensitivityMultiplier).toBeCloseTo(withoutCarbs!.insulinSensitivityMultiplier, 12);
        expect(withZero!.basalMultiplier).toBeCloseTo(withoutCarbs!.basalMultiplier, 12);
    });

    it("returns no correction for flat series", () => {
        const interval = makeInterval("fasting", 0, 60, undefined, {
            glucose: () => 110,
            insulin: () => 0,
            basal: () => 0,
        });
        const result = estimateGeneral(interval);
        expect(result).toMatchObject({
            basalMultiplier: 1,
            insulinSensitivityMultiplier: 1,
            carbSensitivityMultiplier: 1,
            carbRatioMultiplier: 1,
        });
    });

    it("leaves short intervals unestimated", () => {
        const interval = makeInterval("fasting", 0, 20);
        expect(estimateGeneral(interval)).toBeUndefined();
        expect(interval.estimatedMultipliers).toBeUndefined();
    });

    it("leaves the result unset when observed carbs are zero", () => {
        const interval = makeInterval("carbAbsorption", 30, 90, { entered: 40, observed: 0 });
        expect(estimateGeneral(interval)).toBeUndefined();
        expect(interval.estimatedMultipliers).toBeUndefined();
        expect(interval.deltaGlucose).toBe(60);
    });
});

// ── Fasting estimator ───────────────────────────────────────────────

describe("estimateFasting", () => {
    it("projects onto the basal / ISF line", () => {
        // Line 90·basal - 30·(1/isf) = 120 → (1.6, 0.8)
        const result = estimateFasting(makeInterval("fasting", 0, 30));
        expect(result!.basalMultiplier).toBeCloseTo(1.6, 12);
        expect(result!.insulinSensitivityMultiplier).toBeCloseTo(1.25, 12);
        expect(result!.carbSensitivityMultiplier).toBeCloseTo(1.25, 12);
        expect(result!.carbRatioMultiplier).toBe(1);
    });

    it("agrees with the general estimator when there are no carbs", () => {
        const general = estimateGeneral(makeInterval("fasting", 30, 120));
        const fasting = estimateFasting(makeInterval("fasting", 30, 120));
        expect(fasting!.basalMultiplier).toBeCloseTo(general!.basalMultiplier, 12);
        expect(fasting!.insulinSensitivityMultiplier).toBeCloseTo(general!.insulinSensitivityMultiplier, 12);
    });
});

// ── Carb absorption estimator ───────────────────────────────────────

describe("estimateCarbAbsorption", () => {
    it("projects onto the CSF / CR line", () => {
        // w = 60 / 120 = 0.5; line 0.5·(1/csf) + 0.5·cr = 2 → (2, 2)
        const result = estimateCarbAbsorption(makeInterval("carbAbsorption", 30, 90, { entered: 40, observed: 10 }));
        expect(result!.carbSensitivityMultiplier).toBeCloseTo(0.5, 12);
        expect(result!.carbRatioMultiplier).toBeCloseTo(2, 12);
        expect(result!.insulinSensitivityMultiplier).toBeCloseTo(1, 12);
        expect(result!.basalMultiplier).toBe(1);
    });

    it("needs entered carbs", () => {
        expect(estimateCarbAbsorption(makeInterval("fasting", 30, 90))).toBeUndefined();
        expect(
            estimateCarbAbsorption(makeInterval("carbAbsorption", 30, 90, { entered: 0, observed: 0 })),
        ).toBeUndefined();
    });

    it("needs a non-zero counteraction", () => {
        // glucose rise exactly cancelled by insulin effect
        const interval = makeInterval(
            "carbAbsorption",
            30,
            90,
            { entered: 40, observed: 10 },
            { glucose: (t) => 100 - t },
        );
        expect(estimateCarbAbsorption(interval)).toBeUndefined();
        expect(interval.deltaGlucose).toBe(-60);
        expect(interval.deltaGlucoseInsulin).toBe(60);
    });

    it("needs observed carbs", () => {
        expect(
            estimateCarbAbsorption(makeInterval("carbAbsorption", 30, 90, { entered: 40, observed: 0 })),
        ).toBeUndefined();
    });
});

// ── By-type dispatch ────────────────────────────────────────────────

describe("estimateByType", () => {
    it("uses the fasting estimator for fasting intervals", () => {
        const result = estimateByType(makeInterval("fasting", 0, 30));
        expect(result!.carbRatioMultiplier).toBe(1);
        expect(result!.basalMultiplier).toBeCloseTo(1.6, 12);
    });

    it("uses the carb absorption estimator for carb intervals", () => {
        const result = estimateByType(makeInterval("carbAbsorption", 30, 90, { entered: 40, observed: 10 }));
        expect(result!.basalMultiplier).toBe(1);
        expect(result!.carbRatioMultiplier).toBeCloseTo(2, 12);
    });
});
