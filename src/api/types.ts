// ─── Time series samples ───────────────────────────────────────────

/** A scalar value observed or predicted over [startDate, endDate]. */
export interface TimedValue {
  startDate: Date;
  endDate: Date;
  value: number;
}

/** Blood glucose sample, mg/dL */
export type GlucoseSample = TimedValue;

/** Cumulative predicted glucose contribution (insulin action or basal delivery), mg/dL */
export type GlucoseEffect = TimedValue;

// ─── Carb absorption ───────────────────────────────────────────────

/**
 * Absorption tracking for one logged meal. Any field may be missing when
 * the upstream absorption model could not resolve it.
 */
export interface CarbAbsorptionRecord {
  observedStart?: Date;
  observedEnd?: Date;
  enteredCarbs?: number; // grams
  observedCarbs?: number; // grams absorbed according to counteraction
  timeRemaining?: number; // seconds; > 0 while absorption is still in progress
}

// ─── Session input ─────────────────────────────────────────────────

export interface SessionInput {
  startDate: Date;
  endDate: Date;
  glucose: GlucoseSample[];
  insulinEffect: GlucoseEffect[];
  basalEffect: GlucoseEffect[];
  carbRecords: CarbAbsorptionRecord[];
}

// ─── Raw JSON document shapes ──────────────────────────────────────

export interface RawTimedValue {
  startDate: string; // ISO datetime
  endDate?: string;
  value: number;
}

export interface RawCarbAbsorptionRecord {
  observedStart?: string;
  observedEnd?: string;
  enteredCarbs?: number;
  observedCarbs?: number;
  timeRemaining?: number;
}

export interface RawSessionDocument {
  start: string;
  end: string;
  glucose: RawTimedValue[];
  insulinEffect?: RawTimedValue[];
  basalEffect?: RawTimedValue[];
  carbs?: RawCarbAbsorptionRecord[];
}
