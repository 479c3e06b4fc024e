import type {
  CarbAbsorptionRecord,
  GlucoseEffect,
  SessionInput,
  TimedValue,
} from "../api/types";
import { sortByStart, sortCarbRecords } from "../models/estimation/series";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatError(detail: string): Error {
  return new Error(`Unrecognized session data format: ${detail}`);
}

/** Parses an ISO datetime; undefined when absent or unparseable. */
function optionalDate(value: unknown): Date | undefined {
  if (typeof value !== "string") return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function requiredDate(value: unknown, field: string): Date {
  const date = optionalDate(value);
  if (!date) throw formatError(`${field} must be an ISO datetime`);
  return date;
}

function parseSample(raw: unknown, field: string, index: number): TimedValue {
  if (!isRecord(raw)) throw formatError(`${field}[${index}] is not an object`);
  const startDate = requiredDate(raw.startDate, `${field}[${index}].startDate`);
  // Instantaneous readings (CGM values) carry only a start
  const endDate = raw.endDate === undefined ? startDate : requiredDate(raw.endDate, `${field}[${index}].endDate`);
  const value = optionalNumber(raw.value);
  if (value === undefined) throw formatError(`${field}[${index}].value must be a number`);
  return { startDate, endDate, value };
}

function parseSeries(raw: unknown, field: string): TimedValue[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) throw formatError(`${field} must be an array`);
  return sortByStart(raw.map((s: unknown, i) => parseSample(s, field, i)));
}

/**
 * Fields the absorption model could not resolve stay undefined; the
 * assembler reports and skips such records.
 */
function parseCarbRecord(raw: unknown, index: number): CarbAbsorptionRecord {
  if (!isRecord(raw)) throw formatError(`carbs[${index}] is not an object`);
  return {
    observedStart: optionalDate(raw.observedStart),
    observedEnd: optionalDate(raw.observedEnd),
    enteredCarbs: optionalNumber(raw.enteredCarbs),
    observedCarbs: optionalNumber(raw.observedCarbs),
    timeRemaining: optionalNumber(raw.timeRemaining),
  };
}

/**
 * Parse a session document:
 *   { start, end, glucose: [...], insulinEffect?: [...], basalEffect?: [...], carbs?: [...] }
 * Series are sorted by start time, carb records by observed start
 * (records without one go last).
 */
export function parseSessionData(data: unknown): SessionInput {
  if (!isRecord(data)) throw formatError("expected an object");

  const startDate = requiredDate(data.start, "start");
  const endDate = requiredDate(data.end, "end");
  if (endDate.getTime() < startDate.getTime()) throw formatError("end precedes start");
  if (!Array.isArray(data.glucose)) throw formatError("glucose must be an array");

  const insulinEffect: GlucoseEffect[] = parseSeries(data.insulinEffect, "insulinEffect");
  const basalEffect: GlucoseEffect[] = parseSeries(data.basalEffect, "basalEffect");

  let carbRecords: CarbAbsorptionRecord[] = [];
  if (data.carbs !== undefined) {
    if (!Array.isArray(data.carbs)) throw formatError("carbs must be an array");
    carbRecords = sortCarbRecords(data.carbs.map((c: unknown, i) => parseCarbRecord(c, i)));
  }

  return {
    startDate,
    endDate,
    glucose: parseSeries(data.glucose, "glucose"),
    insulinEffect,
    basalEffect,
    carbRecords,
  };
}
