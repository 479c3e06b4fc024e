// Human-readable diagnostic report of an estimation session
import { scaleTime } from "d3-scale";
import type { EstimationInterval, EstimationSession } from "./types";
import { TIMELINE_WIDTH, UNAVAILABLE } from "./types";

export interface ReportOptions {
    /** Columns in the timeline strip (default TIMELINE_WIDTH) */
    timelineWidth?: number;
}

/** UTC "YYYY-MM-DD HH:mm:ss" */
export function formatTimestamp(date: Date): string {
    return date.toISOString().replace("T", " ").slice(0, 19);
}

function formatValue(value: number | undefined, digits: number, unit = ""): string {
    if (value === undefined) return UNAVAILABLE;
    return unit ? `${value.toFixed(digits)} ${unit}` : value.toFixed(digits);
}

/**
 * One character per column across the session window:
 * "." fasting, "#" carb absorption, " " not covered.
 */
export function renderTimeline(session: Pick<EstimationSession, "startDate" | "endDate" | "intervals">, width = TIMELINE_WIDTH): string {
    const cells = new Array<string>(width).fill(" ");
    if (session.endDate.getTime() <= session.startDate.getTime()) return `|${cells.join("")}|`;

    const x = scaleTime().domain([session.startDate, session.endDate]).range([0, width]);
    for (const interval of session.intervals) {
        const from = Math.max(0, Math.round(x(interval.startDate)));
        const to = Math.min(width, Math.round(x(interval.endDate)));
        const mark = interval.type === "carbAbsorption" ? "#" : ".";
        for (let col = from; col < to; col++) cells[col] = mark;
    }
    return `|${cells.join("")}|`;
}

function intervalBlock(interval: EstimationInterval): string[] {
    const m = interval.estimatedMultipliers;
    return [
        "----------",
        `start: ${formatTimestamp(interval.startDate)}`,
        `end: ${formatTimestamp(interval.endDate)}`,
        `type: ${interval.type}`,
        `entered carbs: ${formatValue(interval.carbs?.entered, 1, "g")}`,
        `observed carbs: ${formatValue(interval.carbs?.observed, 1, "g")}`,
        `deltaBG: ${formatValue(interval.deltaGlucose, 1, "mg/dL")}`,
        `deltaBG insulin: ${formatValue(interval.deltaGlucoseInsulin, 1, "mg/dL")}`,
        `deltaBG basal: ${formatValue(interval.deltaGlucoseBasal, 1, "mg/dL")}`,
        `ISF multiplier: ${formatValue(m?.insulinSensitivityMultiplier, 3)}`,
        `CR multiplier: ${formatValue(m?.carbRatioMultiplier, 3)}`,
        `CSF multiplier: ${formatValue(m?.carbSensitivityMultiplier, 3)}`,
        `Basal multiplier: ${formatValue(m?.basalMultiplier, 3)}`,
    ];
}

export function generateDiagnosticReport(session: EstimationSession, options: ReportOptions = {}): string {
    const lines = [
        "## Settings Review",
        session.status,
        `window: ${formatTimestamp(session.startDate)} - ${formatTimestamp(session.endDate)}`,
        `timeline: ${renderTimeline(session, options.timelineWidth)}`,
    ];
    for (const interval of session.intervals) {
        lines.push(...intervalBlock(interval));
    }
    return lines.join("\n");
}
