import { readFileSync, existsSync } from "node:fs";
import { parseSessionData } from "../src/data/loadSessionData.js";
import {
    createSession,
    DEFAULT_ESTIMATOR_ID,
    generateDiagnosticReport,
    listEstimators,
    updateParameterEstimates,
} from "../src/models/estimation/index.js";

const file = process.argv[2];
const estimatorId = process.argv[3] || DEFAULT_ESTIMATOR_ID;

if (!file) {
    const estimators = listEstimators()
        .map((e) => `  ${e.id}: ${e.description}`)
        .join("\n");
    console.error(`Usage: npx tsx cli/estimate.ts <session.json> [estimatorId]\n\nEstimators:\n${estimators}`);
    process.exit(1);
}

if (!existsSync(file)) {
    console.error(`File not found: ${file}`);
    process.exit(1);
}

const data: unknown = JSON.parse(readFileSync(file, "utf-8"));
const session = createSession(parseSessionData(data));
const estimated = updateParameterEstimates(session, estimatorId);

console.log(`Estimator: ${estimatorId}`);
console.log(`Intervals: ${session.intervals.length} (${estimated} estimated)`);
console.log(generateDiagnosticReport(session));
