// CHANGE: Pure report rendering for the checker's console output
// PURITY: CORE
// INVARIANT: Rendered report is ASCII-only (inputs are sanitized or rendered bytes)
// COMPLEXITY: O(1) + O(|points|)

import { match } from "ts-pattern";

import { type Diagnostic, toDiagnostic } from "../compare/format.js";
import type { ComparisonOutcome } from "../compare/outcome.js";
import {
	type CheckSpec,
	type RunResult,
	toRunResult,
	toTestResult,
} from "../harness/result.js";
import type { OutputFormat } from "../models.js";

/**
 * Everything a report is built from.
 */
export interface CheckReport {
	readonly run: RunResult;
	readonly diagnostic: Diagnostic;
}

/**
 * @pure true
 */
export function buildReport(
	spec: CheckSpec,
	outcome: ComparisonOutcome,
): CheckReport {
	return {
		run: toRunResult([toTestResult(spec, outcome)]),
		diagnostic: toDiagnostic(outcome),
	};
}

/**
 * Renders a report as the lines printed by the CLI.
 *
 * - text: `OK` for a match, otherwise the sanitized divergence message
 * - json: one line `{ "run": ..., "diagnostic": ... }`
 *
 * @pure true
 */
export function renderReport(
	report: CheckReport,
	format: OutputFormat,
): ReadonlyArray<string> {
	return match(format)
		.with("json", () => [JSON.stringify(report)])
		.with("text", () =>
			report.run.testResults.map((t) => (t.successful ? "OK" : t.message)),
		)
		.exhaustive();
}
