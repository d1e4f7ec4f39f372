// CHANGE: Console output of checker reports
// PURITY: SHELL (console I/O)
// EFFECT: Effect<void>
// INVARIANT: Results go to stdout, failures to stderr

import { Effect } from "effect";

import { type AppError, describeAppError } from "../../core/errors.js";
import { type CheckReport, renderReport } from "../../core/format/report.js";
import type { OutputFormat } from "../../core/models.js";
import { sanitizeText } from "../../core/sanitize/render.js";

/**
 * Prints a report, one `console.log` per line.
 */
export const printReport = (
	report: CheckReport,
	format: OutputFormat,
): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const line of renderReport(report, format)) {
			console.log(line);
		}
	});

/**
 * Prints an application error to stderr. Paths and details may echo user
 * input, so the line is sanitized first.
 */
export const printAppError = (error: AppError): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(sanitizeText(describeAppError(error)));
	});
