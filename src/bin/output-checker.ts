#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { main } from "../main.js";

/**
 * CLI entry point for output-checker.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1,2}
 */
main()
	.then((code) => {
		process.exit(code);
	})
	.catch((error: Error) => {
		// defects only; typed failures were already mapped to exit code 2
		console.error("Fatal error:", error);
		process.exit(2);
	});
