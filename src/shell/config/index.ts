// CHANGE: Central export file for config module

export { type CLIArgs, parseCLIArgs, parsePoints, USAGE } from "./cli.js";
export {
	DEFAULT_CONFIG_FILE,
	type FileConfig,
	loadCheckerConfig,
	validateConfig,
} from "./loader.js";
export { DEFAULT_OPTIONS, resolveOptions } from "./resolve.js";
