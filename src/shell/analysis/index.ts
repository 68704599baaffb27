export {
	checkAndReportPreflight,
	isBlocking,
	linterInEnvironment,
	type PreflightContext,
	type PreflightIssueCode,
	type PreflightResult,
	printPreflightReport,
	runPreflight,
} from "./preflight.js";
