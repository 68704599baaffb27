export {
	describeGateError,
	describeLinterExit,
	reportGateError,
	reportLinterResult,
} from "./report.js";
