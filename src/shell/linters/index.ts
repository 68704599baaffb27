export {
	formatCommandLine,
	type LinterInvocation,
	type LinterRunner,
	runLinterProcess,
} from "./runner.js";
