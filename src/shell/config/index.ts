export { parseCLIArgs } from "./cli.js";
export {
	loadGateConfig,
	loadGateOptions,
	overridesFromJSON,
	resolveGateOptions,
} from "./loader.js";
