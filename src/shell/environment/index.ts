export {
	currentPlatform,
	isDirectory,
	isFile,
	locateEnvironment,
	prepareEnvironment,
	resolveProjectDir,
} from "./locate.js";
