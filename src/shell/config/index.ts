// CHANGE: Barrel for configuration shell modules
// WHY: APP and BIN import argument parsing and config loading from one place

export { parseArgs, parseCLIArgs, USAGE } from "./cli.js";
export {
	DEFAULT_CONFIG_FILE,
	loadCipherConfig,
	readConfigFile,
	readConfigJSON,
} from "./loader.js";
export type { ConfigFile, JSONObject, JSONValue } from "./loader.js";
