export {
	type ConfigInitOptions,
	configInit,
	configShow,
} from "./config/index";
export {
	type DepsCleanOptions,
	type DepsListOptions,
	depsClean,
	depsInfo,
	depsList,
	depsTree,
} from "./deps";
export { type InitOptions, init } from "./init";
export { type InstallOptions, install } from "./install";
export { type SyncOptions, sync } from "./sync";
export { uninstall } from "./uninstall";
