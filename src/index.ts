export {
	ConfigStore,
	getConfigFilePath,
	parseConfigLine,
	type ConfigMapping,
	type ConfigStoreOptions,
	type LineResult,
} from './utils/kernel-config.js';
export { inferArchitecture, hasArchKconfig, getArchOption } from './utils/arch.js';
export { nodeFileSystem, type KernelFileSystem } from './utils/fs.js';
export { createLogger, silentLogger, type Logger } from './utils/logger.js';
