import path from 'path';
import { nodeFileSystem, type KernelFileSystem } from './fs.js';
import { createLogger, type Logger } from './logger.js';
import { inferArchitecture } from './arch.js';

export type ConfigMapping = ReadonlyMap<string, string>;

export type LineResult =
	| { kind: 'entry'; key: string; value: string }
	| { kind: 'skip' };

export const getConfigFilePath = (kernelDir: string) =>
	path.join(kernelDir, '.config');

const stripQuotes = (value: string) => value.replace(/^"+|"+$/g, '');

/**
 * Parse one `.config` line. Anything without a `=` (blank lines,
 * `# CONFIG_FOO is not set`) is a skip, never an error.
 * Only the first `=` separates key and value, so values may contain `=`.
 */
export const parseConfigLine = (line: string): LineResult => {
	const separator = line.indexOf('=');
	if (separator === -1) {
		return { kind: 'skip' };
	}

	return {
		kind: 'entry',
		key: line.slice(0, separator).trim(),
		value: stripQuotes(line.slice(separator + 1).trim()),
	};
};

export type ConfigStoreOptions = {
	fileSystem?: KernelFileSystem;
	logger?: Logger;
};

/**
 * Parsed kernel configurations, cached per kernel directory.
 *
 * A directory's `.config` is read on the first query for it and the
 * result is kept until `clear()`. Failures are reported to the logger
 * and surface as empty mappings or `undefined`, never as exceptions.
 */
export class ConfigStore {
	readonly fileSystem: KernelFileSystem;

	readonly logger: Logger;

	private readonly cache = new Map<string, ConfigMapping>();

	constructor({ fileSystem = nodeFileSystem, logger = createLogger() }: ConfigStoreOptions = {}) {
		this.fileSystem = fileSystem;
		this.logger = logger;
	}

	parse(kernelDir: string): ConfigMapping {
		const configFile = getConfigFilePath(kernelDir);
		const mapping = new Map<string, string>();

		let content: string;
		try {
			content = this.fileSystem.readFile(configFile);
		} catch (error) {
			const reason = error instanceof Error ? `: ${error.message}` : '';
			this.logger.error(`Failed to open kernel config file ${configFile}${reason}`);
			return mapping;
		}

		for (const line of content.split('\n')) {
			const result = parseConfigLine(line);
			if (result.kind === 'entry') {
				mapping.set(result.key, result.value);
			}
		}

		this.logger.debug(`Parsed ${mapping.size} options from ${configFile}`);
		return mapping;
	}

	getMapping(kernelDir: string): ConfigMapping {
		let mapping = this.cache.get(kernelDir);
		if (!mapping) {
			mapping = this.parse(kernelDir);
			this.cache.set(kernelDir, mapping);
		}
		return mapping;
	}

	getValue(kernelDir: string, option: string): string | undefined {
		return this.getMapping(kernelDir).get(option);
	}

	isEnabled(kernelDir: string, option: string): boolean {
		return this.getValue(kernelDir, option) === 'y';
	}

	inferArchitecture(kernelDir: string): string | undefined {
		return inferArchitecture(this, kernelDir);
	}

	clear() {
		this.cache.clear();
	}
}
