import fs from 'fs/promises';
import path from 'path';
import ini from 'ini';
import { fileExists } from './fs.js';
import { KnownError } from './error.js';
import { resolveConfigPath } from './paths.js';

const { hasOwnProperty } = Object.prototype;
export const hasOwn = (object: unknown, key: PropertyKey) =>
	hasOwnProperty.call(object, key);

const parseAssert = (name: string, condition: boolean, message: string) => {
	if (!condition) {
		throw new KnownError(`Invalid config property ${name}: ${message}`);
	}
};

const configParsers = {
	kdir(kdir?: string) {
		if (!kdir) {
			return undefined;
		}

		parseAssert('kdir', path.isAbsolute(kdir), 'Must be an absolute path');
		return kdir;
	},
	verbose(verbose?: string) {
		if (!verbose) {
			return false;
		}

		parseAssert('verbose', /^(true|false)$/.test(verbose), 'Must be a boolean');
		return verbose === 'true';
	},
} as const;

type ConfigKeys = keyof typeof configParsers;

export type RawConfig = {
	[key in ConfigKeys]?: string;
};

export type ValidConfig = {
	[Key in ConfigKeys]: ReturnType<(typeof configParsers)[Key]>;
};

const isConfigKey = (key: string): key is ConfigKeys => hasOwn(configParsers, key);

const readConfigFile = async (): Promise<RawConfig> => {
	const configPath = resolveConfigPath();
	const configExists = await fileExists(configPath);
	if (!configExists) {
		return Object.create(null);
	}

	const configString = await fs.readFile(configPath, 'utf8');
	const parsed = ini.parse(configString);
	const config: RawConfig = Object.create(null);
	for (const [key, value] of Object.entries(parsed)) {
		// ini turns bare true/false into booleans
		if (isConfigKey(key) && (typeof value === 'string' || typeof value === 'boolean')) {
			config[key] = String(value);
		}
	}
	return config;
};

const parseConfig = (
	config: RawConfig,
	cliConfig: RawConfig,
	suppressErrors: boolean
): ValidConfig => {
	const parseValue = <T>(parse: (value?: string) => T, value?: string): T => {
		try {
			return parse(value);
		} catch (error) {
			if (!suppressErrors) {
				throw error;
			}
			return parse(undefined);
		}
	};

	return {
		kdir: parseValue(configParsers.kdir, cliConfig.kdir ?? config.kdir),
		verbose: parseValue(configParsers.verbose, cliConfig.verbose ?? config.verbose),
	};
};

export const getConfig = async (
	cliConfig: RawConfig = {},
	suppressErrors = false
): Promise<ValidConfig> => {
	const config = await readConfigFile();
	return parseConfig(config, cliConfig, suppressErrors);
};

export const setConfigs = async (keyValues: [key: string, value: string][]) => {
	const config = await readConfigFile();

	for (const [key, value] of keyValues) {
		if (!isConfigKey(key)) {
			throw new KnownError(`Invalid config property: ${key}`);
		}

		configParsers[key](value);
		config[key] = value;
	}

	const configPath = resolveConfigPath();
	await fs.mkdir(path.dirname(configPath), { recursive: true });
	await fs.writeFile(configPath, ini.stringify(config), 'utf8');
};
