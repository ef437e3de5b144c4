import path from 'path';
import { getConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { ConfigStore } from './kernel-config.js';

export type SessionFlags = {
	kdir?: string;
	verbose?: boolean;
};

export type Session = {
	kernelDir: string;
	logger: Logger;
	store: ConfigStore;
};

/**
 * Kernel directory priority: --kdir > $KDIR > `kdir` setting > cwd
 */
export const resolveKernelDir = (flagKdir?: string, configKdir?: string) =>
	path.resolve(flagKdir || process.env.KDIR || configKdir || process.cwd());

export const createSession = async (flags: SessionFlags): Promise<Session> => {
	const config = await getConfig();
	const logger = createLogger({ verbose: flags.verbose || config.verbose });
	const kernelDir = resolveKernelDir(flags.kdir, config.kdir);
	logger.debug(`Kernel directory: ${kernelDir}`);

	return {
		kernelDir,
		logger,
		store: new ConfigStore({ logger }),
	};
};
