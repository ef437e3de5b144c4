import path from 'path';
import { fileURLToPath } from 'url';
import { execaNode } from 'execa';
import { createFixture as createFixtureBase } from 'fs-fixture';
import { nodeFileSystem, type KernelFileSystem } from '../src/utils/fs.js';
import type { Logger } from '../src/utils/logger.js';

type FixtureSource = Parameters<typeof createFixtureBase>[0];

const projectRoot = fileURLToPath(new URL('..', import.meta.url));
const cliPath = path.join(projectRoot, 'src/cli.ts');

export const defconfig = [
	'#',
	'# Linux/x86 6.6.0 Kernel Configuration',
	'#',
	'CONFIG_CC_VERSION_TEXT="gcc (GCC) 13.2.0"',
	'CONFIG_X86=y',
	'CONFIG_X86_64=y',
	'CONFIG_SMP=y',
	'CONFIG_HZ=250',
	'CONFIG_EXT4_FS=m',
	'# CONFIG_DEBUG_INFO is not set',
	'CONFIG_LOCALVERSION=""',
	'',
].join('\n');

export const createFixture = async (source?: FixtureSource) => {
	const fixture = await createFixtureBase(source);

	const kconfigProbe = (
		args: string[],
		options?: {
			reject?: boolean;
			env?: Record<string, string>;
		}
	) => execaNode(cliPath, args, {
		cwd: projectRoot,
		nodeOptions: ['--import', 'tsx'],
		...options,
		env: {
			NO_COLOR: '1',
			KDIR: '',
			KCONFIG_PROBE_CONFIG: path.join(fixture.path, '.kconfig-probe'),
			...options?.env,
		},
	});

	return {
		fixture,
		kconfigProbe,
	};
};

export const createCapturingLogger = () => {
	const errors: string[] = [];
	const logger: Logger = {
		error: (message) => {
			errors.push(message);
		},
		debug: () => {},
	};
	return { errors, logger };
};

export const createCountingFileSystem = () => {
	const reads: string[] = [];
	const fileSystem: KernelFileSystem = {
		...nodeFileSystem,
		readFile: (filePath) => {
			reads.push(filePath);
			return nodeFileSystem.readFile(filePath);
		},
	};
	return { reads, fileSystem };
};
