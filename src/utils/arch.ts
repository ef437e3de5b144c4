import path from 'path';
import type { ConfigStore } from './kernel-config.js';

/**
 * Architectures whose `arch/` directory name has no matching
 * `CONFIG_<ARCH>` option. Checked in order after the directory scan.
 */
const legacyAliases: ReadonlyArray<{ options: readonly string[]; arch: string }> = [
	{ options: ['CONFIG_UML'], arch: 'um' },
	{ options: ['CONFIG_X86_32'], arch: 'i386' },
	{ options: ['CONFIG_X86_64'], arch: 'x86_64' },
	{ options: ['CONFIG_PPC32', 'CONFIG_PPC64'], arch: 'powerpc' },
	{ options: ['CONFIG_SUPERH', 'CONFIG_SUPERH32', 'CONFIG_SUPERH64'], arch: 'sh' },
];

export const getArchOption = (arch: string) => `CONFIG_${arch.toUpperCase()}`;

/**
 * Whether `arch/<arch>/Kconfig` exists, either in the kernel directory
 * itself or, for `make O=<dir>` output directories, behind the
 * `source` link back to the kernel sources.
 */
export const hasArchKconfig = (
	store: ConfigStore,
	kernelDir: string,
	arch: string
) => {
	const { fileSystem } = store;
	if (fileSystem.isFile(path.join(kernelDir, 'arch', arch, 'Kconfig'))) {
		return true;
	}

	const sourceLink = path.join(kernelDir, 'source');
	return (
		fileSystem.isSymbolicLink(sourceLink)
		&& fileSystem.isFile(path.join(sourceLink, 'arch', arch, 'Kconfig'))
	);
};

export const inferArchitecture = (
	store: ConfigStore,
	kernelDir: string
): string | undefined => {
	const { fileSystem, logger } = store;
	const archDir = path.join(kernelDir, 'arch');
	if (!fileSystem.isDirectory(archDir)) {
		logger.error(`'arch' subdirectory in kernel ${kernelDir} does not exist`);
		return undefined;
	}

	let candidates: string[];
	try {
		candidates = fileSystem.listDirectory(archDir);
	} catch (error) {
		const reason = error instanceof Error ? `: ${error.message}` : '';
		logger.error(`Failed to list ${archDir}${reason}`);
		return undefined;
	}

	// Listing order is kept as-is: when several candidates match, the
	// filesystem decides.
	for (const arch of candidates) {
		if (!hasArchKconfig(store, kernelDir, arch)) {
			logger.debug(`Skipping arch/${arch}: no Kconfig`);
			continue;
		}

		if (store.isEnabled(kernelDir, getArchOption(arch))) {
			return arch;
		}
	}

	const alias = legacyAliases.find(
		({ options }) => options.some((option) => store.isEnabled(kernelDir, option))
	);
	if (alias) {
		return alias.arch;
	}

	logger.error(`Couldn't get ARCH for kernel ${kernelDir}`);
	return undefined;
};
