import fs from 'fs';
import fsPromises from 'fs/promises';

/**
 * The synchronous filesystem queries the kernel config reader needs.
 * Swappable so callers can wrap or fake the underlying reads.
 */
export type KernelFileSystem = {
	readFile: (filePath: string) => string;
	isFile: (filePath: string) => boolean;
	isDirectory: (filePath: string) => boolean;
	isSymbolicLink: (filePath: string) => boolean;
	listDirectory: (directoryPath: string) => string[];
};

const statOrUndefined = (filePath: string, follow = true) => {
	try {
		return follow ? fs.statSync(filePath) : fs.lstatSync(filePath);
	} catch {
		return undefined;
	}
};

export const nodeFileSystem: KernelFileSystem = {
	readFile: (filePath) => fs.readFileSync(filePath, 'utf8'),
	isFile: (filePath) => statOrUndefined(filePath)?.isFile() ?? false,
	isDirectory: (filePath) => statOrUndefined(filePath)?.isDirectory() ?? false,
	isSymbolicLink: (filePath) =>
		statOrUndefined(filePath, false)?.isSymbolicLink() ?? false,
	listDirectory: (directoryPath) => fs.readdirSync(directoryPath),
};

export const fileExists = (filePath: string) =>
	fsPromises.access(filePath).then(
		() => true,
		() => false
	);
