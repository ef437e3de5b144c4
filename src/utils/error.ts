import fs from 'fs';
import { dim, red } from 'kolorist';
import { outro } from '@clack/prompts';

export class KnownError extends Error {}

const readVersion = () => {
	let pkg: unknown;
	try {
		pkg = JSON.parse(
			fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8')
		);
	} catch {
		pkg = undefined;
	}
	return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
		? pkg.version
		: '0.0.0';
};

export const version = readVersion();

const indent = '    ';

export const handleCliError = (error: unknown) => {
	if (error instanceof Error && !(error instanceof KnownError)) {
		if (error.stack) {
			console.error(dim(error.stack.split('\n').slice(1).join('\n')));
		}
		console.error(`\n${indent}${dim(`kconfig-probe v${version}`)}`);
		console.error(
			`\n${indent}Please open a bug report with the information above.`
		);
	}
};

export const handleCommandError = (error: unknown) => {
	const message = error instanceof Error ? error.message : String(error);
	outro(`${red('✖')} ${message}`);
	handleCliError(error);
	process.exit(1);
};
