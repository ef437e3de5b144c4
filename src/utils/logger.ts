import { dim, red } from 'kolorist';

export type Logger = {
	error: (message: string) => void;
	debug: (message: string) => void;
};

export const createLogger = (
	{ verbose = false }: { verbose?: boolean } = {}
): Logger => ({
	error: (message) => {
		console.error(`${red('✖')} ${message}`);
	},
	debug: (message) => {
		if (verbose) {
			console.error(dim(message));
		}
	},
});

export const silentLogger: Logger = {
	error: () => {},
	debug: () => {},
};
