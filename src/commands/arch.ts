import { command } from 'cleye';
import { handleCommandError } from '../utils/error.js';
import { createSession } from '../utils/session.js';
import { kernelFlags } from './flags.js';

export default command(
	{
		name: 'arch',
		description: 'Print the CPU architecture the kernel is configured for',
		help: {
			description: `Print the CPU architecture the kernel is configured for

The architecture is the arch/<name> directory whose CONFIG_<NAME> option
is enabled. Out-of-tree build directories are followed through their
"source" link. Legacy names (um, i386, x86_64, powerpc, sh) are used when
no directory matches.`,
		},
		flags: kernelFlags,
	},
	(argv) => {
		(async () => {
			const { kernelDir, store } = await createSession(argv.flags);
			const arch = store.inferArchitecture(kernelDir);

			// The store has already logged why
			if (arch === undefined) {
				process.exit(1);
			}

			console.log(arch);
		})().catch(handleCommandError);
	}
);
