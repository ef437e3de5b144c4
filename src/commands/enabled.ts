import { command } from 'cleye';
import { green, red } from 'kolorist';
import { handleCommandError } from '../utils/error.js';
import { createSession } from '../utils/session.js';
import { kernelFlags } from './flags.js';

export default command(
	{
		name: 'enabled',
		description: 'Exit with 0 if a kernel config option is built in (=y), 1 otherwise',
		parameters: ['<option>'],
		flags: {
			...kernelFlags,
			quiet: {
				type: Boolean,
				description: 'Only set the exit code',
				alias: 'q',
				default: false,
			},
		},
	},
	(argv) => {
		(async () => {
			const { kernelDir, store } = await createSession(argv.flags);
			const { option } = argv._;
			const enabled = store.isEnabled(kernelDir, option);

			if (!argv.flags.quiet) {
				console.log(
					enabled
						? `${green('✓')} ${option} is enabled`
						: `${red('✗')} ${option} is not enabled`
				);
			}

			if (!enabled) {
				process.exit(1);
			}
		})().catch(handleCommandError);
	}
);
