import { command } from 'cleye';
import { handleCommandError } from '../utils/error.js';
import { createSession } from '../utils/session.js';
import { kernelFlags } from './flags.js';

export default command(
	{
		name: 'list',
		description: 'Print every option parsed from .config',
		flags: {
			...kernelFlags,
			enabled: {
				type: Boolean,
				description: 'Only options that are built in (=y)',
				alias: 'e',
				default: false,
			},
			prefix: {
				type: String,
				description: 'Only options whose name starts with this prefix',
				alias: 'p',
			},
		},
	},
	(argv) => {
		(async () => {
			const { kernelDir, store } = await createSession(argv.flags);
			const { enabled, prefix } = argv.flags;

			for (const [option, value] of store.getMapping(kernelDir)) {
				if (enabled && value !== 'y') continue;
				if (prefix && !option.startsWith(prefix)) continue;

				console.log(`${option}=${value}`);
			}
		})().catch(handleCommandError);
	}
);
