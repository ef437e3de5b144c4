import { command } from 'cleye';
import { dim } from 'kolorist';
import { handleCommandError } from '../utils/error.js';
import { createSession } from '../utils/session.js';
import { kernelFlags } from './flags.js';

export default command(
	{
		name: 'get',
		description: 'Print the value of kernel config options',
		help: {
			description: `Print the value of kernel config options

Examples:
  kconfig-probe get CONFIG_SMP                 Print CONFIG_SMP=<value>
  kconfig-probe get -k ../build CONFIG_HZ      Read .config from ../build`,
		},
		parameters: ['<options...>'],
		flags: kernelFlags,
	},
	(argv) => {
		(async () => {
			const { kernelDir, store } = await createSession(argv.flags);

			for (const option of argv._.options) {
				const value = store.getValue(kernelDir, option);
				console.log(
					value === undefined
						? dim(`# ${option} is not set`)
						: `${option}=${value}`
				);
			}
		})().catch(handleCommandError);
	}
);
