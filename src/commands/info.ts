import { command } from 'cleye';
import { bold, dim, green, red } from 'kolorist';
import { intro, note, outro } from '@clack/prompts';
import { handleCommandError } from '../utils/error.js';
import { getConfigFilePath } from '../utils/kernel-config.js';
import { createSession } from '../utils/session.js';
import { kernelFlags } from './flags.js';

export default command(
	{
		name: 'info',
		description: 'Summarize the kernel configuration in a directory',
		flags: kernelFlags,
	},
	(argv) => {
		(async () => {
			intro(bold('kconfig-probe info'));

			const { kernelDir, store } = await createSession(argv.flags);
			const mapping = store.getMapping(kernelDir);
			const values = [...mapping.values()];
			const arch = store.inferArchitecture(kernelDir);

			note(
				[
					`Kernel directory: ${kernelDir}`,
					`Config file:      ${getConfigFilePath(kernelDir)}`,
					`Options:          ${mapping.size}`,
					`Built in (=y):    ${values.filter((value) => value === 'y').length}`,
					`Modules (=m):     ${values.filter((value) => value === 'm').length}`,
					`Architecture:     ${arch ?? dim('unknown')}`,
				].join('\n'),
				'Kernel config'
			);

			outro(arch ? `${green('✔')} Done` : `${red('✖')} Architecture could not be determined`);
		})().catch(handleCommandError);
	}
);
