import { command } from 'cleye';
import { red } from 'kolorist';
import { hasOwn, getConfig, setConfigs } from '../utils/config.js';
import { KnownError, handleCliError } from '../utils/error.js';
import { resolveConfigPath } from '../utils/paths.js';

export default command(
	{
		name: 'config',
		description: 'View or modify kconfig-probe settings',
		help: {
			description: `View or modify kconfig-probe settings

Settings:
  kdir=<absolute path>    Default kernel directory
  verbose=<true|false>    Print debug diagnostics`,
		},
		parameters: ['[mode]', '[key=value...]'],
	},
	(argv) => {
		(async () => {
			const [mode, ...keyValues] = argv._;

			if (!mode) {
				const config = await getConfig({}, true);

				console.log('Settings file:', resolveConfigPath());
				console.log('kdir:', config.kdir ?? '(not set)');
				console.log('verbose:', config.verbose);
				return;
			}

			if (mode === 'get') {
				const config = await getConfig({}, true);
				const values: Record<string, string> = {
					kdir: config.kdir ?? '',
					verbose: String(config.verbose),
				};
				for (const key of keyValues) {
					if (hasOwn(values, key)) {
						console.log(`${key}=${values[key]}`);
					}
				}
				return;
			}

			if (mode === 'set') {
				await setConfigs(
					keyValues.map((keyValue): [string, string] => {
						const separator = keyValue.indexOf('=');
						if (separator === -1) {
							throw new KnownError(`Invalid setting: ${keyValue} (expected key=value)`);
						}
						return [keyValue.slice(0, separator), keyValue.slice(separator + 1)];
					})
				);
				return;
			}

			throw new KnownError(`Invalid mode: ${mode}`);
		})().catch((error: unknown) => {
			console.error(`${red('✖')} ${error instanceof Error ? error.message : String(error)}`);
			handleCliError(error);
			process.exit(1);
		});
	}
);
