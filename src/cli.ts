#!/usr/bin/env node
import { cli } from 'cleye';
import { version } from './utils/error.js';
import getCommand from './commands/get.js';
import enabledCommand from './commands/enabled.js';
import archCommand from './commands/arch.js';
import listCommand from './commands/list.js';
import infoCommand from './commands/info.js';
import configCommand from './commands/config.js';

cli(
	{
		name: 'kconfig-probe',
		version,

		commands: [
			getCommand,
			enabledCommand,
			archCommand,
			listCommand,
			infoCommand,
			configCommand,
		],

		help: {
			description: 'Query Linux kernel build configurations (.config)',
		},
	},
	(argv) => {
		argv.showHelp();
	}
);
