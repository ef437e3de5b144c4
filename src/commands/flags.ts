export const kernelFlags = {
	kdir: {
		type: String,
		description:
			'Kernel build directory containing .config (default: $KDIR, the kdir setting, or the current directory)',
		alias: 'k',
	},
	verbose: {
		type: Boolean,
		description: 'Print debug diagnostics to stderr (default: false)',
		default: false,
	},
};
