import path from 'path';
import os from 'os';

const APP_NAME = 'kconfig-probe';

function xdgConfigHome(): string {
	const env = process.env.XDG_CONFIG_HOME;
	if (env && path.isAbsolute(env)) return env;
	return path.join(os.homedir(), '.config');
}

/** Directory for user-level settings: $XDG_CONFIG_HOME/kconfig-probe */
export function getConfigDir(): string {
	return path.join(xdgConfigHome(), APP_NAME);
}

/** User-level settings file: $XDG_CONFIG_HOME/kconfig-probe/config */
export function getConfigFilePath(): string {
	return path.join(getConfigDir(), 'config');
}

/**
 * Resolve the effective settings file path.
 * Priority: $KCONFIG_PROBE_CONFIG > XDG path
 */
export function resolveConfigPath(): string {
	const envOverride = process.env.KCONFIG_PROBE_CONFIG;
	if (envOverride && path.isAbsolute(envOverride)) {
		return envOverride;
	}

	return getConfigFilePath();
}
