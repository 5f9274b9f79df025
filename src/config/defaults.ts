import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Base directory for capgate data. `CAPGATE_HOME` wins, then
 * `$XDG_DATA_HOME/capgate`, then `~/.capgate`.
 */
export function getCapgateHome(): string {
	const envHome = process.env.CAPGATE_HOME;
	if (envHome) return envHome;

	const xdgData = process.env.XDG_DATA_HOME;
	if (xdgData && process.platform !== 'darwin') {
		return join(xdgData, 'capgate');
	}
	return join(homedir(), '.capgate');
}

export function getDefaultConfigPath(): string {
	return join(getCapgateHome(), 'config.yaml');
}
