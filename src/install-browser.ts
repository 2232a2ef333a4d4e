import createDebug from 'debug';
import { BROWSERS_PATH_ENV } from './browser';
import { BrowserInstallWarning, CommandFailedError } from './errors';
import { CommandRunner, formatCommand } from './runner';
import { ActiveEnvironment } from './types';

const debug = createDebug('envboot:install-browser');

export const DOWNLOAD_HOST_ENV = 'PLAYWRIGHT_DOWNLOAD_HOST';

export type InstallFailureKind = 'connection-reset' | 'timeout' | 'unknown';

export function classifyInstallFailure(
	stderr: string,
	timedOut = false
): InstallFailureKind {
	if (timedOut) {
		return 'timeout';
	}
	if (stderr.includes('ECONNRESET')) {
		return 'connection-reset';
	}
	if (/timed? ?out/i.test(stderr)) {
		return 'timeout';
	}
	return 'unknown';
}

export function generateInstallEnv(
	base: NodeJS.ProcessEnv,
	cachePath: string,
	host: string
): NodeJS.ProcessEnv {
	const env: NodeJS.ProcessEnv = { ...base, [BROWSERS_PATH_ENV]: cachePath };
	if (host) {
		env[DOWNLOAD_HOST_ENV] = host;
	} else {
		delete env[DOWNLOAD_HOST_ENV];
	}
	return env;
}

function describeHost(host: string): string {
	return host || 'default host';
}

export interface InstallBrowserOptions {
	hosts: string[];
	// Passes over `hosts` before giving up
	rounds?: number;
	// Per attempt; a stalled download is killed after this many milliseconds
	timeoutMs?: number;
}

/**
 * Downloads the browser into `cachePath`, trying each download host in turn
 * for up to `rounds` passes. Resolves with the host that worked.
 */
export async function installBrowser(
	active: ActiveEnvironment,
	cachePath: string,
	{ hosts, rounds = 1, timeoutMs }: InstallBrowserOptions,
	runner: CommandRunner
): Promise<string> {
	const args = ['-m', 'playwright', 'install', 'chromium'];
	let failures: string[] = [];
	for (let round = 1; round <= rounds; round++) {
		failures = [];
		for (const host of hosts) {
			debug(
				'Installing browser from %o into %o (round %o of %o)',
				describeHost(host),
				cachePath,
				round,
				rounds
			);
			const res = await runner.run(active.interpreter, args, {
				env: generateInstallEnv(active.env, cachePath, host),
				timeout: timeoutMs
			});
			if (res.exitCode === 0) {
				return host;
			}
			const cause = new CommandFailedError({
				command: formatCommand(active.interpreter, args),
				exitCode: res.exitCode,
				stderr: res.stderr
			});
			const kind = classifyInstallFailure(res.stderr, res.timedOut);
			debug(
				'Install from %o failed (%s): %s',
				describeHost(host),
				kind,
				cause.stderr
			);
			failures.push(`${describeHost(host)}: ${kind}`);
		}
	}
	throw new BrowserInstallWarning(
		`Browser installation failed after ${rounds} ${
			rounds === 1 ? 'round' : 'rounds'
		} (${failures.join(', ')}). ` +
			`Browser automation will be unavailable; install it manually with ` +
			`\`${formatCommand(active.interpreter, args)}\``
	);
}
