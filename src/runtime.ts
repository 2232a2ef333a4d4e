import createDebug from 'debug';
import { pathExists } from 'fs-extra';
import { coerce, lt } from 'semver';
import { runtimeLayout } from './config';
import { MissingRuntimeError } from './errors';
import { CommandRunner } from './runner';
import { BootstrapConfig, RuntimeInfo } from './types';

const debug = createDebug('envboot:runtime');

/**
 * Extracts "3.11.4" out of `python --version` output such as "Python 3.11.4".
 * Older interpreters print the version on stderr.
 */
export function parseRuntimeVersion(output: string): string | null {
	const match = /Python\s+(\d+\.\d+(?:\.\d+)?)/i.exec(output);
	if (!match) {
		return null;
	}
	const version = coerce(match[1]);
	return version ? version.version : null;
}

export async function locateRuntime(
	config: BootstrapConfig,
	runner: CommandRunner
): Promise<RuntimeInfo> {
	const { executable } = runtimeLayout(config);
	debug('Looking for runtime at %o', executable);
	if (!(await pathExists(executable))) {
		throw new MissingRuntimeError(
			`Embedded runtime not found at ${executable}`
		);
	}

	const res = await runner.run(executable, ['--version']);
	if (res.exitCode === null) {
		throw new MissingRuntimeError(
			`Embedded runtime at ${executable} could not be executed`
		);
	}
	const version = parseRuntimeVersion(`${res.stdout}\n${res.stderr}`);
	if (!version) {
		debug('Could not determine runtime version from %o', res.stdout);
	} else if (lt(version, config.minRuntimeVersion)) {
		throw new MissingRuntimeError(
			`Embedded runtime ${version} is older than the required ${config.minRuntimeVersion}`
		);
	} else {
		debug('Found runtime %o at %o', version, executable);
	}
	return { executable, version };
}
