import createDebug from 'debug';
import { posix, win32 } from 'node:path';
import { pathExists, remove } from 'fs-extra';
import { environmentLayout } from './config';
import {
	ActivationError,
	CommandFailedError,
	EnvironmentCreationError
} from './errors';
import { CommandRunner, formatCommand } from './runner';
import { ActiveEnvironment, BootstrapConfig, RuntimeInfo } from './types';

const debug = createDebug('envboot:environment');

export interface EnsureResult {
	created: boolean;
}

export async function ensureEnvironment(
	config: BootstrapConfig,
	runtime: RuntimeInfo,
	runner: CommandRunner
): Promise<EnsureResult> {
	const { dir } = environmentLayout(config);
	if (await pathExists(dir)) {
		debug('Reusing environment at %o', dir);
		return { created: false };
	}

	debug('Creating environment at %o', dir);
	const args = ['-m', 'venv', dir];
	const res = await runner.run(runtime.executable, args, { cwd: config.root });
	if (res.exitCode !== 0) {
		const cause = new CommandFailedError({
			command: formatCommand(runtime.executable, args),
			exitCode: res.exitCode,
			stderr: res.stderr
		});
		// Don't leave a half-built environment behind, otherwise the next run
		// would mistake it for a usable one
		try {
			await remove(dir);
		} catch (err) {
			debug('Cleaning up environment dir failed: %o', err);
		}
		throw new EnvironmentCreationError(
			`Failed to create isolated environment at ${dir}: ${cause.message}`,
			cause
		);
	}
	return { created: true };
}

function pathKey(env: NodeJS.ProcessEnv): string {
	// Windows environments are case-insensitive and usually spell it `Path`
	return Object.keys(env).find(key => key.toUpperCase() === 'PATH') ?? 'PATH';
}

export async function activateEnvironment(
	config: BootstrapConfig,
	baseEnv: NodeJS.ProcessEnv = process.env
): Promise<ActiveEnvironment> {
	const { dir, binDir, interpreter, activationScript } = environmentLayout(
		config
	);
	const [hasScript, hasInterpreter] = await Promise.all([
		pathExists(activationScript),
		pathExists(interpreter)
	]);
	if (!hasScript) {
		throw new ActivationError(
			`Activation script missing at ${activationScript}; delete ${dir} to rebuild the environment`
		);
	}
	if (!hasInterpreter) {
		throw new ActivationError(
			`Environment interpreter missing at ${interpreter}; delete ${dir} to rebuild the environment`
		);
	}

	const delimiter =
		config.platform === 'win32' ? win32.delimiter : posix.delimiter;
	const key = pathKey(baseEnv);
	const currentPath = baseEnv[key];
	const env: NodeJS.ProcessEnv = {
		...baseEnv,
		VIRTUAL_ENV: dir,
		[key]: currentPath ? `${binDir}${delimiter}${currentPath}` : binDir
	};
	delete env.PYTHONHOME;
	debug('Activated environment %o', dir);
	return { interpreter, binDir, env };
}
