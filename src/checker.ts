import createDebug from 'debug';
import { pathExists } from 'fs-extra';
import { CheckerScriptWarning, CommandFailedError } from './errors';
import { CommandRunner, formatCommand } from './runner';
import { ActiveEnvironment, BootstrapConfig } from './types';

const debug = createDebug('envboot:checker');

export type CheckerResult = 'passed' | 'missing';

export async function runChecker(
	config: BootstrapConfig,
	active: ActiveEnvironment,
	runner: CommandRunner
): Promise<CheckerResult> {
	if (!(await pathExists(config.checkerScript))) {
		debug('No checker script at %o', config.checkerScript);
		return 'missing';
	}

	const args = [config.checkerScript];
	const res = await runner.run(active.interpreter, args, {
		cwd: config.root,
		env: active.env,
		inherit: true
	});
	if (res.exitCode !== 0) {
		const cause = new CommandFailedError({
			command: formatCommand(active.interpreter, args),
			exitCode: res.exitCode,
			stderr: res.stderr
		});
		throw new CheckerScriptWarning(
			`Dependency check did not pass (${cause.message}); browser automation may be unavailable`,
			cause
		);
	}
	return 'passed';
}
