import createDebug from 'debug';
import { createInterface } from 'node:readline';
import { Output } from './output';
import { CommandRunner } from './runner';
import { ActiveEnvironment, BootstrapConfig } from './types';

const debug = createDebug('envboot:launch');

/**
 * Runs the application in the foreground and resolves with its exit code,
 * or `null` if it could not be started. Arguments are passed through as-is.
 */
export async function launchApplication(
	config: BootstrapConfig,
	active: ActiveEnvironment,
	args: string[],
	runner: CommandRunner
): Promise<number | null> {
	debug('Launching %o with args %o', config.entry, args);
	const res = await runner.run(active.interpreter, [config.entry, ...args], {
		cwd: config.root,
		env: active.env,
		inherit: true
	});
	return res.exitCode;
}

export function reportOutcome(code: number | null, output: Output): void {
	if (code === 0) {
		output.success('Application exited normally.');
	} else if (code === null) {
		output.error(
			'Application could not be started. Check the messages above for the cause.'
		);
	} else {
		output.error(
			`Application exited with code ${code}. Check the messages above for the cause.`
		);
	}
}

export function waitForAcknowledgment(
	input: NodeJS.ReadableStream,
	output: Output
): Promise<void> {
	output.info('Press Enter to exit...');
	return new Promise(resolve => {
		const rl = createInterface({ input, terminal: false });
		const done = () => {
			rl.close();
			resolve();
		};
		rl.once('line', done);
		rl.once('close', resolve);
	});
}
