import execa from 'execa';
import createDebug from 'debug';

const debug = createDebug('envboot:runner');

export interface RunOptions {
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	// Attach the child to this process' stdio instead of capturing output
	inherit?: boolean;
	// Milliseconds before the child is killed
	timeout?: number;
}

export interface CommandResult {
	exitCode: number | null; // `null` when the process could not be started
	stdout: string;
	stderr: string;
	failed: boolean;
	timedOut: boolean;
}

export interface CommandRunner {
	run(file: string, args: string[], opts?: RunOptions): Promise<CommandResult>;
}

export function formatCommand(file: string, args: string[]): string {
	return [file, ...args]
		.map(part => (/\s/.test(part) ? JSON.stringify(part) : part))
		.join(' ');
}

export class ExecaRunner implements CommandRunner {
	async run(
		file: string,
		args: string[],
		opts: RunOptions = {}
	): Promise<CommandResult> {
		debug('Exec %o', formatCommand(file, args));
		const result = await execa(file, args, {
			cwd: opts.cwd,
			env: opts.env,
			// The activated environment is complete, so don't let execa merge
			// `process.env` back on top of it
			extendEnv: opts.env === undefined,
			stdio: opts.inherit ? 'inherit' : 'pipe',
			reject: false,
			timeout: opts.timeout,
			windowsHide: false
		});
		const exitCode =
			typeof result.exitCode === 'number' ? result.exitCode : null;
		debug(
			'Process %o exited with code %o',
			formatCommand(file, args),
			exitCode
		);
		return {
			exitCode,
			stdout: result.stdout ?? '',
			stderr: result.stderr ?? '',
			failed: result.failed,
			timedOut: result.timedOut
		};
	}
}

export const defaultRunner: CommandRunner = new ExecaRunner();
