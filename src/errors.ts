/**
 * Subclassing `Error` in TypeScript:
 * https://stackoverflow.com/a/41102306/376773
 */

export class BootstrapError extends Error {
	readonly exitCode = 1;

	constructor(message: string, cause?: unknown) {
		super(message);
		Object.setPrototypeOf(this, new.target.prototype);
		Object.defineProperty(this, 'name', { value: new.target.name });
		if (cause !== undefined) {
			this.cause = cause;
		}
	}
}

export class MissingRuntimeError extends BootstrapError {}

export class EnvironmentCreationError extends BootstrapError {}

export class ActivationError extends BootstrapError {}

export class ConfigError extends BootstrapError {}

/**
 * A setup step that did not complete but must not stop the launch.
 */
export class BootstrapWarning extends Error {
	constructor(message: string, cause?: unknown) {
		super(message);
		Object.setPrototypeOf(this, new.target.prototype);
		Object.defineProperty(this, 'name', { value: new.target.name });
		if (cause !== undefined) {
			this.cause = cause;
		}
	}
}

export class DependencyInstallWarning extends BootstrapWarning {}

export class CheckerScriptWarning extends BootstrapWarning {}

export class BrowserInstallWarning extends BootstrapWarning {}

interface CommandFailure {
	command: string;
	exitCode: number | null;
	stderr?: string;
}

const STDERR_TAIL_LINES = 10;

export class CommandFailedError extends Error {
	command: string;
	exitCode: number | null;
	stderr: string;

	constructor({ command, exitCode, stderr = '' }: CommandFailure) {
		super(
			exitCode === null
				? `Command \`${command}\` could not be started`
				: `Command \`${command}\` exited with code ${exitCode}`
		);
		Object.setPrototypeOf(this, new.target.prototype);
		this.name = new.target.name;
		this.command = command;
		this.exitCode = exitCode;
		this.stderr = stderr
			.trimEnd()
			.split('\n')
			.slice(-STDERR_TAIL_LINES)
			.join('\n');
	}
}
