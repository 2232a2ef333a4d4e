import chalk from 'chalk';

/**
 * Operator-facing console messages. Diagnostics go through `debug` instead.
 */
export interface Output {
	info(message: string): void;
	success(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export function createConsoleOutput(): Output {
	return {
		info: message => console.log(message),
		success: message => console.log(chalk.green(message)),
		warn: message => console.warn(chalk.yellow(`Warning: ${message}`)),
		error: message => console.error(chalk.red(`Error: ${message}`))
	};
}
