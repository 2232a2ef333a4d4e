#!/usr/bin/env node
import { Command } from 'commander';
import { RunBootstrapOptions, bootstrap } from './bootstrap';
import { browserCachePath, browserVariants, probeBrowser } from './browser';
import { resolveConfig } from './config';
import { BootstrapError } from './errors';
import { createConsoleOutput } from './output';
import { restart } from './restart';
import { BootstrapOptions } from './types';

interface PathOptions {
	root?: string;
	entry?: string;
	envDir?: string;
	runtimeDir?: string;
	manifest?: string;
	pause?: boolean;
}

interface StartOptions extends PathOptions {
	forceInstall?: boolean;
}

interface RestartOptions extends PathOptions {
	grace?: string;
}

function toBootstrapOptions(
	base: BootstrapOptions,
	opts: PathOptions
): BootstrapOptions {
	return {
		...base,
		root: opts.root ?? base.root,
		entry: opts.entry ?? base.entry,
		envDir: opts.envDir ?? base.envDir,
		runtimeDir: opts.runtimeDir ?? base.runtimeDir,
		manifest: opts.manifest ?? base.manifest,
		// `--no-pause` defaults to `true`, which must not hide ENVBOOT_NO_PAUSE
		pause: opts.pause === false ? false : base.pause
	};
}

function withPathOptions(command: Command): Command {
	return command
		.option('--root <dir>', 'project root (defaults to cwd)')
		.option('--entry <file>', 'application entry point')
		.option('--env-dir <dir>', 'isolated environment directory')
		.option('--runtime-dir <dir>', 'embedded runtime directory')
		.option('--manifest <file>', 'dependency manifest');
}

// `config` holds defaults that command-line flags override
export type ProgramOptions = Pick<
	RunBootstrapOptions,
	'config' | 'runner' | 'output' | 'env' | 'interactive'
>;

export function createProgram(deps: ProgramOptions = {}): Command {
	const base = deps.config ?? {};
	const program = new Command();
	program
		.name('envboot')
		.description(
			'Provision an isolated environment and launch the application in it'
		)
		.enablePositionalOptions();

	withPathOptions(program.command('start', { isDefault: true }))
		.description('bootstrap the environment and launch the application')
		.argument('[args...]', 'arguments forwarded to the application')
		.option('--no-pause', 'exit without waiting for Enter')
		.option('--force-install', 'reinstall dependencies even if unchanged')
		.passThroughOptions()
		.allowUnknownOption()
		.action(async (args: string[], opts: StartOptions) => {
			process.exitCode = await bootstrap(args, {
				...deps,
				config: toBootstrapOptions(base, opts),
				force: opts.forceInstall
			});
		});

	withPathOptions(program.command('restart'))
		.description(
			'stop running runtime processes, clear bytecode caches and start again'
		)
		.option('--grace <duration>', 'wait after stopping processes (default 3s)')
		.option('--no-pause', 'exit without waiting for Enter')
		.action(async (opts: RestartOptions) => {
			process.exitCode = await restart({
				...deps,
				config: {
					...toBootstrapOptions(base, opts),
					gracePeriod: opts.grace ?? base.gracePeriod
				}
			});
		});

	withPathOptions(program.command('probe'))
		.description('show where the browser is looked for and what was found')
		.action(async (opts: PathOptions) => {
			const output = deps.output ?? createConsoleOutput();
			try {
				const config = resolveConfig(
					toBootstrapOptions(base, opts),
					deps.env
				);
				const cachePath = browserCachePath(config);
				output.info(`Browser cache path: ${cachePath}`);
				const found = await probeBrowser(
					cachePath,
					browserVariants(config.browserRevision, config.platform)
				);
				if (found) {
					output.success(`Found ${found.name} at ${found.executable}`);
				} else {
					output.info('No pre-installed browser found');
				}
			} catch (err: unknown) {
				if (!(err instanceof BootstrapError)) {
					throw err;
				}
				output.error(err.message);
				process.exitCode = err.exitCode;
			}
		});

	return program;
}

if (require.main === module) {
	createProgram()
		.parseAsync(process.argv)
		.catch((err: unknown) => {
			console.error(err);
			process.exitCode = 1;
		});
}
