import createDebug from 'debug';
import {
	BROWSERS_PATH_ENV,
	browserCachePath,
	browserVariants,
	probeBrowser
} from './browser';
import { runChecker } from './checker';
import { resolveConfig } from './config';
import { installDependencies } from './dependencies';
import { activateEnvironment, ensureEnvironment } from './environment';
import {
	ActivationError,
	BootstrapError,
	BootstrapWarning,
	BrowserInstallWarning,
	CheckerScriptWarning,
	DependencyInstallWarning,
	EnvironmentCreationError,
	MissingRuntimeError
} from './errors';
import { installBrowser } from './install-browser';
import {
	launchApplication,
	reportOutcome,
	waitForAcknowledgment
} from './launch';
import { Output, createConsoleOutput } from './output';
import { CommandRunner, defaultRunner } from './runner';
import { locateRuntime } from './runtime';
import {
	ActiveEnvironment,
	BootstrapConfig,
	BootstrapOptions,
	BootstrapReport,
	DetectedBrowser,
	ExitStatus,
	RuntimeInfo,
	StepName,
	StepRecord,
	StepResult
} from './types';

const debug = createDebug('envboot:bootstrap');

export interface RunBootstrapOptions {
	config?: BootstrapOptions;
	runner?: CommandRunner;
	output?: Output;
	env?: NodeJS.ProcessEnv;
	input?: NodeJS.ReadableStream;
	// Whether an operator is present to acknowledge the outcome. Defaults to
	// whether stdin is a terminal.
	interactive?: boolean;
	// Reinstall dependencies even when the manifest is unchanged
	force?: boolean;
}

interface BootstrapContext {
	config: BootstrapConfig;
	args: string[];
	runner: CommandRunner;
	output: Output;
	baseEnv: NodeJS.ProcessEnv;
	force: boolean;
	acknowledge: () => Promise<void>;
	runtime?: RuntimeInfo;
	active?: ActiveEnvironment;
	cachePath?: string;
	browser: DetectedBrowser | null;
	applicationExitCode?: number | null;
}

type Step = (ctx: BootstrapContext) => Promise<StepResult>;

type ErrorClass<E> = new (message: string, cause?: unknown) => E;

function messageOf(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

function fatal(
	err: unknown,
	Class: ErrorClass<BootstrapError>,
	context: string
): StepResult {
	const error =
		err instanceof BootstrapError
			? err
			: new Class(`${context}: ${messageOf(err)}`, err);
	return { status: 'fatal', error };
}

function warning(
	err: unknown,
	Class: ErrorClass<BootstrapWarning>,
	context: string
): StepResult {
	const w =
		err instanceof BootstrapWarning
			? err
			: new Class(`${context}: ${messageOf(err)}`, err);
	return { status: 'warning', warning: w };
}

function need<T>(value: T | undefined, what: string): T {
	if (value === undefined) {
		throw new Error(`Bootstrap step ran before ${what} was resolved`);
	}
	return value;
}

const locateRuntimeStep: Step = async ctx => {
	try {
		ctx.runtime = await locateRuntime(ctx.config, ctx.runner);
		return { status: 'ok', detail: ctx.runtime.version ?? 'unknown version' };
	} catch (err: unknown) {
		return fatal(err, MissingRuntimeError, 'Unable to locate runtime');
	}
};

const environmentStep: Step = async ctx => {
	try {
		const { created } = await ensureEnvironment(
			ctx.config,
			need(ctx.runtime, 'the runtime'),
			ctx.runner
		);
		if (created) {
			ctx.output.info(`Created isolated environment at ${ctx.config.envDir}`);
		}
		return { status: 'ok', detail: created ? 'created' : 'reused' };
	} catch (err: unknown) {
		return fatal(
			err,
			EnvironmentCreationError,
			'Unable to create isolated environment'
		);
	}
};

const activateStep: Step = async ctx => {
	try {
		ctx.active = await activateEnvironment(ctx.config, ctx.baseEnv);
		return { status: 'ok' };
	} catch (err: unknown) {
		return fatal(err, ActivationError, 'Unable to activate environment');
	}
};

const dependenciesStep: Step = async ctx => {
	try {
		const result = await installDependencies(
			ctx.config,
			need(ctx.active, 'the environment'),
			ctx.runner,
			{ force: ctx.force }
		);
		if (result.status === 'skipped') {
			return { status: 'skipped', reason: result.reason };
		}
		return { status: 'ok', detail: `${result.packages.length} packages` };
	} catch (err: unknown) {
		return warning(
			err,
			DependencyInstallWarning,
			'Dependency installation failed'
		);
	}
};

const browserPathStep: Step = async ctx => {
	const active = need(ctx.active, 'the environment');
	const cachePath = browserCachePath(ctx.config);
	ctx.cachePath = cachePath;
	// Every child from here on sees the same browser location
	ctx.active = {
		...active,
		env: { ...active.env, [BROWSERS_PATH_ENV]: cachePath }
	};
	return { status: 'ok', detail: cachePath };
};

const browserProbeStep: Step = async ctx => {
	const { browserRevision, platform } = ctx.config;
	ctx.browser = await probeBrowser(
		need(ctx.cachePath, 'the browser cache path'),
		browserVariants(browserRevision, platform)
	);
	if (ctx.browser) {
		ctx.output.info(`Found pre-installed browser: ${ctx.browser.name}`);
		return { status: 'ok', detail: ctx.browser.name };
	}
	ctx.output.info('No pre-installed browser found');
	return { status: 'ok', detail: 'none found' };
};

const checkerStep: Step = async ctx => {
	const active = need(ctx.active, 'the environment');
	try {
		const result = await runChecker(ctx.config, active, ctx.runner);
		if (result === 'passed') {
			return { status: 'ok' };
		}
	} catch (err: unknown) {
		return warning(err, CheckerScriptWarning, 'Dependency check failed');
	}

	if (ctx.browser) {
		return { status: 'skipped', reason: 'no checker script' };
	}
	try {
		ctx.output.info('Installing browser, this may take a while...');
		const host = await installBrowser(
			active,
			need(ctx.cachePath, 'the browser cache path'),
			{
				hosts: ctx.config.downloadHosts,
				rounds: ctx.config.browserInstallRounds,
				timeoutMs: ctx.config.browserInstallTimeoutMs
			},
			ctx.runner
		);
		return {
			status: 'ok',
			detail: `browser installed from ${host || 'default host'}`
		};
	} catch (err: unknown) {
		return warning(err, BrowserInstallWarning, 'Browser installation failed');
	}
};

const launchStep: Step = async ctx => {
	ctx.output.info('Starting application...');
	ctx.applicationExitCode = await launchApplication(
		ctx.config,
		need(ctx.active, 'the environment'),
		ctx.args,
		ctx.runner
	);
	return { status: 'ok', detail: `exit code ${ctx.applicationExitCode}` };
};

const reportStep: Step = async ctx => {
	reportOutcome(need(ctx.applicationExitCode, 'the exit code'), ctx.output);
	await ctx.acknowledge();
	return { status: 'ok' };
};

const steps: [StepName, Step][] = [
	['runtime', locateRuntimeStep],
	['environment', environmentStep],
	['activate', activateStep],
	['dependencies', dependenciesStep],
	['browser-path', browserPathStep],
	['browser-probe', browserProbeStep],
	['checker', checkerStep],
	['launch', launchStep],
	['report', reportStep]
];

export async function runBootstrap(
	args: string[],
	options: RunBootstrapOptions = {}
): Promise<BootstrapReport> {
	const output = options.output ?? createConsoleOutput();
	const baseEnv = options.env ?? process.env;
	const records: StepRecord[] = [];

	let config: BootstrapConfig;
	try {
		config = resolveConfig(options.config, baseEnv);
	} catch (err: unknown) {
		if (err instanceof BootstrapError) {
			output.error(err.message);
			return { status: 1, steps: records, browser: null };
		}
		throw err;
	}

	const interactive = options.interactive ?? Boolean(process.stdin.isTTY);
	const input = options.input ?? process.stdin;
	const ctx: BootstrapContext = {
		config,
		args,
		runner: options.runner ?? defaultRunner,
		output,
		baseEnv,
		force: options.force ?? false,
		acknowledge: () =>
			config.pause && interactive
				? waitForAcknowledgment(input, output)
				: Promise.resolve(),
		browser: null
	};

	for (const [name, step] of steps) {
		debug('Running step %o', name);
		const result = await step(ctx);
		records.push({ step: name, ...result });
		if (result.status === 'fatal') {
			output.error(result.error.message);
			debug('Step %o failed, aborting', name);
			return { status: 1, steps: records, browser: ctx.browser };
		}
		if (result.status === 'warning') {
			output.warn(result.warning.message);
		}
	}

	return {
		status: 0,
		steps: records,
		browser: ctx.browser,
		applicationExitCode: ctx.applicationExitCode
	};
}

export async function bootstrap(
	args: string[],
	options?: RunBootstrapOptions
): Promise<ExitStatus> {
	const report = await runBootstrap(args, options);
	return report.status;
}
