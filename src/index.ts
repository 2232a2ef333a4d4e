import { bootstrap, runBootstrap } from './bootstrap';
import {
	resolveConfig,
	runtimeLayout,
	runtimeProcessNames,
	environmentLayout,
	DEFAULT_DOWNLOAD_HOSTS
} from './config';
import {
	BootstrapError,
	MissingRuntimeError,
	EnvironmentCreationError,
	ActivationError,
	ConfigError,
	BootstrapWarning,
	DependencyInstallWarning,
	CheckerScriptWarning,
	BrowserInstallWarning,
	CommandFailedError
} from './errors';
import {
	BROWSERS_PATH_ENV,
	browserCachePath,
	browserVariants,
	probeBrowser
} from './browser';
import { restart, cleanBytecodeCaches, killRuntimeProcesses } from './restart';
import { ExecaRunner } from './runner';
import { createConsoleOutput } from './output';

export type { RunBootstrapOptions } from './bootstrap';
export type { CommandRunner, CommandResult, RunOptions } from './runner';
export type { Output } from './output';
export type {
	ExitStatus,
	BootstrapOptions,
	BootstrapConfig,
	RuntimeInfo,
	ActiveEnvironment,
	BrowserVariant,
	DetectedBrowser,
	StepName,
	StepResult,
	StepRecord,
	BootstrapReport
} from './types';

export {
	bootstrap,
	runBootstrap,
	restart,
	cleanBytecodeCaches,
	killRuntimeProcesses,
	resolveConfig,
	runtimeLayout,
	runtimeProcessNames,
	environmentLayout,
	DEFAULT_DOWNLOAD_HOSTS,
	BROWSERS_PATH_ENV,
	browserCachePath,
	browserVariants,
	probeBrowser,
	ExecaRunner,
	createConsoleOutput,
	BootstrapError,
	MissingRuntimeError,
	EnvironmentCreationError,
	ActivationError,
	ConfigError,
	BootstrapWarning,
	DependencyInstallWarning,
	CheckerScriptWarning,
	BrowserInstallWarning,
	CommandFailedError
};
