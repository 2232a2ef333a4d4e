import type { BootstrapError, BootstrapWarning } from './errors';

export type ExitStatus = 0 | 1;

export interface BootstrapOptions {
	root?: string;
	runtimeDir?: string; // directory of the embedded runtime, relative to `root`
	envDir?: string; // isolated environment directory, relative to `root`
	manifest?: string; // dependency manifest, relative to `root`
	browserCacheDir?: string;
	browserRevision?: string; // e.g. "1208" for `chromium-1208`
	checkerScript?: string;
	entry?: string; // application entry point, relative to `root`
	minRuntimeVersion?: string;
	indexUrl?: string; // package index passed to the installer
	downloadHosts?: string[]; // browser download mirrors, `""` means the default host
	gracePeriod?: string | number; // `ms` string or milliseconds
	browserInstallRounds?: number | string; // passes over `downloadHosts`
	browserInstallTimeout?: string | number; // per attempt, `ms` string or milliseconds
	cacheLocations?: string[];
	pause?: boolean;
	platform?: NodeJS.Platform;
}

export interface BootstrapConfig {
	root: string;
	runtimeDir: string;
	envDir: string;
	manifest: string;
	browserCacheDir: string;
	browserRevision: string;
	checkerScript: string;
	entry: string;
	minRuntimeVersion: string;
	indexUrl?: string;
	downloadHosts: string[];
	gracePeriodMs: number;
	browserInstallRounds: number;
	browserInstallTimeoutMs: number;
	cacheLocations: string[];
	pause: boolean;
	platform: NodeJS.Platform;
}

export interface RuntimeInfo {
	executable: string;
	version: string | null;
}

export interface ActiveEnvironment {
	interpreter: string;
	binDir: string;
	env: NodeJS.ProcessEnv;
}

export interface BrowserVariant {
	name: string;
	path: string; // relative to the browser cache path
}

export interface DetectedBrowser extends BrowserVariant {
	executable: string;
}

export type StepName =
	| 'runtime'
	| 'environment'
	| 'activate'
	| 'dependencies'
	| 'browser-path'
	| 'browser-probe'
	| 'checker'
	| 'launch'
	| 'report';

export type StepResult =
	| { status: 'ok'; detail?: string }
	| { status: 'skipped'; reason: string }
	| { status: 'warning'; warning: BootstrapWarning }
	| { status: 'fatal'; error: BootstrapError };

export type StepRecord = StepResult & { step: StepName };

export interface BootstrapReport {
	status: ExitStatus;
	steps: StepRecord[];
	browser: DetectedBrowser | null;
	applicationExitCode?: number | null;
}
