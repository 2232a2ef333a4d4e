import ms from 'ms';
import createDebug from 'debug';
import { coerce } from 'semver';
import { basename, join, resolve } from 'node:path';
import { ConfigError } from './errors';
import { BootstrapConfig, BootstrapOptions } from './types';

const debug = createDebug('envboot:config');

// Mirrors are tried in order; the empty string means the installer's own host
export const DEFAULT_DOWNLOAD_HOSTS = [
	'https://mirrors.cloud.tencent.com/playwright/',
	'https://mirrors.huaweicloud.com/playwright/',
	''
];

const defaults = {
	runtimeDir: 'python',
	envDir: 'venv',
	manifest: 'requirements.txt',
	browserCacheDir: 'browsers',
	browserRevision: '1208',
	checkerScript: 'check_playwright.py',
	entry: 'main.py',
	minRuntimeVersion: '3.8.0',
	gracePeriod: '3s',
	browserInstallRounds: 3,
	browserInstallTimeout: '30m',
	cacheLocations: ['.', 'src']
};

function parseDuration(what: string, value: string | number): number {
	if (typeof value === 'number') {
		if (!Number.isFinite(value) || value < 0) {
			throw new ConfigError(`Invalid ${what}: ${value}`);
		}
		return value;
	}
	if (value.trim() === '') {
		throw new ConfigError(`Invalid ${what}: ""`);
	}
	const parsed: number | undefined = ms(value);
	if (typeof parsed !== 'number' || Number.isNaN(parsed) || parsed < 0) {
		throw new ConfigError(`Invalid ${what}: "${value}"`);
	}
	return parsed;
}

function parseRounds(value: string | number): number {
	const rounds = typeof value === 'number' ? value : Number(value);
	if (!Number.isInteger(rounds) || rounds < 1) {
		throw new ConfigError(`Invalid browser install rounds: "${value}"`);
	}
	return rounds;
}

function parseMinVersion(value: string): string {
	const version = coerce(value);
	if (!version) {
		throw new ConfigError(`Invalid minimum runtime version: "${value}"`);
	}
	return version.version;
}

function parseHosts(value: string): string[] {
	return value.split(',').map(host => host.trim());
}

export function resolveConfig(
	options: BootstrapOptions = {},
	env: NodeJS.ProcessEnv = process.env
): BootstrapConfig {
	const root = resolve(options.root ?? env.ENVBOOT_ROOT ?? process.cwd());
	const fromRoot = (p: string) => resolve(root, p);

	const config: BootstrapConfig = {
		root,
		runtimeDir: fromRoot(
			options.runtimeDir ?? env.ENVBOOT_RUNTIME_DIR ?? defaults.runtimeDir
		),
		envDir: fromRoot(options.envDir ?? env.ENVBOOT_ENV_DIR ?? defaults.envDir),
		manifest: fromRoot(
			options.manifest ?? env.ENVBOOT_MANIFEST ?? defaults.manifest
		),
		browserCacheDir: fromRoot(
			options.browserCacheDir ??
				env.ENVBOOT_BROWSERS_DIR ??
				defaults.browserCacheDir
		),
		browserRevision:
			options.browserRevision ??
			env.ENVBOOT_BROWSER_REVISION ??
			defaults.browserRevision,
		checkerScript: fromRoot(
			options.checkerScript ?? env.ENVBOOT_CHECKER ?? defaults.checkerScript
		),
		entry: fromRoot(options.entry ?? env.ENVBOOT_ENTRY ?? defaults.entry),
		minRuntimeVersion: parseMinVersion(
			options.minRuntimeVersion ??
				env.ENVBOOT_MIN_RUNTIME ??
				defaults.minRuntimeVersion
		),
		indexUrl: options.indexUrl ?? (env.ENVBOOT_INDEX_URL || undefined),
		downloadHosts:
			options.downloadHosts ??
			(env.ENVBOOT_DOWNLOAD_HOSTS
				? parseHosts(env.ENVBOOT_DOWNLOAD_HOSTS)
				: DEFAULT_DOWNLOAD_HOSTS),
		gracePeriodMs: parseDuration(
			'grace period',
			options.gracePeriod ?? env.ENVBOOT_GRACE_PERIOD ?? defaults.gracePeriod
		),
		browserInstallRounds: parseRounds(
			options.browserInstallRounds ??
				env.ENVBOOT_BROWSER_INSTALL_ROUNDS ??
				defaults.browserInstallRounds
		),
		browserInstallTimeoutMs: parseDuration(
			'browser install timeout',
			options.browserInstallTimeout ??
				env.ENVBOOT_BROWSER_INSTALL_TIMEOUT ??
				defaults.browserInstallTimeout
		),
		cacheLocations: (options.cacheLocations ?? defaults.cacheLocations).map(
			fromRoot
		),
		pause: options.pause ?? env.ENVBOOT_NO_PAUSE !== '1',
		platform: options.platform ?? process.platform
	};
	debug('Resolved config %o', config);
	return config;
}

export interface RuntimeLayout {
	executable: string;
}

export interface EnvironmentLayout {
	dir: string;
	binDir: string;
	interpreter: string;
	activationScript: string;
}

export function runtimeLayout({
	runtimeDir,
	platform
}: BootstrapConfig): RuntimeLayout {
	// Embedded Windows distributions keep the interpreter at the top level
	const executable =
		platform === 'win32'
			? join(runtimeDir, 'python.exe')
			: join(runtimeDir, 'bin', 'python3');
	return { executable };
}

export function runtimeExecutableName(config: BootstrapConfig): string {
	return basename(runtimeLayout(config).executable);
}

/**
 * Executable names a running application can show up under: the embedded
 * runtime and the environment interpreter it is launched through.
 */
export function runtimeProcessNames(config: BootstrapConfig): string[] {
	const names = [
		runtimeExecutableName(config),
		basename(environmentLayout(config).interpreter)
	];
	return names.filter((name, i) => names.indexOf(name) === i);
}

export function environmentLayout({
	envDir,
	platform
}: BootstrapConfig): EnvironmentLayout {
	const isWin = platform === 'win32';
	const binDir = join(envDir, isWin ? 'Scripts' : 'bin');
	return {
		dir: envDir,
		binDir,
		interpreter: join(binDir, isWin ? 'python.exe' : 'python'),
		activationScript: join(binDir, isWin ? 'activate.bat' : 'activate')
	};
}
