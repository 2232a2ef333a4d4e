import createDebug from 'debug';
import { join } from 'node:path';
import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { remove } from 'fs-extra';
import { RunBootstrapOptions, bootstrap } from './bootstrap';
import { resolveConfig, runtimeProcessNames } from './config';
import { BootstrapError } from './errors';
import { createConsoleOutput } from './output';
import { CommandRunner, defaultRunner } from './runner';
import { BootstrapConfig, ExitStatus } from './types';

const debug = createDebug('envboot:restart');

const CACHE_DIR_NAME = '__pycache__';
const SKIPPED_DIR_NAMES = new Set(['node_modules', '.git']);

/**
 * Stops every process running the runtime or the environment interpreter so
 * that stale file locks and bytecode are released. Having nothing to kill is
 * fine.
 */
export async function killRuntimeProcesses(
	config: BootstrapConfig,
	runner: CommandRunner
): Promise<void> {
	for (const name of runtimeProcessNames(config)) {
		const res =
			config.platform === 'win32'
				? await runner.run('taskkill', ['/F', '/T', '/IM', name])
				: await runner.run('pkill', ['-x', name]);
		debug('Killing %o processes exited with code %o', name, res.exitCode);
	}
}

async function collectCaches(
	dir: string,
	skip: Set<string>,
	found: Set<string>
): Promise<void> {
	let entries: Dirent[];
	try {
		entries = await readdir(dir, { withFileTypes: true });
	} catch (err: unknown) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
			debug('Cache location %o does not exist', dir);
			return;
		}
		throw err;
	}
	for (const entry of entries) {
		const p = join(dir, entry.name);
		if (entry.isDirectory()) {
			if (skip.has(p) || SKIPPED_DIR_NAMES.has(entry.name)) {
				continue;
			}
			if (entry.name === CACHE_DIR_NAME) {
				found.add(p);
			} else {
				await collectCaches(p, skip, found);
			}
		} else if (entry.isFile() && entry.name.endsWith('.pyc')) {
			found.add(p);
		}
	}
}

/**
 * Deletes compiled-bytecode caches below each cache location and returns
 * the removed paths.
 */
export async function cleanBytecodeCaches(
	config: BootstrapConfig
): Promise<string[]> {
	// The environment and runtime keep their own caches, which stay valid
	const skip = new Set([
		config.envDir,
		config.runtimeDir,
		config.browserCacheDir
	]);
	const found = new Set<string>();
	for (const location of config.cacheLocations) {
		await collectCaches(location, skip, found);
	}
	const removed = Array.from(found).sort();
	for (const p of removed) {
		debug('Removing %o', p);
		await remove(p);
	}
	return removed;
}

export async function restart(
	options: RunBootstrapOptions = {}
): Promise<ExitStatus> {
	const output = options.output ?? createConsoleOutput();
	const runner = options.runner ?? defaultRunner;

	let config: BootstrapConfig;
	try {
		config = resolveConfig(options.config, options.env ?? process.env);
	} catch (err: unknown) {
		if (err instanceof BootstrapError) {
			output.error(err.message);
			return 1;
		}
		throw err;
	}

	output.info(
		`Stopping running ${runtimeProcessNames(config).join(', ')} processes...`
	);
	await killRuntimeProcesses(config, runner);
	await sleep(config.gracePeriodMs);

	const removed = await cleanBytecodeCaches(config);
	output.info(`Removed ${removed.length} bytecode cache entries`);

	return bootstrap([], { ...options, output, runner });
}
