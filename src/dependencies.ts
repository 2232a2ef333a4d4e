import createDebug from 'debug';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import { remove } from 'fs-extra';
import { CommandFailedError, DependencyInstallWarning } from './errors';
import { CommandRunner, formatCommand } from './runner';
import { ActiveEnvironment, BootstrapConfig } from './types';

const debug = createDebug('envboot:dependencies');

export const MANIFEST_STAMP = '.requirements-sha';

export type InstallResult =
	| { status: 'installed'; packages: string[] }
	| {
			status: 'skipped';
			reason: 'no-manifest' | 'empty-manifest' | 'up-to-date';
	  };

export interface InstallOptions {
	force?: boolean;
}

async function readOptional(
	f: string,
	encoding: 'utf8' | 'ascii'
): Promise<string | null> {
	try {
		return await readFile(f, encoding);
	} catch (err: unknown) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
			return null;
		}
		throw err;
	}
}

export function parseManifest(contents: string): string[] {
	return contents
		.split(/\r?\n/)
		.map(line => line.replace(/(^|\s)#.*$/, '').trim())
		.filter(line => line.length > 0 && !line.startsWith('-'));
}

/**
 * Returns the requirement lines of the manifest at `f`, or `null` if the
 * file does not exist.
 */
export async function readManifest(f: string): Promise<string[] | null> {
	const contents = await readOptional(f, 'utf8');
	return contents === null ? null : parseManifest(contents);
}

/**
 * Fingerprint of an install: the manifest text and the package index it is
 * resolved against. Files pulled in with `-r` are not followed.
 */
export function manifestSha(
	contents: string | Buffer,
	indexUrl?: string
): string {
	const hash = createHash('sha256').update(contents);
	if (indexUrl) {
		hash.update(`\n--index-url ${indexUrl}`);
	}
	return hash.digest('hex');
}

export async function installDependencies(
	config: BootstrapConfig,
	active: ActiveEnvironment,
	runner: CommandRunner,
	{ force = false }: InstallOptions = {}
): Promise<InstallResult> {
	const contents = await readOptional(config.manifest, 'utf8');
	if (contents === null) {
		debug('No dependency manifest at %o', config.manifest);
		return { status: 'skipped', reason: 'no-manifest' };
	}
	const packages = parseManifest(contents);
	if (packages.length === 0) {
		return { status: 'skipped', reason: 'empty-manifest' };
	}

	// The stamp lives inside the environment so that a rebuilt environment
	// always gets a fresh install
	const stampFile = join(config.envDir, MANIFEST_STAMP);
	const sha = manifestSha(contents, config.indexUrl);
	const cachedSha = await readOptional(stampFile, 'ascii');
	if (!force && cachedSha === sha) {
		debug('Manifest %o unchanged since last install', config.manifest);
		return { status: 'skipped', reason: 'up-to-date' };
	}

	const args = ['-m', 'pip', 'install', '-r', config.manifest];
	if (config.indexUrl) {
		args.push('--index-url', config.indexUrl);
	}
	debug('Installing %o packages from %o', packages.length, config.manifest);
	const res = await runner.run(active.interpreter, args, {
		cwd: config.root,
		env: active.env,
		inherit: true
	});
	if (res.exitCode !== 0) {
		await remove(stampFile);
		const cause = new CommandFailedError({
			command: formatCommand(active.interpreter, args),
			exitCode: res.exitCode,
			stderr: res.stderr
		});
		throw new DependencyInstallWarning(
			`Dependency installation failed (${cause.message}); continuing with the packages already installed`,
			cause
		);
	}
	await writeFile(stampFile, sha);
	return { status: 'installed', packages };
}
