import createDebug from 'debug';
import { join } from 'node:path';
import { stat } from 'node:fs/promises';
import { BootstrapConfig, BrowserVariant, DetectedBrowser } from './types';

const debug = createDebug('envboot:browser');

// Read by the browser-automation tool to find (and store) its browsers
export const BROWSERS_PATH_ENV = 'PLAYWRIGHT_BROWSERS_PATH';

export function browserCachePath(config: BootstrapConfig): string {
	return config.browserCacheDir;
}

interface PlatformFolders {
	chromium: [string, string][]; // [folder, executable]
	headlessShell: [string, string][];
}

function platformFolders(platform: NodeJS.Platform): PlatformFolders {
	switch (platform) {
		case 'win32':
			return {
				chromium: [
					['chrome-win', 'chrome.exe'],
					['chrome-win64', 'chrome.exe']
				],
				headlessShell: [
					['chrome-win', 'headless_shell.exe'],
					['chrome-headless-shell-win64', 'chrome-headless-shell.exe']
				]
			};
		case 'darwin':
			return {
				chromium: [
					['chrome-mac', 'Chromium.app/Contents/MacOS/Chromium'],
					[
						'chrome-mac-arm64',
						'Google Chrome for Testing.app/Contents/MacOS/Google Chrome for Testing'
					]
				],
				headlessShell: [
					['chrome-mac', 'headless_shell'],
					['chrome-headless-shell-mac-arm64', 'chrome-headless-shell']
				]
			};
		default:
			return {
				chromium: [
					['chrome-linux', 'chrome'],
					['chrome-linux64', 'chrome']
				],
				headlessShell: [
					['chrome-linux', 'headless_shell'],
					['chrome-headless-shell-linux64', 'chrome-headless-shell']
				]
			};
	}
}

/**
 * Candidate locations of a pre-installed browser under the cache path, in
 * the order they are probed. Folder names differ between releases of the
 * same browser build, so every known spelling is listed.
 */
export function browserVariants(
	revision: string,
	platform: NodeJS.Platform = process.platform
): BrowserVariant[] {
	const { chromium, headlessShell } = platformFolders(platform);
	return [
		...chromium.map(([folder, exe]) => ({
			name: `chromium-${revision}/${folder}`,
			path: `chromium-${revision}/${folder}/${exe}`
		})),
		...headlessShell.map(([folder, exe]) => ({
			name: `chromium_headless_shell-${revision}/${folder}`,
			path: `chromium_headless_shell-${revision}/${folder}/${exe}`
		}))
	];
}

async function isFile(p: string): Promise<boolean> {
	try {
		return (await stat(p)).isFile();
	} catch (err: unknown) {
		if (
			err instanceof Error &&
			'code' in err &&
			(err.code === 'ENOENT' || err.code === 'ENOTDIR')
		) {
			return false;
		}
		throw err;
	}
}

/**
 * Returns the first variant whose executable exists, or `null` when none
 * does (the browser installer will then fetch one).
 */
export async function probeBrowser(
	cachePath: string,
	variants: BrowserVariant[]
): Promise<DetectedBrowser | null> {
	for (const variant of variants) {
		const executable = join(cachePath, ...variant.path.split('/'));
		if (await isFile(executable)) {
			debug('Found browser %o at %o', variant.name, executable);
			return { ...variant, executable };
		}
	}
	debug('No pre-installed browser under %o', cachePath);
	return null;
}
