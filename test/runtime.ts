import { join } from 'node:path';
import { rm as remove } from 'node:fs/promises';
import { resolveConfig } from '../src/config';
import { MissingRuntimeError } from '../src/errors';
import { locateRuntime, parseRuntimeVersion } from '../src/runtime';
import { FakeRunner, healthyRunner } from './helpers/fake-runner';
import { createProject, testConfig } from './helpers/project';

it('parse_runtime_version', () => {
	expect(parseRuntimeVersion('Python 3.11.4')).toBe('3.11.4');
	expect(parseRuntimeVersion('Python 3.12\n')).toBe('3.12.0');
	expect(parseRuntimeVersion('command not found')).toBeNull();
});

it('locate_runtime', async () => {
	const root = await createProject();
	try {
		const runner = healthyRunner();
		const runtime = await locateRuntime(
			resolveConfig(testConfig(root), {}),
			runner
		);
		expect(runtime).toEqual({
			executable: join(root, 'python', 'bin', 'python3'),
			version: '3.11.4'
		});
		expect(runner.calls[0].args).toEqual(['--version']);
	} finally {
		await remove(root, { recursive: true });
	}
});

it('locate_runtime_missing', async () => {
	const root = await createProject({ runtime: false });
	try {
		const runner = new FakeRunner();
		await expect(
			locateRuntime(resolveConfig(testConfig(root), {}), runner)
		).rejects.toThrow(
			new MissingRuntimeError(
				`Embedded runtime not found at ${join(root, 'python', 'bin', 'python3')}`
			)
		);
		expect(runner.calls).toHaveLength(0);
	} finally {
		await remove(root, { recursive: true });
	}
});

it('locate_runtime_too_old', async () => {
	const root = await createProject();
	try {
		await expect(
			locateRuntime(
				resolveConfig(testConfig(root), {}),
				healthyRunner('Python 3.7.9')
			)
		).rejects.toThrow('Embedded runtime 3.7.9 is older than the required 3.8.0');
	} finally {
		await remove(root, { recursive: true });
	}
});

it('locate_runtime_version_on_stderr', async () => {
	const root = await createProject();
	try {
		const runner = new FakeRunner().on(() => ({ stderr: 'Python 3.9.1' }));
		const runtime = await locateRuntime(resolveConfig(testConfig(root), {}), runner);
		expect(runtime.version).toBe('3.9.1');
	} finally {
		await remove(root, { recursive: true });
	}
});

it('locate_runtime_unknown_version', async () => {
	const root = await createProject();
	try {
		const runtime = await locateRuntime(
			resolveConfig(testConfig(root), {}),
			new FakeRunner()
		);
		expect(runtime.version).toBeNull();
	} finally {
		await remove(root, { recursive: true });
	}
});

it('locate_runtime_not_executable', async () => {
	const root = await createProject();
	try {
		const runner = new FakeRunner().on(() => ({ exitCode: null }));
		await expect(
			locateRuntime(resolveConfig(testConfig(root), {}), runner)
		).rejects.toBeInstanceOf(MissingRuntimeError);
	} finally {
		await remove(root, { recursive: true });
	}
});
