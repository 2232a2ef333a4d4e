import { join } from 'node:path';
import { mkdir, rm as remove, writeFile } from 'node:fs/promises';
import { pathExists } from 'fs-extra';
import { resolveConfig } from '../src/config';
import { activateEnvironment, ensureEnvironment } from '../src/environment';
import { ActivationError, EnvironmentCreationError } from '../src/errors';
import { FakeRunner, healthyRunner } from './helpers/fake-runner';
import { createProject, testConfig } from './helpers/project';

function runtimeFor(root: string) {
	return { executable: join(root, 'python', 'bin', 'python3'), version: '3.11.4' };
}

it('ensure_environment_creates_once', async () => {
	const root = await createProject();
	try {
		const config = resolveConfig(testConfig(root), {});
		const runner = healthyRunner();

		const first = await ensureEnvironment(config, runtimeFor(root), runner);
		expect(first.created).toBe(true);
		expect(runner.calls).toHaveLength(1);
		expect(runner.calls[0].file).toBe(join(root, 'python', 'bin', 'python3'));
		expect(runner.calls[0].args).toEqual(['-m', 'venv', join(root, 'venv')]);
		expect(runner.calls[0].opts.cwd).toBe(root);

		const second = await ensureEnvironment(config, runtimeFor(root), runner);
		expect(second.created).toBe(false);
		expect(runner.calls).toHaveLength(1);
	} finally {
		await remove(root, { recursive: true });
	}
});

it('ensure_environment_failure_cleans_up', async () => {
	const root = await createProject();
	try {
		const config = resolveConfig(testConfig(root), {});
		const envDir = join(root, 'venv');
		const exe = join(root, 'python', 'bin', 'python3');
		const runner = new FakeRunner().on(async () => {
			// Fail halfway through, leaving a partial directory behind
			await mkdir(join(envDir, 'lib'), { recursive: true });
			return { exitCode: 1, stderr: 'Error: ensurepip failed\n' };
		});

		let err: unknown;
		try {
			await ensureEnvironment(config, runtimeFor(root), runner);
		} catch (_err) {
			err = _err;
		}
		expect(err).toBeInstanceOf(EnvironmentCreationError);
		expect(err).toHaveProperty(
			'message',
			`Failed to create isolated environment at ${envDir}: Command \`${exe} -m venv ${envDir}\` exited with code 1`
		);
		expect(err).toHaveProperty('cause.stderr', 'Error: ensurepip failed');
		expect(await pathExists(envDir)).toBe(false);
	} finally {
		await remove(root, { recursive: true });
	}
});

it('activate_environment', async () => {
	const root = await createProject({ venv: true });
	try {
		const config = resolveConfig(testConfig(root), {});
		const baseEnv = { PATH: '/usr/bin', PYTHONHOME: '/opt/python', FOO: 'bar' };
		const active = await activateEnvironment(config, baseEnv);
		expect(active.interpreter).toBe(join(root, 'venv', 'bin', 'python'));
		expect(active.binDir).toBe(join(root, 'venv', 'bin'));
		expect(active.env).toEqual({
			PATH: `${join(root, 'venv', 'bin')}:/usr/bin`,
			VIRTUAL_ENV: join(root, 'venv'),
			FOO: 'bar'
		});
		// The caller's environment is left alone
		expect(baseEnv.PYTHONHOME).toBe('/opt/python');
	} finally {
		await remove(root, { recursive: true });
	}
});

it('activate_environment_windows_path_key', async () => {
	const root = await createProject();
	try {
		const scripts = join(root, 'venv', 'Scripts');
		await mkdir(scripts, { recursive: true });
		await writeFile(join(scripts, 'python.exe'), '');
		await writeFile(join(scripts, 'activate.bat'), '');
		const config = resolveConfig({ ...testConfig(root), platform: 'win32' }, {});
		const active = await activateEnvironment(config, {
			Path: 'C:\\Windows\\system32'
		});
		expect(active.env.Path).toBe(`${scripts};C:\\Windows\\system32`);
		expect(active.env.PATH).toBeUndefined();
	} finally {
		await remove(root, { recursive: true });
	}
});

it('activate_environment_missing_script', async () => {
	const root = await createProject();
	try {
		await mkdir(join(root, 'venv', 'bin'), { recursive: true });
		await writeFile(join(root, 'venv', 'bin', 'python'), '');
		const config = resolveConfig(testConfig(root), {});
		await expect(activateEnvironment(config, {})).rejects.toThrow(
			new ActivationError(
				`Activation script missing at ${join(root, 'venv', 'bin', 'activate')}; delete ${join(root, 'venv')} to rebuild the environment`
			)
		);
	} finally {
		await remove(root, { recursive: true });
	}
});

it('activate_environment_missing_interpreter', async () => {
	const root = await createProject();
	try {
		await mkdir(join(root, 'venv', 'bin'), { recursive: true });
		await writeFile(join(root, 'venv', 'bin', 'activate'), '');
		const config = resolveConfig(testConfig(root), {});
		await expect(activateEnvironment(config, {})).rejects.toBeInstanceOf(
			ActivationError
		);
	} finally {
		await remove(root, { recursive: true });
	}
});
