import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { rm as remove } from 'node:fs/promises';
import { pathExists } from 'fs-extra';
import { resolveConfig } from '../src/config';
import {
	cleanBytecodeCaches,
	killRuntimeProcesses,
	restart
} from '../src/restart';
import { FakeRunner, healthyRunner } from './helpers/fake-runner';
import {
	createProject,
	recordingOutput,
	testConfig,
	touch
} from './helpers/project';

it('kill_runtime_processes_posix', async () => {
	const runner = new FakeRunner().on(() => ({ exitCode: 1 }));
	await killRuntimeProcesses(
		resolveConfig({ root: '/proj', platform: 'linux' }, {}),
		runner
	);
	// The application runs as `venv/bin/python`, which is named `python`
	expect(runner.calls.map(c => [c.file, c.args])).toEqual([
		['pkill', ['-x', 'python3']],
		['pkill', ['-x', 'python']]
	]);
});

it('kill_runtime_processes_windows', async () => {
	const runner = new FakeRunner().on(() => ({ exitCode: 128 }));
	await killRuntimeProcesses(
		resolveConfig({ root: '/proj', platform: 'win32' }, {}),
		runner
	);
	expect(runner.calls.map(c => [c.file, c.args])).toEqual([
		['taskkill', ['/F', '/T', '/IM', 'python.exe']]
	]);
});

it('clean_bytecode_caches', async () => {
	const root = await createProject({ venv: true });
	try {
		await touch(root, '__pycache__', 'main.cpython-311.pyc');
		await touch(root, 'src', '__pycache__', 'app.cpython-311.pyc');
		await touch(root, 'src', 'api', '__pycache__', 'router.cpython-311.pyc');
		await touch(root, 'tools', 'stray.pyc');
		const kept = [
			await touch(root, 'venv', 'lib', '__pycache__', 'site.cpython-311.pyc'),
			await touch(root, 'node_modules', 'pkg', '__pycache__', 'x.pyc'),
			await touch(root, 'src', 'app.py')
		];

		const removed = await cleanBytecodeCaches(resolveConfig(testConfig(root), {}));
		expect(removed).toEqual([
			join(root, '__pycache__'),
			join(root, 'src', '__pycache__'),
			join(root, 'src', 'api', '__pycache__'),
			join(root, 'tools', 'stray.pyc')
		]);
		for (const p of removed) {
			expect(await pathExists(p)).toBe(false);
		}
		for (const p of kept) {
			expect(await pathExists(p)).toBe(true);
		}
	} finally {
		await remove(root, { recursive: true });
	}
});

it('clean_bytecode_caches_absent_locations', async () => {
	const root = join(tmpdir(), `envboot-missing-${Math.random().toString(16).substring(2)}`);
	expect(await cleanBytecodeCaches(resolveConfig({ root }, {}))).toEqual([]);

	const project = await createProject();
	try {
		expect(
			await cleanBytecodeCaches(resolveConfig(testConfig(project), {}))
		).toEqual([]);
	} finally {
		await remove(project, { recursive: true });
	}
});

it('restart_cleans_and_relaunches_without_args', async () => {
	const root = await createProject({ checker: true });
	try {
		await touch(root, '__pycache__', 'main.cpython-311.pyc');
		await touch(root, 'src', '__pycache__', 'app.cpython-311.pyc');
		const runner = healthyRunner().on(({ file }) =>
			file === 'pkill' ? { exitCode: 1 } : undefined
		);
		const output = recordingOutput();
		const status = await restart({
			config: { ...testConfig(root), gracePeriod: 0 },
			runner,
			output,
			env: { PATH: '/usr/bin' },
			interactive: false
		});
		expect(status).toBe(0);
		expect(runner.calls[0].file).toBe('pkill');
		expect(await pathExists(join(root, '__pycache__'))).toBe(false);
		expect(await pathExists(join(root, 'src', '__pycache__'))).toBe(false);
		expect(output.lines.slice(0, 2)).toEqual([
			'info: Stopping running python3, python processes...',
			'info: Removed 2 bytecode cache entries'
		]);

		const launch = runner.find(call => call.args[0] === join(root, 'main.py'));
		expect(launch).toHaveLength(1);
		expect(launch[0].args).toEqual([join(root, 'main.py')]);
	} finally {
		await remove(root, { recursive: true });
	}
});
