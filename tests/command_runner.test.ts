import test from 'node:test';
import assert from 'node:assert/strict';
import { EXIT_SPAWN_FAILED, EXIT_TIMED_OUT, SpawnCommandRunner } from '../src/command_runner';

const runner = new SpawnCommandRunner();

function nodeScript(source: string, timeoutMs = 10000, env?: Record<string, string>) {
    return runner.run({ command: process.execPath, args: ['-e', source], timeoutMs, env });
}

test('captures stdout, stderr and a zero exit', async () => {
    const res = await nodeScript("process.stdout.write('out'); process.stderr.write('err')");
    assert.deepEqual(res, { exitCode: 0, stdout: 'out', stderr: 'err', timedOut: false });
});

test('reports a non-zero exit code as a result', async () => {
    const res = await nodeScript("process.stderr.write('boom'); process.exit(3)");
    assert.equal(res.exitCode, 3);
    assert.equal(res.stderr, 'boom');
    assert.equal(res.timedOut, false);
});

test('extra environment is merged over the parent environment', async () => {
    const res = await nodeScript(
        "process.stdout.write(process.env.VPCMIG_RUNNER_VALUE + ':' + (process.env.PATH ? 'path' : 'nopath'))",
        10000,
        { VPCMIG_RUNNER_VALUE: 'set' }
    );
    assert.equal(res.stdout, 'set:path');
});

test('runs in the requested working directory', async () => {
    const res = await runner.run({
        command: process.execPath,
        args: ['-e', 'process.stdout.write(process.cwd())'],
        cwd: __dirname,
        timeoutMs: 10000,
    });
    assert.equal(res.stdout, __dirname);
});

test('a missing binary resolves with the spawn-failure exit code', async () => {
    const res = await runner.run({ command: 'vpcmig-no-such-binary', args: ['--version'], timeoutMs: 10000 });
    assert.equal(res.exitCode, EXIT_SPAWN_FAILED);
    assert.equal(res.timedOut, false);
    assert.ok(res.stderr.startsWith('vpcmig-no-such-binary --version: '));
    assert.ok(res.stderr.includes('ENOENT'));
});

test('a command past its timeout is killed and reported as timed out', async () => {
    const started = Date.now();
    const res = await nodeScript('setTimeout(() => {}, 30000)', 200);

    assert.equal(res.exitCode, EXIT_TIMED_OUT);
    assert.equal(res.timedOut, true);
    assert.ok(res.stderr.endsWith(`killed after 200ms`));
    assert.ok(Date.now() - started < 10000);
});
