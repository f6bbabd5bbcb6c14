import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ToolchainDriver } from '../src/toolchain_driver';
import { DeployError, ScaffoldError } from '../src/errors';
import { entryPointFilePath, renderEntryPoint, stackFilePath } from '../src/project_files';
import { RecordingRunner } from './helpers/fakes';

function tempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'vpcmig-toolchain-'));
}

const DRIVER_BINS = { cdkBin: 'cdk', npmBin: 'npm' };

test('scaffold runs cdk init inside a freshly created directory', async () => {
    const root = tempDir();
    try {
        const projectPath = path.join(root, 'my-vpc-migration');
        const runner = new RecordingRunner();
        await new ToolchainDriver(runner, DRIVER_BINS).scaffold(projectPath);

        assert.ok(fs.statSync(projectPath).isDirectory());
        assert.deepEqual(runner.commandLines(), ['cdk init app --language typescript']);
        assert.equal(runner.requests[0].cwd, projectPath);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('scaffold is skipped for an already initialized project', async () => {
    const root = tempDir();
    try {
        fs.writeFileSync(path.join(root, 'cdk.json'), '{}');
        const runner = new RecordingRunner();
        await new ToolchainDriver(runner, DRIVER_BINS).scaffold(root);
        assert.equal(runner.requests.length, 0);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('scaffold failure raises ScaffoldError with stderr', async () => {
    const root = tempDir();
    try {
        const runner = new RecordingRunner(() => ({ exitCode: 1, stderr: 'cdk: command not found' }));
        await assert.rejects(
            new ToolchainDriver(runner, DRIVER_BINS).scaffold(path.join(root, 'p')),
            (e: unknown) => e instanceof ScaffoldError && e.exitCode === 1 && e.stderr === 'cdk: command not found'
        );
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('writeProjectFiles overwrites the stack and entry point', () => {
    const root = tempDir();
    try {
        const driver = new ToolchainDriver(new RecordingRunner(), DRIVER_BINS);
        const stackFile = stackFilePath(root, 'my-vpc-migration');
        fs.mkdirSync(path.dirname(stackFile), { recursive: true });
        fs.writeFileSync(stackFile, '// scaffolded content that must disappear\n');

        const written = driver.writeProjectFiles(root, 'my-vpc-migration', 'export class MyVpcMigrationStack {}');

        assert.equal(written.stackFile, path.join(root, 'lib', 'my-vpc-migration-stack.ts'));
        assert.equal(written.entryFile, path.join(root, 'bin', 'my-vpc-migration.ts'));
        assert.equal(fs.readFileSync(stackFile, 'utf8'), 'export class MyVpcMigrationStack {}');
        assert.equal(
            fs.readFileSync(entryPointFilePath(root, 'my-vpc-migration'), 'utf8'),
            renderEntryPoint('MyVpcMigrationStack', 'my-vpc-migration')
        );
        assert.deepEqual(fs.readdirSync(path.join(root, 'lib')), ['my-vpc-migration-stack.ts']);
        assert.equal(fs.statSync(stackFile).mode & 0o777, 0o644);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('entry point template references the generated class', () => {
    const lines = renderEntryPoint('DemoStack', 'demo').split('\n');
    assert.equal(lines[0], '#!/usr/bin/env node');
    assert.equal(lines[3], "import { DemoStack } from '../lib/demo-stack';");
    assert.equal(lines[6], "new DemoStack(app, 'DemoStack', {");
});

test('deploy tolerates install and bootstrap failures', async () => {
    const runner = new RecordingRunner((req) => {
        if (req.args[0] === 'install') return { exitCode: 1, stderr: 'ERESOLVE' };
        if (req.args[0] === 'bootstrap') return { exitCode: 1, stderr: 'already bootstrapped' };
        return { stdout: 'Stack ARN: arn:aws:cloudformation:us-east-1:123456789012:stack/Demo' };
    });
    const result = await new ToolchainDriver(runner, DRIVER_BINS).deploy('/tmp/project');

    assert.deepEqual(runner.commandLines(), ['npm install', 'cdk bootstrap', 'cdk deploy --require-approval never']);
    assert.ok(runner.requests.every((r) => r.cwd === '/tmp/project'));
    assert.deepEqual(result, {
        status: 'deployed',
        output: 'Stack ARN: arn:aws:cloudformation:us-east-1:123456789012:stack/Demo',
        projectPath: '/tmp/project',
    });
});

test('deploy failure raises DeployError', async () => {
    const runner = new RecordingRunner((req) => (req.args[0] === 'deploy' ? { exitCode: 2, stderr: 'ROLLBACK_COMPLETE' } : {}));
    await assert.rejects(
        new ToolchainDriver(runner, DRIVER_BINS).deploy('/tmp/project'),
        (e: unknown) => e instanceof DeployError && e.exitCode === 2 && e.stderr === 'ROLLBACK_COMPLETE'
    );
});

test('repeated deploys re-report deployed and leave project files untouched', async () => {
    const root = tempDir();
    try {
        const runner = new RecordingRunner(() => ({ stdout: 'no changes' }));
        const driver = new ToolchainDriver(runner, DRIVER_BINS);
        driver.writeProjectFiles(root, 'demo', 'export class DemoStack {}');
        const before = fs.readFileSync(stackFilePath(root, 'demo'), 'utf8');
        const entryBefore = fs.readFileSync(entryPointFilePath(root, 'demo'), 'utf8');

        const first = await driver.deploy(root);
        const second = await driver.deploy(root);

        assert.equal(first.status, 'deployed');
        assert.deepEqual(second, first);
        assert.equal(fs.readFileSync(stackFilePath(root, 'demo'), 'utf8'), before);
        assert.equal(fs.readFileSync(entryPointFilePath(root, 'demo'), 'utf8'), entryBefore);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});
