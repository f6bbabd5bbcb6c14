import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
    CommandToolProvider,
    ToolCatalogueError,
    loadToolCatalogue,
    parseToolCatalogue,
    renderArgs,
} from '../src/tool_provider';
import { RecordingRunner } from './helpers/fakes';

const CATALOGUE_PATH = path.resolve(__dirname, '..', 'config', 'toolchain_tools.json');

test('shipped catalogue loads and advertises its tools', async () => {
    const entries = loadToolCatalogue(CATALOGUE_PATH);
    assert.deepEqual(entries.map((e) => e.name), ['package_latest_version', 'cdk_cli_version']);

    const provider = new CommandToolProvider({ runner: new RecordingRunner(), cataloguePath: CATALOGUE_PATH });
    await provider.connect();
    const tools = await provider.listTools();
    assert.deepEqual(tools.map((t) => t.name), ['package_latest_version', 'cdk_cli_version']);
    assert.deepEqual(tools[0].input_schema.required, ['package']);
    assert.equal('command' in tools[0], false);
});

test('callTool renders arguments, runs the command and memoizes the result', async () => {
    const runner = new RecordingRunner(() => ({ stdout: '2.150.0\n' }));
    const provider = new CommandToolProvider({ runner, cataloguePath: CATALOGUE_PATH, timeoutMs: 500 });
    await provider.connect();

    const first = await provider.callTool('package_latest_version', { package: 'aws-cdk-lib' });
    const second = await provider.callTool('package_latest_version', { package: 'aws-cdk-lib' });

    assert.deepEqual(first, { content: '2.150.0', is_error: false });
    assert.deepEqual(second, first);
    assert.equal(runner.requests.length, 1);
    assert.deepEqual(runner.requests[0].args, ['view', 'aws-cdk-lib', 'version']);
    assert.equal(runner.requests[0].timeoutMs, 500);
});

test('invalid, unknown and failing calls come back as error results', async () => {
    const runner = new RecordingRunner(() => ({ exitCode: 1, stderr: 'npm ERR! 404 Not Found' }));
    const provider = new CommandToolProvider({ runner, cataloguePath: CATALOGUE_PATH });
    await provider.connect();

    assert.deepEqual(await provider.callTool('rm_rf', {}), { content: 'Unknown tool: rm_rf', is_error: true });

    const missingArg = await provider.callTool('package_latest_version', {});
    assert.deepEqual(missingArg, {
        content: 'Invalid arguments for package_latest_version: .package: Required field missing',
        is_error: true,
    });

    const optionLike = await provider.callTool('package_latest_version', { package: '--registry=evil' });
    assert.equal(optionLike.is_error, true);
    assert.equal(runner.requests.length, 0);

    const failed = await provider.callTool('package_latest_version', { package: 'no-such-pkg' });
    assert.deepEqual(failed, {
        content: 'package_latest_version failed (exit 1): npm ERR! 404 Not Found',
        is_error: true,
    });

    // failures are not cached
    await provider.callTool('package_latest_version', { package: 'no-such-pkg' });
    assert.equal(runner.requests.length, 2);
});

test('renderArgs rejects option-like and non-scalar values', () => {
    assert.deepEqual(renderArgs(['view', '{package}', 'version'], { package: '@aws-cdk/core' }), [
        'view',
        '@aws-cdk/core',
        'version',
    ]);
    assert.throws(() => renderArgs(['{package}'], { package: '-g' }), /disallowed characters/);
    assert.throws(() => renderArgs(['{package}'], { package: 'a b' }), /disallowed characters/);
    assert.throws(() => renderArgs(['{package}'], { package: { x: 1 } }), /missing or non-scalar argument: package/);
});

test('catalogue validation reports the offending entry', () => {
    assert.throws(() => parseToolCatalogue({}), ToolCatalogueError);
    assert.throws(
        () => parseToolCatalogue({ tools: [{ name: 'x', description: '', command: 'npm', args: [1], input_schema: { type: 'object' } }] }),
        /tools\[0\]\.args must be an array of strings/
    );
    assert.throws(
        () => parseToolCatalogue({ tools: [{ name: 'x', description: '', command: 'npm', args: [], input_schema: { type: 'string' } }] }),
        /tools\[0\]\.input_schema must be an object schema/
    );

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vpcmig-tools-'));
    const file = path.join(dir, 'tools.json');
    const entry = { name: 'dup', description: '', command: 'npm', args: [], input_schema: { type: 'object' } };
    fs.writeFileSync(file, JSON.stringify({ tools: [entry, entry] }));
    try {
        assert.throws(() => loadToolCatalogue(file), /duplicate tool name: dup/);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('listTools before connect rejects', async () => {
    const provider = new CommandToolProvider({ runner: new RecordingRunner(), catalogue: [] });
    await assert.rejects(provider.listTools(), /not connected/);
});
