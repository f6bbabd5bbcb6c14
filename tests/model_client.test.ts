import test from 'node:test';
import assert from 'node:assert/strict';
import { parseBedrockBody, responseText, toolUses } from '../src/model_client';
import { ModelCallError, TimeoutError } from '../src/errors';
import { withTimeout } from '../src/timeout';

test('decodes text and tool_use blocks with usage', () => {
    const body = JSON.stringify({
        id: 'msg_1',
        type: 'message',
        role: 'assistant',
        content: [
            { type: 'text', text: 'Checking the version. ' },
            { type: 'tool_use', id: 'toolu_1', name: 'package_latest_version', input: { package: 'aws-cdk-lib' } },
            { type: 'thinking', thinking: 'dropped' },
        ],
        stop_reason: 'tool_use',
        usage: { input_tokens: 120, output_tokens: 33 },
    });

    const parsed = parseBedrockBody(body, 'test-model');
    assert.deepEqual(parsed, {
        content: [
            { type: 'text', text: 'Checking the version. ' },
            { type: 'tool_use', id: 'toolu_1', name: 'package_latest_version', input: { package: 'aws-cdk-lib' } },
        ],
        stop_reason: 'tool_use',
        usage: { input_tokens: 120, output_tokens: 33 },
    });
    assert.equal(responseText(parsed), 'Checking the version. ');
    assert.deepEqual(toolUses(parsed).map((t) => t.id), ['toolu_1']);
    assert.equal(
        responseText({ content: [{ type: 'text', text: 'first' }, { type: 'text', text: 'second' }] }),
        'first\nsecond'
    );
});

test('missing usage and stop reason decode to defaults', () => {
    const parsed = parseBedrockBody('{"content": [{"type": "tool_use", "id": "t", "name": "x", "input": "bad"}]}', 'm');
    assert.deepEqual(parsed, {
        content: [{ type: 'tool_use', id: 't', name: 'x', input: {} }],
        stop_reason: null,
        usage: { input_tokens: 0, output_tokens: 0 },
    });
});

test('non-JSON and content-less bodies raise ModelCallError', () => {
    assert.throws(
        () => parseBedrockBody('<html>502</html>', 'test-model'),
        (e: unknown) => e instanceof ModelCallError && e.message === 'provider_response_not_json' && e.context.model_id === 'test-model'
    );
    assert.throws(
        () => parseBedrockBody('{"message": "ThrottlingException"}', 'test-model'),
        (e: unknown) => e instanceof ModelCallError && e.message === 'provider_response_missing_content'
    );
});

test('withTimeout resolves fast work and rejects slow work with TimeoutError', async () => {
    assert.equal(await withTimeout(Promise.resolve(7), 50, 'fast'), 7);

    let timer: NodeJS.Timeout | undefined;
    const slow = new Promise<number>((resolve) => {
        timer = setTimeout(() => resolve(1), 1000);
    });
    await assert.rejects(
        withTimeout(slow, 10, 'slow call'),
        (e: unknown) => e instanceof TimeoutError && e.message === 'slow call timed out after 10ms'
    );
    clearTimeout(timer);
});
