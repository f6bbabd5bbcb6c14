import test from 'node:test';
import assert from 'node:assert/strict';
import { clearCorrelation, getCorrelation, runWithCorrelation, setCorrelation } from '../src/logger';

function tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

test('concurrent runs keep their own correlation context', async () => {
    const seen: Record<string, string[]> = { a: [], b: [] };

    const run = (id: string) =>
        runWithCorrelation(async () => {
            setCorrelation({ runId: id, project: `project-${id}`, stage: 'extract' });
            await tick();
            seen[id].push(getCorrelation().runId);
            setCorrelation({ stage: 'deploy' });
            await tick();
            seen[id].push(`${getCorrelation().runId}:${getCorrelation().stage}`);
            if (id === 'a') clearCorrelation();
            await tick();
            seen[id].push(getCorrelation().runId);
        });

    await Promise.all([run('a'), run('b')]);

    assert.deepEqual(seen.a, ['a', 'a:deploy', '']);
    assert.deepEqual(seen.b, ['b', 'b:deploy', 'b']);
});

test('a run context does not leak into the caller', async () => {
    clearCorrelation();
    await runWithCorrelation(async () => {
        setCorrelation({ runId: 'inner', stage: 'transform' });
    });
    assert.deepEqual(getCorrelation(), { runId: '', stage: '', project: '' });

    setCorrelation({ runId: 'outer' });
    assert.equal(getCorrelation().runId, 'outer');
    clearCorrelation();
    assert.equal(getCorrelation().runId, '');
});
