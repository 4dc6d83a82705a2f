// tests/unit/plugins/lifecycle.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import { PluginLifecycle } from '../../../src/plugins/lifecycle.js';
import { PluginRegistry } from '../../../src/plugins/registry.js';
import { PluginError, PluginHookError, TerraformError } from '../../../src/core/errors/index.js';
import { MemorySandbox } from '../../helpers/memory-sandbox.js';
import { RecordingPlugin } from '../../helpers/recording-plugin.js';

describe('PluginLifecycle', () => {
    let events: string[];
    let sandbox: MemorySandbox;

    beforeEach(() => {
        events = [];
        sandbox = new MemorySandbox({ 'main.tf': 'module "dcos" {}\n' });
    });

    it('should load only the plugins that apply, in registration order', async () => {
        const used = new RecordingPlugin('used', events, { marker: 'module "dcos"' });
        const unused = new RecordingPlugin('unused', events, { marker: 'resource "dcos_package"' });
        const alsoUsed = new RecordingPlugin('also-used', events);
        const lifecycle = new PluginLifecycle(new PluginRegistry([used, unused, alsoUsed]));

        expect(await lifecycle.loadActivePlugins(sandbox)).toEqual([used, alsoUsed]);
    });

    it('should fail loading when a plugin cannot tell whether it applies', async () => {
        const broken = new RecordingPlugin('broken', events, { failIsUsed: new Error('boom') });
        const lifecycle = new PluginLifecycle(new PluginRegistry([broken]));

        const load = lifecycle.loadActivePlugins(sandbox);
        await expect(load).rejects.toBeInstanceOf(PluginError);
        await expect(lifecycle.loadActivePlugins(sandbox)).rejects.toThrow('Could not load plugin broken: boom');
    });

    it('should run every pre-hook, then terraform, then every post-hook', async () => {
        const lifecycle = new PluginLifecycle(
            new PluginRegistry([new RecordingPlugin('a', events), new RecordingPlugin('b', events)]),
        );

        const result = await lifecycle.run(sandbox, ['plan']);

        expect(events).toEqual(['a:before:plan', 'b:before:plan', 'a:after:plan', 'b:after:plan']);
        expect(sandbox.terraform.calls).toEqual([['plan']]);
        expect(result.error).toBeUndefined();
        expect(result.plugins.map((plugin) => plugin.name)).toEqual(['a', 'b']);
    });

    it('should stop before terraform when a pre-hook fails', async () => {
        const lifecycle = new PluginLifecycle(
            new PluginRegistry([
                new RecordingPlugin('first', events),
                new RecordingPlugin('second', events, { failBefore: new Error('agent missing') }),
                new RecordingPlugin('third', events),
            ]),
        );

        const run = lifecycle.run(sandbox, ['apply']);

        await expect(run).rejects.toBeInstanceOf(PluginHookError);
        await expect(run).rejects.toThrow('Could not start second: agent missing');
        expect(events).toEqual(['first:before:apply', 'second:before:apply']);
        expect(sandbox.terraform.calls).toEqual([]);
    });

    it('should hand a terraform failure to every post-hook and return it', async () => {
        const failure = new TerraformError('terraform apply exited with code 3', ['apply'], 3);
        sandbox.terraform.failWith = failure;
        const plugin = new RecordingPlugin('watcher', events);
        const lifecycle = new PluginLifecycle(new PluginRegistry([plugin]));

        const result = await lifecycle.run(sandbox, ['apply']);

        expect(result.error).toBe(failure);
        expect(plugin.errors).toEqual([failure]);
        expect(events).toEqual(['watcher:before:apply', 'watcher:after:apply']);
    });

    it('should report a failing post-hook', async () => {
        const lifecycle = new PluginLifecycle(
            new PluginRegistry([new RecordingPlugin('cleanup', events, { failAfter: new Error('still running') })]),
        );

        await expect(lifecycle.run(sandbox, ['destroy'])).rejects.toThrow('Could not finalize cleanup: still running');
        expect(sandbox.terraform.calls).toEqual([['destroy']]);
    });

    it('should mark init invocations', async () => {
        const contexts: boolean[] = [];
        const plugin = new RecordingPlugin('init-watcher', events);
        plugin.beforeRun = async (context) => {
            contexts.push(context.isInit);
        };
        const lifecycle = new PluginLifecycle(new PluginRegistry([plugin]));

        await lifecycle.run(sandbox, ['init', '-upgrade']);
        await lifecycle.run(sandbox, ['plan']);

        expect(contexts).toEqual([true, false]);
    });

    it('should locate terraform before running any hook', async () => {
        sandbox.terraform.available = false;
        const lifecycle = new PluginLifecycle(new PluginRegistry([new RecordingPlugin('a', events)]));

        await expect(lifecycle.run(sandbox, ['plan'])).rejects.toThrow('terraform not found');
        expect(events).toEqual([]);
    });
});
