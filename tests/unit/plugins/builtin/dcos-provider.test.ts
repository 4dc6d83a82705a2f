// tests/unit/plugins/builtin/dcos-provider.test.ts
import { describe, it, expect } from 'vitest';
import { DcosProviderPlugin, PROVIDER_FILE, renderProviderPin } from '../../../../src/plugins/builtin/dcos-provider.js';
import type { RunContext } from '../../../../src/plugins/types.js';
import { MemorySandbox } from '../../../helpers/memory-sandbox.js';

const servicePackage = 'resource "dcos_package" "kafka" {\n  app_id = "kafka"\n}\n';

function context(sandbox: MemorySandbox, args: string[]): RunContext {
    return { sandbox, terraform: sandbox.terraform, args, isInit: args.includes('init') };
}

describe('DcosProviderPlugin', () => {
    it('should render the provider requirement', () => {
        expect(renderProviderPin()).toBe(
            [
                'terraform {',
                '  required_providers {',
                '    dcos = {',
                '      source  = "dcos/dcos"',
                '      version = "~> 0.5.0"',
                '    }',
                '  }',
                '}',
                '',
            ].join('\n'),
        );
    });

    it('should apply to projects with dcos resources or data sources', async () => {
        const plugin = new DcosProviderPlugin();
        expect(await plugin.isUsed(new MemorySandbox({ 'service_kafka.tf': servicePackage }))).toBe(true);
        expect(await plugin.isUsed(new MemorySandbox({ 'lookup.tf': 'data "dcos_token" "t" {}\n' }))).toBe(true);
        expect(await plugin.isUsed(new MemorySandbox({ 'main.tf': 'module "dcos" {}\n' }))).toBe(false);
    });

    it('should pin the provider on init', async () => {
        const sandbox = new MemorySandbox({ 'service_kafka.tf': servicePackage });

        await new DcosProviderPlugin('~> 0.6.0').beforeRun(context(sandbox, ['init']));

        expect(sandbox.files.get(PROVIDER_FILE)).toBe(renderProviderPin('~> 0.6.0'));
    });

    it('should not touch the project outside init or when the pin exists', async () => {
        const sandbox = new MemorySandbox({ 'service_kafka.tf': servicePackage });
        const plugin = new DcosProviderPlugin();

        await plugin.beforeRun(context(sandbox, ['plan']));
        expect(sandbox.files.has(PROVIDER_FILE)).toBe(false);

        sandbox.files.set(PROVIDER_FILE, '# managed by hand\n');
        await plugin.beforeRun(context(sandbox, ['init']));
        expect(sandbox.files.get(PROVIDER_FILE)).toBe('# managed by hand\n');
    });
});
