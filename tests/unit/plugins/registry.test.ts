// tests/unit/plugins/registry.test.ts
import { describe, it, expect } from 'vitest';
import { PluginRegistry } from '../../../src/plugins/registry.js';
import { PluginRegistryError } from '../../../src/core/errors/index.js';
import type { PluginCommand } from '../../../src/plugins/types.js';
import { RecordingPlugin } from '../../helpers/recording-plugin.js';

function command(name: string): PluginCommand {
    return { name, description: `${name} description`, handle: async () => {} };
}

describe('PluginRegistry', () => {
    it('should keep plugins in registration order', () => {
        const first = new RecordingPlugin('first', []);
        const second = new RecordingPlugin('second', []);

        expect(new PluginRegistry([first, second]).getPlugins()).toEqual([first, second]);
    });

    it('should list commands by plugin order then declaration order', () => {
        const registry = new PluginRegistry([
            new RecordingPlugin('a', [], { commands: [command('zeta'), command('alpha')] }),
            new RecordingPlugin('b', [], { commands: [command('beta')] }),
        ]);

        expect(registry.listCommands().map(({ plugin, command }) => `${plugin.name}/${command.name}`)).toEqual([
            'a/zeta',
            'a/alpha',
            'b/beta',
        ]);
    });

    it('should resolve commands to their owning plugin', () => {
        const owner = new RecordingPlugin('owner', [], { commands: [command('add-thing')] });
        const registry = new PluginRegistry([owner]);

        expect(registry.resolveCommand('add-thing')?.plugin).toBe(owner);
        expect(registry.resolveCommand('plan')).toBeUndefined();
    });

    it('should reject a command name provided twice', () => {
        const create = () =>
            new PluginRegistry([
                new RecordingPlugin('first', [], { commands: [command('dup')] }),
                new RecordingPlugin('second', [], { commands: [command('dup')] }),
            ]);

        expect(create).toThrow(PluginRegistryError);
        expect(create).toThrow('Command "dup" of plugin second is already provided by plugin first');
    });
});
