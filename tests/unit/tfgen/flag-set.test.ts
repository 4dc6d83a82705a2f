// tests/unit/tfgen/flag-set.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import { FlagSet, normalizeArgs } from '../../../src/core/tfgen/flag-set.js';
import { FlagParseError } from '../../../src/core/errors/index.js';

describe('FlagSet', () => {
    let flags: FlagSet;

    beforeEach(() => {
        flags = new FlagSet('add-aws-cluster')
            .define('num_masters', 'Number of master nodes')
            .define('cluster_name', 'Name of the cluster')
            .define('admin_ips', 'Allowed CIDR range');
    });

    it('should list definitions in lexicographical order', () => {
        expect(flags.getDefinitions().map((flag) => flag.name)).toEqual(['admin_ips', 'cluster_name', 'num_masters']);
    });

    it('should reject invalid and duplicate flag names', () => {
        expect(() => flags.define('9lives', 'x')).toThrow('invalid flag name: 9lives');
        expect(() => flags.define('cluster_name', 'again')).toThrow('flag redefined: cluster_name');
    });

    it('should parse single-dash flags with = and with a separate value', () => {
        const positional = flags.parse(['-cluster_name=demo', '-num_masters', '3', 'extra']);

        expect(positional).toEqual(['extra']);
        expect(flags.getVisited()).toEqual([
            { name: 'cluster_name', values: ['demo'] },
            { name: 'num_masters', values: ['3'] },
        ]);
    });

    it('should record repeated flags in order of first occurrence', () => {
        flags.parse(['--admin_ips=10.0.0.0/8', '-cluster_name=a', '-admin_ips=192.168.0.0/16', '-cluster_name=b']);

        expect(flags.getVisited()).toEqual([
            { name: 'admin_ips', values: ['10.0.0.0/8', '192.168.0.0/16'] },
            { name: 'cluster_name', values: ['a', 'b'] },
        ]);
    });

    it('should not report flags that were not supplied', () => {
        flags.parse([]);
        expect(flags.getVisited()).toEqual([]);
    });

    it('should discard values recorded by a previous parse', () => {
        flags.parse(['-cluster_name=first']);
        flags.parse(['-num_masters=5']);
        expect(flags.getVisited()).toEqual([{ name: 'num_masters', values: ['5'] }]);
    });

    it('should reject unknown flags', () => {
        expect(() => flags.parse(['-nope=1'])).toThrow(FlagParseError);
        expect(() => flags.parse(['-nope=1'])).toThrow('flag provided but not defined: -nope');
    });

    it('should reject a flag without its value', () => {
        expect(() => flags.parse(['-cluster_name'])).toThrow('flag needs an argument: -cluster_name');
    });
});

describe('normalizeArgs', () => {
    it('should turn single-dash flags into double-dash flags', () => {
        expect(normalizeArgs(['-a=1', '--b', '-', 'plain', '--', '-c'])).toEqual([
            '--a=1',
            '--b',
            '-',
            'plain',
            '--',
            '-c',
        ]);
    });
});
