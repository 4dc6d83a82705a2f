// tests/unit/tfgen/formatter.test.ts
import { describe, it, expect } from 'vitest';
import { formatHcl } from '../../../src/core/tfgen/formatter.js';
import { FormatError } from '../../../src/core/errors/index.js';

describe('formatHcl', () => {
    it('should indent blocks and align consecutive attributes', () => {
        const input = [
            'module "dcos" {',
            'source = "x"',
            'version = "~> 0.2.0"',
            '',
            'cluster_name = "c"',
            'num_masters = "1"',
            '}',
        ].join('\n');

        expect(formatHcl(input)).toBe(
            [
                'module "dcos" {',
                '  source  = "x"',
                '  version = "~> 0.2.0"',
                '',
                '  cluster_name = "c"',
                '  num_masters  = "1"',
                '}',
                '',
            ].join('\n'),
        );
    });

    it('should not align block openers with attributes', () => {
        const input = [
            'resource "x" "y" {',
            '  tags = {',
            ' a = "1"',
            '     long_key = "2"',
            '  }',
            '  list = [',
            '    "one",',
            '  ]',
            '}',
        ].join('\n');

        expect(formatHcl(input)).toBe(
            [
                'resource "x" "y" {',
                '  tags = {',
                '    a        = "1"',
                '    long_key = "2"',
                '  }',
                '  list = [',
                '    "one",',
                '  ]',
                '}',
                '',
            ].join('\n'),
        );
    });

    it('should normalize spacing around the equals sign', () => {
        expect(formatHcl('a="1"')).toBe('a = "1"\n');
        expect(formatHcl('x    =    5')).toBe('x = 5\n');
    });

    it('should keep heredoc bodies as written', () => {
        const input = ['a = <<EOT', '  keep   this', 'EOT', 'b = "x"'].join('\n');
        expect(formatHcl(input)).toBe('a = <<EOT\n  keep   this\nEOT\nb = "x"\n');
    });

    it('should collapse blank runs and drop leading and trailing blanks', () => {
        expect(formatHcl('\n\na = "1"\n\n\n\nb = "2"\n\n')).toBe('a = "1"\n\nb = "2"\n');
    });

    it('should leave comments and interpolations alone', () => {
        const input = ['# comment', 'name = "${var.prefix}-{x}" # trailing'].join('\n');
        expect(formatHcl(input)).toBe('# comment\nname = "${var.prefix}-{x}" # trailing\n');
    });

    it('should return an empty string for empty input', () => {
        expect(formatHcl('')).toBe('');
    });

    it('should reject an unexpected closing bracket', () => {
        expect(() => formatHcl('a = {\n}\n}')).toThrow(FormatError);
        expect(() => formatHcl('a = {\n}\n}')).toThrow("Could not format output: unexpected '}' at line 3");
    });

    it('should reject an unterminated string', () => {
        expect(() => formatHcl('a = "open')).toThrow('unterminated string at line 1');
    });

    it('should reject an unterminated heredoc', () => {
        expect(() => formatHcl('a = <<EOT\nno end')).toThrow('unterminated heredoc <<EOT at line 1');
    });

    it('should reject an unclosed block', () => {
        expect(() => formatHcl('module "x" {\na = 1')).toThrow("unclosed '{' opened at line 1");
    });

    it('should reject a line that is neither an attribute nor a block', () => {
        const unquoted = 'tags = {\n  Cost Center = "ops"\n}';
        expect(() => formatHcl(unquoted)).toThrow(FormatError);
        expect(() => formatHcl(unquoted)).toThrow(
            'Could not format output: expected an attribute or block at line 2: Cost Center = "ops"',
        );
        expect(() => formatHcl('tags = {\n  = "empty"\n}')).toThrow(
            'expected an attribute or block at line 2: = "empty"',
        );
    });

    it('should accept list items, nested blocks and comments', () => {
        const input = [
            'terraform {',
            '  required_providers {',
            '    // pinned',
            '    dcos = {',
            '      source = "dcos/dcos"',
            '    }',
            '  }',
            '}',
            'data "dcos_token" "t" {}',
            'zones = [',
            '  "a",',
            ']',
        ].join('\n');

        expect(formatHcl(input)).toBe(`${input}\n`);
    });

    it('should reject an unterminated block comment', () => {
        expect(() => formatHcl('/* start\nmore')).toThrow('unterminated comment at line 1');
    });
});
