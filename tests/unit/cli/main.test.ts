// tests/unit/cli/main.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { main } from '../../../src/cli/index.js';
import { renderMissingTerraformHelp } from '../../../src/cli/help.js';

describe('main', () => {
    let homeDir: string;
    let projectDir: string;
    const env = { WHEELS_TERRAFORM_PATH: './missing-terraform' };

    beforeEach(async () => {
        homeDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wheels-home-'));
        projectDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wheels-main-'));
        vi.spyOn(os, 'homedir').mockReturnValue(homeDir);
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.remove(homeDir);
        await fs.remove(projectDir);
    });

    it('should print the version without touching the project', async () => {
        expect(await main(['wheels-version'], { cwd: path.join(projectDir, 'absent'), env })).toBe(0);
    });

    it('should show help for unknown commands', async () => {
        expect(await main(['frobnicate'], { cwd: projectDir, env })).toBe(1);
        expect(vi.mocked(console.log)).toHaveBeenCalledWith(renderMissingTerraformHelp()[0]);
    });

    it('should run plugin commands against the project', async () => {
        await fs.outputJson(path.join(projectDir, '.wheels', 'config.json'), { autoInit: false });

        expect(await main(['add-service', 'kafka'], { cwd: projectDir, env })).toBe(0);
        expect(await fs.readFile(path.join(projectDir, 'service_kafka.tf'), 'utf-8')).toContain(
            'resource "dcos_package" "kafka" {',
        );
    });

    it('should leave disabled plugins out', async () => {
        await fs.outputJson(path.join(projectDir, '.wheels', 'config.json'), { disabledPlugins: ['add-service'] });

        expect(await main(['add-service', 'kafka'], { cwd: projectDir, env })).toBe(1);
        expect(await fs.pathExists(path.join(projectDir, 'service_kafka.tf'))).toBe(false);
    });

    it('should fail when terraform cannot be found for a terraform command', async () => {
        expect(await main(['plan'], { cwd: projectDir, env })).toBe(1);
    });

    it('should fail on an invalid configuration', async () => {
        await fs.outputFile(path.join(projectDir, '.wheels', 'config.json'), '{ broken');
        expect(await main(['plan'], { cwd: projectDir, env })).toBe(1);
    });
});
