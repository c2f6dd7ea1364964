import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { readArtifact } from '@portcheck/core';
import { checkCommand } from './check.js';

const CONFIG = `
version: 1
reference:
  root: ref
  modules: [mod.py]
candidates:
  - root: cand
    extensions: ["*.txt"]
`;

const ADVISORY = `${CONFIG}policy: advisory\n`;
const GATING = `${CONFIG}policy: gating\n`;

describe('checkCommand', () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'portcheck-check-'));
        vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
        vi.spyOn(console, 'log').mockImplementation(() => { });
        vi.spyOn(console, 'error').mockImplementation(() => { });

        await fs.outputFile(path.join(testDir, 'ref/mod.py'), 'def alpha(x):\ndef _beta():\ndef delta(y):\nclass Gamma(Base):\n');
        await fs.outputFile(path.join(testDir, 'cand/a.txt'), 'alpha implementation');
        await fs.outputFile(path.join(testDir, 'cand/b.txt'), 'Gamma class');
    });

    afterEach(async () => {
        await fs.remove(testDir);
        vi.restoreAllMocks();
    });

    it('exits successfully under the advisory policy even below the threshold', async () => {
        await fs.writeFile(path.join(testDir, 'portcheck.yml'), ADVISORY);

        await checkCommand(testDir, {});

        expect(process.exit).toHaveBeenCalledWith(0);
        expect(await readArtifact(path.join(testDir, 'missing_functions.json'))).toEqual([{ name: 'delta', module: 'mod.py' }]);
        expect(await readArtifact(path.join(testDir, 'missing_classes.json'))).toEqual([]);
        expect(await fs.pathExists(path.join(testDir, 'portcheck-report.json'))).toBe(true);
    });

    it('fails under the gating policy below the threshold', async () => {
        await fs.writeFile(path.join(testDir, 'portcheck.yml'), GATING);

        await checkCommand(testDir, {});

        expect(process.exit).toHaveBeenCalledWith(1);
    });

    it('lets flags override the policy and threshold', async () => {
        await fs.writeFile(path.join(testDir, 'portcheck.yml'), CONFIG);

        await checkCommand(testDir, { policy: 'gating', threshold: '60' });

        expect(process.exit).toHaveBeenCalledWith(0);
    });

    it('prints a machine-readable result in JSON mode', async () => {
        await fs.writeFile(path.join(testDir, 'portcheck.yml'), CONFIG);

        await checkCommand(testDir, { json: true, policy: 'gating' });

        const printed = vi.mocked(console.log).mock.calls.map(call => String(call[0]));
        expect(printed).toHaveLength(1);
        const output = JSON.parse(printed[0]);
        expect(output.pass).toBe(false);
        expect(output.policy).toBe('gating');
        expect(output.report.missing.functions).toEqual([{ name: 'delta', module: 'mod.py' }]);
        expect(process.exit).toHaveBeenCalledWith(1);
    });

    it('keeps stdout to the JSON document when verbose', async () => {
        await fs.writeFile(path.join(testDir, 'portcheck.yml'), GATING);

        await checkCommand(testDir, { json: true, verbose: true });

        const printed = vi.mocked(console.log).mock.calls.map(call => String(call[0]));
        expect(printed).toHaveLength(1);
        expect(JSON.parse(printed[0]).percentage).toBeCloseTo(66.67, 1);
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Resolved 1 reference module(s), 0 skipped'));
    });

    it('prints one verdict line and the missing items in CI mode', async () => {
        await fs.writeFile(path.join(testDir, 'portcheck.yml'), ADVISORY);

        await checkCommand(testDir, { ci: true });

        const printed = vi.mocked(console.log).mock.calls.map(call => String(call[0]));
        expect(printed).toEqual([
            'FAIL 66.7% (threshold 90%): 1 missing item(s)',
            '  - [function] delta (mod.py)',
        ]);
    });

    it('exits with the config error code when portcheck.yml is missing', async () => {
        await checkCommand(testDir, {});
        expect(process.exit).toHaveBeenCalledWith(2);
    });

    it('honours an advisory --policy flag when the config cannot be read', async () => {
        await checkCommand(testDir, { policy: 'advisory' });
        expect(process.exit).toHaveBeenCalledWith(0);
    });

    it('rejects an invalid threshold flag', async () => {
        await fs.writeFile(path.join(testDir, 'portcheck.yml'), GATING);

        await checkCommand(testDir, { threshold: 'lots' });

        expect(process.exit).toHaveBeenCalledWith(2);
        expect(process.exit).toHaveBeenCalledTimes(1);
    });

    it('treats a config without a policy as a configuration error', async () => {
        await fs.writeFile(path.join(testDir, 'portcheck.yml'), CONFIG);

        await checkCommand(testDir, {});

        expect(process.exit).toHaveBeenCalledWith(2);
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('policy: Required'));
    });

    describe('when the run fails after the config loads', () => {
        // The artifact directory is a regular file, so writing the artifacts throws.
        const blocked = (policy: string) => `${CONFIG}policy: ${policy}\noutput:\n  missing_functions: blocker/missing_functions.json\n`;

        beforeEach(async () => {
            await fs.writeFile(path.join(testDir, 'blocker'), 'not a directory');
        });

        it('exits with the internal error code under the gating policy', async () => {
            await fs.writeFile(path.join(testDir, 'portcheck.yml'), blocked('gating'));

            await checkCommand(testDir, {});

            expect(process.exit).toHaveBeenCalledWith(3);
            expect(process.exit).toHaveBeenCalledTimes(1);
            expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Verification aborted'));
        });

        it('still exits successfully under the advisory policy', async () => {
            await fs.writeFile(path.join(testDir, 'portcheck.yml'), blocked('advisory'));

            await checkCommand(testDir, {});

            expect(process.exit).toHaveBeenCalledWith(0);
            expect(process.exit).toHaveBeenCalledTimes(1);
            expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Advisory policy: exiting successfully despite the error.'));
        });
    });
});
