import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { classifyLine, extractModule, extractSymbols } from './extractor.js';

describe('classifyLine', () => {
    it('reads public function declarations', () => {
        expect(classifyLine('def foo(x):')).toEqual({ name: 'foo', kind: 'function' });
    });

    it('drops functions behind the private prefix', () => {
        expect(classifyLine('def _hidden(x):')).toBeUndefined();
        expect(classifyLine('def __init__(self):')).toBeUndefined();
    });

    it('reads class declarations up to the argument list or colon', () => {
        expect(classifyLine('class Bar(Base):')).toEqual({ name: 'Bar', kind: 'class' });
        expect(classifyLine('class Baz:')).toEqual({ name: 'Baz', kind: 'class' });
    });

    it('keeps private-looking class names', () => {
        expect(classifyLine('class _Internal:')).toEqual({ name: '_Internal', kind: 'class' });
    });

    it('takes the rest of the line when there is no argument list', () => {
        expect(classifyLine('def lonely')).toEqual({ name: 'lonely', kind: 'function' });
    });

    it('keeps spacing before the argument list in the name', () => {
        expect(classifyLine('def spaced (x):')).toEqual({ name: 'spaced ', kind: 'function' });
    });

    it('ignores lines that only share a prefix with a marker', () => {
        expect(classifyLine('define = 3')).toBeUndefined();
        expect(classifyLine('classes = []')).toBeUndefined();
        expect(classifyLine('# def commented(x):')).toBeUndefined();
    });

    it('accepts custom markers', () => {
        const markers = { function_marker: 'fn ', class_marker: 'struct ', private_prefix: '_' };
        expect(classifyLine('fn run(self) {', markers)).toEqual({ name: 'run', kind: 'function' });
        expect(classifyLine('fn _helper() {', markers)).toBeUndefined();
        expect(classifyLine('def foo(x):', markers)).toBeUndefined();
    });
});

describe('extractSymbols', () => {
    it('returns declarations in file order, nested ones included', () => {
        const text = [
            'class Outer:',
            '    def method(self):',
            '        pass',
            '    class Inner(Base):',
            '        def _private(self):',
            '            pass',
            '',
            'def top(a, b):',
            '    return a',
        ].join('\n');

        expect(extractSymbols(text, 'pkg/mod.py')).toEqual([
            { name: 'Outer', kind: 'class', module: 'pkg/mod.py' },
            { name: 'method', kind: 'function', module: 'pkg/mod.py' },
            { name: 'Inner', kind: 'class', module: 'pkg/mod.py' },
            { name: 'top', kind: 'function', module: 'pkg/mod.py' },
        ]);
    });

    it('handles CRLF line endings', () => {
        expect(extractSymbols('def first():\r\nclass Second:\r\n', 'm.py')).toEqual([
            { name: 'first', kind: 'function', module: 'm.py' },
            { name: 'Second', kind: 'class', module: 'm.py' },
        ]);
    });

    it('returns nothing for an empty file', () => {
        expect(extractSymbols('', 'empty.py')).toEqual([]);
    });
});

describe('extractModule', () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'portcheck-extract-'));
    });

    afterEach(async () => {
        await fs.remove(testDir);
    });

    it('extracts from a readable file', async () => {
        const file = path.join(testDir, 'ops.py');
        await fs.writeFile(file, 'def link(a, b):\n    pass\n');

        const result = await extractModule(file, 'ops.py');
        expect(result.error).toBeUndefined();
        expect(result.symbols).toEqual([{ name: 'link', kind: 'function', module: 'ops.py' }]);
    });

    it('folds a missing file into an error', async () => {
        const result = await extractModule(path.join(testDir, 'absent.py'), 'absent.py');
        expect(result.symbols).toEqual([]);
        expect(result.error).toContain('ENOENT');
    });

    it('folds undecodable bytes into an error', async () => {
        const file = path.join(testDir, 'binary.py');
        await fs.writeFile(file, Buffer.from([0x64, 0x65, 0x66, 0x20, 0x78, 0x28, 0xff, 0xfe, 0x29]));

        const result = await extractModule(file, 'binary.py');
        expect(result.symbols).toEqual([]);
        expect(result.error).toBeDefined();
    });
});
