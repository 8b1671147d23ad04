import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    isExcluded,
    removeDirectoriesNamed,
    removePaths,
} from './clean';
import assert = require('assert');
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

/**
 * Tests for cache directory removal
 */
@suite('clean')
export class CleanTest {
    private root = '';

    async before(): Promise<void> {
        this.root = await fs.mkdtemp(path.join(os.tmpdir(), 'stepmake-clean-'));
    }

    async after(): Promise<void> {
        await fs.remove(this.root);
    }

    private async mkdirs(...relPaths: string[]): Promise<void> {
        for (const relPath of relPaths)
            await fs.ensureDir(path.join(this.root, relPath));
    }

    private exists(relPath: string): Promise<boolean> {
        return fs.pathExists(path.join(this.root, relPath));
    }

    @test
    async 'removePaths() removes listed paths and ignores missing ones'(): Promise<void> {
        await this.mkdirs('.ruff_cache/0.1', 'dist', 'src');
        const removed = await removePaths(this.root, ['.ruff_cache', 'dist', 'build']);
        assert.deepStrictEqual(removed, [path.join(this.root, '.ruff_cache'), path.join(this.root, 'dist')]);
        assert.strictEqual(await this.exists('.ruff_cache'), false);
        assert.strictEqual(await this.exists('dist'), false);
        assert.strictEqual(await this.exists('src'), true);
    }

    @test
    async 'removePaths() skips excluded paths'(): Promise<void> {
        await this.mkdirs('.venv/build', 'build');
        const removed = await removePaths(this.root, ['.venv/build', 'build', '.venv'], { exclude: ['.venv'] });
        assert.deepStrictEqual(removed, [path.join(this.root, 'build')]);
        assert.strictEqual(await this.exists('.venv/build'), true);
    }

    @test
    async 'removeDirectoriesNamed() removes matches at any depth'(): Promise<void> {
        await this.mkdirs('__pycache__', 'pkg/__pycache__', 'pkg/sub/deep/__pycache__', 'pkg/keep');
        await fs.outputFile(path.join(this.root, 'pkg/__pycache__/mod.cpython-312.pyc'), '');
        const removed = await removeDirectoriesNamed(this.root, '__pycache__');
        assert.deepStrictEqual(removed.sort(), [
            path.join(this.root, '__pycache__'),
            path.join(this.root, 'pkg/__pycache__'),
            path.join(this.root, 'pkg/sub/deep/__pycache__'),
        ].sort());
        assert.strictEqual(await this.exists('pkg/__pycache__'), false);
        assert.strictEqual(await this.exists('pkg/keep'), true);
    }

    @test
    async 'removeDirectoriesNamed() never touches excluded trees'(): Promise<void> {
        await this.mkdirs('.venv/__pycache__', '.venv/lib/site-packages/x/__pycache__', 'src/__pycache__');
        const removed = await removeDirectoriesNamed(this.root, '__pycache__', { exclude: ['.venv'] });
        assert.deepStrictEqual(removed, [path.join(this.root, 'src/__pycache__')]);
        assert.strictEqual(await this.exists('.venv/__pycache__'), true);
        assert.strictEqual(await this.exists('.venv/lib/site-packages/x/__pycache__'), true);
    }

    @test
    async 'removeDirectoriesNamed() leaves files with the name alone'(): Promise<void> {
        await fs.outputFile(path.join(this.root, 'docs/__pycache__'), 'not a directory');
        const removed = await removeDirectoriesNamed(this.root, '__pycache__');
        assert.deepStrictEqual(removed, []);
        assert.strictEqual(await this.exists('docs/__pycache__'), true);
    }

    @test
    'isExcluded()'(): void {
        const excluded = ['/work/.venv'];
        assert.strictEqual(isExcluded('/work/.venv', excluded), true);
        assert.strictEqual(isExcluded('/work/.venv/lib/__pycache__', excluded), true);
        assert.strictEqual(isExcluded('/work/.venv2', excluded), false);
        assert.strictEqual(isExcluded('/work/src/.venv', excluded), false);
        assert.strictEqual(isExcluded('/work', excluded), false);
    }
}
