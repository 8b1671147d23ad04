/**
 * @module
 * Removal of cache and build directories.
 */
import fs = require('fs-extra');
import path = require('path');

export interface RemoveOptions {
    /**
     * Paths, relative to the root, that are never removed or descended into.
     * Anything inside them is kept as well.
     */
    exclude?: readonly string[];
}

/**
 * Removes each of `relPaths` under `root`. Missing paths are ignored.
 * Returns the absolute paths that were removed.
 */
export async function removePaths(root: string, relPaths: readonly string[], options?: RemoveOptions): Promise<string[]> {
    const excluded = excludedRoots(root, options);
    const removed: string[] = [];
    for (const relPath of relPaths) {
        const target = path.resolve(root, relPath);
        if (isExcluded(target, excluded))
            continue;
        if (!(await fs.pathExists(target)))
            continue;
        await fs.remove(target);
        removed.push(target);
    }
    return removed;
}

/**
 * Walks `root` and removes every directory called `name`. Symbolic links are not followed.
 * Returns the absolute paths that were removed.
 */
export async function removeDirectoriesNamed(root: string, name: string, options?: RemoveOptions): Promise<string[]> {
    const excluded = excludedRoots(root, options);
    const removed: string[] = [];
    await walk(path.resolve(root));
    return removed;

    async function walk(dir: string): Promise<void> {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        for (const entry of entries) {
            if (!entry.isDirectory())
                continue;
            const child = path.join(dir, entry.name);
            if (isExcluded(child, excluded))
                continue;
            if (entry.name === name) {
                await fs.remove(child);
                removed.push(child);
            } else {
                await walk(child);
            }
        }
    }
}

function excludedRoots(root: string, options?: RemoveOptions): string[] {
    if (!options)
        options = {};
    return (options.exclude || []).map(x => path.resolve(root, x));
}

/**
 * True if `target` is one of `excluded` or lies inside one of them.
 */
export function isExcluded(target: string, excluded: readonly string[]): boolean {
    for (const dir of excluded) {
        const rel = path.relative(dir, target);
        const outside = rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel);
        if (!outside)
            return true;
    }
    return false;
}
