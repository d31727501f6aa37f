// File: src/lib/FileSystem.ts
import fsPromises from 'fs/promises';
import { Dirent, Stats } from 'fs';
import path from 'path';
import { Ignore } from 'ignore';
import chalk from 'chalk';
import { FilesystemError } from './errors';

export interface ListFilesOptions {
    /** Gitignore-style rules, matched against paths relative to the walked root. */
    ig: Ignore;
    /** Lower-case extensions (with the dot) to keep. All files are kept when omitted. */
    extensions?: string[];
    /** Absolute paths (files or directories) left out of the walk. */
    exclude?: string[];
}

// fs errors may belong to another realm, so match on shape rather than `instanceof Error`.
function isErrnoCode(error: unknown, ...codes: string[]): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && codes.includes(String(error.code));
}

export function toPosix(relativePath: string): string {
    return relativePath.split(path.sep).join('/');
}

class FileSystem {

    async readFile(filePath: string): Promise<string | null> {
        try {
            return await fsPromises.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isErrnoCode(error, 'ENOENT')) {
                return null;
            }
            throw new FilesystemError('read', filePath, error);
        }
    }

    /**
     * Gets file status information.
     * @returns The Stats object, or null if nothing exists at the path.
     */
    async stat(filePath: string): Promise<Stats | null> {
        try {
            return await fsPromises.stat(filePath);
        } catch (error) {
            if (isErrnoCode(error, 'ENOENT')) return null;
            throw new FilesystemError('stat', filePath, error);
        }
    }

    /**
     * Writes the whole file or nothing: content goes to a sibling temporary file
     * first and is renamed over the target.
     */
    async writeFile(filePath: string, content: string): Promise<void> {
        await this.ensureDirExists(path.dirname(filePath));
        const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
        try {
            await fsPromises.writeFile(tmpPath, content, 'utf-8');
            await fsPromises.rename(tmpPath, filePath);
        } catch (error) {
            await fsPromises.rm(tmpPath, { force: true });
            throw new FilesystemError('write', filePath, error);
        }
    }

    async deleteFile(filePath: string): Promise<void> {
        try {
            await fsPromises.unlink(filePath);
        } catch (error) {
            throw new FilesystemError('delete', filePath, error);
        }
    }

    /**
     * Ensures the specified directory exists, creating intermediate directories.
     */
    async ensureDirExists(dir: string): Promise<void> {
        try {
            await fsPromises.access(dir);
        } catch (error) {
            if (!isErrnoCode(error, 'ENOENT')) {
                throw new FilesystemError('access', dir, error);
            }
            console.log(chalk.dim(`  Creating directory: ${dir}`));
            try {
                await fsPromises.mkdir(dir, { recursive: true });
            } catch (mkdirError) {
                throw new FilesystemError('create directory', dir, mkdirError);
            }
        }
    }

    /**
     * Removes a directory only when it has no entries left.
     * @returns `true` if the directory was removed.
     */
    async removeDirIfEmpty(dir: string): Promise<boolean> {
        try {
            const entries = await fsPromises.readdir(dir);
            if (entries.length > 0) return false;
            await fsPromises.rmdir(dir);
            return true;
        } catch (error) {
            if (isErrnoCode(error, 'ENOENT', 'ENOTEMPTY')) return false;
            throw new FilesystemError('remove directory', dir, error);
        }
    }

    /**
     * Recursively lists files under `root`, sorted by path so every sweep visits
     * them in the same order. Symlinks are not followed. A missing root yields `[]`.
     * @returns Absolute file paths.
     */
    async listFiles(root: string, options: ListFilesOptions): Promise<string[]> {
        const rootStat = await this.stat(root);
        if (!rootStat || !rootStat.isDirectory()) {
            return [];
        }
        const exclude = new Set((options.exclude ?? []).map(p => path.resolve(p)));
        return this.walk(root, root, options, exclude);
    }

    private async walk(dirPath: string, root: string, options: ListFilesOptions, exclude: Set<string>): Promise<string[]> {
        let entries: Dirent[];
        try {
            entries = await fsPromises.readdir(dirPath, { withFileTypes: true });
        } catch (error) {
            throw new FilesystemError('list', dirPath, error);
        }
        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        let files: string[] = [];
        for (const entry of entries) {
            const fullPath = path.join(dirPath, entry.name);
            if (exclude.has(path.resolve(fullPath))) {
                continue;
            }
            const relativePath = toPosix(path.relative(root, fullPath));

            if (entry.isDirectory()) {
                if (options.ig.ignores(`${relativePath}/`)) continue;
                files = files.concat(await this.walk(fullPath, root, options, exclude));
            } else if (entry.isFile()) {
                if (options.ig.ignores(relativePath)) continue;
                const ext = path.extname(entry.name).toLowerCase();
                if (options.extensions && !options.extensions.includes(ext)) continue;
                files.push(fullPath);
            }
        }
        return files;
    }
}

export { FileSystem };
