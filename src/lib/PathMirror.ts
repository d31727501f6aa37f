// File: src/lib/PathMirror.ts
import path from 'path';
import { toPosix } from './FileSystem';
import { StubwrightError } from './errors';

export const SOURCE_EXTENSIONS = ['.py'];

export interface MirrorLayout {
    projectRoot: string;
    sourceRoot: string;
    testRoot: string;
    fixtureRoot: string;
    testPrefix: string;
    fixtureSuffix: string;
}

/**
 * Maps a source file's path (relative to the source root, POSIX separators) to its
 * test stub and fixture stub, and back again.
 *
 *   auth/dependencies.py  <->  <tests>/auth/test_dependencies.py
 *                         <->  <fixtures>/auth/dependencies_fixtures.py
 */
export class PathMirror {
    readonly layout: MirrorLayout;

    constructor(layout: MirrorLayout) {
        this.layout = layout;
    }

    testPathFor(sourceRel: string): string {
        const { dir, stem, ext } = splitRelative(sourceRel);
        return path.join(this.layout.testRoot, ...dir, `${this.layout.testPrefix}${stem}${ext}`);
    }

    fixturePathFor(sourceRel: string): string {
        const { dir, stem, ext } = splitRelative(sourceRel);
        return path.join(this.layout.fixtureRoot, ...dir, `${stem}${this.layout.fixtureSuffix}${ext}`);
    }

    /** Source path for a test stub path relative to the test root, or null when the name is not a stub name. */
    sourceForTest(testRel: string): string | null {
        const { dir, stem, ext } = splitRelative(testRel);
        const prefix = this.layout.testPrefix;
        if (!SOURCE_EXTENSIONS.includes(ext) || !stem.startsWith(prefix) || stem.length === prefix.length) {
            return null;
        }
        return [...dir, `${stem.slice(prefix.length)}${ext}`].join('/');
    }

    sourceForFixture(fixtureRel: string): string | null {
        const { dir, stem, ext } = splitRelative(fixtureRel);
        const suffix = this.layout.fixtureSuffix;
        if (!SOURCE_EXTENSIONS.includes(ext) || !stem.endsWith(suffix) || stem.length === suffix.length) {
            return null;
        }
        return [...dir, `${stem.slice(0, stem.length - suffix.length)}${ext}`].join('/');
    }

    /** Dotted import path of a file, relative to the project root (`src/auth/dependencies.py` -> `src.auth.dependencies`). */
    moduleName(absolutePath: string): string {
        const rel = toPosix(path.relative(this.layout.projectRoot, absolutePath));
        if (rel === '' || rel.startsWith('../') || path.isAbsolute(rel)) {
            throw new StubwrightError(`${absolutePath} is outside the project root ${this.layout.projectRoot}`);
        }
        const ext = path.posix.extname(rel);
        return rel.slice(0, rel.length - ext.length).split('/').join('.');
    }

    sourceModuleName(sourceRel: string): string {
        return this.moduleName(path.join(this.layout.sourceRoot, ...sourceRel.split('/')));
    }
}

function splitRelative(relPath: string): { dir: string[]; stem: string; ext: string } {
    const parts = relPath.split('/');
    const base = parts.pop() ?? '';
    const ext = path.posix.extname(base);
    return { dir: parts, stem: base.slice(0, base.length - ext.length), ext };
}
