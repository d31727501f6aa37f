// File: src/lib/TestScaffolder.ts
import path from 'path';
import chalk from 'chalk';
import ignore, { Ignore } from 'ignore';
import { FileSystem, toPosix } from './FileSystem';
import { PathMirror, SOURCE_EXTENSIONS } from './PathMirror';
import { matchesTemplate, renderFixtureStub, renderTestStub } from './StubTemplates';
import { FixtureDefinition, scanFixtures } from './FixtureScanner';
import { renderRegion, replaceRegion } from './ManagedRegion';
import { FixtureConflict, FixtureConflictError, TemplateMismatchError } from './errors';
import { Config, PathsConfig, ResolvedPaths } from './Config';

export interface ScaffoldLayout extends ResolvedPaths {
    testPrefix: string;
    fixtureSuffix: string;
    /** Gitignore-style patterns applied to every walked root. */
    ignore: string[];
}

export interface SweepOptions {
    dryRun?: boolean;
}

export interface GenerateReport {
    created: string[];
    existing: string[];
    skipped: string[];
}

export interface ImportReport {
    fixtures: FixtureDefinition[];
    changed: boolean;
    sharedFile: string;
}

export interface CleanReport {
    deleted: string[];
    kept: string[];
    /** Files in a stub tree that do not follow the stub naming; left in place. */
    mismatched: TemplateMismatchError[];
    removedDirs: string[];
}

type StubKind = 'test' | 'fixture';

interface StubFile {
    kind: StubKind;
    absolutePath: string;
    /** Relative to the stub's root, POSIX separators. */
    relativePath: string;
    root: string;
}

function isInside(child: string, parent: string): boolean {
    const rel = path.relative(parent, child);
    return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Keeps the test tree and the fixture tree in step with the source tree:
 * fills in missing stubs, wires fixtures into the shared fixture file, and
 * prunes stubs that were never edited.
 */
export class TestScaffolder {
    private fs: FileSystem;
    private layout: ScaffoldLayout;
    private mirror: PathMirror;
    private ig: Ignore;

    constructor(fs: FileSystem, layout: ScaffoldLayout) {
        this.fs = fs;
        this.layout = layout;
        this.mirror = new PathMirror(layout);
        this.ig = ignore().add(layout.ignore);
    }

    static fromConfig(fs: FileSystem, config: Config, overrides: Partial<PathsConfig> = {}): TestScaffolder {
        return new TestScaffolder(fs, {
            ...config.resolvePaths(overrides),
            testPrefix: config.naming.test_prefix,
            fixtureSuffix: config.naming.fixture_suffix,
            ignore: config.ignore,
        });
    }

    // --- generate-test-files ---

    async generateTestFiles(options: SweepOptions = {}): Promise<GenerateReport> {
        const { sourceRoot, testRoot, fixtureRoot, sharedFixturesFile } = this.layout;
        console.log(chalk.cyan(`\nGenerating stubs for ${sourceRoot}...`));

        const sources = await this.fs.listFiles(sourceRoot, {
            ig: this.ig,
            extensions: SOURCE_EXTENSIONS,
            exclude: [testRoot, fixtureRoot, sharedFixturesFile],
        });
        if (sources.length === 0) {
            console.warn(chalk.yellow(`No source files found under ${sourceRoot}.`));
        }

        const report: GenerateReport = { created: [], existing: [], skipped: [] };
        const planned: Array<{ filePath: string; content: string }> = [];

        for (const sourcePath of sources) {
            const sourceRel = toPosix(path.relative(sourceRoot, sourcePath));
            const moduleName = this.mirror.sourceModuleName(sourceRel);
            const targets = [
                { filePath: this.mirror.testPathFor(sourceRel), content: renderTestStub(moduleName), kind: 'test' },
                { filePath: this.mirror.fixturePathFor(sourceRel), content: renderFixtureStub(moduleName), kind: 'fixture' },
            ];
            for (const target of targets) {
                if (target.filePath === sharedFixturesFile
                    || (target.kind === 'test' && isInside(target.filePath, fixtureRoot))) {
                    console.warn(chalk.yellow(`  Skipping ${target.filePath}: ${sourceRel} mirrors onto a path this tool manages differently.`));
                    report.skipped.push(target.filePath);
                    continue;
                }
                const stat = await this.fs.stat(target.filePath);
                if (stat && stat.size > 0) {
                    report.existing.push(target.filePath);
                } else {
                    planned.push(target);
                }
            }
        }

        for (const { filePath, content } of planned) {
            if (!options.dryRun) {
                await this.fs.writeFile(filePath, content);
            }
            report.created.push(filePath);
            console.log(chalk.green(`  ${options.dryRun ? 'Would create' : 'Created'} ${path.relative(this.layout.projectRoot, filePath)}`));
        }
        console.log(chalk.dim(`  ${report.created.length} created, ${report.existing.length} already present, ${report.skipped.length} skipped.`));
        return report;
    }

    // --- import-fixtures ---

    /**
     * Rebuilds the managed import block of the shared fixture file from the fixture stubs
     * developers have filled in. Fails without writing anything when two fixtures share a name.
     * @throws FixtureConflictError
     */
    async importFixtures(): Promise<ImportReport> {
        const { sharedFixturesFile } = this.layout;
        console.log(chalk.cyan(`\nCollecting fixtures from ${this.layout.fixtureRoot}...`));

        const fixtures: FixtureDefinition[] = [];
        const conflicts: FixtureConflict[] = [];
        const seen = new Map<string, FixtureDefinition>();

        for (const stub of await this.listStubs('fixture')) {
            const template = this.templateFor(stub);
            if (template instanceof TemplateMismatchError) continue;
            const content = await this.fs.readFile(stub.absolutePath);
            if (content === null || matchesTemplate(content, template)) continue;

            const moduleName = this.mirror.moduleName(stub.absolutePath);
            for (const fixture of scanFixtures(content, stub.relativePath, moduleName)) {
                const first = seen.get(fixture.name);
                if (first) {
                    conflicts.push({
                        name: fixture.name,
                        first: { file: first.file, line: first.line },
                        duplicate: { file: fixture.file, line: fixture.line },
                    });
                    continue;
                }
                seen.set(fixture.name, fixture);
                fixtures.push(fixture);
            }
        }

        if (conflicts.length > 0) {
            throw new FixtureConflictError(conflicts);
        }

        const existing = await this.fs.readFile(sharedFixturesFile);
        const updated = replaceRegion(existing, renderRegion(fixtures), sharedFixturesFile);
        const changed = updated !== existing;
        if (changed) {
            await this.fs.writeFile(sharedFixturesFile, updated);
            console.log(chalk.green(`  Wrote ${fixtures.length} fixture import(s) to ${sharedFixturesFile}`));
        } else {
            console.log(chalk.dim(`  ${sharedFixturesFile} already up to date (${fixtures.length} fixture(s)).`));
        }
        return { fixtures, changed, sharedFile: sharedFixturesFile };
    }

    // --- clean-unused-tests ---

    async cleanUnusedTests(options: SweepOptions = {}): Promise<CleanReport> {
        console.log(chalk.cyan(`\nLooking for unedited stubs in ${this.layout.testRoot} and ${this.layout.fixtureRoot}...`));
        const report: CleanReport = { deleted: [], kept: [], mismatched: [], removedDirs: [] };
        const stale: StubFile[] = [];

        const stubs = [...await this.listStubs('test'), ...await this.listStubs('fixture')];
        for (const stub of stubs) {
            const template = this.templateFor(stub);
            if (template instanceof TemplateMismatchError) {
                report.mismatched.push(template);
                continue;
            }
            const content = await this.fs.readFile(stub.absolutePath);
            if (content !== null && matchesTemplate(content, template)) {
                stale.push(stub);
            } else {
                report.kept.push(stub.absolutePath);
            }
        }

        const touchedDirs = new Set<string>();
        for (const stub of stale) {
            if (!options.dryRun) {
                await this.fs.deleteFile(stub.absolutePath);
                let dir = path.dirname(stub.absolutePath);
                while (isInside(dir, stub.root)) {
                    touchedDirs.add(dir);
                    if (dir === stub.root) break;
                    dir = path.dirname(dir);
                }
            }
            report.deleted.push(stub.absolutePath);
            console.log(chalk.yellow(`  ${options.dryRun ? 'Would delete' : 'Deleted'} ${path.relative(this.layout.projectRoot, stub.absolutePath)}`));
        }

        const deepestFirst = [...touchedDirs].sort((a, b) => b.split(path.sep).length - a.split(path.sep).length || (a < b ? -1 : 1));
        for (const dir of deepestFirst) {
            if (await this.fs.removeDirIfEmpty(dir)) {
                report.removedDirs.push(dir);
                console.log(chalk.yellow(`  Removed empty directory ${path.relative(this.layout.projectRoot, dir) || '.'}`));
            }
        }
        console.log(chalk.dim(`  ${report.deleted.length} stub(s) removed, ${report.kept.length} edited stub(s) kept, ${report.mismatched.length} unrecognised file(s) skipped.`));
        return report;
    }

    // --- helpers ---

    /** Lists stub-tree files sorted by relative path. The fixture tree is left out of the test tree walk. */
    private async listStubs(kind: StubKind): Promise<StubFile[]> {
        const { testRoot, fixtureRoot, sharedFixturesFile } = this.layout;
        const root = kind === 'test' ? testRoot : fixtureRoot;
        const exclude = kind === 'test' ? [fixtureRoot, sharedFixturesFile] : [sharedFixturesFile];
        const files = await this.fs.listFiles(root, { ig: this.ig, extensions: SOURCE_EXTENSIONS, exclude });
        return files
            .map(absolutePath => ({ kind, absolutePath, root, relativePath: toPosix(path.relative(root, absolutePath)) }))
            .sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
    }

    /**
     * The template a stub would have been generated from, or a logged
     * TemplateMismatchError when its name does not follow the mirroring convention.
     */
    private templateFor(stub: StubFile): string | TemplateMismatchError {
        const sourceRel = stub.kind === 'test'
            ? this.mirror.sourceForTest(stub.relativePath)
            : this.mirror.sourceForFixture(stub.relativePath);
        if (sourceRel === null) {
            const expected = stub.kind === 'test'
                ? `'${this.layout.testPrefix}<module>.py'`
                : `'<module>${this.layout.fixtureSuffix}.py'`;
            const warning = new TemplateMismatchError(stub.absolutePath, `not named like a ${stub.kind} stub (expected ${expected}); skipped`);
            console.warn(chalk.yellow(`  Warning: ${warning.message}`));
            return warning;
        }
        const moduleName = this.mirror.sourceModuleName(sourceRel);
        return stub.kind === 'test' ? renderTestStub(moduleName) : renderFixtureStub(moduleName);
    }
}
