#!/usr/bin/env node
// src/stubwright.ts
import chalk from 'chalk';
import { Command } from 'commander';
import { Config, PathsConfig, initConfigFile } from './lib/Config';
import { FileSystem } from './lib/FileSystem';
import { ShellExecutor } from './lib/ShellExecutor';
import { TestScaffolder } from './lib/TestScaffolder';
import { DevTasks } from './lib/DevTasks';

const VERSION = '0.1.0';

// Aliases, not interfaces: optsWithGlobals<T>() needs an implicit index signature.
type GlobalOptions = {
    cwd: string;
    config?: string;
};

type SweepCommandOptions = GlobalOptions & {
    source?: string;
    tests?: string;
    fixtures?: string;
    sharedFile?: string;
    dryRun?: boolean;
};

export interface ProgramDeps {
    fs?: FileSystem;
    shell?: ShellExecutor;
}

function pathOverrides(options: SweepCommandOptions): Partial<PathsConfig> {
    return {
        source_root: options.source,
        test_root: options.tests,
        fixture_root: options.fixtures,
        shared_fixtures_file: options.sharedFile,
    };
}

/**
 * Runs a command body and turns its outcome into `process.exitCode`. Any error ends
 * up as one red line and exit status 1.
 */
async function report(commandName: string, body: () => Promise<number>): Promise<void> {
    try {
        process.exitCode = await body();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`\n🛑 ${commandName} failed: ${message}`));
        process.exitCode = 1;
    }
}

export function buildProgram(deps: ProgramDeps = {}): Command {
    const fs = deps.fs ?? new FileSystem();
    const shell = deps.shell ?? new ShellExecutor();

    const load = (options: GlobalOptions) => new Config(options.cwd, options.config);
    const scaffolderFor = (options: SweepCommandOptions) => {
        const config = load(options);
        return { config, scaffolder: TestScaffolder.fromConfig(fs, config, pathOverrides(options)) };
    };
    const tasksFor = (options: SweepCommandOptions) => {
        const { config, scaffolder } = scaffolderFor(options);
        return new DevTasks(shell, config.commands, config.projectRoot, scaffolder);
    };

    const program = new Command()
        .name('stubwright')
        .description('Mirror a Python source tree into pytest stubs and keep the shared fixture imports in sync')
        .version(VERSION)
        .option('-C, --cwd <dir>', 'project root', process.cwd())
        .option('-c, --config <file>', 'config file (default: <project root>/stubwright.yaml)');

    const withPathOptions = (command: Command): Command => command
        .option('--source <dir>', 'source root')
        .option('--tests <dir>', 'test root')
        .option('--fixtures <dir>', 'fixture root')
        .option('--shared-file <file>', 'shared fixture import file');

    program.command('init')
        .description('write a default stubwright.yaml into the project root')
        .action((_options: object, command: Command) => report('init', async () => {
            const config = load(command.optsWithGlobals<GlobalOptions>());
            await initConfigFile(fs, config.getConfigFilePath());
            return 0;
        }));

    withPathOptions(program.command('generate-test-files'))
        .description('create missing test and fixture stubs for every source file')
        .option('--dry-run', 'list the stubs that would be created')
        .action((_options: object, command: Command) => report('generate-test-files', async () => {
            const options = command.optsWithGlobals<SweepCommandOptions>();
            await scaffolderFor(options).scaffolder.generateTestFiles({ dryRun: options.dryRun });
            return 0;
        }));

    withPathOptions(program.command('import-fixtures'))
        .description('rewrite the managed fixture import block of the shared fixture file')
        .action((_options: object, command: Command) => report('import-fixtures', async () => {
            await scaffolderFor(command.optsWithGlobals<SweepCommandOptions>()).scaffolder.importFixtures();
            return 0;
        }));

    withPathOptions(program.command('clean-unused-tests'))
        .description('delete stubs that were never edited and the directories they leave empty')
        .option('--dry-run', 'list the stubs that would be deleted')
        .action((_options: object, command: Command) => report('clean-unused-tests', async () => {
            const options = command.optsWithGlobals<SweepCommandOptions>();
            await scaffolderFor(options).scaffolder.cleanUnusedTests({ dryRun: options.dryRun });
            return 0;
        }));

    program.command('run')
        .description('start the dev server')
        .action((_options: object, command: Command) => report('run', () =>
            tasksFor(command.optsWithGlobals<GlobalOptions>()).run()));

    program.command('clean')
        .description('run the configured formatters')
        .action((_options: object, command: Command) => report('clean', () =>
            tasksFor(command.optsWithGlobals<GlobalOptions>()).clean()));

    program.command('run-tests')
        .description('run the test suite; extra arguments go to the test runner')
        .argument('[args...]', 'arguments for the test runner')
        .allowUnknownOption()
        .action((args: string[], _options: object, command: Command) => report('run-tests', () =>
            tasksFor(command.optsWithGlobals<GlobalOptions>()).runTests(args)));

    withPathOptions(program.command('pre-stage'))
        .description('import-fixtures, then clean, then run-tests; stops at the first failure')
        .action((_options: object, command: Command) => report('pre-stage', () =>
            tasksFor(command.optsWithGlobals<SweepCommandOptions>()).preStage()));

    return program;
}

if (require.main === module) {
    buildProgram().parseAsync(process.argv).catch((error: unknown) => {
        console.error(chalk.red('Unexpected error:'), error);
        process.exitCode = 1;
    });
}
