// File: src/lib/DevTasks.ts
import chalk from 'chalk';
import { ShellExecutor } from './ShellExecutor';
import { TestScaffolder } from './TestScaffolder';
import { CommandsConfig } from './Config';
import { StubwrightError } from './errors';

/**
 * The developer commands that hand off to external tools (dev server, formatters,
 * test runner). Every method resolves to the exit status the CLI should report.
 */
export class DevTasks {
    private shell: ShellExecutor;
    private commands: CommandsConfig;
    private projectRoot: string;
    private scaffolder: TestScaffolder;

    constructor(shell: ShellExecutor, commands: CommandsConfig, projectRoot: string, scaffolder: TestScaffolder) {
        this.shell = shell;
        this.commands = commands;
        this.projectRoot = projectRoot;
        this.scaffolder = scaffolder;
    }

    async run(): Promise<number> {
        console.log(chalk.cyan('\nStarting dev server...'));
        return this.shell.spawnAndWait(this.commands.run, [], { cwd: this.projectRoot });
    }

    /** Runs the formatter commands in order, stopping at the first failure. */
    async clean(): Promise<number> {
        console.log(chalk.cyan('\nFormatting code...'));
        for (const command of this.commands.clean) {
            const code = await this.shell.spawnAndWait(command, [], { cwd: this.projectRoot });
            if (code !== 0) {
                console.error(chalk.red(`Formatter "${command}" exited with code ${code}.`));
                return code;
            }
        }
        return 0;
    }

    async runTests(args: string[] = []): Promise<number> {
        console.log(chalk.cyan('\nRunning tests...'));
        return this.shell.spawnAndWait(this.commands.run_tests, args, { cwd: this.projectRoot });
    }

    async importFixtures(): Promise<number> {
        try {
            await this.scaffolder.importFixtures();
            return 0;
        } catch (error) {
            if (error instanceof StubwrightError) {
                console.error(chalk.red(`import-fixtures failed: ${error.message}`));
                return 1;
            }
            throw error;
        }
    }

    /**
     * import-fixtures, then the formatters, then the test suite. The first step
     * that fails ends the sequence and its exit status is returned as is.
     */
    async preStage(): Promise<number> {
        const steps: Array<[string, () => Promise<number>]> = [
            ['import-fixtures', () => this.importFixtures()],
            ['clean', () => this.clean()],
            ['run-tests', () => this.runTests()],
        ];
        for (const [name, step] of steps) {
            const code = await step();
            if (code !== 0) {
                console.error(chalk.red(`pre-stage stopped: ${name} exited with code ${code}.`));
                return code;
            }
        }
        console.log(chalk.green('\npre-stage complete.'));
        return 0;
    }
}
