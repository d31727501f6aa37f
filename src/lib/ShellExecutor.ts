// src/lib/ShellExecutor.ts
import { spawn, SpawnOptions } from 'child_process';
import chalk from 'chalk';

/** Quotes an argument for a POSIX shell unless it is made of safe characters only. */
export function quoteArg(arg: string): string {
    if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
    return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export class ShellExecutor {

    /**
     * Spawns a command, waits for it to exit, and resolves with its exit code.
     * A process killed by a signal resolves to 1.
     * @param command The command line, interpreted by the shell (e.g. "black src tests").
     * @param args Extra arguments, quoted and appended to the command line.
     * @param options Spawn options; stdio defaults to 'inherit' and shell to true.
     * @returns The exit code, or a rejection when the process could not be spawned.
     */
    async spawnAndWait(command: string, args: string[] = [], options: SpawnOptions = {}): Promise<number> {
        return new Promise((resolve, reject) => {
            const commandLine = [command, ...args.map(quoteArg)].join(' ');
            console.log(chalk.dim(`Spawning command: ${commandLine}${options.cwd ? ` in ${options.cwd}` : ''}`));
            const child = spawn(commandLine, { stdio: 'inherit', shell: true, ...options });

            child.on('close', (code, signal) => {
                if (code === null) {
                    console.error(chalk.red(`Command "${commandLine}" was terminated by ${signal ?? 'an unknown signal'}`));
                    resolve(1);
                    return;
                }
                console.log(chalk.dim(`Command "${commandLine}" closed with code: ${code}`));
                resolve(code);
            });

            child.on('error', (error) => {
                console.error(chalk.red(`Error spawning command "${commandLine}":`), error);
                reject(error);
            });
        });
    }
}
