import fs from 'fs';
import os from 'os';
import path from 'path';
import { SpawnOptions } from 'child_process';
import { ShellExecutor } from '../ShellExecutor';
import { ScaffoldLayout } from '../TestScaffolder';

export function makeTempProject(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'stubwright-'));
}

export function writeFile(root: string, relPath: string, content: string): string {
  const filePath = path.join(root, ...relPath.split('/'));
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function readFile(root: string, relPath: string): string {
  return fs.readFileSync(path.join(root, ...relPath.split('/')), 'utf8');
}

export function exists(root: string, relPath: string): boolean {
  return fs.existsSync(path.join(root, ...relPath.split('/')));
}

/** Every file and directory under `root` (relative POSIX paths) with file contents, for before/after comparisons. */
export function snapshotTree(root: string): Record<string, string | null> {
  const tree: Record<string, string | null> = {};
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      const rel = path.relative(root, full).split(path.sep).join('/');
      if (entry.isDirectory()) {
        tree[`${rel}/`] = null;
        walk(full);
      } else {
        tree[rel] = fs.readFileSync(full, 'utf8');
      }
    }
  };
  walk(root);
  return tree;
}

export function defaultLayout(root: string): ScaffoldLayout {
  return {
    projectRoot: root,
    sourceRoot: path.join(root, 'src'),
    testRoot: path.join(root, 'tests'),
    fixtureRoot: path.join(root, 'tests', 'fixtures'),
    sharedFixturesFile: path.join(root, 'tests', 'conftest.py'),
    testPrefix: 'test_',
    fixtureSuffix: '_fixtures',
    ignore: ['__init__.py', '__pycache__/', 'conftest.py'],
  };
}

export interface SpawnCall {
  command: string;
  args: string[];
  cwd: SpawnOptions['cwd'];
}

/** Records commands instead of spawning them; exit codes come from `exitCodes` (default 0). */
export class FakeShell extends ShellExecutor {
  calls: SpawnCall[] = [];
  exitCodes: Record<string, number> = {};

  async spawnAndWait(command: string, args: string[] = [], options: SpawnOptions = {}): Promise<number> {
    this.calls.push({ command, args, cwd: options.cwd });
    return this.exitCodes[command] ?? 0;
  }
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
}
