import { DevTasks } from '../DevTasks';
import { FileSystem } from '../FileSystem';
import { ImportReport, TestScaffolder } from '../TestScaffolder';
import { FixtureConflictError } from '../errors';
import { defaultLayout, FakeShell, silenceConsole } from './helpers';

class FakeScaffolder extends TestScaffolder {
  importCalls = 0;
  failure: Error | null = null;

  constructor() {
    super(new FileSystem(), defaultLayout('/proj'));
  }

  async importFixtures(): Promise<ImportReport> {
    this.importCalls++;
    if (this.failure) throw this.failure;
    return { fixtures: [], changed: false, sharedFile: '/proj/tests/conftest.py' };
  }
}

describe('DevTasks', () => {
  const commands = {
    run: 'uvicorn src.main:app --reload',
    clean: ['isort src tests', 'black src tests'],
    run_tests: 'pytest',
  };
  let shell: FakeShell;
  let scaffolder: FakeScaffolder;
  let tasks: DevTasks;

  beforeEach(() => {
    silenceConsole();
    shell = new FakeShell();
    scaffolder = new FakeScaffolder();
    tasks = new DevTasks(shell, commands, '/proj', scaffolder);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('run starts the dev server and returns its exit code', async () => {
    shell.exitCodes['uvicorn src.main:app --reload'] = 3;
    expect(await tasks.run()).toBe(3);
    expect(shell.calls).toEqual([{ command: 'uvicorn src.main:app --reload', args: [], cwd: '/proj' }]);
  });

  it('clean stops at the first failing formatter', async () => {
    shell.exitCodes['isort src tests'] = 2;
    expect(await tasks.clean()).toBe(2);
    expect(shell.calls.map(c => c.command)).toEqual(['isort src tests']);
  });

  it('runTests forwards extra arguments to the test runner', async () => {
    expect(await tasks.runTests(['-k', 'orders and not slow'])).toBe(0);
    expect(shell.calls).toEqual([{ command: 'pytest', args: ['-k', 'orders and not slow'], cwd: '/proj' }]);
  });

  describe('preStage', () => {
    it('runs import-fixtures, the formatters and the tests in order', async () => {
      expect(await tasks.preStage()).toBe(0);
      expect(scaffolder.importCalls).toBe(1);
      expect(shell.calls.map(c => c.command)).toEqual(['isort src tests', 'black src tests', 'pytest']);
    });

    it('stops with exit 1 when import-fixtures reports a conflict', async () => {
      scaffolder.failure = new FixtureConflictError([
        { name: 'x', first: { file: 'a_fixtures.py', line: 4 }, duplicate: { file: 'b_fixtures.py', line: 4 } },
      ]);
      expect(await tasks.preStage()).toBe(1);
      expect(shell.calls).toEqual([]);
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('import-fixtures failed'));
    });

    it('returns the formatter exit status unchanged and skips the tests', async () => {
      shell.exitCodes['black src tests'] = 123;
      expect(await tasks.preStage()).toBe(123);
      expect(shell.calls.map(c => c.command)).toEqual(['isort src tests', 'black src tests']);
    });

    it('returns the test runner exit status unchanged', async () => {
      shell.exitCodes.pytest = 5;
      expect(await tasks.preStage()).toBe(5);
    });
  });

  it('lets unexpected import errors propagate', async () => {
    scaffolder.failure = new TypeError('boom');
    await expect(tasks.importFixtures()).rejects.toThrow('boom');
  });
});
