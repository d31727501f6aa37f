// File: src/lib/Config.ts
import * as fsSync from 'fs'; // Config is loaded once at startup, synchronously
import path from 'path';
import yaml from 'js-yaml';
import chalk from 'chalk';
import { ConfigError } from './errors';
import { FileSystem } from './FileSystem';
import { DEFAULT_CONFIG_YAML } from './config_defaults';

export const CONFIG_FILE_NAME = 'stubwright.yaml';

// --- Interfaces ---

export interface PathsConfig {
    source_root: string;
    test_root: string;
    fixture_root: string;
    shared_fixtures_file: string;
}

interface NamingConfig {
    test_prefix: string;
    fixture_suffix: string;
}

export interface CommandsConfig {
    run: string;
    clean: string[]; // Formatter commands, run in order
    run_tests: string;
}

/** Absolute locations the scaffolder works on. */
export interface ResolvedPaths {
    projectRoot: string;
    sourceRoot: string;
    testRoot: string;
    fixtureRoot: string;
    sharedFixturesFile: string;
}

const DEFAULT_PATHS: PathsConfig = {
    source_root: 'src',
    test_root: 'tests',
    fixture_root: 'tests/fixtures',
    shared_fixtures_file: 'tests/conftest.py',
};

const PATH_KEYS: Array<keyof PathsConfig> = ['source_root', 'test_root', 'fixture_root', 'shared_fixtures_file'];

const DEFAULT_NAMING: NamingConfig = {
    test_prefix: 'test_',
    fixture_suffix: '_fixtures',
};

const DEFAULT_IGNORE = ['__init__.py', '__pycache__/', 'conftest.py'];

const DEFAULT_COMMANDS: CommandsConfig = {
    run: 'uvicorn src.main:app --reload',
    clean: ['isort src tests', 'black src tests'],
    run_tests: 'pytest',
};

// --- YAML narrowing helpers ---

type YamlSection = Record<string, unknown>;

function isRecord(value: unknown): value is YamlSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(data: YamlSection, key: string, configPath: string): YamlSection {
    const value = data[key];
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
        throw new ConfigError(configPath, `'${key}' must be a mapping`);
    }
    return value;
}

function readString(section: YamlSection, key: string, label: string, configPath: string): string | undefined {
    const value = section[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw new ConfigError(configPath, `'${label}' must be a string`);
    }
    return value;
}

function readStringList(value: unknown, label: string, configPath: string): string[] | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') return [value];
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        return value;
    }
    throw new ConfigError(configPath, `'${label}' must be a string or a list of strings`);
}

// --- Config Class ---
class ConfigLoader {
    readonly projectRoot: string;
    paths: PathsConfig;
    naming: NamingConfig;
    ignore: string[];
    commands: CommandsConfig;
    private configFilePath: string;

    /**
     * @param projectRoot Directory every relative path in the config resolves against.
     * @param configFile Explicit config file; defaults to `stubwright.yaml` in the project root.
     */
    constructor(projectRoot: string = process.cwd(), configFile?: string) {
        this.projectRoot = path.resolve(projectRoot);
        this.configFilePath = configFile
            ? path.resolve(this.projectRoot, configFile)
            : path.join(this.projectRoot, CONFIG_FILE_NAME);

        const data = this.loadYaml();
        const pathsSection = readSection(data, 'paths', this.configFilePath);
        const namingSection = readSection(data, 'naming', this.configFilePath);
        const commandsSection = readSection(data, 'commands', this.configFilePath);

        this.paths = {
            source_root: readString(pathsSection, 'source_root', 'paths.source_root', this.configFilePath) ?? DEFAULT_PATHS.source_root,
            test_root: readString(pathsSection, 'test_root', 'paths.test_root', this.configFilePath) ?? DEFAULT_PATHS.test_root,
            fixture_root: readString(pathsSection, 'fixture_root', 'paths.fixture_root', this.configFilePath) ?? DEFAULT_PATHS.fixture_root,
            shared_fixtures_file: readString(pathsSection, 'shared_fixtures_file', 'paths.shared_fixtures_file', this.configFilePath) ?? DEFAULT_PATHS.shared_fixtures_file,
        };
        this.naming = {
            test_prefix: readString(namingSection, 'test_prefix', 'naming.test_prefix', this.configFilePath) ?? DEFAULT_NAMING.test_prefix,
            fixture_suffix: readString(namingSection, 'fixture_suffix', 'naming.fixture_suffix', this.configFilePath) ?? DEFAULT_NAMING.fixture_suffix,
        };
        if (!this.naming.test_prefix && !this.naming.fixture_suffix) {
            throw new ConfigError(this.configFilePath, "'naming.test_prefix' and 'naming.fixture_suffix' cannot both be empty");
        }
        this.ignore = readStringList(data.ignore, 'ignore', this.configFilePath) ?? [...DEFAULT_IGNORE];
        this.commands = {
            run: readString(commandsSection, 'run', 'commands.run', this.configFilePath) ?? DEFAULT_COMMANDS.run,
            clean: readStringList(commandsSection.clean, 'commands.clean', this.configFilePath) ?? [...DEFAULT_COMMANDS.clean],
            run_tests: readString(commandsSection, 'run_tests', 'commands.run_tests', this.configFilePath) ?? DEFAULT_COMMANDS.run_tests,
        };
    }

    private loadYaml(): YamlSection {
        if (!fsSync.existsSync(this.configFilePath)) {
            console.log(chalk.dim(`No ${path.basename(this.configFilePath)} found at ${this.configFilePath}. Using defaults.`));
            return {};
        }
        try {
            const loaded = yaml.load(fsSync.readFileSync(this.configFilePath, 'utf8'));
            if (isRecord(loaded)) {
                return loaded;
            }
            console.warn(chalk.yellow(`Warning: ${this.configFilePath} is empty or not a mapping. Using defaults.`));
        } catch (e) {
            console.error(chalk.red(`Error loading or parsing ${this.configFilePath}:`), e);
            console.warn(chalk.yellow('Continuing with default configuration...'));
        }
        return {};
    }

    /**
     * Resolves the configured paths (optionally overridden per invocation) against the project root.
     * @throws ConfigError when the fixture root is the test root or one of its ancestors.
     */
    resolvePaths(overrides: Partial<PathsConfig> = {}): ResolvedPaths {
        const merged: PathsConfig = { ...this.paths };
        for (const key of PATH_KEYS) {
            const override = overrides[key];
            if (override) merged[key] = override;
        }
        const resolved: ResolvedPaths = {
            projectRoot: this.projectRoot,
            sourceRoot: path.resolve(this.projectRoot, merged.source_root),
            testRoot: path.resolve(this.projectRoot, merged.test_root),
            fixtureRoot: path.resolve(this.projectRoot, merged.fixture_root),
            sharedFixturesFile: path.resolve(this.projectRoot, merged.shared_fixtures_file),
        };
        const testRootFromFixtures = path.relative(resolved.fixtureRoot, resolved.testRoot);
        if (testRootFromFixtures === '' || (!testRootFromFixtures.startsWith('..') && !path.isAbsolute(testRootFromFixtures))) {
            throw new ConfigError(
                this.configFilePath,
                `fixture root '${merged.fixture_root}' must not be the test root '${merged.test_root}' or contain it`,
            );
        }
        return resolved;
    }

    public getConfigFilePath(): string {
        return this.configFilePath;
    }
}

/**
 * Writes the default config file unless one already exists.
 * @returns `true` if the file was written.
 */
export async function initConfigFile(fs: FileSystem, configPath: string): Promise<boolean> {
    if (await fs.stat(configPath)) {
        console.log(chalk.yellow(`${configPath} already exists. Leaving it untouched.`));
        return false;
    }
    await fs.writeFile(configPath, DEFAULT_CONFIG_YAML);
    console.log(chalk.green(`Wrote default configuration to ${configPath}.`));
    return true;
}

export { ConfigLoader as Config };
