/**
 * Command-line interface.
 *
 * Command handlers return exit codes; the commander program only parses
 * arguments and forwards them.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';
import { v4 as uuidv4 } from 'uuid';
import { buildModule } from './build.js';
import { DEFAULT_CONFIG_FILE, loadSettings, resolveSettings, type ToolSettings } from './config.js';
import { ConfigError, ConfigNotFoundError, ModuleDirNotFoundError, ToolError } from './errors.js';
import { createModuleDescriptor, discoverModules } from './module/descriptor.js';
import { ContextLogger, type WritableOutput } from './observability/context-logger.js';
import { regenerateAll } from './regenerator.js';
import { isVersionPart, readModuleVersionFile, updateModuleVersion, VERSION_PARTS, type VersionPart } from './version.js';
import { VERSION } from './index.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  MODULE_FAILED: 1,
  CONFIG_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CommonOptions {
  root?: string;
  config?: string;
  logLevel?: string;
  logFormat?: string;
  /** Directory searched for the default config file. */
  cwd?: string;
}

export interface CliIO {
  stdout: WritableOutput;
  stderr: WritableOutput;
}

const defaultIO: CliIO = {
  stdout: { write: (s: string) => process.stdout.write(s) },
  stderr: { write: (s: string) => process.stderr.write(s) },
};

function settingsOverrides(opts: CommonOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (opts.root !== undefined) overrides['root'] = opts.root;
  const logging: Record<string, unknown> = {};
  if (opts.logLevel !== undefined) logging['level'] = opts.logLevel;
  if (opts.logFormat !== undefined) logging['format'] = opts.logFormat;
  if (Object.keys(logging).length > 0) overrides['logging'] = logging;
  return overrides;
}

/**
 * Settings from `--config`, else from psmanifest.yaml in the working
 * directory when present, else from the flags alone.
 */
export function resolveCliSettings(opts: CommonOptions): ToolSettings {
  const overrides = settingsOverrides(opts);
  if (opts.config !== undefined) {
    return loadSettings(opts.config, overrides);
  }
  const implicit = join(opts.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
  if (existsSync(implicit)) {
    return loadSettings(implicit, overrides);
  }
  if (overrides['root'] === undefined) {
    throw new ConfigError(`No module root given: pass --root or create ${DEFAULT_CONFIG_FILE}`);
  }
  return resolveSettings(overrides);
}

function createLogger(settings: ToolSettings, io: CliIO): ContextLogger {
  return new ContextLogger({
    level: settings.logging.level,
    format: settings.logging.format,
    output: io.stderr,
    runId: uuidv4(),
  });
}

function withSettings(opts: CommonOptions, io: CliIO, run: (settings: ToolSettings) => ExitCode): ExitCode {
  let settings: ToolSettings;
  try {
    settings = resolveCliSettings(opts);
  } catch (e) {
    if (e instanceof ConfigError || e instanceof ConfigNotFoundError) {
      io.stderr.write(`${e.toString()}\n`);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw e;
  }
  try {
    return run(settings);
  } catch (e) {
    if (e instanceof ToolError) {
      io.stderr.write(`${e.toString()}\n`);
      return e instanceof ConfigError || e instanceof ModuleDirNotFoundError
        ? EXIT_CODES.CONFIG_ERROR
        : EXIT_CODES.MODULE_FAILED;
    }
    throw e;
  }
}

function selectModules(requested: readonly string[], settings: ToolSettings): string[] {
  if (requested.length > 0) return [...requested];
  if (settings.modules.length > 0) return [...settings.modules];
  return discoverModules(settings.root, settings);
}

export interface RegenCommandOptions extends CommonOptions {
  dryRun?: boolean;
}

export function executeRegen(moduleNames: readonly string[], opts: RegenCommandOptions, io: CliIO = defaultIO): ExitCode {
  return withSettings(opts, io, (settings) => {
    const logger = createLogger(settings, io);
    const batch = regenerateAll(settings.root, selectModules(moduleNames, settings), {
      ...settings,
      logger,
      runId: logger.runId ?? undefined,
      dryRun: opts.dryRun ?? false,
    });

    for (const result of batch.results) {
      for (const artifact of result.artifacts) {
        io.stdout.write(`${result.moduleName}\t${artifact.kind}\t${artifact.status}\n`);
      }
    }
    for (const failure of batch.failures) {
      io.stdout.write(`${failure.moduleName}\tfailed\t${failure.error.message}\n`);
    }
    return batch.failures.length > 0 ? EXIT_CODES.MODULE_FAILED : EXIT_CODES.SUCCESS;
  });
}

function parsePart(part: string, io: CliIO): VersionPart | null {
  if (isVersionPart(part)) return part;
  io.stderr.write(`Invalid version part '${part}', expected one of: ${VERSION_PARTS.join(', ')}\n`);
  return null;
}

export function executeBump(moduleName: string, part: string, opts: CommonOptions, io: CliIO = defaultIO): ExitCode {
  const versionPart = parsePart(part, io);
  if (versionPart === null) return EXIT_CODES.CONFIG_ERROR;
  return withSettings(opts, io, (settings) => {
    const descriptor = createModuleDescriptor(settings.root, moduleName, settings);
    const bump = updateModuleVersion(descriptor, versionPart, { logger: createLogger(settings, io) });
    io.stdout.write(`${bump.moduleName}\t${bump.previous} -> ${bump.next}\n`);
    return EXIT_CODES.SUCCESS;
  });
}

export interface BuildCommandOptions extends RegenCommandOptions {
  bump?: string;
}

export function executeBuild(moduleName: string, opts: BuildCommandOptions, io: CliIO = defaultIO): ExitCode {
  let bump: VersionPart | undefined;
  if (opts.bump !== undefined) {
    const parsed = parsePart(opts.bump, io);
    if (parsed === null) return EXIT_CODES.CONFIG_ERROR;
    bump = parsed;
  }
  return withSettings(opts, io, (settings) => {
    const descriptor = createModuleDescriptor(settings.root, moduleName, settings);
    const result = buildModule(descriptor, {
      ...settings,
      logger: createLogger(settings, io),
      dryRun: opts.dryRun ?? false,
      bump,
    });
    for (const artifact of result.regeneration.artifacts) {
      io.stdout.write(`${moduleName}\t${artifact.kind}\t${artifact.status}\n`);
    }
    if (result.version) {
      io.stdout.write(`${moduleName}\tversion\t${result.version.previous} -> ${result.version.next}\n`);
    }
    return EXIT_CODES.SUCCESS;
  });
}

export function executeList(opts: CommonOptions, io: CliIO = defaultIO): ExitCode {
  return withSettings(opts, io, (settings) => {
    for (const name of discoverModules(settings.root, settings)) {
      const version = readModuleVersionFile(createModuleDescriptor(settings.root, name, settings));
      io.stdout.write(`${name}\t${version ?? '-'}\n`);
    }
    return EXIT_CODES.SUCCESS;
  });
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-r, --root <dir>', 'Directory containing the module directories')
    .option('-c, --config <file>', `Configuration file (default: ./${DEFAULT_CONFIG_FILE} when present)`)
    .option('--log-level <level>', 'trace, debug, info, warn, error or fatal')
    .option('--log-format <format>', 'text or json');
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('psmanifest')
    .description('Regenerate PowerShell module loader scripts and manifest export lists')
    .version(VERSION);

  addCommonOptions(
    program
      .command('regen')
      .description('Regenerate loader scripts and manifest export lists')
      .argument('[modules...]', 'Module names (default: configured or discovered modules)'),
  )
    .option('-n, --dry-run', 'Report what would change without writing', false)
    .action((modules: string[], opts: RegenCommandOptions) => {
      process.exitCode = executeRegen(modules, opts, io);
    });

  addCommonOptions(
    program
      .command('bump')
      .description('Bump the ModuleVersion in a module manifest')
      .argument('<module>', 'Module name')
      .argument('[part]', VERSION_PARTS.join(' | '), 'patch'),
  ).action((moduleName: string, part: string, opts: CommonOptions) => {
    process.exitCode = executeBump(moduleName, part, opts, io);
  });

  addCommonOptions(
    program
      .command('build')
      .description('Regenerate a module and optionally bump its version')
      .argument('<module>', 'Module name'),
  )
    .option('-b, --bump <part>', VERSION_PARTS.join(' | '))
    .option('-n, --dry-run', 'Report what would change without writing', false)
    .action((moduleName: string, opts: BuildCommandOptions) => {
      process.exitCode = executeBuild(moduleName, opts, io);
    });

  addCommonOptions(program.command('list').description('List modules and their versions')).action(
    (opts: CommonOptions) => {
      process.exitCode = executeList(opts, io);
    },
  );

  return program;
}
