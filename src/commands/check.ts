import { Command, Option } from 'commander';

import type { CommandResult, DependencyScope, OutputFormat } from '../types/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { registerCleanup } from '../utils/interrupt.js';
import { loadConfig } from '../core/config.js';
import { ExistenceCache } from '../core/cache/existence-cache.js';
import { ExistenceOracle } from '../core/oracle/existence-oracle.js';
import { DnfRepoQueryRunner } from '../core/oracle/repo-query.js';
import { runAudit, type AuditResult, type CheckProgress } from '../core/audit/audit-pipeline.js';
import { renderJsonReport, renderTextReport } from '../core/report/audit-report.js';
import { createCliOutput } from '../cli/context.js';

interface CheckOptions {
  sourceDir?: string;
  format?: OutputFormat;
  quiet?: boolean;
  cleanup?: boolean;
  allDeps?: boolean;
  allCrates?: boolean;
  updateSpec?: string;
  draft?: boolean;
  cacheFile?: string;
  config?: string;
  firstParty?: string[];
  exclude?: string[];
}

export function resolveScope(options: Pick<CheckOptions, 'allDeps' | 'allCrates'>): DependencyScope {
  if (options.allCrates) return 'workspace';
  if (options.allDeps) return 'lockfile';
  return 'root';
}

export function formatProgressLine(progress: CheckProgress): string {
  const counter = `[${progress.index}/${progress.total}]`;
  const status = progress.verdict.exists && progress.verdict.packages.length > 0
    ? `✓ ${progress.verdict.packages[0]}`
    : '✗ MISSING';
  return `${counter} Checking ${progress.name.padEnd(40)} ${status}`;
}

async function checkCommand(archive: string | undefined, options: CheckOptions): Promise<CommandResult<AuditResult>> {
  if (!archive && !options.sourceDir) {
    throw new ValidationError('either an archive or --source-dir must be provided');
  }

  const format: OutputFormat = options.format ?? 'text';
  const out = createCliOutput({ format, quiet: options.quiet });

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      cacheFile: options.cacheFile,
      firstParty: options.firstParty,
      exclude: options.exclude
    }
  });
  logger.debug('Effective configuration', config);

  const cache = await ExistenceCache.load(config.cacheFile, { ttlSeconds: config.cacheTtlSeconds });
  const oracle = new ExistenceOracle({
    runner: new DnfRepoQueryRunner(config.queryCommand),
    cache,
    timeoutMs: config.queryTimeoutMs,
    packagePrefix: config.packagePrefix
  });

  const result = await runAudit(
    {
      archive,
      sourceDir: options.sourceDir,
      keepExtracted: options.cleanup === false,
      scope: resolveScope(options),
      exclude: config.exclude,
      descriptorPath: options.updateSpec,
      draft: options.draft,
      firstParty: config.firstParty,
      packagePrefix: config.packagePrefix
    },
    {
      oracle,
      cache,
      output: out,
      registerCleanup,
      onProgress: progress => out.message(formatProgressLine(progress)),
      emitReport: report => {
        console.log(format === 'json' ? renderJsonReport(report) : renderTextReport(report));
      }
    }
  );

  if (result.descriptor) {
    // Keep stdout parseable in JSON mode
    const print = format === 'json' ? console.error : console.log;
    print(result.descriptor.preview);
    if (result.descriptor.applied) {
      out.success(`Spec file updated: ${result.descriptor.path}`);
    } else {
      out.info('Draft mode - no changes made. Remove --draft to apply changes.');
    }
  }

  return { success: true, data: result };
}

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .argument('[archive]', 'source archive to audit (e.g. project-1.2.3.tar.zstd)')
    .description('Check whether Cargo dependencies are packaged in the distribution repositories')
    .option('--source-dir <dir>', 'audit an already extracted source directory')
    .addOption(new Option('--format <format>', 'report format').choices(['text', 'json']).default('text'))
    .option('--quiet', 'suppress progress messages')
    .option('--no-cleanup', 'keep the temporary extraction directory')
    .option('--all-deps', 'check every package in Cargo.lock, transitive ones included')
    .option('--all-crates', 'scan every Cargo.toml in the tree, tracking where each dependency is declared')
    .option('--update-spec <file>', 'update the BuildRequires/bundled Provides regions of an RPM spec file')
    .option('--draft', 'preview spec file changes without writing them')
    .option('--cache-file <file>', 'cache file location (default: .cache/distro-deps.json)')
    .option('--config <file>', 'configuration file (default: distro-deps.jsonc in the working directory)')
    .option('--first-party <names...>', 'crates built from this source tree; never declared as bundled')
    .option('--exclude <globs...>', 'skip manifests matching these globs (relative to the source root)')
    .action(withErrorHandling(async (archive: string | undefined, options: CheckOptions) => {
      await checkCommand(archive, options);
    }));
}
