/**
 * Audit pipeline: acquire the source tree, collect dependencies, check each
 * one against the distribution's repositories, persist the cache, emit the
 * report and optionally patch the RPM spec file.
 */

import type { DependencyScope, ExistenceVerdict } from '../../types/index.js';
import { NoDependenciesError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ExistenceCache } from '../cache/existence-cache.js';
import { DescriptorPatcher } from '../descriptor/descriptor-patcher.js';
import { collectDependencies, type CollectedDependencies } from '../manifest/dependency-collector.js';
import type { ExistenceOracle } from '../oracle/existence-oracle.js';
import { consoleOutput } from '../ports/console-output.js';
import type { OutputPort } from '../ports/output.js';
import { buildReport, type AuditReport } from '../report/audit-report.js';
import { acquireSourceTree, type ArchiveExtractor } from '../source/source-tree.js';

export interface AuditOptions {
  archive?: string;
  sourceDir?: string;
  /** Keep the extracted archive instead of removing it */
  keepExtracted?: boolean;
  scope: DependencyScope;
  /** minimatch globs of manifests to skip in workspace scope */
  exclude?: string[];
  /** RPM spec file whose generated regions are updated */
  descriptorPath?: string;
  /** Preview the descriptor changes without writing them */
  draft?: boolean;
  /** Added to the crates whose manifests live in the tree */
  firstParty?: string[];
  packagePrefix?: string;
}

export interface CheckProgress {
  index: number;
  total: number;
  name: string;
  version: string;
  verdict: ExistenceVerdict;
}

export interface AuditContext {
  oracle: ExistenceOracle;
  cache: ExistenceCache;
  emitReport(report: AuditReport): void;
  output?: OutputPort;
  extractor?: ArchiveExtractor;
  onProgress?(progress: CheckProgress): void;
  /** Hook for interrupt-time cleanup of an extracted archive */
  registerCleanup?(cleanup: () => Promise<void>): () => void;
}

export interface DescriptorOutcome {
  path: string;
  preview: string;
  applied: boolean;
}

export interface AuditResult {
  collected: CollectedDependencies;
  verdicts: Record<string, ExistenceVerdict>;
  report: AuditReport;
  descriptor?: DescriptorOutcome;
}

export async function runAudit(options: AuditOptions, ctx: AuditContext): Promise<AuditResult> {
  const out = ctx.output ?? consoleOutput;

  // A source directory takes precedence over an archive
  const spinner = options.archive && !options.sourceDir ? out.spinner() : undefined;
  spinner?.start(`Extracting ${options.archive}...`);

  const tree = await acquireSourceTree({
    archive: options.archive,
    sourceDir: options.sourceDir,
    keep: options.keepExtracted,
    extractor: ctx.extractor,
    registerCleanup: ctx.registerCleanup
  }).catch((error: unknown) => {
    spinner?.stop('Extraction failed');
    throw error;
  });

  if (spinner) {
    spinner.stop(`Extracted to: ${tree.root}`);
  } else {
    out.info(`Using source directory: ${tree.root}`);
  }

  try {
    return await auditTree(tree.root, options, ctx, out);
  } finally {
    if (tree.tempDir && !options.keepExtracted) {
      out.info('Cleaning up temporary files...');
    }
    await tree.release();
  }
}

async function auditTree(
  root: string,
  options: AuditOptions,
  ctx: AuditContext,
  out: OutputPort
): Promise<AuditResult> {
  out.step('Parsing Cargo files...');
  const collected = await collectDependencies(root, options.scope, { exclude: options.exclude });

  if (options.scope === 'workspace') {
    out.info(`Found ${collected.manifestCount} Cargo.toml files`);
  }

  const names = Object.keys(collected.dependencies).sort();
  if (names.length === 0) {
    throw new NoDependenciesError(root, options.scope);
  }
  out.info(`Found ${names.length} ${collected.dependencyType} dependencies`);

  out.step(`Checking dependencies in distribution repositories (cache: ${ctx.cache.filePath})`);
  const verdicts = await checkAll(names, collected, ctx);

  out.step('Saving cache...');
  if (!(await ctx.cache.flush())) {
    out.warn(`Could not save cache to ${ctx.cache.filePath}; results will be queried again next run`);
  }

  const report = buildReport(collected, verdicts);
  ctx.emitReport(report);

  const result: AuditResult = { collected, verdicts, report };

  if (options.descriptorPath) {
    const firstParty = [...collected.workspaceCrates, ...(options.firstParty ?? [])];
    logger.debug('First-party crates excluded from bundled declarations', { firstParty });
    const patcher = new DescriptorPatcher(options.descriptorPath, {
      packagePrefix: options.packagePrefix,
      firstParty
    });
    const preview = options.draft
      ? await patcher.preview(collected.dependencies, verdicts)
      : await patcher.apply(collected.dependencies, verdicts);
    result.descriptor = { path: options.descriptorPath, preview, applied: !options.draft };
  }

  return result;
}

/**
 * Check dependencies one at a time, in sorted order.
 */
async function checkAll(
  names: string[],
  collected: CollectedDependencies,
  ctx: AuditContext
): Promise<Record<string, ExistenceVerdict>> {
  const verdicts: Record<string, ExistenceVerdict> = {};

  for (const [offset, name] of names.entries()) {
    const verdict = await ctx.oracle.check(name);
    verdicts[name] = verdict;
    logger.debug(`Checked ${name}`, { exists: verdict.exists, message: verdict.message });
    ctx.onProgress?.({
      index: offset + 1,
      total: names.length,
      name,
      version: collected.dependencies[name],
      verdict
    });
  }

  return verdicts;
}
