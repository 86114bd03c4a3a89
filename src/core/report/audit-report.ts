import pc from 'picocolors';
import type { ExistenceVerdict } from '../../types/index.js';
import type { CollectedDependencies } from '../manifest/dependency-collector.js';

export interface ReportEntry {
  version: string;
  message: string;
  packages: string[];
  /** Manifests declaring the dependency, when provenance was tracked */
  definedIn?: string[];
}

export interface AuditReport {
  dependencyType: string;
  total: number;
  found: number;
  missing: number;
  foundPackages: Record<string, ReportEntry>;
  missingPackages: Record<string, ReportEntry>;
}

type Colors = Pick<typeof pc, 'bold' | 'green' | 'red' | 'dim'>;

export interface TextReportOptions {
  colors?: Colors;
}

export function buildReport(
  collected: Pick<CollectedDependencies, 'dependencies' | 'sources' | 'dependencyType'>,
  verdicts: Record<string, ExistenceVerdict>
): AuditReport {
  const report: AuditReport = {
    dependencyType: collected.dependencyType,
    total: 0,
    found: 0,
    missing: 0,
    foundPackages: {},
    missingPackages: {}
  };

  for (const name of Object.keys(collected.dependencies).sort()) {
    const verdict = verdicts[name] ?? { exists: false, message: 'Not checked', packages: [] };
    const entry: ReportEntry = {
      version: collected.dependencies[name],
      message: verdict.message,
      packages: [...verdict.packages]
    };
    const definedIn = collected.sources?.[name];
    if (definedIn) {
      entry.definedIn = [...definedIn];
    }

    report.total++;
    if (verdict.exists) {
      report.found++;
      report.foundPackages[name] = entry;
    } else {
      report.missing++;
      report.missingPackages[name] = entry;
    }
  }

  return report;
}

interface JsonReportEntry {
  version: string;
  message: string;
  fedora_packages?: string[];
  defined_in?: string[];
}

/**
 * Machine-readable report. Keys are snake_case; missing entries carry no
 * package list.
 */
export function renderJsonReport(report: AuditReport): string {
  const toJson = (entries: Record<string, ReportEntry>, withPackages: boolean): Record<string, JsonReportEntry> => {
    const result: Record<string, JsonReportEntry> = {};
    for (const [name, entry] of Object.entries(entries)) {
      const json: JsonReportEntry = { version: entry.version, message: entry.message };
      if (withPackages) {
        json.fedora_packages = [...entry.packages];
      }
      if (entry.definedIn) {
        json.defined_in = [...entry.definedIn];
      }
      result[name] = json;
    }
    return result;
  };

  return JSON.stringify({
    dependency_type: report.dependencyType,
    total: report.total,
    found: report.found,
    missing: report.missing,
    found_packages: toJson(report.foundPackages, true),
    missing_packages: toJson(report.missingPackages, false)
  }, null, 2);
}

function percentage(count: number, total: number): string {
  return total === 0 ? '0.0' : ((count / total) * 100).toFixed(1);
}

function row(name: string, version: string, detail: string): string {
  return `  ${name.padEnd(40)} ${`v${version}`.padEnd(16)} ${detail}`;
}

export function renderTextReport(report: AuditReport, options: TextReportOptions = {}): string {
  const colors = options.colors ?? pc;
  const rule = '='.repeat(80);
  const thinRule = '-'.repeat(80);
  const title = report.dependencyType === 'total' ? 'ALL DEPENDENCY' : 'TOP-LEVEL DEPENDENCY';

  const lines: string[] = [
    '',
    rule,
    colors.bold(`${title} CHECK REPORT`),
    rule,
    '',
    `Total ${report.dependencyType} dependencies: ${report.total}`,
    `Found in repositories: ${report.found} (${percentage(report.found, report.total)}%)`,
    `Missing from repositories: ${report.missing} (${percentage(report.missing, report.total)}%)`
  ];

  const missing = Object.entries(report.missingPackages);
  if (missing.length > 0) {
    lines.push('', thinRule, colors.red('❌ MISSING DEPENDENCIES:'), thinRule);
    for (const [name, entry] of missing) {
      lines.push(row(name, entry.version, entry.message));
      if (entry.definedIn) {
        lines.push(colors.dim(`    └─ defined in: ${entry.definedIn.join(', ')}`));
      }
    }
  }

  const found = Object.entries(report.foundPackages);
  if (found.length > 0) {
    lines.push('', thinRule, colors.green('✅ FOUND DEPENDENCIES:'), thinRule);
    for (const [name, entry] of found) {
      lines.push(row(name, entry.version, `=> ${entry.packages[0] ?? 'unknown'}`));
      // Provenance only matters for crates shared between manifests
      if (entry.definedIn && entry.definedIn.length > 1) {
        lines.push(colors.dim(`    └─ used in: ${entry.definedIn.join(', ')}`));
      }
    }
  }

  lines.push('', rule);
  return lines.join('\n');
}
