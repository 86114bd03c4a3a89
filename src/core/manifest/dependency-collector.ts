import { join, relative, sep } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import {
  UNKNOWN_VERSION,
  type DependencyScope,
  type DependencySet,
  type DependencySources
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import {
  discoverManifests,
  parseDirectDependencies,
  parseLockfile,
  parsePackageName,
  type DiscoverOptions
} from './manifest-parser.js';

/** One manifest's direct dependencies. `path` is what provenance reports show. */
export interface ManifestDependencies {
  path: string;
  dependencies: Set<string>;
}

export interface MergedDependencies {
  dependencies: DependencySet;
  sources?: DependencySources;
}

export interface CollectedDependencies extends MergedDependencies {
  scope: DependencyScope;
  /** Human-readable label, e.g. "direct (root only)" */
  dependencyType: string;
  manifestCount: number;
  /** Crates built from the tree itself: every `[package] name` under the root, sorted */
  workspaceCrates: string[];
}

const SCOPE_LABELS: Record<DependencyScope, string> = {
  root: 'direct (root only)',
  workspace: 'direct (from all crates)',
  lockfile: 'total'
};

/**
 * Resolve direct dependencies against the lockfile's versions.
 *
 * A single manifest yields a plain name -> version map. Several manifests
 * yield the union of their names, plus for each name the manifests that
 * declared it, in the order they were given.
 */
export function mergeDirectWithVersions(
  manifests: ManifestDependencies[],
  lockfileVersions: Record<string, string>
): MergedDependencies {
  const resolve = (name: string): string =>
    Object.prototype.hasOwnProperty.call(lockfileVersions, name) ? lockfileVersions[name] : UNKNOWN_VERSION;

  if (manifests.length === 1) {
    const dependencies: DependencySet = {};
    for (const name of manifests[0].dependencies) {
      dependencies[name] = resolve(name);
    }
    return { dependencies };
  }

  const sources = new Map<string, string[]>();
  for (const manifest of manifests) {
    for (const name of manifest.dependencies) {
      const declaredIn = sources.get(name) ?? [];
      if (!declaredIn.includes(manifest.path)) {
        declaredIn.push(manifest.path);
      }
      sources.set(name, declaredIn);
    }
  }

  const dependencies: DependencySet = {};
  const dependencySources: DependencySources = {};
  for (const [name, declaredIn] of sources) {
    dependencies[name] = resolve(name);
    dependencySources[name] = declaredIn;
  }

  return { dependencies, sources: dependencySources };
}

/**
 * Collect the dependency set a run audits, for the given scope.
 */
export async function collectDependencies(
  root: string,
  scope: DependencyScope,
  options: DiscoverOptions = {}
): Promise<CollectedDependencies> {
  const lockfileVersions = await parseLockfile(join(root, FILE_PATTERNS.CARGO_LOCK));
  const dependencyType = SCOPE_LABELS[scope];
  const discovered = await discoverManifests(root, options);
  const workspaceCrates = await collectWorkspaceCrates(discovered);

  if (scope === 'lockfile') {
    return {
      scope,
      dependencyType,
      manifestCount: 0,
      workspaceCrates,
      dependencies: { ...lockfileVersions }
    };
  }

  const manifestPaths = scope === 'root'
    ? [join(root, FILE_PATTERNS.CARGO_TOML)]
    : discovered;

  const manifests: ManifestDependencies[] = [];
  for (const manifestPath of manifestPaths) {
    manifests.push({
      path: toDisplayPath(root, manifestPath),
      dependencies: await parseDirectDependencies(manifestPath)
    });
  }

  logger.debug(`Parsed ${manifests.length} manifest(s) for scope '${scope}'`);

  // A workspace scan keeps provenance even when only one manifest exists
  const merged = scope === 'workspace' && manifests.length === 1
    ? withSingleSource(mergeDirectWithVersions(manifests, lockfileVersions), manifests[0].path)
    : mergeDirectWithVersions(manifests, lockfileVersions);

  return {
    scope,
    dependencyType,
    manifestCount: manifests.length,
    workspaceCrates,
    ...merged
  };
}

async function collectWorkspaceCrates(manifestPaths: string[]): Promise<string[]> {
  const names = new Set<string>();
  for (const manifestPath of manifestPaths) {
    const name = await parsePackageName(manifestPath);
    if (name !== undefined) {
      names.add(name);
    }
  }
  return [...names].sort();
}

function withSingleSource(merged: MergedDependencies, path: string): MergedDependencies {
  const sources: DependencySources = {};
  for (const name of Object.keys(merged.dependencies)) {
    sources[name] = [path];
  }
  return { ...merged, sources };
}

function toDisplayPath(root: string, path: string): string {
  return relative(root, path).split(sep).join('/');
}
