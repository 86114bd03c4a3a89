import { DEFAULT_PACKAGE_PREFIX, PREVIEW_LIMIT } from '../../constants/index.js';
import type { DependencySet, ExistenceVerdict } from '../../types/index.js';
import { InputNotFoundError } from '../../utils/errors.js';
import { exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { develPackageName } from '../oracle/existence-oracle.js';
import { patchDescriptor } from './descriptor-regions.js';

export interface DeclarationOptions {
  packagePrefix?: string;
  /**
   * Crates built from the packaged source tree itself. They are never
   * declared as bundled, whatever their verdict.
   */
  firstParty?: Iterable<string>;
}

export interface Declarations {
  buildRequires: string[];
  provides: string[];
}

export function buildRequiresLine(name: string, packagePrefix: string = DEFAULT_PACKAGE_PREFIX): string {
  return `BuildRequires: ${develPackageName(name, packagePrefix)}`;
}

export function bundledProvidesLine(name: string, version: string): string {
  return `Provides: bundled(crate(${name})) = ${version}`;
}

/**
 * Split dependencies, in sorted name order, into BuildRequires lines
 * (packaged in the distribution) and bundled Provides lines (vendored).
 */
export function partitionDeclarations(
  dependencies: DependencySet,
  verdicts: Record<string, ExistenceVerdict>,
  options: DeclarationOptions = {}
): Declarations {
  const packagePrefix = options.packagePrefix ?? DEFAULT_PACKAGE_PREFIX;
  const firstParty = new Set(options.firstParty ?? []);
  const declarations: Declarations = { buildRequires: [], provides: [] };

  for (const name of Object.keys(dependencies).sort()) {
    if (firstParty.has(name)) {
      continue;
    }

    const verdict = verdicts[name];
    if (verdict === undefined) {
      logger.warn(`No verdict recorded for ${name}; declaring it as bundled`);
    }

    if (verdict?.exists) {
      declarations.buildRequires.push(buildRequiresLine(name, packagePrefix));
    } else {
      declarations.provides.push(bundledProvidesLine(name, dependencies[name]));
    }
  }

  return declarations;
}

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

function renderPartition(title: string, lines: string[]): string {
  let section = `📦 ${title} (${lines.length}):\n`;
  section += `${THIN_RULE}\n`;
  if (lines.length === 0) {
    section += '  (none)\n';
  }
  for (const line of lines.slice(0, PREVIEW_LIMIT)) {
    section += `  ${line}\n`;
  }
  if (lines.length > PREVIEW_LIMIT) {
    section += `  ... and ${lines.length - PREVIEW_LIMIT} more\n`;
  }
  return section + '\n';
}

export function renderPreview(declarations: Declarations): string {
  let preview = `\n${RULE}\n`;
  preview += 'DESCRIPTOR UPDATE PREVIEW\n';
  preview += `${RULE}\n\n`;
  preview += renderPartition('BuildRequires to add', declarations.buildRequires);
  preview += renderPartition('Provides (bundled) to add', declarations.provides);
  preview += `${RULE}\n`;
  return preview;
}

/**
 * Updates the generated regions of an RPM spec file.
 */
export class DescriptorPatcher {
  constructor(
    readonly descriptorPath: string,
    private readonly options: DeclarationOptions = {}
  ) {}

  /** Validate the descriptor and render the changes, without writing. */
  async preview(dependencies: DependencySet, verdicts: Record<string, ExistenceVerdict>): Promise<string> {
    const { preview } = await this.render(dependencies, verdicts);
    return preview;
  }

  /** Rewrite the descriptor's regions and return the same preview text. */
  async apply(dependencies: DependencySet, verdicts: Record<string, ExistenceVerdict>): Promise<string> {
    const { preview, patched, original } = await this.render(dependencies, verdicts);
    if (patched === original) {
      logger.debug(`Descriptor already up to date: ${this.descriptorPath}`);
    } else {
      await writeTextFile(this.descriptorPath, patched);
    }
    return preview;
  }

  private async render(
    dependencies: DependencySet,
    verdicts: Record<string, ExistenceVerdict>
  ): Promise<{ preview: string; original: string; patched: string }> {
    if (!(await exists(this.descriptorPath))) {
      throw new InputNotFoundError('Spec file', this.descriptorPath);
    }

    const original = await readTextFile(this.descriptorPath);
    const declarations = partitionDeclarations(dependencies, verdicts, this.options);
    const patched = patchDescriptor(original, declarations.buildRequires, declarations.provides);

    return { preview: renderPreview(declarations), original, patched };
  }
}
