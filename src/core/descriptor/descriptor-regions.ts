/**
 * Marker-delimited regions of an RPM spec file.
 *
 * A region is a start marker line, an end marker line, and everything in
 * between. Patching replaces only the lines strictly between the markers.
 */

import { DESCRIPTOR_MARKERS } from '../../constants/index.js';
import { MalformedDescriptorError } from '../../utils/errors.js';

export interface RegionMarkers {
  label: string;
  start: string;
  end: string;
}

/** Line indexes of a located region's markers. */
export interface Region {
  markers: RegionMarkers;
  start: number;
  end: number;
}

export interface RegionContent {
  markers: RegionMarkers;
  lines: string[];
}

/**
 * Split text into lines that keep their terminators, so joining the result
 * gives back the original text byte for byte.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function isMarkerLine(line: string, marker: string): boolean {
  return line.trim() === marker;
}

function indexesOf(lines: string[], marker: string): number[] {
  const found: number[] = [];
  lines.forEach((line, index) => {
    if (isMarkerLine(line, marker)) {
      found.push(index);
    }
  });
  return found;
}

export function locateRegion(lines: string[], markers: RegionMarkers): Region {
  const starts = indexesOf(lines, markers.start);
  const ends = indexesOf(lines, markers.end);

  if (starts.length === 0 || ends.length === 0) {
    const missing = starts.length === 0 ? markers.start : markers.end;
    throw new MalformedDescriptorError(`missing '${missing}' marker for ${markers.label}`, { markers });
  }
  if (starts.length > 1 || ends.length > 1) {
    const duplicated = starts.length > 1 ? markers.start : markers.end;
    throw new MalformedDescriptorError(`'${duplicated}' marker appears more than once`, { markers });
  }
  if (starts[0] >= ends[0]) {
    throw new MalformedDescriptorError(`'${markers.end}' precedes '${markers.start}'`, { markers });
  }

  return { markers, start: starts[0], end: ends[0] };
}

/**
 * Locate every region, rejecting documents whose regions overlap.
 */
export function locateRegions(lines: string[], markerSets: RegionMarkers[]): Region[] {
  const regions = markerSets.map(markers => locateRegion(lines, markers));

  for (let i = 0; i < regions.length; i++) {
    for (let j = i + 1; j < regions.length; j++) {
      const a = regions[i];
      const b = regions[j];
      if (a.start < b.end && b.start < a.end) {
        throw new MalformedDescriptorError(
          `${a.markers.label} and ${b.markers.label} regions overlap`,
          { regions: [a, b] }
        );
      }
    }
  }

  return regions;
}

function lineEnding(line: string): string {
  return line.endsWith('\r\n') ? '\r\n' : '\n';
}

/**
 * Replace the content of each region with the given lines (without
 * terminators). Markers and every line outside the regions are kept as-is.
 * Throws `MalformedDescriptorError` before producing any output when a
 * region cannot be located.
 */
export function patchRegions(text: string, contents: RegionContent[]): string {
  const lines = splitLines(text);
  const regions = locateRegions(lines, contents.map(content => content.markers));

  const byStart = new Map<number, { region: Region; lines: string[] }>();
  regions.forEach((region, index) => {
    byStart.set(region.start, { region, lines: contents[index].lines });
  });

  const output: string[] = [];
  let i = 0;
  while (i < lines.length) {
    const replacement = byStart.get(i);
    if (!replacement) {
      output.push(lines[i]);
      i++;
      continue;
    }

    const { region } = replacement;
    const eol = lineEnding(lines[region.start]);
    output.push(lines[region.start]);
    for (const line of replacement.lines) {
      output.push(line + eol);
    }
    output.push(lines[region.end]);
    i = region.end + 1;
  }

  return output.join('');
}

/**
 * Patch the build-requirement and bundled-dependency regions of a spec file.
 */
export function patchDescriptor(text: string, buildRequires: string[], provides: string[]): string {
  return patchRegions(text, [
    { markers: DESCRIPTOR_MARKERS.BUILD_REQUIRES, lines: buildRequires },
    { markers: DESCRIPTOR_MARKERS.BUNDLED, lines: provides }
  ]);
}
