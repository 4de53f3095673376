/**
 * ChunkFormatter - Serializes chunk parts into the labeled text layout
 *
 *   Title: ...
 *   Section: ...
 *   Parent Section: ...
 *   Key Facts:
 *   - ...
 *   Main Content:
 *   ...
 *   Source: a, b, c
 *   Video: ...
 *
 * Empty parts are left out, so a chunk never carries an empty label.
 */

import type { Chunk } from '../contracts/types.js';

export interface ChunkParts {
  title?: string;
  section?: string;
  parentSection?: string;
  keyFacts?: readonly string[];
  mainContent?: readonly string[];
  /** Joined with ", " on the Source line; empty entries are dropped */
  provenance?: readonly string[];
  /** Trailing reference line, e.g. { label: 'Video', value: url } */
  reference?: { label: string; value: string };
}

export function formatSourceLine(provenance: readonly string[]): string | null {
  const parts = provenance.filter(part => part.length > 0);
  return parts.length > 0 ? `Source: ${parts.join(', ')}` : null;
}

export function formatChunk(parts: ChunkParts): Chunk {
  const lines: string[] = [];

  if (parts.title) lines.push(`Title: ${parts.title}`);
  if (parts.section) lines.push(`Section: ${parts.section}`);
  if (parts.parentSection) lines.push(`Parent Section: ${parts.parentSection}`);

  if (parts.keyFacts && parts.keyFacts.length > 0) {
    lines.push('Key Facts:');
    for (const fact of parts.keyFacts) {
      lines.push(`- ${fact}`);
    }
  }

  if (parts.mainContent && parts.mainContent.length > 0) {
    lines.push('Main Content:');
    lines.push(...parts.mainContent);
  }

  const sourceLine = formatSourceLine(parts.provenance ?? []);
  if (sourceLine) lines.push(sourceLine);

  if (parts.reference && parts.reference.value) {
    lines.push(`${parts.reference.label}: ${parts.reference.value}`);
  }

  return lines.join('\n');
}

/**
 * Annotate a section label with its part number when a section was split
 */
export function partLabel(label: string, index: number, total: number): string {
  return total > 1 ? `${label} (Part ${index + 1}/${total})` : label;
}
