/**
 * Control Descriptor
 *
 * Reads, renders and checks the DEBIAN/control paragraph (deb822).
 */

import { z } from 'zod';
import type { PackageMetadata } from './types.js';

const controlFieldsSchema = z.object({
  Package: z.string().min(1),
  Version: z.string().min(1),
  Architecture: z.string().min(1),
  Maintainer: z.string().min(1),
  Description: z.string().min(1),
}).passthrough();

export type ControlFields = z.infer<typeof controlFieldsSchema>;

export interface RenderControlOptions {
  metadata: PackageMetadata;
  maintainer: string;
  description: string;
  section?: string;
  priority?: string;
  homepage?: string;
  depends?: string[];
}

/**
 * Parse a single deb822 paragraph. Continuation lines (leading space or
 * tab) are folded into the previous field with a newline.
 */
export function parseControl(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  let current: string | undefined;

  for (const line of content.split(/\r?\n/)) {
    if (line.trim() === '') {
      // End of the first paragraph
      if (current !== undefined) break;
      continue;
    }
    if (line.startsWith('#')) continue;

    if (/^[ \t]/.test(line)) {
      if (current !== undefined) {
        fields[current] = `${fields[current] ?? ''}\n${line.trim()}`;
      }
      continue;
    }

    const colon = line.indexOf(':');
    if (colon <= 0) continue;

    current = line.slice(0, colon).trim();
    fields[current] = line.slice(colon + 1).trim();
  }

  return fields;
}

/**
 * Render a control paragraph from metadata. Extended description lines are
 * indented, blank ones become " .".
 */
export function renderControl(options: RenderControlOptions): string {
  const { metadata } = options;
  const [synopsis = '', ...extended] = options.description.trim().split(/\r?\n/);

  const lines = [
    `Package: ${metadata.name}`,
    `Version: ${metadata.version}`,
    `Architecture: ${metadata.architecture}`,
    `Maintainer: ${options.maintainer}`,
  ];

  if (options.depends && options.depends.length > 0) {
    lines.push(`Depends: ${options.depends.join(', ')}`);
  }
  lines.push(`Section: ${options.section ?? 'utils'}`);
  lines.push(`Priority: ${options.priority ?? 'optional'}`);
  if (options.homepage) {
    lines.push(`Homepage: ${options.homepage}`);
  }

  lines.push(`Description: ${synopsis.trim()}`);
  for (const line of extended) {
    lines.push(line.trim() === '' ? ' .' : ` ${line.trim()}`);
  }

  return `${lines.join('\n')}\n`;
}

/**
 * List what's wrong with a control paragraph for this metadata.
 * Empty array means valid.
 */
export function validateControl(
  fields: Record<string, string>,
  metadata: PackageMetadata
): string[] {
  const parsed = controlFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    return parsed.error.issues.map((issue) => {
      const field = issue.path.join('.');
      return fields[field] === undefined ? `missing field ${field}` : `empty field ${field}`;
    });
  }

  const problems: string[] = [];
  const expected: Array<['Package' | 'Version' | 'Architecture', string]> = [
    ['Package', metadata.name],
    ['Version', metadata.version],
    ['Architecture', metadata.architecture],
  ];

  for (const [field, value] of expected) {
    if (parsed.data[field] !== value) {
      problems.push(`${field} is "${parsed.data[field]}", expected "${value}"`);
    }
  }

  return problems;
}
