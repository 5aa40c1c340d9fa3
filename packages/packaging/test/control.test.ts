import { describe, it, expect } from 'vitest';
import { parseControl, renderControl, validateControl } from '../src/control.js';
import { CONTROL } from './fixtures.js';

const metadata = { name: 'roextract', version: '1.0.4', architecture: 'amd64' };

describe('parseControl', () => {
  it('folds continuation lines into the previous field', () => {
    const fields = parseControl(CONTROL);

    expect(fields['Package']).toBe('roextract');
    expect(fields['Maintainer']).toBe('Test Maintainer <maintainer@example.com>');
    expect(fields['Description']).toBe(
      'Extract cached assets\nPulls cached files out of a local cache directory.'
    );
  });

  it('stops at the end of the first paragraph', () => {
    const fields = parseControl('Package: a\n\nPackage: b\n');
    expect(fields).toEqual({ Package: 'a' });
  });

  it('skips comments', () => {
    expect(parseControl('# generated\nPackage: a\n')).toEqual({ Package: 'a' });
  });
});

describe('renderControl', () => {
  it('renders required fields and an indented extended description', () => {
    const content = renderControl({
      metadata,
      maintainer: 'M <m@example.com>',
      description: 'Short\nLong line\n\nMore',
    });

    expect(content).toBe(
      [
        'Package: roextract',
        'Version: 1.0.4',
        'Architecture: amd64',
        'Maintainer: M <m@example.com>',
        'Section: utils',
        'Priority: optional',
        'Description: Short',
        ' Long line',
        ' .',
        ' More',
        '',
      ].join('\n')
    );
  });

  it('adds Depends and Homepage when given', () => {
    const content = renderControl({
      metadata,
      maintainer: 'M <m@example.com>',
      description: 'Short',
      depends: ['libc6', 'libssl3'],
      homepage: 'https://example.com',
    });

    expect(content).toContain('\nDepends: libc6, libssl3\n');
    expect(content).toContain('\nHomepage: https://example.com\n');
  });

  it('produces a paragraph that validates against its own metadata', () => {
    const content = renderControl({ metadata, maintainer: 'M <m@example.com>', description: 'Short' });
    expect(validateControl(parseControl(content), metadata)).toEqual([]);
  });
});

describe('validateControl', () => {
  it('accepts a matching descriptor', () => {
    expect(validateControl(parseControl(CONTROL), metadata)).toEqual([]);
  });

  it('reports missing and empty fields', () => {
    const problems = validateControl(
      { Package: 'roextract', Version: '1.0.4', Architecture: 'amd64', Description: '' },
      metadata
    );

    expect(problems).toEqual(['missing field Maintainer', 'empty field Description']);
  });

  it('reports fields that disagree with the metadata', () => {
    const fields = parseControl(CONTROL.replace('Version: 1.0.4', 'Version: 1.0.3'));

    expect(validateControl(fields, metadata)).toEqual(['Version is "1.0.3", expected "1.0.4"']);
  });
});
