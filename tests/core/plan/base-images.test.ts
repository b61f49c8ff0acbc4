import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  loadBuiltInCatalog,
  mergeBaseImages,
  parseBaseImageEntries,
  selectBaseImage
} from '../../../src/core/plan/base-images.js';
import type { ResolvedRequirement } from '../../../src/types/index.js';
import { ConfigError, UnsupportedBaseOSError } from '../../../src/utils/errors.js';
import { parseVersionRange } from '../../../src/utils/version-range.js';

function os(name: string, range: string): ResolvedRequirement {
  return { name, range: parseVersionRange(range), kind: 'os', sourceIds: ['#os'] };
}

function imageFor(name: string, range: string): string {
  return selectBaseImage(os(name, range), loadBuiltInCatalog()).image;
}

describe('loadBuiltInCatalog', () => {
  it('reads the shipped catalog once', () => {
    const catalog = loadBuiltInCatalog();
    assert.ok(catalog.length > 0);
    assert.equal(loadBuiltInCatalog(), catalog);
    assert.ok(catalog.some(entry => entry.distribution === 'ubuntu' && entry.version === '22.04'));
  });
});

describe('selectBaseImage', () => {
  it('maps a pinned version to its release', () => {
    assert.equal(imageFor('ubuntu', '22.04'), 'ubuntu:22.04');
    assert.equal(imageFor('debian', '12'), 'debian:bookworm');
  });

  it('maps point releases to the catalog release', () => {
    assert.equal(imageFor('ubuntu', '22.04.3'), 'ubuntu:22.04');
    assert.equal(imageFor('debian', '12.5'), 'debian:bookworm');
  });

  it('picks the newest release inside a range', () => {
    assert.equal(imageFor('ubuntu', '>=20.04,<24'), 'ubuntu:22.04');
    assert.equal(imageFor('ubuntu', ''), 'ubuntu:24.04');
    assert.equal(imageFor('rockylinux', '<9'), 'rockylinux:8');
  });

  it('fails for versions the catalog does not know', () => {
    assert.throws(
      () => imageFor('ubuntu', '21.10'),
      (error: unknown) => {
        assert.ok(error instanceof UnsupportedBaseOSError);
        assert.equal(error.message, 'No base image for ubuntu ==21.10. Supported versions: 18.04, 20.04, 22.04, 24.04');
        assert.deepEqual(error.details?.entityIds, ['#os']);
        return true;
      }
    );
  });

  it('fails for unknown distributions', () => {
    assert.throws(
      () => imageFor('haiku', ''),
      (error: unknown) => error instanceof UnsupportedBaseOSError &&
        error.message === 'No base image for haiku any-version. No base images are known for this distribution'
    );
  });
});

describe('mergeBaseImages', () => {
  it('replaces matching releases and appends new ones', () => {
    const merged = mergeBaseImages(
      [
        { distribution: 'ubuntu', version: '22.04', image: 'ubuntu:22.04' },
        { distribution: 'debian', version: '12', image: 'debian:bookworm' }
      ],
      [
        { distribution: 'ubuntu', version: '22.04.0', image: 'registry.example.org/ubuntu:22.04' },
        { distribution: 'arch', version: '2024.1', image: 'archlinux:base' }
      ]
    );
    assert.deepEqual(merged.map(entry => entry.image), [
      'registry.example.org/ubuntu:22.04',
      'debian:bookworm',
      'archlinux:base'
    ]);
  });
});

describe('parseBaseImageEntries', () => {
  it('normalizes distribution names', () => {
    const [entry] = parseBaseImageEntries(
      [{ distribution: 'Rocky Linux', version: '9', image: 'rockylinux:9' }],
      'test'
    );
    assert.deepEqual(entry, { distribution: 'rockylinux', version: '9', image: 'rockylinux:9' });
  });

  it('rejects malformed entries', () => {
    assert.throws(() => parseBaseImageEntries({}, 'test'), /test: baseImages must be an array/);
    assert.throws(
      () => parseBaseImageEntries([{ distribution: 'ubuntu', version: '22.04' }], 'test'),
      (error: unknown) => error instanceof ConfigError &&
        error.message === 'test: baseImages[0] needs string distribution, version and image'
    );
    assert.throws(
      () => parseBaseImageEntries([{ distribution: 'ubuntu', version: 'jammy', image: 'ubuntu:jammy' }], 'test'),
      /invalid version 'jammy'/
    );
  });
});
