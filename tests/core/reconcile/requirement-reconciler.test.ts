/**
 * Requirement Reconciler Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { groupCandidates, reconcileRequirements } from '../../../src/core/reconcile/requirement-reconciler.js';
import type { RequirementCandidate, RequirementKind } from '../../../src/types/index.js';
import { ErrorCodes } from '../../../src/types/index.js';
import { ConflictingOSRequirementError, UnsatisfiableRequirementError } from '../../../src/utils/errors.js';
import { formatVersionRange, isSubrange, parseVersionRange } from '../../../src/utils/version-range.js';

function candidate(name: string, range: string, sourceId: string, kind: RequirementKind = 'software'): RequirementCandidate {
  return { name, range: parseVersionRange(range), kind, sourceIds: [sourceId] };
}

const UBUNTU = candidate('Ubuntu', '22.04', '#os', 'os');

describe('groupCandidates', () => {
  it('groups equivalent spellings under one normalized name', () => {
    const groups = groupCandidates([
      candidate('NumPy', '>=1.20', '#a'),
      candidate('scipy', '', '#b'),
      candidate('pypi:numpy', '', '#c'),
      candidate('Ubuntu', '', '#os', 'os')
    ]);
    assert.deepEqual(
      groups.map(g => [g.kind, g.name, g.members.length]),
      [['software', 'numpy', 2], ['software', 'scipy', 1], ['os', 'ubuntu', 1]]
    );
  });

  it('strips configured ecosystem prefixes', () => {
    const groups = groupCandidates([candidate('spack:hdf5', '', '#a'), candidate('hdf5', '', '#b')], ['spack']);
    assert.deepEqual(groups.map(g => g.name), ['hdf5']);
  });
});

describe('reconcileRequirements', () => {
  it('intersects the constraints of each name', () => {
    const members = [
      candidate('NumPy', '>=1.20', '#a'),
      candidate('numpy', '<2', '#b'),
      candidate('pypi:numpy', '', '#c')
    ];
    const { requirements, warnings } = reconcileRequirements([...members, UBUNTU]);

    assert.equal(requirements.software.length, 1);
    const [numpy] = requirements.software;
    assert.equal(numpy.name, 'numpy');
    assert.equal(formatVersionRange(numpy.range), '>=1.20,<2');
    assert.deepEqual(numpy.sourceIds, ['#a', '#b', '#c']);
    for (const member of members) {
      assert.equal(isSubrange(numpy.range, member.range), true);
    }
    assert.deepEqual(warnings, []);
  });

  it('sorts software by normalized name', () => {
    const { requirements } = reconcileRequirements([
      candidate('zlib', '', '#z'),
      candidate('Bowtie2', '', '#b'),
      candidate('samtools', '', '#s'),
      UBUNTU
    ]);
    assert.deepEqual(requirements.software.map(r => r.name), ['bowtie2', 'samtools', 'zlib']);
  });

  it('reports every unsatisfiable group at once', () => {
    assert.throws(
      () => reconcileRequirements([
        candidate('numpy', '1.0', '#a'),
        candidate('numpy', '2.0', '#b'),
        candidate('scipy', '>=2', '#c'),
        candidate('scipy', '<1', '#d'),
        candidate('pandas', '', '#e'),
        UBUNTU
      ]),
      (error: unknown) => {
        assert.ok(error instanceof UnsatisfiableRequirementError);
        assert.equal(error.code, ErrorCodes.UNSATISFIABLE_REQUIREMENT);
        assert.equal(
          error.message,
          "No version satisfies every declared constraint for 'numpy' (==1.0 from #a; ==2.0 from #b), " +
          "'scipy' (>=2 from #c; <1 from #d)"
        );
        assert.deepEqual(error.details?.entityIds, ['#a', '#b', '#c', '#d']);
        return true;
      }
    );
  });

  it('accepts the same operating system declared twice', () => {
    const { requirements } = reconcileRequirements([
      candidate('Ubuntu', '22.04', '#os-a', 'os'),
      candidate('ubuntu', '', '#os-b', 'os')
    ]);
    assert.equal(requirements.os.name, 'ubuntu');
    assert.equal(formatVersionRange(requirements.os.range), '==22.04');
    assert.deepEqual(requirements.os.sourceIds, ['#os-a', '#os-b']);
    assert.equal(requirements.defaultedOs, false);
  });

  it('keeps the point release when a release is also declared', () => {
    const { requirements } = reconcileRequirements([
      candidate('Ubuntu', '22.04', '#a', 'os'),
      candidate('Ubuntu', '22.04.3', '#b', 'os')
    ]);
    assert.equal(formatVersionRange(requirements.os.range), '==22.04.3');
    assert.deepEqual(requirements.os.sourceIds, ['#a', '#b']);
  });

  it('fails on two different point releases of one release', () => {
    assert.throws(
      () => reconcileRequirements([
        candidate('Ubuntu', '22.04', '#a', 'os'),
        candidate('Ubuntu', '22.04.3', '#b', 'os'),
        candidate('Ubuntu', '22.04.4', '#c', 'os')
      ]),
      ConflictingOSRequirementError
    );
  });

  it('fails on incompatible versions of one distribution', () => {
    assert.throws(
      () => reconcileRequirements([
        candidate('Ubuntu', '20.04', '#a', 'os'),
        candidate('Ubuntu', '22.04', '#b', 'os')
      ]),
      (error: unknown) => {
        assert.ok(error instanceof ConflictingOSRequirementError);
        assert.equal(error.message, 'Conflicting operating system requirements: ubuntu ==20.04 (#a) vs ubuntu ==22.04 (#b)');
        assert.deepEqual(error.details?.entityIds, ['#a', '#b']);
        return true;
      }
    );
  });

  it('fails on different distributions', () => {
    assert.throws(
      () => reconcileRequirements([candidate('Ubuntu', '', '#a', 'os'), candidate('Debian', '12', '#b', 'os')]),
      (error: unknown) => error instanceof ConflictingOSRequirementError &&
        error.message === 'Conflicting operating system requirements: debian ==12 (#b) vs ubuntu any-version (#a)'
    );
  });

  it('defaults the operating system with a warning', () => {
    const { requirements, warnings } = reconcileRequirements([candidate('samtools', '', '#s')]);
    assert.equal(requirements.os.name, 'ubuntu');
    assert.equal(formatVersionRange(requirements.os.range), '==22.04');
    assert.deepEqual(requirements.os.sourceIds, []);
    assert.equal(requirements.defaultedOs, true);
    assert.deepEqual(warnings, [{
      code: 'DEFAULTED_OS',
      message: 'Crate declares no operating system; defaulting to ubuntu ==22.04',
      entityIds: []
    }]);
  });

  it('uses a configured default operating system', () => {
    const { requirements } = reconcileRequirements([], [], { defaultOs: { name: 'Debian', version: '12' } });
    assert.equal(requirements.os.name, 'debian');
    assert.equal(formatVersionRange(requirements.os.range), '==12');
  });

  it('normalizes, dedupes and sorts prerequisite edges', () => {
    const { requirements } = reconcileRequirements(
      [candidate('Tool', '', '#t'), candidate('numpy', '', '#n'), candidate('attrs', '', '#a'), UBUNTU],
      [
        { before: 'NumPy', after: 'Tool', sourceId: '#t' },
        { before: 'numpy', after: 'tool', sourceId: '#t' },
        { before: 'attrs', after: 'tool', sourceId: '#t' },
        { before: 'tool', after: 'Tool', sourceId: '#t' },
        { before: 'Ubuntu', after: 'tool', sourceId: '#t' }
      ]
    );
    assert.deepEqual(requirements.prerequisites, [
      { before: 'attrs', after: 'tool' },
      { before: 'numpy', after: 'tool' }
    ]);
  });
});
