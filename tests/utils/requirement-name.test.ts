import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  normalizeOsName,
  normalizeSoftwareName,
  parseRequirementExpression,
  splitNameAndVersion
} from '../../src/utils/requirement-name.js';

describe('normalizeSoftwareName', () => {
  it('folds case and separator runs', () => {
    assert.equal(normalizeSoftwareName('Scikit_Learn'), 'scikit-learn');
    assert.equal(normalizeSoftwareName('ruamel.yaml'), 'ruamel-yaml');
    assert.equal(normalizeSoftwareName('  NumPy  '), 'numpy');
  });

  it('strips known ecosystem prefixes', () => {
    assert.equal(normalizeSoftwareName('PyPI:numpy'), 'numpy');
    assert.equal(normalizeSoftwareName('conda-forge::samtools'), 'samtools');
  });

  it('keeps unknown prefixes unless configured', () => {
    assert.equal(normalizeSoftwareName('spack:hdf5'), 'spack:hdf5');
    assert.equal(normalizeSoftwareName('spack:hdf5', ['spack']), 'hdf5');
  });

  it('reads the name out of a package URL', () => {
    assert.equal(normalizeSoftwareName('pkg:pypi/Scikit-Learn@1.3.0'), 'scikit-learn');
  });
});

describe('normalizeOsName', () => {
  it('drops the Linux suffix and spacing', () => {
    assert.equal(normalizeOsName('Ubuntu'), 'ubuntu');
    assert.equal(normalizeOsName('Debian GNU/Linux'), 'debian');
    assert.equal(normalizeOsName('Alpine Linux'), 'alpine');
  });

  it('maps aliases to catalog names', () => {
    assert.equal(normalizeOsName('Rocky Linux'), 'rockylinux');
    assert.equal(normalizeOsName('AlmaLinux'), 'almalinux');
  });

  it('keeps a bare Linux name', () => {
    assert.equal(normalizeOsName('Linux'), 'linux');
  });
});

describe('splitNameAndVersion', () => {
  it('splits a trailing version', () => {
    assert.deepEqual(splitNameAndVersion('Python 3.10'), { name: 'Python', version: '3.10' });
    assert.deepEqual(splitNameAndVersion('R-4.3.1'), { name: 'R', version: '4.3.1' });
  });

  it('ignores release labels and parenthesized codenames', () => {
    assert.deepEqual(splitNameAndVersion('Ubuntu 20.04 LTS'), { name: 'Ubuntu', version: '20.04' });
    assert.deepEqual(splitNameAndVersion('Ubuntu 22.04 (Jammy Jellyfish)'), { name: 'Ubuntu', version: '22.04' });
  });

  it('returns only a name when there is no version', () => {
    assert.deepEqual(splitNameAndVersion('Python'), { name: 'Python' });
  });
});

describe('parseRequirementExpression', () => {
  it('separates name and constraint', () => {
    assert.deepEqual(parseRequirementExpression('numpy>=1.20,<2'), { name: 'numpy', rangeText: '>=1.20,<2' });
    assert.deepEqual(parseRequirementExpression('scipy 1.11'), { name: 'scipy', rangeText: '1.11' });
    assert.deepEqual(parseRequirementExpression('pandas'), { name: 'pandas', rangeText: '' });
  });

  it('drops extras, markers and parentheses', () => {
    assert.deepEqual(parseRequirementExpression('xarray[io] (>=2023.1)'), { name: 'xarray', rangeText: '>=2023.1' });
    assert.deepEqual(parseRequirementExpression("tomli; python_version < '3.11'"), { name: 'tomli', rangeText: '' });
  });

  it('reads package URL versions', () => {
    assert.deepEqual(parseRequirementExpression('pkg:pypi/pandas@2.1'), { name: 'pkg:pypi/pandas', rangeText: '2.1' });
  });

  it('rejects text with no name', () => {
    assert.equal(parseRequirementExpression('>=1.0'), undefined);
    assert.equal(parseRequirementExpression('   '), undefined);
  });
});
