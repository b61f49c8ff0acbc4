/**
 * Build Plan Generator Tests
 *
 * Step ordering, cycle reporting, immutability and serialization.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as yaml from 'js-yaml';
import {
  generateBuildPlan,
  orderRequirements,
  serializeBuildPlan
} from '../../../src/core/plan/build-plan-generator.js';
import type { ResolvedRequirement, ResolvedRequirementSet } from '../../../src/types/index.js';
import { ErrorCodes } from '../../../src/types/index.js';
import { CyclicDependencyError } from '../../../src/utils/errors.js';
import { parseVersionRange } from '../../../src/utils/version-range.js';

// ============================================================================
// Helpers
// ============================================================================

function software(name: string, range = ''): ResolvedRequirement {
  return { name, range: parseVersionRange(range), kind: 'software', sourceIds: [`#${name}`] };
}

function requirementSet(
  items: ResolvedRequirement[],
  prerequisites: Array<{ before: string; after: string }> = []
): ResolvedRequirementSet {
  return {
    os: { name: 'ubuntu', range: parseVersionRange('22.04'), kind: 'os', sourceIds: ['#os'] },
    software: items,
    prerequisites,
    defaultedOs: false
  };
}

function names(items: ResolvedRequirement[]): string[] {
  return items.map(item => item.name);
}

// ============================================================================
// Tests
// ============================================================================

describe('orderRequirements', () => {
  it('orders independent requirements by name', () => {
    const ordered = orderRequirements([software('zlib'), software('bowtie2'), software('samtools')], []);
    assert.deepEqual(names(ordered), ['bowtie2', 'samtools', 'zlib']);
  });

  it('places prerequisites first, keeping name order otherwise', () => {
    const ordered = orderRequirements(
      [software('a'), software('b'), software('c'), software('d')],
      [{ before: 'c', after: 'a' }]
    );
    assert.deepEqual(names(ordered), ['b', 'c', 'a', 'd']);
  });

  it('follows chains of prerequisites', () => {
    const ordered = orderRequirements(
      [software('python'), software('numpy'), software('analysis')],
      [{ before: 'numpy', after: 'analysis' }, { before: 'python', after: 'numpy' }]
    );
    assert.deepEqual(names(ordered), ['python', 'numpy', 'analysis']);
  });

  it('ignores edges to unknown names', () => {
    const ordered = orderRequirements([software('b'), software('a')], [{ before: 'ghost', after: 'a' }]);
    assert.deepEqual(names(ordered), ['a', 'b']);
  });

  it('names every member of a cycle', () => {
    assert.throws(
      () => orderRequirements(
        [software('a'), software('b'), software('c'), software('d'), software('e')],
        [
          { before: 'a', after: 'b' },
          { before: 'b', after: 'c' },
          { before: 'c', after: 'a' },
          { before: 'a', after: 'e' }
        ]
      ),
      (error: unknown) => {
        assert.ok(error instanceof CyclicDependencyError);
        assert.equal(error.code, ErrorCodes.CYCLIC_DEPENDENCY);
        assert.equal(error.message, 'Cyclic prerequisite chain: a -> b -> c -> a (members: a, b, c)');
        assert.deepEqual(error.details?.members, ['a', 'b', 'c']);
        assert.deepEqual(error.details?.entityIds, ['#a', '#b', '#c']);
        return true;
      }
    );
  });
});

describe('generateBuildPlan', () => {
  it('starts with the base image and installs in order', () => {
    const plan = generateBuildPlan(requirementSet([software('numpy', '>=1.20,<2'), software('samtools')]));

    assert.equal(plan.baseImage, 'ubuntu:22.04');
    assert.deepEqual(plan.steps, [
      { step: 'base-image', image: 'ubuntu:22.04' },
      { step: 'install', name: 'numpy', constraint: '>=1.20,<2' },
      { step: 'install', name: 'samtools', constraint: 'any-version' }
    ]);
  });

  it('produces a frozen plan', () => {
    const plan = generateBuildPlan(requirementSet([software('numpy')]));
    assert.equal(Object.isFrozen(plan), true);
    assert.equal(Object.isFrozen(plan.steps), true);
    assert.equal(plan.steps.every(step => Object.isFrozen(step)), true);
  });

  it('uses the given catalog', () => {
    const plan = generateBuildPlan(requirementSet([]), {
      baseImages: [{ distribution: 'ubuntu', version: '22.04', image: 'registry.example.org/ubuntu:22.04' }]
    });
    assert.deepEqual(plan.steps, [{ step: 'base-image', image: 'registry.example.org/ubuntu:22.04' }]);
  });

  it('returns no plan when the prerequisites are cyclic', () => {
    assert.throws(
      () => generateBuildPlan(requirementSet(
        [software('a'), software('b')],
        [{ before: 'a', after: 'b' }, { before: 'b', after: 'a' }]
      )),
      CyclicDependencyError
    );
  });
});

describe('serializeBuildPlan', () => {
  const plan = generateBuildPlan(requirementSet([software('numpy', '>=1.20,<2')]));

  it('writes indented JSON with a trailing newline', () => {
    assert.equal(
      serializeBuildPlan(plan),
      [
        '{',
        '  "baseImage": "ubuntu:22.04",',
        '  "steps": [',
        '    {',
        '      "step": "base-image",',
        '      "image": "ubuntu:22.04"',
        '    },',
        '    {',
        '      "step": "install",',
        '      "name": "numpy",',
        '      "constraint": ">=1.20,<2"',
        '    }',
        '  ]',
        '}',
        ''
      ].join('\n')
    );
  });

  it('writes YAML carrying the same document', () => {
    const text = serializeBuildPlan(plan, 'yaml');
    assert.deepEqual(yaml.load(text), JSON.parse(serializeBuildPlan(plan, 'json')));
  });

  it('serializes equal plans to identical text', () => {
    const again = generateBuildPlan(requirementSet([software('numpy', '>=1.20,<2')]));
    assert.equal(serializeBuildPlan(again), serializeBuildPlan(plan));
    assert.equal(serializeBuildPlan(again, 'yaml'), serializeBuildPlan(plan, 'yaml'));
  });
});
