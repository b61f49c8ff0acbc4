/**
 * @fileoverview Command setup for 'cratebuild inspect'
 *
 * Shows how a crate is read: the kind of every entity and the requirement
 * candidates it declares, before any reconciliation.
 */

import { Command } from 'commander';
import type { CrateAnalysis } from '../core/pipeline.js';
import { analyzeCrate } from '../core/pipeline.js';
import { withErrorHandling } from '../utils/errors.js';
import { readBinaryFile } from '../utils/fs.js';
import { resolveMetadataPath } from '../utils/paths.js';
import { formatVersionRange } from '../utils/version-range.js';
import { formatWarning } from './plan.js';

/**
 * Render an analysis as plain text, one entity or candidate per line
 */
export function formatInspectReport(analysis: CrateAnalysis): string {
  const { graph, classification } = analysis;
  const lines = [`Root: ${graph.rootId}`, '', 'Entities:'];

  const idWidth = Math.max(...graph.entities.map(entity => entity.id.length));
  for (const entity of graph.entities) {
    const kind = classification.kinds.get(entity.id) ?? 'other';
    lines.push(`  ${entity.id.padEnd(idWidth)}  ${kind}`);
  }

  lines.push('', 'Requirements:');
  if (classification.candidates.length === 0) {
    lines.push('  (none)');
  }
  for (const candidate of classification.candidates) {
    lines.push(
      `  ${candidate.kind.padEnd(8)}  ${candidate.name} ${formatVersionRange(candidate.range)}` +
      ` (from ${candidate.sourceIds.join(', ')})`
    );
  }

  if (classification.prerequisites.length > 0) {
    lines.push('', 'Prerequisites:');
    for (const edge of classification.prerequisites) {
      lines.push(`  ${edge.before} -> ${edge.after} (from ${edge.sourceId})`);
    }
  }

  if (classification.warnings.length > 0) {
    lines.push('', 'Warnings:');
    for (const warning of classification.warnings) {
      lines.push(`  ${formatWarning(warning)}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export async function runInspectCommand(metadata: string, cwd: string = process.cwd()): Promise<string> {
  const metadataPath = await resolveMetadataPath(metadata, cwd);
  return formatInspectReport(analyzeCrate(await readBinaryFile(metadataPath)));
}

/**
 * Setup the 'cratebuild inspect' command
 */
export function setupInspectCommand(program: Command): void {
  program
    .command('inspect')
    .argument('<metadata>', 'ro-crate-metadata.json file or crate directory')
    .description('Show entity kinds and declared requirements of an RO-Crate')
    .action(
      withErrorHandling(async (metadata: string) => {
        process.stdout.write(await runInspectCommand(metadata));
      })
    );
}
