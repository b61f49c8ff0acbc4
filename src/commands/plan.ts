/**
 * @fileoverview Command setup for 'cratebuild plan'
 *
 * Runs the crate pipeline over one metadata file and writes the build plan.
 */

import { Command, Option } from 'commander';
import { extname, isAbsolute, resolve } from 'path';
import type { PipelineWarning, PlanFormat } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { readBinaryFile, writeTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { resolveMetadataPath } from '../utils/paths.js';
import { loadConfig } from '../core/config.js';
import { runCratePipeline } from '../core/pipeline.js';
import { serializeBuildPlan } from '../core/plan/build-plan-generator.js';

export interface PlanCommandOptions {
  output?: string;
  format?: PlanFormat;
  config?: string;
}

export interface PlanCommandResult {
  metadataPath: string;
  /** Serialized plan, exactly as written */
  content: string;
  format: PlanFormat;
  outputPath?: string;
  warnings: PipelineWarning[];
}

/**
 * Output format from the flag, else from the output file extension
 */
export function resolvePlanFormat(format: PlanFormat | undefined, outputPath: string | undefined): PlanFormat {
  if (format) return format;
  const extension = outputPath ? extname(outputPath).toLowerCase() : '';
  return extension === '.yaml' || extension === '.yml' ? 'yaml' : 'json';
}

export function formatWarning(warning: PipelineWarning): string {
  return `warning ${warning.code}: ${warning.message}`;
}

/**
 * Build the plan for a metadata file, writing it to `options.output` when given
 */
export async function runPlanCommand(
  metadata: string,
  options: PlanCommandOptions = {},
  cwd: string = process.cwd()
): Promise<PlanCommandResult> {
  const config = await loadConfig({ cwd, configPath: options.config });
  const metadataPath = await resolveMetadataPath(metadata, cwd);
  logger.debug(`Building plan for ${metadataPath}`);

  const { plan, warnings } = runCratePipeline(await readBinaryFile(metadataPath), {
    defaultOs: config.defaultOs,
    baseImages: config.baseImages,
    ecosystemPrefixes: config.ecosystemPrefixes
  });

  const format = resolvePlanFormat(options.format, options.output);
  const content = serializeBuildPlan(plan, format);
  const result: PlanCommandResult = { metadataPath, content, format, warnings };

  if (options.output) {
    const outputPath = isAbsolute(options.output) ? options.output : resolve(cwd, options.output);
    await writeTextFile(outputPath, content);
    result.outputPath = outputPath;
  }
  return result;
}

/**
 * Setup the 'cratebuild plan' command
 */
export function setupPlanCommand(program: Command): void {
  program
    .command('plan')
    .argument('<metadata>', 'ro-crate-metadata.json file or crate directory')
    .description('Generate a container build plan from an RO-Crate')
    .option('-o, --output <file>', 'write the plan to a file instead of stdout')
    .addOption(new Option('--format <format>', 'plan format').choices(['json', 'yaml']))
    .option('--config <file>', 'config file (default: cratebuild.config.jsonc in cwd)')
    .action(
      withErrorHandling(async (metadata: string, options: PlanCommandOptions) => {
        const result = await runPlanCommand(metadata, options);

        for (const warning of result.warnings) {
          console.error(formatWarning(warning));
        }
        if (result.outputPath) {
          console.error(`Wrote ${result.format} plan to ${result.outputPath}`);
        } else {
          process.stdout.write(result.content);
        }
      })
    );
}
