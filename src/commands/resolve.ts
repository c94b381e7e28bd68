/**
 * @fileoverview Command setup for 'dbdeps resolve'
 *
 * Resolves the ordered dependency list of one or more objects against a
 * catalog snapshot and prints it in the requested format.
 */

import { Command, Option } from 'commander';
import { OUTPUT_FORMATS } from '../constants/index.js';
import type { CommandResult } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { resolveObjectDependencies } from '../core/dependency-resolver/index.js';
import type { RootResolution } from '../core/dependency-resolver/index.js';
import { renderResolutions } from '../core/render/records.js';
import { loadCatalogSource } from '../core/resolve/catalog-source.js';
import { mergeResolveSettings, type ResolveFlags } from '../core/resolve/settings.js';
import { createCliExecutionContext } from '../cli/context.js';
import { parsePositiveInteger, parseTerminator, parseTimeout, readGlobalOptions } from '../cli/options.js';

export interface ResolveCommandOptions extends ResolveFlags {
  configPath?: string;
}

/**
 * Resolve `roots` and write the rendered result. Fails when any root failed.
 */
export async function resolveCommand(
  roots: string[],
  options: ResolveCommandOptions,
  ctx: ExecutionContext
): Promise<CommandResult<RootResolution[]>> {
  const { config, snapshot } = await loadCatalogSource({
    cwd: ctx.cwd,
    configPath: options.configPath,
    catalog: options.catalog
  });
  const { format, ...settings } = mergeResolveSettings(config, options);

  const spinner = ctx.output.spinner();
  spinner.start(`Resolving ${settings.direction} of ${roots.length} object(s) on ${snapshot.serverName}`);
  const resolutions = await resolveObjectDependencies(roots, settings, snapshot);
  spinner.stop(`Resolved ${roots.length} object(s)`);

  ctx.write(renderResolutions(resolutions, format, { colors: ctx.interactive }));

  const failed = resolutions.filter(resolution => resolution.status === 'failed');
  const skipped = resolutions.reduce(
    (count, resolution) => count + (resolution.status === 'resolved' ? resolution.failures.length : 0),
    0
  );
  const warnings = skipped > 0 ? [`${skipped} object(s) could not be resolved and were skipped`] : [];
  for (const warning of warnings) {
    ctx.output.warn(warning);
  }

  if (failed.length > 0) {
    logger.debug('Roots failed', { roots: failed.map(resolution => resolution.root) });
    return {
      success: false,
      data: resolutions,
      error: `${failed.length} of ${resolutions.length} object(s) failed to resolve`,
      warnings
    };
  }

  return { success: true, data: resolutions, warnings };
}

/**
 * Setup the 'dbdeps resolve' command
 */
export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .argument('<urn...>', 'object identities (URNs) to resolve')
    .description('List the dependencies of objects in a valid creation order')
    .option('--catalog <file>', 'catalog snapshot (YAML) to resolve against')
    .option('--parents', 'list what the objects depend on instead of what depends on them')
    .option('--include-self', 'include the objects themselves in the result')
    .option('--no-script', 'do not fetch creation scripts')
    .option('--allow-system-objects', 'include system objects')
    .option('--terminator <text>', 'batch terminator appended to each script', parseTerminator)
    .option('--concurrency <n>', 'objects (and lookups) resolved at once', parsePositiveInteger)
    .option('--timeout <ms>', 'deadline for each catalog call', parseTimeout)
    .addOption(new Option('--format <format>', 'output format').choices(OUTPUT_FORMATS))
    .action(
      withErrorHandling(async (roots: string[], options: ResolveCommandOptions, command: Command) => {
        const globals = readGlobalOptions(command);
        // --no-script defaults to true; only an explicit flag may override the config file
        const script = command.getOptionValueSource('script') === 'cli' ? options.script : undefined;
        const ctx = createCliExecutionContext({ cwd: globals.cwd });

        const result = await resolveCommand(roots, { ...options, script, configPath: globals.config }, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Resolve failed');
        }
      })
    );
}
