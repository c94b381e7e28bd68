import { Command } from 'commander';
import type { CommandResult } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { withErrorHandling } from '../utils/errors.js';
import { Urn } from '../core/urn.js';
import { flattenDependencyTree, requestDiscovery, type FlatNode } from '../core/dependency-resolver/index.js';
import { renderFlatTree } from '../core/render/tree.js';
import { loadCatalogSource } from '../core/resolve/catalog-source.js';
import { mergeResolveSettings } from '../core/resolve/settings.js';
import { createCliExecutionContext } from '../cli/context.js';
import { readGlobalOptions } from '../cli/options.js';

export interface TreeCommandOptions {
  catalog?: string;
  parents?: boolean;
  includeSelf?: boolean;
  configPath?: string;
}

/**
 * Print the flattened discovery tree of one object, before enrichment and
 * deduplication.
 */
export async function treeCommand(
  root: string,
  options: TreeCommandOptions,
  ctx: ExecutionContext
): Promise<CommandResult<FlatNode[]>> {
  const identity = Urn.parse(root);
  const { config, snapshot } = await loadCatalogSource({
    cwd: ctx.cwd,
    configPath: options.configPath,
    catalog: options.catalog
  });
  const settings = mergeResolveSettings(config, options);

  const { tree } = await requestDiscovery(
    [identity],
    { allowSystemObjects: settings.allowSystemObjects, direction: settings.direction, timeoutMs: settings.timeoutMs },
    snapshot
  );
  const nodes = flattenDependencyTree(tree, settings.direction, { includeSelf: settings.includeSelf });

  if (nodes.length === 0) {
    ctx.output.info(`No dependencies detected for ${identity}`);
  } else {
    ctx.write(renderFlatTree(nodes));
  }

  return { success: true, data: nodes };
}

/**
 * Setup the 'dbdeps tree' command
 */
export function setupTreeCommand(program: Command): void {
  program
    .command('tree')
    .argument('<urn>', 'object identity (URN)')
    .description('Show the raw dependency tree of an object with its tiers')
    .option('--catalog <file>', 'catalog snapshot (YAML) to resolve against')
    .option('--parents', 'show what the object depends on instead of what depends on it')
    .option('--include-self', 'include the object itself at tier 0')
    .action(
      withErrorHandling(async (root: string, options: TreeCommandOptions, command: Command) => {
        const globals = readGlobalOptions(command);
        const ctx = createCliExecutionContext({ cwd: globals.cwd });
        await treeCommand(root, { ...options, configPath: globals.config }, ctx);
      })
    );
}
