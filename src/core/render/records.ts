/**
 * Renderers for resolution results (table, JSON, YAML, script).
 */

import * as yaml from 'js-yaml';
import pc from 'picocolors';
import type { OutputFormat } from '../../types/index.js';
import { Urn, type ObjectIdentity } from '../urn.js';
import type { DependencyRecord, RootResolution } from '../dependency-resolver/types.js';

export interface RecordView {
  tier: number;
  kind: string;
  name: string;
  urn: string;
  owner: string;
  schemaBound: boolean;
  parent: string | null;
  parentKind: string | null;
  originRoot: string;
  script?: string;
}

export type ResolutionView =
  | { root: string; status: 'resolved'; records: RecordView[]; failures: Array<{ urn: string; tier: number; error: string }> }
  | { root: string; status: 'empty'; records: RecordView[] }
  | { root: string; status: 'failed'; stage: string; error: { code: string; message: string } };

export interface RenderOptions {
  colors?: boolean;
}

export function toRecordView(record: DependencyRecord): RecordView {
  return {
    tier: record.tier,
    kind: record.dependentKind,
    name: record.dependentName,
    urn: record.dependentIdentity.toString(),
    owner: record.owner,
    schemaBound: record.isSchemaBound,
    parent: record.parentIdentity?.toString() ?? null,
    parentKind: record.parentKind,
    originRoot: record.originRootIdentity.toString(),
    ...(record.script !== undefined ? { script: record.script } : {})
  };
}

export function toResolutionView(resolution: RootResolution): ResolutionView {
  switch (resolution.status) {
    case 'resolved':
      return {
        root: resolution.root,
        status: 'resolved',
        records: resolution.records.map(toRecordView),
        failures: resolution.failures.map(failure => ({
          urn: failure.identity.toString(),
          tier: failure.tier,
          error: failure.error.message
        }))
      };
    case 'empty':
      return { root: resolution.root, status: 'empty', records: [] };
    case 'failed':
      return {
        root: resolution.root,
        status: 'failed',
        stage: resolution.stage,
        error: { code: resolution.error.code, message: resolution.error.message }
      };
  }
}

export function renderJson(resolutions: readonly RootResolution[]): string {
  return JSON.stringify(resolutions.map(toResolutionView), null, 2);
}

export function renderYaml(resolutions: readonly RootResolution[]): string {
  return yaml.dump(resolutions.map(toResolutionView), { indent: 2, noRefs: true, lineWidth: -1 });
}

const TABLE_HEADERS = ['TIER', 'KIND', 'NAME', 'OWNER', 'BOUND', 'PARENT'] as const;

/**
 * Plain-text table per root, records in emission order
 */
export function renderTable(resolutions: readonly RootResolution[], options: RenderOptions = {}): string {
  const colors = pc.createColors(options.colors ?? false);
  const blocks: string[] = [];

  for (const resolution of resolutions) {
    const lines = [colors.bold(resolution.root)];

    if (resolution.status === 'failed') {
      lines.push(colors.red(`  failed during ${resolution.stage}: ${resolution.error.message}`));
    } else if (resolution.status === 'empty' || resolution.records.length === 0) {
      lines.push(colors.dim('  No dependencies detected'));
    } else {
      const rows = resolution.records.map(record => [
        String(record.tier),
        record.dependentKind,
        record.dependentName,
        record.owner,
        record.isSchemaBound ? 'yes' : 'no',
        displayName(record.parentIdentity)
      ]);
      lines.push(...formatColumns([[...TABLE_HEADERS], ...rows]).map((line, index) =>
        index === 0 ? `  ${colors.dim(line)}` : `  ${line}`
      ));
    }

    if (resolution.status === 'resolved') {
      for (const failure of resolution.failures) {
        lines.push(colors.yellow(`  skipped ${displayName(failure.identity)}: ${failure.error.message}`));
      }
    }

    blocks.push(lines.join('\n'));
  }

  return blocks.join('\n\n');
}

/**
 * Creation scripts in emission order, one commented header per root
 */
export function renderScript(resolutions: readonly RootResolution[]): string {
  const blocks: string[] = [];

  for (const resolution of resolutions) {
    if (resolution.status === 'failed') {
      blocks.push(`-- ${resolution.root}: failed during ${resolution.stage}: ${resolution.error.message}`);
      continue;
    }
    if (resolution.status === 'empty') {
      blocks.push(`-- ${resolution.root}: no dependencies detected`);
      continue;
    }

    const scripts = resolution.records
      .filter((record): record is DependencyRecord & { script: string } => record.script !== undefined)
      .map(record => `-- ${record.dependentKind} ${record.dependentName} (tier ${record.tier})\n${record.script}`);
    blocks.push([`-- Dependencies of ${resolution.root}`, ...scripts].join('\n\n'));
  }

  return blocks.join('\n\n');
}

export function renderResolutions(
  resolutions: readonly RootResolution[],
  format: OutputFormat,
  options: RenderOptions = {}
): string {
  switch (format) {
    case 'json':
      return renderJson(resolutions);
    case 'yaml':
      return renderYaml(resolutions);
    case 'script':
      return renderScript(resolutions);
    case 'table':
      return renderTable(resolutions, options);
  }
}

function displayName(identity: ObjectIdentity | null): string {
  if (!identity) return '-';
  return Urn.tryParse(identity.toString())?.name ?? identity.toString();
}

function formatColumns(rows: string[][]): string[] {
  const widths = rows[0].map((_, column) => Math.max(...rows.map(row => row[column].length)));
  return rows.map(row =>
    row.map((cell, column) => (column === row.length - 1 ? cell : cell.padEnd(widths[column] + 2))).join('')
  );
}
