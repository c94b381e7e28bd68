/**
 * Object identities (URNs).
 *
 * A URN is a path of typed segments, each optionally filtered by quoted
 * attributes:
 *
 *   Server[@Name='sql01']/Database[@Name='shop']/Table[@Name='Orders' and @Schema='dbo']
 *
 * The resolution engine only depends on the narrow ObjectIdentity contract
 * (equality plus a stable key); Urn is the concrete implementation used at
 * the CLI and catalog boundaries.
 */

import { InvalidInputError } from '../utils/errors.js';

export interface ObjectIdentity {
  /** Stable hash key; two identities are equal iff their keys are equal */
  readonly key: string;
  equals(other: ObjectIdentity): boolean;
  toString(): string;
}

export interface UrnSegment {
  readonly type: string;
  readonly attributes: Readonly<Record<string, string>>;
}

const SEGMENT_PATTERN = /^([A-Za-z_][\w]*)(?:\[([\s\S]*)\])?$/;
const ATTRIBUTE_PATTERN = /@(\w+)\s*=\s*'((?:[^']|'')*)'/g;

export class Urn implements ObjectIdentity {
  readonly segments: readonly UrnSegment[];
  readonly key: string;

  private constructor(segments: readonly UrnSegment[]) {
    this.segments = segments;
    this.key = segments.map(formatSegment).join('/');
  }

  /**
   * Parse the textual form. Throws InvalidInputError on malformed input.
   */
  static parse(text: string): Urn {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new InvalidInputError('object identity is empty', { root: text });
    }

    const segments = splitSegments(trimmed).map(part => parseSegment(part, trimmed));
    return new Urn(segments);
  }

  static tryParse(text: string): Urn | undefined {
    try {
      return Urn.parse(text);
    } catch {
      return undefined;
    }
  }

  /** Last segment type, e.g. 'Table' or 'StoredProcedure' */
  get kind(): string {
    return this.segments[this.segments.length - 1].type;
  }

  /** Schema-qualified name of the addressed object */
  get name(): string {
    const last = this.segments[this.segments.length - 1];
    const name = last.attributes.Name ?? last.type;
    return last.attributes.Schema ? `${last.attributes.Schema}.${name}` : name;
  }

  get serverName(): string | undefined {
    const first = this.segments[0];
    return first.type === 'Server' ? first.attributes.Name : undefined;
  }

  get databaseName(): string | undefined {
    return this.segments.find(segment => segment.type === 'Database')?.attributes.Name;
  }

  equals(other: ObjectIdentity): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.key;
  }
}

function splitSegments(text: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuote = false;
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (ch === "'") {
      if (inQuote && text[i + 1] === "'") {
        current += "''";
        i++;
        continue;
      }
      inQuote = !inQuote;
    } else if (!inQuote) {
      if (ch === '[') {
        depth++;
      } else if (ch === ']') {
        depth--;
      } else if (ch === '/' && depth === 0) {
        parts.push(current);
        current = '';
        continue;
      }
    }

    current += ch;
  }

  if (inQuote || depth !== 0) {
    throw new InvalidInputError(`unbalanced quotes or brackets in '${text}'`, { root: text });
  }

  parts.push(current);
  return parts;
}

function parseSegment(part: string, source: string): UrnSegment {
  const match = SEGMENT_PATTERN.exec(part.trim());
  if (!match) {
    throw new InvalidInputError(`malformed segment '${part}' in '${source}'`, { root: source });
  }

  const [, type, filter] = match;
  const attributes: Record<string, string> = {};

  if (filter !== undefined) {
    for (const attr of filter.matchAll(ATTRIBUTE_PATTERN)) {
      attributes[attr[1]] = attr[2].replace(/''/g, "'");
    }

    const leftover = filter.replace(ATTRIBUTE_PATTERN, '').replace(/\band\b/gi, '').trim();
    if (leftover) {
      throw new InvalidInputError(`unsupported filter '${filter}' in '${source}'`, { root: source });
    }
  }

  return { type, attributes };
}

function formatSegment(segment: UrnSegment): string {
  const filters = Object.entries(segment.attributes).map(
    ([name, value]) => `@${name}='${value.replace(/'/g, "''")}'`
  );
  return filters.length > 0 ? `${segment.type}[${filters.join(' and ')}]` : segment.type;
}
