import type { EventPayload, JsonPath } from '../domain/index.js';
import { deletePath, getPath, parsePath, setPath } from '../domain/index.js';
import type { DataLayoutConfig, MappingFieldConfig, MappingType } from './destination-schema.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { columnForPath } from './columns.js';

/**
 * The one mapping style active for a destination.
 *
 * Legacy (`"/src -> /dst"` strings) and structured rules are mutually
 * exclusive; `identity` applies when neither is configured.
 */
export type MappingVariant =
  | { readonly kind: 'identity' }
  | { readonly kind: 'legacy'; readonly mapping_type: MappingType; readonly rules: readonly string[] }
  | { readonly kind: 'structured'; readonly keep_unmapped: boolean; readonly fields: readonly MappingFieldConfig[] };

export interface FieldMapper {
  readonly kind: MappingVariant['kind'];
  /** Returns the mapped copy of `fields`. Throws when a rule cannot be applied. */
  map(fields: EventPayload): EventPayload;
}

export interface FieldMapperSetup {
  readonly mapper: FieldMapper;
  /** column → destination type declared by `cast` rules. */
  readonly type_casts: Readonly<Record<string, string>>;
}

/**
 * Picks the mapping variant from a data layout.
 * Supplying both styles is a configuration error rather than a silent precedence.
 */
export function resolveMappingVariant(layout: DataLayoutConfig | undefined): MappingVariant {
  const legacy = layout?.mapping ?? [];
  const structured = layout?.mappings;

  if (legacy.length > 0 && structured !== undefined) {
    throw new ConfigurationError(
      'invalid_mapping',
      'data_layout.mapping and data_layout.mappings are mutually exclusive: configure either legacy or structured mapping rules',
    );
  }

  if (structured !== undefined) {
    return {
      kind: 'structured',
      keep_unmapped: structured.keep_unmapped ?? true,
      fields: structured.fields,
    };
  }

  if (legacy.length > 0) {
    return { kind: 'legacy', mapping_type: layout?.mapping_type ?? 'default', rules: legacy };
  }

  return { kind: 'identity' };
}

// ─── Legacy ──────────────────────────────────────────────────

interface LegacyRule {
  readonly src: JsonPath;
  /** null = remove the source field. */
  readonly dst: JsonPath | null;
}

function parseLegacyRule(raw: string): LegacyRule {
  const parts = raw.split('->');
  if (parts.length !== 2) {
    throw new ConfigurationError('invalid_mapping', `Malformed mapping rule "${raw}": expected "/src -> /dst"`);
  }
  const [srcRaw = '', dstRaw = ''] = parts;
  try {
    const src = parsePath(srcRaw);
    const dst = dstRaw.trim() === '' ? null : parsePath(dstRaw);
    return { src, dst };
  } catch (err: unknown) {
    throw new ConfigurationError('invalid_mapping', `Malformed mapping rule "${raw}": ${errorMessage(err)}`, { cause: err });
  }
}

function createLegacyMapper(mappingType: MappingType, rawRules: readonly string[]): FieldMapper {
  const rules = rawRules.map(parseLegacyRule);
  const strict = mappingType === 'strict';

  return {
    kind: 'legacy',
    map(fields) {
      if (strict) {
        const result: EventPayload = {};
        for (const rule of rules) {
          if (rule.dst === null) continue;
          const value = getPath(fields, rule.src);
          if (value !== undefined) setPath(result, rule.dst, structuredClone(value));
        }
        return result;
      }

      const result = structuredClone(fields);
      for (const rule of rules) {
        const value = deletePath(result, rule.src);
        if (rule.dst !== null && value !== undefined) setPath(result, rule.dst, value);
      }
      return result;
    },
  };
}

// ─── Structured ──────────────────────────────────────────────

type StructuredRule =
  | { readonly action: 'move'; readonly src: JsonPath; readonly dst: JsonPath }
  | { readonly action: 'remove'; readonly src: JsonPath }
  | { readonly action: 'cast'; readonly dst: JsonPath; readonly type: string }
  | { readonly action: 'constant'; readonly dst: JsonPath; readonly value: unknown };

function requirePath(raw: string | undefined, field: 'src' | 'dst', rule: MappingFieldConfig): JsonPath {
  if (raw === undefined || raw.trim() === '') {
    throw new ConfigurationError('invalid_mapping', `Mapping rule ${describeRule(rule)} requires "${field}"`);
  }
  try {
    return parsePath(raw);
  } catch (err: unknown) {
    throw new ConfigurationError('invalid_mapping', `Mapping rule ${describeRule(rule)}: ${errorMessage(err)}`, { cause: err });
  }
}

export function describeRule(rule: MappingFieldConfig): string {
  const parts = [`action: ${rule.action}`];
  if (rule.src !== undefined) parts.push(`src: ${rule.src}`);
  if (rule.dst !== undefined) parts.push(`dst: ${rule.dst}`);
  if (rule.type !== undefined) parts.push(`type: ${rule.type}`);
  if (rule.value !== undefined) parts.push(`value: ${JSON.stringify(rule.value)}`);
  return `{${parts.join(', ')}}`;
}

function parseStructuredRule(rule: MappingFieldConfig): StructuredRule {
  switch (rule.action) {
    case 'move':
      return { action: 'move', src: requirePath(rule.src, 'src', rule), dst: requirePath(rule.dst, 'dst', rule) };
    case 'remove':
      return { action: 'remove', src: requirePath(rule.src, 'src', rule) };
    case 'cast': {
      const dst = requirePath(rule.dst, 'dst', rule);
      if (rule.type === undefined || rule.type.trim() === '') {
        throw new ConfigurationError('invalid_mapping', `Mapping rule ${describeRule(rule)} requires "type"`);
      }
      return { action: 'cast', dst, type: rule.type.trim() };
    }
    case 'constant':
      return { action: 'constant', dst: requirePath(rule.dst, 'dst', rule), value: rule.value ?? null };
  }
}

function createStructuredMapper(keepUnmapped: boolean, rules: readonly StructuredRule[]): FieldMapper {
  return {
    kind: 'structured',
    map(fields) {
      const result: EventPayload = keepUnmapped ? structuredClone(fields) : {};

      for (const rule of rules) {
        switch (rule.action) {
          case 'move': {
            const value = getPath(fields, rule.src);
            if (keepUnmapped) deletePath(result, rule.src);
            if (value !== undefined) setPath(result, rule.dst, structuredClone(value));
            break;
          }
          case 'remove':
            deletePath(result, rule.src);
            break;
          case 'constant':
            setPath(result, rule.dst, structuredClone(rule.value));
            break;
          case 'cast':
            break;
        }
      }

      return result;
    },
  };
}

/**
 * Builds the field mapper for a mapping variant.
 * Throws ConfigurationError on malformed rules.
 */
export function createFieldMapper(variant: MappingVariant): FieldMapperSetup {
  switch (variant.kind) {
    case 'identity':
      return { mapper: { kind: 'identity', map: (fields) => structuredClone(fields) }, type_casts: {} };
    case 'legacy':
      return { mapper: createLegacyMapper(variant.mapping_type, variant.rules), type_casts: {} };
    case 'structured': {
      const rules = variant.fields.map(parseStructuredRule);
      const typeCasts: Record<string, string> = {};
      for (const rule of rules) {
        if (rule.action === 'cast') typeCasts[columnForPath(rule.dst)] = rule.type;
      }
      return { mapper: createStructuredMapper(variant.keep_unmapped, rules), type_casts: typeCasts };
    }
  }
}
