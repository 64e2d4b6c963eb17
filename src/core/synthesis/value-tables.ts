/**
 * @arch testsmith.core.domain.schema
 *
 * Versioned per-tier value tables (`core/data/value-tables.json`).
 * Values are Python literal expressions.
 */
import { z } from 'zod';
import type { Tier } from '../model/types.js';
import type { BaseType } from './type-resolver.js';
import { parseDataFile } from '../data/loader.js';
import valueTablesData from '../data/value-tables.json' with { type: 'json' };

function tierTableSchema(minimum: number) {
  const values = z.array(z.string().min(1)).min(minimum);
  return z.object({
    integer: values,
    float: values,
    string: values,
    boolean: values,
    sequence: values,
    mapping: values,
  });
}

const ValueTablesSchema = z.object({
  version: z.literal(1),
  /** Exception the error tier expects */
  expectedError: z.string().min(1),
  tiers: z.object({
    happy: tierTableSchema(1),
    edge: tierTableSchema(0),
    error: tierTableSchema(1),
    boundary: tierTableSchema(0),
  }),
});

export type ValueTables = z.infer<typeof ValueTablesSchema>;

let tables: ValueTables | undefined;

export function getValueTables(): ValueTables {
  tables ??= parseDataFile('value-tables.json', valueTablesData, ValueTablesSchema);
  return tables;
}

/**
 * Values for one tier and base type. Unknown types use the string tables.
 */
export function tierValues(tier: Tier, baseType: BaseType): readonly string[] {
  const table = getValueTables().tiers[tier];
  return baseType === 'unknown' ? table.string : table[baseType];
}

/**
 * First happy-path value; used wherever one representative argument is needed.
 */
export function representativeValue(baseType: BaseType): string {
  return tierValues('happy', baseType)[0];
}
