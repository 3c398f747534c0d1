/**
 * Input and output schemas for on-chain tools, derived from the JSON package
 * summary that `sui move summary` writes next to a Move package.
 *
 * The input schema describes the parameters of the module's `execute`
 * function, without its leading proof parameter and its `TxContext`. The
 * output schema describes the variants of the module's `Output` enum.
 *
 * @module
 */

import { execFile } from 'node:child_process';
import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { z } from 'zod';
import { errorMessage, formatZodIssues } from '@nexus-core/sdk';
import { SchemaGenerationError } from '../types/errors.js';

const execFileAsync = promisify(execFile);

export const SUMMARY_DIRECTORY = 'package_summaries';

// ============================================================================
// Summary Types
// ============================================================================

export interface MoveModuleId {
  address: string;
  name: string;
}

export interface MoveDatatype {
  module: MoveModuleId;
  name: string;
  type_arguments?: unknown[];
}

export type MovePrimitive = 'Bool' | 'U8' | 'U16' | 'U32' | 'U64' | 'U128' | 'U256' | 'Address' | 'Signer' | 'Any';

export type MoveType =
  | MovePrimitive
  | { Datatype: MoveDatatype }
  | { Vector: MoveType }
  | { Reference: [boolean, MoveType] }
  | { TypeParameter: number | string }
  | { NamedTypeParameter: string }
  | { Tuple: MoveType[] }
  | { Fun: [MoveType[], MoveType] };

export interface MoveParameter {
  name?: string;
  type: MoveType;
}

/** The parts of a module summary schemas are built from. */
export interface MoveModuleSummary {
  id: MoveModuleId;
  functions: Record<string, unknown>;
  enums: Record<string, unknown>;
}

const moduleIdSchema = z.object({ address: z.string(), name: z.string() });

const datatypeSchema = z.object({
  module: moduleIdSchema,
  name: z.string(),
  type_arguments: z.array(z.unknown()).optional(),
});

const moveTypeSchema: z.ZodType<MoveType> = z.lazy(() =>
  z.union([
    z.enum(['Bool', 'U8', 'U16', 'U32', 'U64', 'U128', 'U256', 'Address', 'Signer', 'Any']),
    z.object({ Datatype: datatypeSchema }),
    z.object({ Vector: moveTypeSchema }),
    z.object({ Reference: z.tuple([z.boolean(), moveTypeSchema]) }),
    z.object({ TypeParameter: z.union([z.number(), z.string()]) }),
    z.object({ NamedTypeParameter: z.string() }),
    z.object({ Tuple: z.array(moveTypeSchema) }),
    z.object({ Fun: z.tuple([z.array(moveTypeSchema), moveTypeSchema]) }),
  ]),
);

// Summaries name the type field `type_`; `type` is accepted too.
const parameterSchema = z
  .object({ name: z.string().nullish(), type_: moveTypeSchema.optional(), type: moveTypeSchema.optional() })
  .transform((param, ctx): MoveParameter => {
    const type = param.type_ ?? param.type;
    if (type === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'parameter type is missing' });
      return z.NEVER;
    }
    return param.name != null ? { name: param.name, type } : { type };
  });

const executeFunctionSchema = z.object({ parameters: z.array(parameterSchema) });

const fieldSchema = z
  .object({ index: z.number().int().optional(), type_: moveTypeSchema.optional(), type: moveTypeSchema.optional() })
  .transform((field, ctx): { index?: number; type: MoveType } => {
    const type = field.type_ ?? field.type;
    if (type === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'field type is missing' });
      return z.NEVER;
    }
    return field.index !== undefined ? { index: field.index, type } : { type };
  });

const outputEnumSchema = z.object({
  variants: z.record(
    z.object({
      index: z.number().int().optional(),
      fields: z.object({ fields: z.record(fieldSchema).default({}) }).default({}),
    }),
  ),
});

const moduleSummarySchema = z.object({
  id: moduleIdSchema,
  functions: z.record(z.unknown()).default({}),
  enums: z.record(z.unknown()).default({}),
});

function byIndex<T extends { index?: number }>(entries: Array<[string, T]>): Array<[string, T]> {
  return entries
    .map((entry, position) => ({ entry, order: entry[1].index ?? position }))
    .sort((a, b) => a.order - b.order)
    .map(({ entry }) => entry);
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new SchemaGenerationError(`Failed to parse ${what}: ${formatZodIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

// ============================================================================
// Summary Lookup
// ============================================================================

/**
 * Locate a module in summary JSON: a single module summary, modules nested
 * by name, or an array of module summaries.
 */
export function findModuleInSummary(summary: unknown, moduleName: string): MoveModuleSummary {
  if (Array.isArray(summary)) {
    for (const entry of summary) {
      const parsed = moduleSummarySchema.safeParse(entry);
      if (parsed.success && parsed.data.id.name === moduleName) return parsed.data;
    }
  } else if (typeof summary === 'object' && summary !== null) {
    if ('id' in summary) {
      const module = parseWith(moduleSummarySchema, summary, 'module summary');
      if (module.id.name === moduleName) return module;
    }
    if (moduleName in summary) {
      const nested: unknown = Reflect.get(summary, moduleName);
      return parseWith(moduleSummarySchema, nested, `module '${moduleName}'`);
    }
  }
  throw new SchemaGenerationError(`Module '${moduleName}' not found in package summary`);
}

// ============================================================================
// Type Conversion
// ============================================================================

export interface TypeSchema {
  type: string;
  description: string;
  /** Set on references */
  mutable?: boolean;
  /** Set on vectors */
  element_type?: TypeSchema;
  /** Position among the schema's parameters; input schemas only */
  index?: number;
}

export interface VariantSchema {
  type: 'variant';
  description: string;
  fields: Record<string, TypeSchema>;
}

const PRIMITIVE_SCHEMAS: Record<MovePrimitive, TypeSchema> = {
  Bool: { type: 'bool', description: 'Boolean value' },
  U8: { type: 'u8', description: '8-bit unsigned integer' },
  U16: { type: 'u16', description: '16-bit unsigned integer' },
  U32: { type: 'u32', description: '32-bit unsigned integer' },
  U64: { type: 'u64', description: '64-bit unsigned integer' },
  U128: { type: 'u128', description: '128-bit unsigned integer' },
  U256: { type: 'u256', description: '256-bit unsigned integer' },
  Address: { type: 'address', description: 'Sui address' },
  Signer: { type: 'signer', description: 'Transaction signer' },
  Any: { type: 'any', description: 'Any type' },
};

const isStdAddress = (address: string): boolean => address === '0x1' || address === 'std';
const isFrameworkAddress = (address: string): boolean => address === '0x2' || address === 'sui';

export function isTxContextType(type: MoveType): boolean {
  if (typeof type === 'string') return false;
  if ('Reference' in type) return isTxContextType(type.Reference[1]);
  if (!('Datatype' in type)) return false;
  const { module, name } = type.Datatype;
  return isFrameworkAddress(module.address) && module.name === 'tx_context' && name === 'TxContext';
}

function datatypeSchemaFor({ module, name }: MoveDatatype): TypeSchema {
  if (isStdAddress(module.address)) {
    if (name === 'String' && (module.name === 'string' || module.name === 'ascii')) {
      return { type: 'string', description: `0x1::${module.name}::String` };
    }
    return { type: 'object', description: `0x1::${module.name}::${name}` };
  }
  if (isFrameworkAddress(module.address)) {
    if (module.name === 'object' && name === 'ID') {
      return { type: 'object_id', description: 'Sui object ID' };
    }
    if (module.name === 'tx_context' && name === 'TxContext') {
      return { type: 'tx_context', description: 'Transaction context (automatically provided)' };
    }
    return { type: 'object', description: `0x2::${module.name}::${name}` };
  }
  return { type: 'object', description: `${module.address}::${module.name}::${name}` };
}

export function moveTypeToSchema(type: MoveType): TypeSchema {
  if (typeof type === 'string') return { ...PRIMITIVE_SCHEMAS[type] };
  if ('Datatype' in type) return datatypeSchemaFor(type.Datatype);
  if ('Vector' in type) {
    return { type: 'vector', description: 'Vector of values', element_type: moveTypeToSchema(type.Vector) };
  }
  if ('Reference' in type) {
    const [mutable, inner] = type.Reference;
    return { ...moveTypeToSchema(inner), mutable };
  }
  if ('Tuple' in type) {
    return type.Tuple.length === 0
      ? { type: 'unit', description: 'Unit type' }
      : { type: 'tuple', description: 'Tuple type' };
  }
  if ('Fun' in type) return { type: 'function', description: 'Function type' };
  return { type: 'generic', description: 'Generic type parameter' };
}

// ============================================================================
// Schema Generation
// ============================================================================

/**
 * Schema of the `execute` parameters, keyed by parameter name (or
 * `param_<position>` when the summary has none).
 */
export function inputSchemaFromSummary(module: MoveModuleSummary): Record<string, TypeSchema> {
  if (!('execute' in module.functions)) {
    throw new SchemaGenerationError("Function 'execute' not found in module");
  }
  const execute = parseWith(executeFunctionSchema, module.functions.execute, "function 'execute'");

  const schema: Record<string, TypeSchema> = {};
  let index = 0;
  execute.parameters.forEach((param, position) => {
    // The first parameter is the tool's proof of invocation.
    if (position === 0 || isTxContextType(param.type)) return;
    schema[param.name ?? `param_${position}`] = { ...moveTypeToSchema(param.type), index };
    index++;
  });
  return schema;
}

/** Schema of the `Output` enum, keyed by lower-cased variant name. */
export function outputSchemaFromSummary(module: MoveModuleSummary): Record<string, VariantSchema> {
  if (!('Output' in module.enums)) {
    throw new SchemaGenerationError("Enum 'Output' not found in module");
  }
  const output = parseWith(outputEnumSchema, module.enums.Output, "enum 'Output'");

  const schema: Record<string, VariantSchema> = {};
  for (const [variantName, variant] of byIndex(Object.entries(output.variants))) {
    const fields: Record<string, TypeSchema> = {};
    for (const [fieldName, field] of byIndex(Object.entries(variant.fields.fields))) {
      fields[fieldName] = moveTypeToSchema(field.type);
    }
    schema[variantName.toLowerCase()] = { type: 'variant', description: `${variantName} variant`, fields };
  }
  return schema;
}

// ============================================================================
// Package Summaries
// ============================================================================

/** Writes `package_summaries/` into the given Move package. */
export type SummaryRunner = (packagePath: string) => Promise<void>;

export const runSuiMoveSummary: SummaryRunner = async (packagePath) => {
  await execFileAsync('sui', ['move', 'summary', '--path', packagePath, '--output-format', 'json'], {
    cwd: packagePath,
  });
};

export interface OnChainToolSchemas {
  module: MoveModuleSummary;
  input: Record<string, TypeSchema>;
  output: Record<string, VariantSchema>;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Read the summary of `moduleName` that a previous summary run produced. */
export async function readModuleSummary(packagePath: string, moduleName: string): Promise<MoveModuleSummary> {
  const summaryFile = join(packagePath, SUMMARY_DIRECTORY, moduleName, `${moduleName}.json`);
  if (!(await exists(summaryFile))) {
    throw new SchemaGenerationError(
      `Summary file not found: ${summaryFile}. Expected at ${SUMMARY_DIRECTORY}/${moduleName}/${moduleName}.json`,
    );
  }

  let summary: unknown;
  try {
    summary = JSON.parse(await readFile(summaryFile, 'utf8'));
  } catch (error) {
    throw new SchemaGenerationError(`Failed to parse summary JSON from ${summaryFile}: ${errorMessage(error)}`);
  }
  return findModuleInSummary(summary, moduleName);
}

/**
 * Summarize the Move package at `packagePath` and build the input and
 * output schemas of `moduleName`.
 */
export async function generateOnChainSchema(
  packagePath: string,
  moduleName: string,
  runner: SummaryRunner = runSuiMoveSummary,
): Promise<OnChainToolSchemas> {
  if (!(await exists(packagePath))) {
    throw new SchemaGenerationError(`Package path does not exist: ${packagePath}`);
  }
  if (!(await exists(join(packagePath, 'Move.toml')))) {
    throw new SchemaGenerationError(`Move.toml not found in package path: ${packagePath}`);
  }

  try {
    await runner(packagePath);
  } catch (error) {
    throw new SchemaGenerationError(`Failed to execute summary generation: ${errorMessage(error)}`);
  }

  const module = await readModuleSummary(packagePath, moduleName);
  return { module, input: inputSchemaFromSummary(module), output: outputSchemaFromSummary(module) };
}
