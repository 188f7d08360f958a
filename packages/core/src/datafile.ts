import { readFileSync } from 'fs';
import { parse } from 'yaml';
import type { ZodType, ZodTypeDef } from 'zod';

function readDataFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read data file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

function validate<T>(filePath: string, raw: unknown, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new Error(`Invalid data file ${filePath}${where}: ${issue?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

export function loadYamlFile<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const raw: unknown = parse(readDataFile(filePath));
  return validate(filePath, raw, schema);
}

export function loadJsonFile<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(readDataFile(filePath));
  return validate(filePath, raw, schema);
}
