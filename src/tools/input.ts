import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { InputError, errorMessage } from '../utils/index.js';

/** Read a JSON array file and validate every row. The whole file is rejected on the first bad row. */
export async function readJsonRows<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<Array<z.output<S>>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (err) {
    throw new InputError(filePath, `Cannot read JSON: ${errorMessage(err)}`);
  }

  const result = z.array(schema).safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new InputError(filePath, `Invalid row ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

export function jsonResult(value: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

export function errorResult(err: unknown) {
  return {
    content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
    isError: true,
  };
}
