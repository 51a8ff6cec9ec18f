import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { isErrnoException } from '../utils';
import { DeclarationError } from './errors';

export const ModuleDeclarationSchema = z
  .object({
    kind: z.string().min(1).optional(),
    root: z.boolean().optional(),
    config: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type ModuleDeclaration = z.infer<typeof ModuleDeclarationSchema>;

/**
 * Kind named by a directory without an explicit `kind`: everything before the first dot (`Plot.raw` -> `Plot`).
 */
export function kindFromDirectoryName(directory: string): string {
  const name = path.basename(directory);
  const index = name.indexOf('.');
  return index > 0 ? name.slice(0, index) : name;
}

export function readDeclaration(moduleDir: string, declarationFile: string): ModuleDeclaration {
  const fileName = path.join(moduleDir, declarationFile);
  let content: string;
  try {
    content = fs.readFileSync(fileName, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new DeclarationError(moduleDir, [`${declarationFile} is missing`], err);
    }
    throw err;
  }

  let raw: unknown = {};
  if (content.trim().length > 0) {
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new DeclarationError(moduleDir, [`${declarationFile} is not valid JSON`], err);
    }
  }

  const result = ModuleDeclarationSchema.safeParse(raw);
  if (!result.success) {
    throw new DeclarationError(
      moduleDir,
      result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
}
