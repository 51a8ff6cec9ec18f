import globby from 'globby';
import path from 'path';
import { z } from 'zod';

import { ModuleKind, TargetSpec } from '../engine';

const LocalDataConfigSchema = z.object({
  pattern: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  ignore: z.array(z.string()).optional(),
});

export type LocalDataConfig = z.infer<typeof LocalDataConfigSchema>;

/**
 * Static data at the top of a pipeline: every file matching `config.pattern` is a direct target named by its stem.
 */
export const localDataModule: ModuleKind = {
  name: 'local-data',
  root: true,
  declareTargets(context) {
    const config = LocalDataConfigSchema.parse(context.config);
    const files = globby.sync(config.pattern, {
      cwd: context.modulePath,
      onlyFiles: true,
      ignore: [path.basename(context.declarationPath), ...(config.ignore || [])],
    });
    context.logger.trace(`pattern matched ${files.length} files`);
    return files.sort().map(
      (file): TargetSpec => ({
        name: path.parse(file).name,
        path: file,
      })
    );
  },
};
