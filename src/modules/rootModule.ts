import { ModuleKind } from '../engine';

/**
 * Top of a pipeline. Declares nothing and stops the search for enclosing modules.
 */
export const rootModule: ModuleKind = {
  name: 'root',
  root: true,
  declareTargets: () => [],
};
