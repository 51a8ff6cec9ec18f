import { ModuleRegistry } from '../engine';
import { commandModule } from './commandModule';
import { localDataModule } from './localData';
import { rootModule } from './rootModule';

export * from './commandModule';
export * from './localData';
export * from './rootModule';

export const stdModuleKinds = [rootModule, localDataModule, commandModule];

export function registerStdModules(registry: ModuleRegistry): ModuleRegistry {
  return registry.register(...stdModuleKinds);
}

export function createStdRegistry(): ModuleRegistry {
  return registerStdModules(new ModuleRegistry());
}
