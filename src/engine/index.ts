export * from './artifactLock';
export * from './buildEngine';
export * from './declaration';
export * from './errors';
export * from './executor';
export * from './generationStore';
export * from './module';
export * from './registry';
export * from './resolver';
export * from './scheduler';
export * from './staleness';
export * from './target';
export * from './targetGraph';
export * from './types';
export * from './workspace';
