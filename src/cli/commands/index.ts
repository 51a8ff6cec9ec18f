export * from './clean';
export * from './gitignore';
export * from './make';
export * from './pipeline';
export * from './run';
export * from './scan';
export * from './status';
