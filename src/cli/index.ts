export * from './cli';
export * from './commands';
export * from './options';
export * from './planScript';
export * from './progressBar';
