export * from './logHandler';
export * from './logLevel';
