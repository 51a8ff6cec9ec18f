export * from './fsUtils';
export * from './promiseQueue';
