export * from './engineConfig';
