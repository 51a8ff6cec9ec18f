export * from './config';
export * from './engine';
export * from './io';
export * from './models';
export * from './modules';
export * from './utils';
