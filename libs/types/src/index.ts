export * from './models';
export * from './api';
export * from './export';
export * from './runner';
