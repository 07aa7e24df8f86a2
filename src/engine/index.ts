export * from './types';
export * from './errors';
export * from './formulas';
export * from './categories';
export * from './metrics';
export * from './thresholds';
export * from './recommendation';
export * from './forecast';
