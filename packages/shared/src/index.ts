export * from './types';
export * from './constants';
export * from './errors';
export * from './vector';
export * from './kepler';
export * from './orbit';
export * from './body';
export * from './system';
export * from './systems';
export * from './messages';
