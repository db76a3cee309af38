export * from './schemas.js';
export * from './conditions.js';
export * from './search-filter.js';
