export * from './types.js';
export { attachRaw, isDetailLevel, outcome, withoutRaw } from './detail.js';
export * from './project.js';
export * from './flow.js';
export * from './analysis.js';
export * from './queries.js';
export * from './reports.js';
export * from './host.js';
