export * from './declarations.js';
export * from './model.js';
export * from './report.js';
