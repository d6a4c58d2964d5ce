export * from './values.js';
export * from './chart.js';
