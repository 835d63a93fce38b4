export * from './factory.js';
export * from './visitor.js';
export * from './analysis.js';
export { render } from './printer.js';
