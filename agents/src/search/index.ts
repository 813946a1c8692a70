export * from './candidate-search.js';
