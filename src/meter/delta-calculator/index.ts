export * from './delta-calculator.js';
