export * from './work-orders.js';
