export * from './task.js';
export * from './errors.js';
export * from './validation.js';
export * from './task-query.js';
export * from './views.js';
