export * from './concurrency/read-write-lock.js';
export * from './persistence/in-memory-task-store.js';
export * from './seed/sample-tasks.js';
