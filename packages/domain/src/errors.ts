import type { TaskId } from './task.js';

export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    constructor(public readonly id: TaskId) {
        super(`task with ID ${id} not found`);
        this.name = 'NotFoundError';
    }
}

export class CapacityError extends Error {
    constructor(public readonly limit: number) {
        super(`maximum number of tasks (${limit}) reached`);
        this.name = 'CapacityError';
    }
}
