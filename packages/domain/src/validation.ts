import { TASK_LIMITS, isTaskPriority, isTaskStatus } from './task.js';
import type { CreateTaskRequest, UpdateTaskRequest } from './task.js';

// Each check returns the failure reason, or null when the value passes.
export type ValidationResult = string | null;

export function isBlank(value: string): boolean {
    return value.trim() === '';
}

export function validateRequired(field: string, value: string | undefined): ValidationResult {
    if (value === undefined || isBlank(value)) {
        return `${field} is required`;
    }
    return null;
}

/** Checks the trimmed length of `value`. A `max` of 0 means no upper bound. */
export function validateLength(field: string, value: string, min: number, max: number): ValidationResult {
    const length = value.trim().length;
    if (length < min) {
        return `${field} must be at least ${min} characters`;
    }
    if (max > 0 && length > max) {
        return `${field} must be no more than ${max} characters`;
    }
    return null;
}

export function validateOneOf(field: string, value: string, allowed: readonly string[]): ValidationResult {
    if (!allowed.includes(value)) {
        return `${field} must be one of: ${allowed.join(', ')}`;
    }
    return null;
}

export function validateTagList(tags: readonly string[], maxTags: number, maxTagLength: number): ValidationResult {
    if (tags.length > maxTags) {
        return `maximum of ${maxTags} tags allowed`;
    }

    for (const [index, raw] of tags.entries()) {
        const tag = raw.trim();
        if (tag === '') {
            return `tag ${index + 1} is empty`;
        }
        if (tag.length > maxTagLength) {
            return `tag '${tag}' exceeds maximum length of ${maxTagLength} characters`;
        }
    }

    return null;
}

function firstFailure(checks: Array<() => ValidationResult>): ValidationResult {
    for (const check of checks) {
        const failure = check();
        if (failure) return failure;
    }
    return null;
}

export function validateCreateTaskRequest(request: CreateTaskRequest): ValidationResult {
    const { description, status, priority, assignedTo, tags } = request;
    return firstFailure([
        () => validateRequired('title', request.title),
        () => validateLength('title', request.title, 1, TASK_LIMITS.titleMaxLength),
        () => (description ? validateLength('description', description, 0, TASK_LIMITS.descriptionMaxLength) : null),
        () => (status && !isTaskStatus(status) ? `invalid status: ${status}` : null),
        () => (priority && !isTaskPriority(priority) ? `invalid priority: ${priority}` : null),
        () => (assignedTo ? validateLength('assigned_to', assignedTo, 0, TASK_LIMITS.assigneeMaxLength) : null),
        () => (tags ? validateTagList(tags, TASK_LIMITS.maxTags, TASK_LIMITS.tagMaxLength) : null),
    ]);
}

/** Only the fields present on the request are checked. */
export function validateUpdateTaskRequest(request: UpdateTaskRequest): ValidationResult {
    const { title, description, status, priority, assignedTo, tags } = request;
    return firstFailure([
        () => (title !== undefined ? validateRequired('title', title) : null),
        () => (title !== undefined ? validateLength('title', title, 1, TASK_LIMITS.titleMaxLength) : null),
        () => (description !== undefined
            ? validateLength('description', description, 0, TASK_LIMITS.descriptionMaxLength)
            : null),
        () => (status !== undefined && !isTaskStatus(status) ? `invalid status: ${status}` : null),
        () => (priority !== undefined && !isTaskPriority(priority) ? `invalid priority: ${priority}` : null),
        () => (assignedTo !== undefined
            ? validateLength('assigned_to', assignedTo, 0, TASK_LIMITS.assigneeMaxLength)
            : null),
        () => (tags !== undefined ? validateTagList(tags, TASK_LIMITS.maxTags, TASK_LIMITS.tagMaxLength) : null),
    ]);
}
