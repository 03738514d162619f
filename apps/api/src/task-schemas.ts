import { z } from 'zod';
import type { CreateTaskRequest, TaskFilter, TaskSearchQuery, UpdateTaskRequest } from '@taskdeck/domain';
import { InvalidTaskIdError } from './http/error-handler.js';

// Request bodies arrive in snake_case. `null` is treated the same as an
// absent key; content rules (lengths, enum values) are checked by the domain.

const optionalText = z.string().nullish();
const optionalTags = z.array(z.string()).nullish();

const createTaskBody = z.object({
    title: optionalText,
    description: optionalText,
    status: optionalText,
    priority: optionalText,
    assigned_to: optionalText,
    tags: optionalTags,
});

const updateTaskBody = createTaskBody;

const filterBody = z.object({
    status: optionalText,
    priority: optionalText,
    assigned_to: optionalText,
    tags: optionalTags,
    limit: z.number().int().nullish(),
    offset: z.number().int().nullish(),
});

const searchBody = z.object({
    query: optionalText,
    fields: optionalTags,
    filters: filterBody.nullish(),
    sort_by: optionalText,
    sort_desc: z.boolean().nullish(),
});

function present<T>(value: T | null | undefined): T | undefined {
    return value ?? undefined;
}

// express.json() leaves the body undefined when there is nothing to parse.
function bodyOf(body: unknown): unknown {
    return body === undefined ? {} : body;
}

export function parseCreateTaskBody(body: unknown): CreateTaskRequest {
    const parsed = createTaskBody.parse(bodyOf(body));
    return {
        title: parsed.title ?? '',
        description: present(parsed.description),
        status: present(parsed.status),
        priority: present(parsed.priority),
        assignedTo: present(parsed.assigned_to),
        tags: present(parsed.tags),
    };
}

export function parseUpdateTaskBody(body: unknown): UpdateTaskRequest {
    const parsed = updateTaskBody.parse(bodyOf(body));
    return {
        title: present(parsed.title),
        description: present(parsed.description),
        status: present(parsed.status),
        priority: present(parsed.priority),
        assignedTo: present(parsed.assigned_to),
        tags: present(parsed.tags),
    };
}

export function parseSearchBody(body: unknown): TaskSearchQuery {
    const parsed = searchBody.parse(bodyOf(body));
    const filters = parsed.filters;
    return {
        query: parsed.query ?? '',
        fields: present(parsed.fields),
        filter: filters
            ? {
                status: present(filters.status),
                priority: present(filters.priority),
                assignedTo: present(filters.assigned_to),
                tags: present(filters.tags),
                limit: present(filters.limit),
                offset: present(filters.offset),
            }
            : undefined,
        sortBy: present(parsed.sort_by),
        sortDesc: parsed.sort_desc ?? false,
    };
}

function firstValue(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
    return undefined;
}

function parseCount(value: string | undefined, min: number): number | undefined {
    if (value === undefined || !/^-?\d+$/.test(value)) return undefined;
    const parsed = Number(value);
    return parsed >= min ? parsed : undefined;
}

/**
 * Query-string filter for GET /tasks. Values that do not parse (a negative
 * offset, a non-numeric limit) are ignored rather than rejected.
 */
export function parseListQuery(query: Record<string, unknown>): TaskFilter {
    const filter: TaskFilter = {};

    const status = firstValue(query.status);
    if (status) filter.status = status;

    const priority = firstValue(query.priority);
    if (priority) filter.priority = priority;

    const assignedTo = firstValue(query.assigned_to);
    if (assignedTo) filter.assignedTo = assignedTo;

    const tags = firstValue(query.tags);
    if (tags) {
        const list = tags.split(',').map((tag) => tag.trim()).filter((tag) => tag !== '');
        if (list.length > 0) filter.tags = list;
    }

    const limit = parseCount(firstValue(query.limit), 1);
    if (limit !== undefined) filter.limit = limit;

    const offset = parseCount(firstValue(query.offset), 0);
    if (offset !== undefined) filter.offset = offset;

    return filter;
}

export function parseTaskId(raw: string | undefined): number {
    if (raw === undefined || !/^-?\d+$/.test(raw)) throw new InvalidTaskIdError();
    return Number(raw);
}
