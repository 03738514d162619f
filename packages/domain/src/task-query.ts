import { PRIORITY_RANK, TASK_PRIORITIES, TASK_STATUSES } from './task.js';
import type { SearchField, Task, TaskFilter, TaskSortKey, TaskStats } from './task.js';

const DEFAULT_SEARCH_FIELDS: readonly SearchField[] = ['title', 'description'];

export function matchesFilter(task: Task, filter?: TaskFilter): boolean {
    if (!filter) return true;

    if (filter.status && task.status !== filter.status) return false;
    if (filter.priority && task.priority !== filter.priority) return false;
    if (filter.assignedTo && task.assignedTo !== filter.assignedTo) return false;

    if (filter.tags && filter.tags.length > 0) {
        const wanted = new Set(filter.tags);
        if (!task.tags.some((tag) => wanted.has(tag))) return false;
    }

    return true;
}

function isSearchField(field: string): field is SearchField {
    return field === 'title' || field === 'description';
}

/**
 * Case-insensitive substring match over the requested fields; a hit in any
 * one of them is enough. An empty term matches every task. Field names other
 * than title and description are ignored.
 */
export function matchesSearchTerm(task: Task, term: string, fields?: readonly string[]): boolean {
    const needle = term.trim().toLowerCase();
    if (needle === '') return true;

    const searched = fields && fields.length > 0 ? fields.filter(isSearchField) : DEFAULT_SEARCH_FIELDS;
    return searched.some((field) => task[field].toLowerCase().includes(needle));
}

// Newest first; the ID breaks ties between tasks created in the same millisecond.
export function compareByDefaultOrder(a: Task, b: Task): number {
    return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

function isSortKey(key: string): key is TaskSortKey {
    return key === 'created_at' || key === 'updated_at' || key === 'priority';
}

export function sortTasks(tasks: Task[], sortBy?: string, descending = false): Task[] {
    if (!sortBy || !isSortKey(sortBy)) {
        return tasks.sort(compareByDefaultOrder);
    }

    const direction = descending ? -1 : 1;
    switch (sortBy) {
        case 'created_at':
            return tasks.sort((a, b) => direction * (a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id));
        case 'updated_at':
            return tasks.sort((a, b) => direction * (a.updatedAt.getTime() - b.updatedAt.getTime() || a.id - b.id));
        case 'priority':
            return tasks.sort(
                (a, b) =>
                    direction * (PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]) || compareByDefaultOrder(a, b),
            );
    }
}

/**
 * Slices out the window [offset, offset + limit). A limit of zero or less
 * means no upper bound; an offset past the end yields an empty list.
 */
export function paginate<T>(items: T[], limit?: number, offset?: number): T[] {
    const start = Math.max(0, offset ?? 0);
    if (start >= items.length) return [];

    const end = limit !== undefined && limit > 0 ? Math.min(start + limit, items.length) : items.length;
    return items.slice(start, end);
}

export function computeStats(tasks: Iterable<Task>, now: Date): TaskStats {
    const stats: TaskStats = {
        totalTasks: 0,
        tasksByStatus: Object.fromEntries(TASK_STATUSES.map((status) => [status, 0])),
        tasksByPriority: Object.fromEntries(TASK_PRIORITIES.map((priority) => [priority, 0])),
        tasksByUser: {},
        lastUpdated: now,
    };

    for (const task of tasks) {
        stats.totalTasks++;
        stats.tasksByStatus[task.status] = (stats.tasksByStatus[task.status] ?? 0) + 1;
        stats.tasksByPriority[task.priority] = (stats.tasksByPriority[task.priority] ?? 0) + 1;
        if (task.assignedTo) {
            stats.tasksByUser[task.assignedTo] = (stats.tasksByUser[task.assignedTo] ?? 0) + 1;
        }
    }

    return stats;
}
