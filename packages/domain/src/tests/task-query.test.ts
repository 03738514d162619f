import { describe, it, expect } from 'vitest';
import { TaskPriority, TaskStatus } from '../task.js';
import type { Task } from '../task.js';
import { computeStats, matchesFilter, matchesSearchTerm, paginate, sortTasks } from '../task-query.js';

function makeTask(overrides: Partial<Task> & Pick<Task, 'id'>): Task {
    return {
        title: `Task ${overrides.id}`,
        description: '',
        status: TaskStatus.PENDING,
        priority: TaskPriority.MEDIUM,
        createdAt: new Date('2024-01-01T00:00:00Z'),
        updatedAt: new Date('2024-01-01T00:00:00Z'),
        tags: [],
        ...overrides,
    };
}

describe('matchesFilter', () => {
    const task = makeTask({
        id: 1,
        status: TaskStatus.IN_PROGRESS,
        priority: TaskPriority.HIGH,
        assignedTo: 'bob',
        tags: ['api', 'backend'],
    });

    it('matches everything without a filter or with empty fields', () => {
        expect(matchesFilter(task)).toBe(true);
        expect(matchesFilter(task, {})).toBe(true);
        expect(matchesFilter(task, { status: '', priority: '', assignedTo: '', tags: [] })).toBe(true);
    });

    it('combines active fields with AND', () => {
        expect(matchesFilter(task, { status: 'in-progress', priority: 'high' })).toBe(true);
        expect(matchesFilter(task, { status: 'in-progress', priority: 'low' })).toBe(false);
        expect(matchesFilter(task, { assignedTo: 'alice' })).toBe(false);
    });

    it('matches tags when any one is shared', () => {
        expect(matchesFilter(task, { tags: ['docs', 'backend'] })).toBe(true);
        expect(matchesFilter(task, { tags: ['docs'] })).toBe(false);
    });
});

describe('matchesSearchTerm', () => {
    const task = makeTask({ id: 1, title: 'Implement api endpoints', description: 'REST handlers' });

    it('is case-insensitive', () => {
        expect(matchesSearchTerm(task, 'API')).toBe(true);
        expect(matchesSearchTerm(task, 'rest')).toBe(true);
    });

    it('treats an empty term as a match', () => {
        expect(matchesSearchTerm(task, '   ')).toBe(true);
    });

    it('searches only the requested fields and ignores unknown ones', () => {
        expect(matchesSearchTerm(task, 'rest', ['title'])).toBe(false);
        expect(matchesSearchTerm(task, 'rest', ['description'])).toBe(true);
        expect(matchesSearchTerm(task, 'api', ['assigned_to'])).toBe(false);
    });
});

describe('sortTasks', () => {
    const older = makeTask({
        id: 1,
        priority: TaskPriority.CRITICAL,
        createdAt: new Date('2024-01-01T00:00:00Z'),
        updatedAt: new Date('2024-03-01T00:00:00Z'),
    });
    const newer = makeTask({
        id: 2,
        priority: TaskPriority.LOW,
        createdAt: new Date('2024-02-01T00:00:00Z'),
        updatedAt: new Date('2024-02-01T00:00:00Z'),
    });
    const sameTime = makeTask({
        id: 3,
        priority: TaskPriority.LOW,
        createdAt: new Date('2024-02-01T00:00:00Z'),
        updatedAt: new Date('2024-02-01T00:00:00Z'),
    });

    const ids = (tasks: Task[]) => tasks.map((task) => task.id);

    it('defaults to newest first with the ID breaking ties', () => {
        expect(ids(sortTasks([older, newer, sameTime]))).toEqual([3, 2, 1]);
    });

    it('falls back to the default order for unknown keys', () => {
        expect(ids(sortTasks([older, newer, sameTime], 'title', false))).toEqual([3, 2, 1]);
    });

    it('sorts by creation and update time in either direction', () => {
        expect(ids(sortTasks([newer, sameTime, older], 'created_at', false))).toEqual([1, 2, 3]);
        expect(ids(sortTasks([older, newer, sameTime], 'updated_at', true))).toEqual([1, 3, 2]);
    });

    it('ranks priorities low < medium < high < critical', () => {
        expect(ids(sortTasks([older, newer, sameTime], 'priority', false))).toEqual([3, 2, 1]);
        expect(ids(sortTasks([newer, sameTime, older], 'priority', true))).toEqual([1, 3, 2]);
    });
});

describe('paginate', () => {
    const items = [1, 2, 3, 4];

    it('returns the clamped window', () => {
        expect(paginate(items, 2, 3)).toEqual([4]);
        expect(paginate(items, 2, 1)).toEqual([2, 3]);
    });

    it('returns an empty list when the offset is past the end', () => {
        expect(paginate(items, undefined, 10)).toEqual([]);
        expect(paginate(items, 5, 4)).toEqual([]);
    });

    it('treats a non-positive limit as unbounded', () => {
        expect(paginate(items, 0, 1)).toEqual([2, 3, 4]);
        expect(paginate(items, -1)).toEqual([1, 2, 3, 4]);
    });
});

describe('computeStats', () => {
    it('groups by status, priority and assignee', () => {
        const now = new Date('2024-05-01T12:00:00Z');
        const stats = computeStats(
            [
                makeTask({ id: 1, status: TaskStatus.COMPLETED, priority: TaskPriority.HIGH, assignedTo: 'alice' }),
                makeTask({ id: 2, priority: TaskPriority.HIGH, assignedTo: 'alice' }),
                makeTask({ id: 3, priority: TaskPriority.LOW }),
            ],
            now,
        );

        expect(stats).toEqual({
            totalTasks: 3,
            tasksByStatus: { pending: 2, 'in-progress': 0, completed: 1, cancelled: 0 },
            tasksByPriority: { low: 1, medium: 0, high: 2, critical: 0 },
            tasksByUser: { alice: 2 },
            lastUpdated: now,
        });
    });
});
