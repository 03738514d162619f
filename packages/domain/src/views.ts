import type { TaskId, TaskPriority, TaskStatus } from './task.js';

// JSON shapes sent over the wire; timestamps are ISO-8601 strings.

export interface TaskView {
    id: TaskId;
    title: string;
    description: string;
    status: TaskStatus;
    priority: TaskPriority;
    created_at: string;
    updated_at: string;
    assigned_to?: string;
    tags?: string[];
}

export interface TaskListView {
    tasks: TaskView[];
    count: number;
}

export interface TaskSearchView extends TaskListView {
    query: string;
}

export interface TaskStatsView {
    total_tasks: number;
    tasks_by_status: Record<string, number>;
    tasks_by_priority: Record<string, number>;
    tasks_by_user: Record<string, number>;
    last_updated: string;
}
