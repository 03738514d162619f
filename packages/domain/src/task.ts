export type TaskId = number;

export enum TaskStatus {
    PENDING = 'pending',
    IN_PROGRESS = 'in-progress',
    COMPLETED = 'completed',
    CANCELLED = 'cancelled',
}

export enum TaskPriority {
    LOW = 'low',
    MEDIUM = 'medium',
    HIGH = 'high',
    CRITICAL = 'critical',
}

export const TASK_STATUSES: readonly TaskStatus[] = Object.values(TaskStatus);
export const TASK_PRIORITIES: readonly TaskPriority[] = Object.values(TaskPriority);

// Ordinal used when sorting by priority.
export const PRIORITY_RANK: Record<TaskPriority, number> = {
    [TaskPriority.LOW]: 1,
    [TaskPriority.MEDIUM]: 2,
    [TaskPriority.HIGH]: 3,
    [TaskPriority.CRITICAL]: 4,
};

export const TASK_LIMITS = {
    titleMaxLength: 200,
    descriptionMaxLength: 1000,
    assigneeMaxLength: 50,
    maxTags: 10,
    tagMaxLength: 50,
} as const;

export function isTaskStatus(value: string): value is TaskStatus {
    return TASK_STATUSES.some((status) => status === value);
}

export function isTaskPriority(value: string): value is TaskPriority {
    return TASK_PRIORITIES.some((priority) => priority === value);
}

export interface Task {
    id: TaskId;
    title: string;
    description: string;
    status: TaskStatus;
    priority: TaskPriority;
    createdAt: Date;
    updatedAt: Date;
    assignedTo?: string;
    tags: string[];
}

/**
 * Payload for creating a task. Status and priority are untrusted input and
 * are checked against the enums by the store; empty values take the store's
 * defaults.
 */
export interface CreateTaskRequest {
    title: string;
    description?: string;
    status?: string;
    priority?: string;
    assignedTo?: string;
    tags?: string[];
}

/**
 * Partial update. A property that is defined is applied; an undefined one
 * leaves the stored value untouched. `assignedTo: ''` clears the assignee and
 * `tags: []` clears the tags.
 */
export interface UpdateTaskRequest {
    title?: string;
    description?: string;
    status?: string;
    priority?: string;
    assignedTo?: string;
    tags?: string[];
}

export interface TaskFilter {
    status?: string;
    priority?: string;
    assignedTo?: string;
    tags?: string[];
    limit?: number;
    offset?: number;
}

export type SearchField = 'title' | 'description';

export type TaskSortKey = 'created_at' | 'updated_at' | 'priority';

export interface TaskSearchQuery {
    query?: string;
    fields?: string[];
    filter?: TaskFilter;
    sortBy?: string;
    sortDesc?: boolean;
}

export interface TaskStats {
    totalTasks: number;
    tasksByStatus: Record<string, number>;
    tasksByPriority: Record<string, number>;
    tasksByUser: Record<string, number>;
    lastUpdated: Date;
}

export interface TaskStore {
    create(request: CreateTaskRequest): Promise<Task>;
    get(id: TaskId): Promise<Task>;
    list(filter?: TaskFilter): Promise<Task[]>;
    update(id: TaskId, request: UpdateTaskRequest): Promise<Task>;
    delete(id: TaskId): Promise<void>;
    search(query: TaskSearchQuery): Promise<Task[]>;
    stats(): Promise<TaskStats>;
    count(): Promise<number>;
}
