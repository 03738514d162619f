import {
    CapacityError,
    NotFoundError,
    TaskPriority,
    TaskStatus,
    ValidationError,
    compareByDefaultOrder,
    computeStats,
    isTaskPriority,
    isTaskStatus,
    matchesFilter,
    matchesSearchTerm,
    paginate,
    sortTasks,
    validateCreateTaskRequest,
    validateUpdateTaskRequest,
} from '@taskdeck/domain';
import type {
    CreateTaskRequest,
    Task,
    TaskFilter,
    TaskId,
    TaskSearchQuery,
    TaskStats,
    TaskStore,
    UpdateTaskRequest,
} from '@taskdeck/domain';
import { ReadWriteLock } from '../concurrency/read-write-lock.js';

export interface InMemoryTaskStoreOptions {
    maxTasks: number;
    defaultStatus?: TaskStatus;
    defaultPriority?: TaskPriority;
    clock?: () => Date;
}

function cloneTask(task: Task): Task {
    return {
        ...task,
        tags: [...task.tags],
        createdAt: new Date(task.createdAt),
        updatedAt: new Date(task.updatedAt),
    };
}

function trimTags(tags: readonly string[] | undefined): string[] {
    return (tags ?? []).map((tag) => tag.trim());
}

/**
 * Process-lifetime task store. Reads share the lock, writes hold it
 * exclusively, and every record handed out is a copy.
 */
export class InMemoryTaskStore implements TaskStore {
    private readonly tasks: Map<TaskId, Task> = new Map();
    private readonly lock = new ReadWriteLock();
    private nextId: TaskId = 1;

    private readonly maxTasks: number;
    private readonly defaultStatus: TaskStatus;
    private readonly defaultPriority: TaskPriority;
    private readonly clock: () => Date;

    constructor(options: InMemoryTaskStoreOptions) {
        this.maxTasks = options.maxTasks;
        this.defaultStatus = options.defaultStatus ?? TaskStatus.PENDING;
        this.defaultPriority = options.defaultPriority ?? TaskPriority.MEDIUM;
        this.clock = options.clock ?? (() => new Date());
    }

    async create(request: CreateTaskRequest): Promise<Task> {
        return this.lock.write(() => {
            const failure = validateCreateTaskRequest(request);
            if (failure) throw new ValidationError(failure);

            if (this.tasks.size >= this.maxTasks) {
                throw new CapacityError(this.maxTasks);
            }

            const now = this.clock();
            const assignedTo = request.assignedTo?.trim();
            const task: Task = {
                id: this.nextId,
                title: request.title.trim(),
                description: (request.description ?? '').trim(),
                status: request.status && isTaskStatus(request.status) ? request.status : this.defaultStatus,
                priority: request.priority && isTaskPriority(request.priority) ? request.priority : this.defaultPriority,
                createdAt: now,
                updatedAt: new Date(now),
                ...(assignedTo ? { assignedTo } : {}),
                tags: trimTags(request.tags),
            };

            this.tasks.set(task.id, task);
            this.nextId++;
            return cloneTask(task);
        });
    }

    async get(id: TaskId): Promise<Task> {
        return this.lock.read(() => cloneTask(this.require(id)));
    }

    async list(filter?: TaskFilter): Promise<Task[]> {
        return this.lock.read(() => {
            const matching = this.snapshot((task) => matchesFilter(task, filter)).sort(compareByDefaultOrder);
            return paginate(matching, filter?.limit, filter?.offset);
        });
    }

    async update(id: TaskId, request: UpdateTaskRequest): Promise<Task> {
        return this.lock.write(() => {
            const current = this.require(id);

            const failure = validateUpdateTaskRequest(request);
            if (failure) throw new ValidationError(failure);

            // Build the replacement first so a failure can never leave a half-applied record.
            const next: Task = { ...current, tags: [...current.tags] };
            if (request.title !== undefined) next.title = request.title.trim();
            if (request.description !== undefined) next.description = request.description.trim();
            if (request.status !== undefined && isTaskStatus(request.status)) next.status = request.status;
            if (request.priority !== undefined && isTaskPriority(request.priority)) next.priority = request.priority;
            if (request.assignedTo !== undefined) {
                const assignedTo = request.assignedTo.trim();
                if (assignedTo) {
                    next.assignedTo = assignedTo;
                } else {
                    delete next.assignedTo;
                }
            }
            if (request.tags !== undefined) next.tags = trimTags(request.tags);

            const now = this.clock();
            next.updatedAt = now.getTime() < current.updatedAt.getTime() ? new Date(current.updatedAt) : now;

            this.tasks.set(id, next);
            return cloneTask(next);
        });
    }

    async delete(id: TaskId): Promise<void> {
        return this.lock.write(() => {
            this.require(id);
            this.tasks.delete(id);
        });
    }

    async search(query: TaskSearchQuery): Promise<Task[]> {
        return this.lock.read(() => {
            const term = query.query ?? '';
            const results = this.snapshot(
                (task) => matchesFilter(task, query.filter) && matchesSearchTerm(task, term, query.fields),
            );
            sortTasks(results, query.sortBy, query.sortDesc);
            return paginate(results, query.filter?.limit, query.filter?.offset);
        });
    }

    async stats(): Promise<TaskStats> {
        return this.lock.read(() => computeStats(this.tasks.values(), this.clock()));
    }

    async count(): Promise<number> {
        return this.lock.read(() => this.tasks.size);
    }

    private require(id: TaskId): Task {
        const task = this.tasks.get(id);
        if (!task) throw new NotFoundError(id);
        return task;
    }

    private snapshot(predicate: (task: Task) => boolean): Task[] {
        const result: Task[] = [];
        for (const task of this.tasks.values()) {
            if (predicate(task)) result.push(cloneTask(task));
        }
        return result;
    }
}
