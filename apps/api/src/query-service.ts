import type {
    Task,
    TaskFilter,
    TaskId,
    TaskListView,
    TaskSearchQuery,
    TaskSearchView,
    TaskStats,
    TaskStatsView,
    TaskStore,
    TaskView,
} from '@taskdeck/domain';

/** Read side of the API: loads tasks from the store and maps them to wire views. */
export class QueryService {
    constructor(private readonly store: TaskStore) { }

    async getTasks(filter?: TaskFilter): Promise<TaskListView> {
        const tasks = await this.store.list(filter);
        return { tasks: tasks.map(mapToTaskView), count: tasks.length };
    }

    async getTask(id: TaskId): Promise<TaskView> {
        return mapToTaskView(await this.store.get(id));
    }

    async searchTasks(query: TaskSearchQuery): Promise<TaskSearchView> {
        const tasks = await this.store.search(query);
        return { tasks: tasks.map(mapToTaskView), count: tasks.length, query: query.query ?? '' };
    }

    async getStats(): Promise<TaskStatsView> {
        return mapToStatsView(await this.store.stats());
    }
}

export function mapToTaskView(task: Task): TaskView {
    return {
        id: task.id,
        title: task.title,
        description: task.description,
        status: task.status,
        priority: task.priority,
        created_at: task.createdAt.toISOString(),
        updated_at: task.updatedAt.toISOString(),
        ...(task.assignedTo ? { assigned_to: task.assignedTo } : {}),
        ...(task.tags.length > 0 ? { tags: [...task.tags] } : {}),
    };
}

export function mapToStatsView(stats: TaskStats): TaskStatsView {
    return {
        total_tasks: stats.totalTasks,
        tasks_by_status: { ...stats.tasksByStatus },
        tasks_by_priority: { ...stats.tasksByPriority },
        tasks_by_user: { ...stats.tasksByUser },
        last_updated: stats.lastUpdated.toISOString(),
    };
}
