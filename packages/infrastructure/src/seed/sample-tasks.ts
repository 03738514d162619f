import type { CreateTaskRequest, Task, TaskStore } from '@taskdeck/domain';

export const SAMPLE_TASKS: readonly CreateTaskRequest[] = [
    {
        title: 'Setup project structure',
        description: 'Create the basic project layout with a clear package organization',
        status: 'completed',
        priority: 'high',
        assignedTo: 'alice',
        tags: ['setup', 'infrastructure'],
    },
    {
        title: 'Implement API endpoints',
        description: 'Create REST API endpoints for task management with proper error handling',
        status: 'in-progress',
        priority: 'high',
        assignedTo: 'bob',
        tags: ['api', 'backend'],
    },
    {
        title: 'Add authentication',
        description: 'Implement token-based authentication and authorization middleware',
        status: 'pending',
        priority: 'medium',
        assignedTo: 'charlie',
        tags: ['auth', 'security'],
    },
    {
        title: 'Write documentation',
        description: 'Create comprehensive API documentation and user guides',
        status: 'pending',
        priority: 'low',
        tags: ['docs', 'documentation'],
    },
];

/** Creates the sample tasks in order; stops at the first failure (e.g. a full store). */
export async function seedSampleTasks(store: TaskStore): Promise<Task[]> {
    const created: Task[] = [];
    for (const request of SAMPLE_TASKS) {
        created.push(await store.create(request));
    }
    return created;
}
