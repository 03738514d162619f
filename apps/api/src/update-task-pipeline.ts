import { ValidationError } from '@taskdeck/domain';
import type { Task, TaskId, UpdateTaskRequest } from '@taskdeck/domain';
import { CommandPipeline } from './command-pipeline.js';
import type { Command } from './command-pipeline.js';

export interface UpdateTaskCommand extends Command<{
    taskId: TaskId;
    changes: UpdateTaskRequest;
}> {
    type: 'TASK_UPDATE';
}

export class UpdateTaskPipeline extends CommandPipeline<UpdateTaskCommand, Task> {
    protected validate(command: UpdateTaskCommand): void {
        if (!Number.isInteger(command.payload.taskId)) throw new ValidationError('task ID must be an integer');
    }

    protected async handle(command: UpdateTaskCommand): Promise<Task> {
        return this.store.update(command.payload.taskId, command.payload.changes);
    }

    protected getResourceId(command: UpdateTaskCommand): number {
        return command.payload.taskId;
    }
}
