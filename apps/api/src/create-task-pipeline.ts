import { ValidationError } from '@taskdeck/domain';
import type { CreateTaskRequest, Task } from '@taskdeck/domain';
import { CommandPipeline } from './command-pipeline.js';
import type { Command } from './command-pipeline.js';

export interface CreateTaskCommand extends Command<CreateTaskRequest> {
    type: 'TASK_CREATE';
}

export class CreateTaskPipeline extends CommandPipeline<CreateTaskCommand, Task> {
    protected validate(command: CreateTaskCommand): void {
        if (typeof command.payload.title !== 'string') throw new ValidationError('title is required');
    }

    protected async handle(command: CreateTaskCommand): Promise<Task> {
        return this.store.create(command.payload);
    }

    protected getResourceId(_command: CreateTaskCommand, task: Task): number {
        return task.id;
    }
}
