import { ValidationError } from '@taskdeck/domain';
import type { TaskId } from '@taskdeck/domain';
import { CommandPipeline } from './command-pipeline.js';
import type { Command } from './command-pipeline.js';

export interface DeleteTaskCommand extends Command<{
    taskId: TaskId;
}> {
    type: 'TASK_DELETE';
}

export class DeleteTaskPipeline extends CommandPipeline<DeleteTaskCommand, void> {
    protected validate(command: DeleteTaskCommand): void {
        if (!Number.isInteger(command.payload.taskId)) throw new ValidationError('task ID must be an integer');
    }

    protected async handle(command: DeleteTaskCommand): Promise<void> {
        await this.store.delete(command.payload.taskId);
    }

    protected getResourceId(command: DeleteTaskCommand): number {
        return command.payload.taskId;
    }
}
