import type { TaskStore } from '@taskdeck/domain';
import type { Logger } from './logger.js';

export interface Command<T> {
    type: string;
    payload: T;
}

/**
 * Write path shared by every task command: check the command shape, run it
 * against the store, then record the outcome in the log.
 */
export abstract class CommandPipeline<TCommand extends Command<unknown>, TResult> {
    constructor(
        protected readonly store: TaskStore,
        protected readonly logger: Logger,
    ) { }

    async execute(command: TCommand): Promise<TResult> {
        this.validate(command);

        try {
            const result = await this.handle(command);
            this.logger.info(`${command.type} succeeded`, {
                command: command.type,
                taskId: this.getResourceId(command, result),
            });
            return result;
        } catch (error) {
            this.logger.warn(`${command.type} failed`, {
                command: command.type,
                reason: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }

    protected abstract validate(command: TCommand): void;
    protected abstract handle(command: TCommand): Promise<TResult>;
    protected abstract getResourceId(command: TCommand, result: TResult): number;
}
