type LockMode = 'read' | 'write';

interface Waiter {
    mode: LockMode;
    resolve: () => void;
}

/**
 * Async shared/exclusive lock. Readers run together; a writer runs alone.
 * Waiters are granted in arrival order, so a queued writer holds back readers
 * that arrive after it.
 */
export class ReadWriteLock {
    private activeReaders = 0;
    private writerActive = false;
    private readonly queue: Waiter[] = [];

    async read<T>(fn: () => T | Promise<T>): Promise<T> {
        await this.acquire('read');
        try {
            return await fn();
        } finally {
            this.release('read');
        }
    }

    async write<T>(fn: () => T | Promise<T>): Promise<T> {
        await this.acquire('write');
        try {
            return await fn();
        } finally {
            this.release('write');
        }
    }

    get pending(): number {
        return this.queue.length;
    }

    private acquire(mode: LockMode): Promise<void> {
        if (this.queue.length === 0 && this.canGrant(mode)) {
            this.grant(mode);
            return Promise.resolve();
        }
        return new Promise((resolve) => this.queue.push({ mode, resolve }));
    }

    private release(mode: LockMode): void {
        if (mode === 'read') {
            this.activeReaders--;
        } else {
            this.writerActive = false;
        }
        this.drain();
    }

    private drain(): void {
        for (let next = this.queue[0]; next && this.canGrant(next.mode); next = this.queue[0]) {
            this.queue.shift();
            this.grant(next.mode);
            next.resolve();
        }
    }

    private canGrant(mode: LockMode): boolean {
        if (mode === 'read') return !this.writerActive;
        return !this.writerActive && this.activeReaders === 0;
    }

    private grant(mode: LockMode): void {
        if (mode === 'read') {
            this.activeReaders++;
        } else {
            this.writerActive = true;
        }
    }
}
