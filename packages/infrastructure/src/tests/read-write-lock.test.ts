import { describe, it, expect } from 'vitest';
import { ReadWriteLock } from '../concurrency/read-write-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((done) => {
        resolve = done;
    });
    return { promise, resolve };
}

const flush = () => new Promise<void>((done) => setImmediate(done));

describe('ReadWriteLock', () => {
    it('lets readers run together', async () => {
        const lock = new ReadWriteLock();
        const gate = deferred();
        const events: string[] = [];

        const first = lock.read(async () => {
            events.push('r1:start');
            await gate.promise;
        });
        const second = lock.read(async () => {
            events.push('r2:start');
            await gate.promise;
        });

        await flush();
        expect(events).toEqual(['r1:start', 'r2:start']);

        gate.resolve();
        await Promise.all([first, second]);
    });

    it('makes a writer wait for the active reader', async () => {
        const lock = new ReadWriteLock();
        const gate = deferred();
        const events: string[] = [];

        const reader = lock.read(async () => {
            events.push('read:start');
            await gate.promise;
            events.push('read:end');
        });
        const writer = lock.write(() => {
            events.push('write');
        });

        await flush();
        expect(events).toEqual(['read:start']);
        expect(lock.pending).toBe(1);

        gate.resolve();
        await Promise.all([reader, writer]);
        expect(events).toEqual(['read:start', 'read:end', 'write']);
    });

    it('holds back readers that arrive after a queued writer', async () => {
        const lock = new ReadWriteLock();
        const gate = deferred();
        const events: string[] = [];

        const first = lock.read(async () => {
            events.push('r1:start');
            await gate.promise;
            events.push('r1:end');
        });
        const writer = lock.write(() => {
            events.push('write');
        });
        const second = lock.read(() => {
            events.push('r2');
        });

        await flush();
        expect(events).toEqual(['r1:start']);

        gate.resolve();
        await Promise.all([first, writer, second]);
        expect(events).toEqual(['r1:start', 'r1:end', 'write', 'r2']);
    });

    it('releases the lock when the critical section throws', async () => {
        const lock = new ReadWriteLock();

        await expect(
            lock.write(() => {
                throw new Error('boom');
            }),
        ).rejects.toThrow('boom');

        await expect(lock.read(() => 'still usable')).resolves.toBe('still usable');
        expect(lock.pending).toBe(0);
    });
});
