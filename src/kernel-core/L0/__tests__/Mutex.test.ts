import { describe, it, expect } from '@jest/globals';
import { KeyedMutex } from '../Mutex.js';

describe('KeyedMutex', () => {
    it('should run work under one key strictly in order', async () => {
        const mutex = new KeyedMutex();
        const log: string[] = [];
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });

        const a = mutex.runExclusive('alice', async () => {
            log.push('a-start');
            await gate;
            log.push('a-end');
        });
        const b = mutex.runExclusive('alice', async () => {
            log.push('b');
        });
        release();
        await Promise.all([a, b]);

        expect(log).toEqual(['a-start', 'a-end', 'b']);
        expect(mutex.isLocked('alice')).toBe(false);
    });

    it('should not block different keys', async () => {
        const mutex = new KeyedMutex();
        const log: string[] = [];
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });

        const a = mutex.runExclusive('alice', async () => {
            log.push('a-start');
            await gate;
            log.push('a-end');
        });
        const b = mutex.runExclusive('bob', async () => {
            log.push('b');
            release();
        });
        await Promise.all([a, b]);

        expect(log).toEqual(['a-start', 'b', 'a-end']);
    });

    it('should release the key when work throws', async () => {
        const mutex = new KeyedMutex();
        const failing = mutex.runExclusive('alice', async () => {
            throw new Error('boom');
        });
        const next = mutex.runExclusive('alice', async () => 42);

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe(42);
    });
});
