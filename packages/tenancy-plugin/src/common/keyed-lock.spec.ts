import { describe, expect, it } from 'vitest';

import { KeyedLock } from './keyed-lock';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 5));

describe('KeyedLock', () => {
    it('runs work under the same key one at a time, in arrival order', async () => {
        const lock = new KeyedLock();
        const events: string[] = [];
        const job = (name: string) => async () => {
            events.push(`${name} start`);
            await tick();
            events.push(`${name} end`);
        };

        await Promise.all([lock.run('tenant:1', job('a')), lock.run('tenant:1', job('b'))]);

        expect(events).toEqual(['a start', 'a end', 'b start', 'b end']);
    });

    it('does not serialise different keys', async () => {
        const lock = new KeyedLock();
        const events: string[] = [];
        const job = (name: string) => async () => {
            events.push(`${name} start`);
            await tick();
            events.push(`${name} end`);
        };

        await Promise.all([lock.run('tenant:1', job('a')), lock.run('tenant:2', job('b'))]);

        expect(events.slice(0, 2)).toEqual(['a start', 'b start']);
    });

    it('grants the last free slot to exactly one of two concurrent reservations', async () => {
        const lock = new KeyedLock();
        const limit = 5;
        let used = 4;
        const reserve = () =>
            lock.run('tenant:1', async () => {
                const fits = used + 1 <= limit;
                await tick();
                if (fits) {
                    used += 1;
                }
                return fits;
            });

        const results = await Promise.all([reserve(), reserve()]);

        expect(results.filter(Boolean)).toHaveLength(1);
        expect(used).toBe(5);
    });

    it('keeps going after a failed job and passes the error to its caller', async () => {
        const lock = new KeyedLock();
        const failing = lock.run('tenant:1', async () => {
            throw new Error('boom');
        });
        const next = lock.run('tenant:1', async () => 'ok');

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe('ok');
    });

    it('releases the key once the queue is empty', async () => {
        const lock = new KeyedLock();
        const running = lock.run('tenant:1', tick);
        expect(lock.isLocked('tenant:1')).toBe(true);
        await running;
        expect(lock.isLocked('tenant:1')).toBe(false);
    });
});
