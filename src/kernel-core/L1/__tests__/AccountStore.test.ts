import { describe, it, expect } from '@jest/globals';
import {
    InMemoryAccountStore, accountStateHash, createAccount, deserializeAccount, parseAccount, requireAccount, serializeAccount
} from '../AccountStore.js';
import { CoreError, ErrorCode, isCoreError } from '../../Errors.js';

describe('Account Store', () => {
    it('should create accounts at the centre with genesis values', () => {
        const account = createAccount('alice');

        expect(account.complexityIndex).toBe(1.0);
        expect(account.energy).toBe(100.0);
        expect(account.tier).toBe(1);
        expect(account.position8d).toEqual([0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5]);
        expect(Object.values(account.knowledgeVector).every((k) => k === 0)).toBe(true);
        expect(account.problemsSolved).toBe(0);
    });

    it('should derive the tier of a configured genesis', () => {
        expect(createAccount('elder', { complexityIndex: 50, energy: 10 }).tier).toBe(2);
    });

    it('should round-trip the persisted layout', () => {
        const account = createAccount('alice');
        const restored = deserializeAccount(serializeAccount(account));

        expect(restored).toEqual(account);
        expect(accountStateHash(restored)).toBe(accountStateHash(account));
    });

    it('should refuse records that break invariants as a fault', () => {
        const broken = { ...createAccount('alice'), energy: -5 };
        try {
            parseAccount(JSON.parse(JSON.stringify(broken)));
            throw new Error('expected parseAccount to throw');
        } catch (e) {
            expect(isCoreError(e, ErrorCode.INTEGRITY_BREACH)).toBe(true);
            expect(e instanceof CoreError && e.isFault).toBe(true);
        }
    });

    it('should refuse bytes that are not JSON', () => {
        expect(() => deserializeAccount(Buffer.from('not json'))).toThrow(CoreError);
    });

    it('should list accounts sorted by identity and keep the last write', async () => {
        const store = new InMemoryAccountStore([createAccount('carol'), createAccount('alice')]);
        await store.upsert({ ...createAccount('alice'), energy: 42 });

        const listed = await store.list();
        expect(listed.map((a) => a.identity)).toEqual(['alice', 'carol']);
        expect(listed[0]?.energy).toBe(42);
    });

    it('should surface missing accounts', async () => {
        const store = new InMemoryAccountStore();
        await expect(requireAccount(store, 'ghost')).rejects.toMatchObject({ code: ErrorCode.ACCOUNT_NOT_FOUND });
    });
});
