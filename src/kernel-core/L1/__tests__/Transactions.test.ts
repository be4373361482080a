import { describe, it, expect } from '@jest/globals';
import { hasValidId, parseTransaction, transactionId, transferTransaction } from '../Transactions.js';
import { ErrorCode } from '../../Errors.js';

describe('Transactions', () => {
    const tx = transferTransaction({ from: 'alice', to: 'bob', amount: 3, nonce: 0 }, 1000);

    it('should file transfers under their sender and derive the id from content', () => {
        expect(tx.kind).toBe('TRANSFER');
        expect(tx.accountId).toBe('alice');
        expect(tx.id).toBe(transactionId(tx));
        expect(hasValidId(tx)).toBe(true);
    });

    it('should give different content different ids', () => {
        const other = transferTransaction({ from: 'alice', to: 'bob', amount: 3, nonce: 1 }, 1000);
        expect(other.id).not.toBe(tx.id);
    });

    it('should detect tampered content', () => {
        const tampered = { ...tx, payload: { ...tx.payload, amount: 300 } };
        expect(hasValidId(tampered)).toBe(false);
    });

    it('should parse decoded JSON back into the same transaction', () => {
        expect(parseTransaction(JSON.parse(JSON.stringify(tx)))).toEqual(tx);
    });

    it('should reject unknown kinds', () => {
        let error: unknown;
        try {
            parseTransaction({ ...tx, kind: 'MINT' });
        } catch (e) {
            error = e;
        }
        expect(error).toMatchObject({ code: ErrorCode.MALFORMED_BLOCK });
    });
});
