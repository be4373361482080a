import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_NODE_CONFIG, loadNodeConfig, resolveNodeConfig } from '../Config.js';
import { ErrorCode } from '../../../kernel-core/Errors.js';

function configError(run: () => unknown): unknown {
    let error: unknown;
    try {
        run();
    } catch (e) {
        error = e;
    }
    return error;
}

describe('Node Configuration', () => {
    it('should fall back to the defaults', () => {
        expect(resolveNodeConfig({})).toEqual(DEFAULT_NODE_CONFIG);
        expect(resolveNodeConfig(null)).toEqual(DEFAULT_NODE_CONFIG);
    });

    it('should merge sections over the defaults', () => {
        const config = resolveNodeConfig({ difficulty: { mode: 'retarget', initial: 6 }, mining: { workers: 2 } });
        expect(config.difficulty).toEqual({ ...DEFAULT_NODE_CONFIG.difficulty, mode: 'retarget', initial: 6 });
        expect(config.mining).toEqual({ ...DEFAULT_NODE_CONFIG.mining, workers: 2 });
    });

    it('should let the environment win over the document', () => {
        const config = resolveNodeConfig({ difficulty: { initial: 3 }, dbPath: 'file.db' }, {
            POHD_DIFFICULTY: '7',
            POHD_WORKERS: '2',
            POHD_SEED: '42',
            POHD_DB_PATH: ':memory:'
        });
        expect(config.difficulty.initial).toBe(7);
        expect(config.mining.workers).toBe(2);
        expect(config.seed).toBe(42);
        expect(config.dbPath).toBe(':memory:');
    });

    it.each([
        ['a list root', [1, 2]],
        ['zero workers', { mining: { workers: 0 } }],
        ['an unknown difficulty mode', { difficulty: { mode: 'adaptive' } }],
        ['a textual reward', { blockReward: 'ten' }],
        ['inverted bounds', { difficulty: { min: 5, max: 2 } }],
        ['a retarget start outside the bounds', { difficulty: { mode: 'retarget', initial: 40 } }],
        ['a scalar section', { mining: 4 }],
        ['a fractional seed', { seed: 1.5 }],
        ['genesis energy above the tier cap', { genesis: { energy: 1500 } }]
    ])('should reject %s', (_label, document) => {
        expect(configError(() => resolveNodeConfig(document))).toMatchObject({ code: ErrorCode.CONFIGURATION_INVALID });
    });

    it('should reject a non-numeric environment override', () => {
        expect(configError(() => resolveNodeConfig({}, { POHD_DIFFICULTY: 'hard' }))).toMatchObject({
            code: ErrorCode.CONFIGURATION_INVALID
        });
    });

    it('should read the shipped node.yml', () => {
        const shipped = path.join(__dirname, '..', '..', '..', '..', 'config', 'node.yml');
        expect(loadNodeConfig(shipped, {})).toEqual({ ...DEFAULT_NODE_CONFIG, rewardAccount: 'miner-0' });
    });

    describe('files', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pohd-config-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should load the file named by POHD_CONFIG', () => {
            const file = path.join(dir, 'custom.yml');
            fs.writeFileSync(file, 'blockReward: 25\ngenesis:\n  energy: 40\n');

            const config = loadNodeConfig(undefined, { POHD_CONFIG: file });
            expect(config.blockReward).toBe(25);
            expect(config.genesis).toEqual({ complexityIndex: 1, energy: 40 });
        });

        it('should insist on a file that was named explicitly', () => {
            const missing = path.join(dir, 'absent.yml');
            expect(configError(() => loadNodeConfig(missing, {}))).toMatchObject({ code: ErrorCode.CONFIGURATION_INVALID });
        });

        it('should report YAML it cannot parse', () => {
            const file = path.join(dir, 'broken.yml');
            fs.writeFileSync(file, 'difficulty: [4, 5\n');
            expect(() => loadNodeConfig(file, {})).toThrow('Cannot parse');
        });
    });
});
