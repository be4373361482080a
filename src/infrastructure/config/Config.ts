/**
 * Node Configuration
 *
 * Parses config/node.yml, merges it over the defaults below and applies
 * POHD_* environment overrides.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { CoreError, ErrorCode } from '../../kernel-core/Errors.js';
import { energyCap, tierFor } from '../../kernel-core/L0/Tiers.js';

export type DifficultyMode = 'fixed' | 'retarget';

export interface DifficultyConfig {
    mode: DifficultyMode;
    initial: number;
    min: number;
    max: number;
    targetBlockTimeMs: number;
}

export interface NodeConfig {
    dbPath: string;
    blockReward: number;
    rewardAccount?: string;
    /** Seed of the node's random source; entropy when absent. */
    seed?: number;
    difficulty: DifficultyConfig;
    mining: {
        workers: number;
        batchSize: number;
        maxAttempts: number;
    };
    validation: {
        oracleTimeoutMs: number;
    };
    genesis: {
        complexityIndex: number;
        energy: number;
    };
}

export const DEFAULT_CONFIG_PATH = path.join('config', 'node.yml');

export const DEFAULT_NODE_CONFIG: NodeConfig = {
    dbPath: path.join('data', 'ledger.db'),
    blockReward: 10.0,
    difficulty: {
        mode: 'fixed',
        initial: 4,
        min: 1,
        max: 32,
        targetBlockTimeMs: 10_000,
    },
    mining: {
        workers: 4,
        batchSize: 256,
        maxAttempts: 10_000_000,
    },
    validation: {
        oracleTimeoutMs: 30_000,
    },
    genesis: {
        complexityIndex: 1.0,
        energy: 100.0,
    },
};

function invalid(message: string): CoreError {
    return new CoreError(ErrorCode.CONFIGURATION_INVALID, message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) throw invalid(`${key} must be a mapping`);
    return value;
}

function numberOr(raw: Record<string, unknown>, key: string, fallback: number, label: string): number {
    const value = raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) throw invalid(`${label} must be a number`);
    return value;
}

function stringOr(raw: Record<string, unknown>, key: string, fallback: string, label: string): string {
    const value = raw[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'string' || value.length === 0) throw invalid(`${label} must be a non-empty string`);
    return value;
}

function optionalString(raw: Record<string, unknown>, key: string, label: string): string | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;
    return stringOr(raw, key, '', label);
}

function optionalNumber(raw: Record<string, unknown>, key: string, label: string): number | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;
    return numberOr(raw, key, 0, label);
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const value = env[name];
    if (value === undefined || value === '') return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) throw invalid(`${name} must be a number, got ${JSON.stringify(value)}`);
    return parsed;
}

function parseMode(value: unknown): DifficultyMode {
    if (value === undefined || value === null) return DEFAULT_NODE_CONFIG.difficulty.mode;
    if (value === 'fixed' || value === 'retarget') return value;
    throw invalid(`difficulty.mode must be "fixed" or "retarget", got ${JSON.stringify(value)}`);
}

/**
 * Builds a config from an already parsed YAML document.
 */
export function resolveNodeConfig(document: unknown, env: NodeJS.ProcessEnv = {}): NodeConfig {
    const raw = document === undefined || document === null ? {} : document;
    if (!isRecord(raw)) throw invalid('Configuration root must be a mapping');

    const defaults = DEFAULT_NODE_CONFIG;
    const difficulty = section(raw, 'difficulty');
    const mining = section(raw, 'mining');
    const validation = section(raw, 'validation');
    const genesis = section(raw, 'genesis');

    const config: NodeConfig = {
        dbPath: stringOr(raw, 'dbPath', defaults.dbPath, 'dbPath'),
        blockReward: numberOr(raw, 'blockReward', defaults.blockReward, 'blockReward'),
        rewardAccount: optionalString(raw, 'rewardAccount', 'rewardAccount'),
        seed: optionalNumber(raw, 'seed', 'seed'),
        difficulty: {
            mode: parseMode(difficulty['mode']),
            initial: numberOr(difficulty, 'initial', defaults.difficulty.initial, 'difficulty.initial'),
            min: numberOr(difficulty, 'min', defaults.difficulty.min, 'difficulty.min'),
            max: numberOr(difficulty, 'max', defaults.difficulty.max, 'difficulty.max'),
            targetBlockTimeMs: numberOr(difficulty, 'targetBlockTimeMs', defaults.difficulty.targetBlockTimeMs, 'difficulty.targetBlockTimeMs'),
        },
        mining: {
            workers: numberOr(mining, 'workers', defaults.mining.workers, 'mining.workers'),
            batchSize: numberOr(mining, 'batchSize', defaults.mining.batchSize, 'mining.batchSize'),
            maxAttempts: numberOr(mining, 'maxAttempts', defaults.mining.maxAttempts, 'mining.maxAttempts'),
        },
        validation: {
            oracleTimeoutMs: numberOr(validation, 'oracleTimeoutMs', defaults.validation.oracleTimeoutMs, 'validation.oracleTimeoutMs'),
        },
        genesis: {
            complexityIndex: numberOr(genesis, 'complexityIndex', defaults.genesis.complexityIndex, 'genesis.complexityIndex'),
            energy: numberOr(genesis, 'energy', defaults.genesis.energy, 'genesis.energy'),
        },
    };

    // Environment wins over the file.
    const difficultyOverride = envNumber(env, 'POHD_DIFFICULTY');
    if (difficultyOverride !== undefined) config.difficulty.initial = difficultyOverride;
    const workersOverride = envNumber(env, 'POHD_WORKERS');
    if (workersOverride !== undefined) config.mining.workers = workersOverride;
    const seedOverride = envNumber(env, 'POHD_SEED');
    if (seedOverride !== undefined) config.seed = seedOverride;
    if (env['POHD_DB_PATH']) config.dbPath = env['POHD_DB_PATH'];

    validateNodeConfig(config);
    return config;
}

export function validateNodeConfig(config: NodeConfig): void {
    const { difficulty, mining, validation, genesis } = config;
    if (difficulty.initial < 0) throw invalid('difficulty.initial must not be negative');
    if (difficulty.min < 0 || difficulty.min > difficulty.max) throw invalid('difficulty bounds must satisfy 0 <= min <= max');
    if (difficulty.mode === 'retarget' && (difficulty.initial < difficulty.min || difficulty.initial > difficulty.max)) {
        throw invalid('difficulty.initial must lie within [min, max] when retargeting');
    }
    if (difficulty.targetBlockTimeMs <= 0) throw invalid('difficulty.targetBlockTimeMs must be positive');
    if (!Number.isInteger(mining.workers) || mining.workers < 1) throw invalid('mining.workers must be a positive integer');
    if (!Number.isInteger(mining.batchSize) || mining.batchSize < 1) throw invalid('mining.batchSize must be a positive integer');
    if (!Number.isInteger(mining.maxAttempts) || mining.maxAttempts < 1) throw invalid('mining.maxAttempts must be a positive integer');
    if (validation.oracleTimeoutMs < 0) throw invalid('validation.oracleTimeoutMs must not be negative');
    if (genesis.complexityIndex <= 0) throw invalid('genesis.complexityIndex must be positive');
    if (genesis.energy < 0) throw invalid('genesis.energy must not be negative');
    const cap = energyCap(tierFor(genesis.complexityIndex));
    if (genesis.energy > cap) throw invalid(`genesis.energy must not exceed the tier cap ${cap}`);
    if (config.blockReward <= 0) throw invalid('blockReward must be positive');
    if (config.seed !== undefined && !Number.isInteger(config.seed)) throw invalid('seed must be an integer');
}

/**
 * Load node config from YAML, falling back to defaults when the default file is absent.
 * A path named explicitly (argument or POHD_CONFIG) must exist.
 */
export function loadNodeConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): NodeConfig {
    const explicit = configPath || env['POHD_CONFIG'];
    const filePath = explicit || DEFAULT_CONFIG_PATH;

    if (!fs.existsSync(filePath)) {
        if (explicit) throw invalid(`Configuration file ${filePath} does not exist`);
        return resolveNodeConfig({}, env);
    }

    let document: unknown;
    try {
        document = parseYaml(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw invalid(`Cannot parse ${filePath}: ${message}`);
    }
    return resolveNodeConfig(document, env);
}
