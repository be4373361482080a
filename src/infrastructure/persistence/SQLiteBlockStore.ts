import Database from 'better-sqlite3';
import type { Block } from '../../kernel-core/L0/Ontology.js';
import { deserializeBlock, serializeBlock } from '../../kernel-core/L4/Block.js';
import type { IBlockStore } from '../../kernel-core/L5/BlockStore.js';

interface BlockRow {
    body: string;
}

/**
 * Blocks are kept as their canonical encoding, so a stored row hashes
 * back to the same digest the chain recorded.
 */
export class SQLiteBlockStore implements IBlockStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS blocks (
                blockIndex INTEGER PRIMARY KEY,
                hash TEXT UNIQUE NOT NULL,
                previousHash TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                body TEXT NOT NULL
            )
        `);
    }

    async append(block: Block): Promise<void> {
        this.db.prepare(`
            INSERT INTO blocks (blockIndex, hash, previousHash, timestamp, body) VALUES (?, ?, ?, ?, ?)
        `).run(block.index, block.hash, block.previousHash, block.timestamp, serializeBlock(block).toString('utf8'));
    }

    async load(): Promise<Block[]> {
        const rows = this.db.prepare<[], BlockRow>('SELECT body FROM blocks ORDER BY blockIndex ASC').all();
        return rows.map((row) => deserializeBlock(Buffer.from(row.body, 'utf8')));
    }

    public close() {
        this.db.close();
    }
}
