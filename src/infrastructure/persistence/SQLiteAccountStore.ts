import Database from 'better-sqlite3';
import type { Account, AccountID } from '../../kernel-core/L0/Ontology.js';
import { deserializeAccount, serializeAccount } from '../../kernel-core/L1/AccountStore.js';
import type { IAccountStore } from '../../kernel-core/L1/AccountStore.js';

interface AccountRow {
    identity: string;
    state: string;
}

export class SQLiteAccountStore implements IAccountStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS accounts (
                identity TEXT PRIMARY KEY,
                state TEXT NOT NULL,
                updatedAt INTEGER NOT NULL
            )
        `);
    }

    async get(id: AccountID): Promise<Account | null> {
        const row = this.db
            .prepare<[string], AccountRow>('SELECT identity, state FROM accounts WHERE identity = ?')
            .get(id);
        return row ? this.mapRowToAccount(row) : null;
    }

    async upsert(account: Account): Promise<void> {
        this.db.prepare(`
            INSERT INTO accounts (identity, state, updatedAt) VALUES (?, ?, ?)
            ON CONFLICT(identity) DO UPDATE SET state = excluded.state, updatedAt = excluded.updatedAt
        `).run(account.identity, serializeAccount(account).toString('utf8'), Date.now());
    }

    async list(): Promise<Account[]> {
        const rows = this.db
            .prepare<[], AccountRow>('SELECT identity, state FROM accounts ORDER BY identity ASC')
            .all();
        return rows.map((row) => this.mapRowToAccount(row));
    }

    private mapRowToAccount(row: AccountRow): Account {
        return deserializeAccount(Buffer.from(row.state, 'utf8'));
    }

    public close() {
        this.db.close();
    }
}
