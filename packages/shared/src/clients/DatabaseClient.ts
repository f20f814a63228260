import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { readFileSync } from 'fs';
import * as schema from '../db/schema.js';

export type CareDatabase = BetterSQLite3Database<typeof schema>;

const SCHEMA_SQL = new URL('../../sql/schema.sql', import.meta.url);

export class DatabaseClient {
    private static instance: DatabaseClient | undefined;
    private readonly sqlite: Database.Database;
    private readonly database: CareDatabase;

    private constructor(filename: string) {
        this.sqlite = new Database(filename);
        if (filename !== ':memory:') {
            this.sqlite.pragma('journal_mode = WAL');
        }
        this.sqlite.pragma('foreign_keys = ON');
        this.sqlite.exec(readFileSync(SCHEMA_SQL, 'utf8'));
        this.database = drizzle(this.sqlite, { schema });
    }

    static getInstance(filename?: string): DatabaseClient {
        if (!DatabaseClient.instance) {
            const path = filename ?? process.env.DATABASE_PATH ?? 'carewatch.db';
            DatabaseClient.instance = new DatabaseClient(path);
            console.log('[DatabaseClient] Opened database:', path);
        }
        return DatabaseClient.instance;
    }

    static createInMemory(): DatabaseClient {
        return new DatabaseClient(':memory:');
    }

    get db(): CareDatabase {
        return this.database;
    }

    close(): void {
        this.sqlite.close();
        if (DatabaseClient.instance === this) {
            DatabaseClient.instance = undefined;
        }
    }
}
