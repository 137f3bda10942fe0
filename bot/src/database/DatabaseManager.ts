import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { IDatabaseManager } from '../core/interfaces/IDatabaseManager';
import { ILogger } from '../core/interfaces/ILogger';
import { PersistenceError } from '../utils/errors';

export interface Infraction {
  id: number;
  messageId: string;
  channelId: string;
  authorId: string;
  createdAt: Date;
  deletionTime: Date;
  content: string;
}

export type NewInfraction = Omit<Infraction, 'id'>;

interface InfractionRow {
  id: number;
  message_id: string;
  channel_id: string;
  author_id: string;
  created_at: number;
  deletion_time: number;
  content: string;
}

const IN_MEMORY = ':memory:';
const DEFAULT_PENDING_LIMIT = 50;

function toInfraction(row: InfractionRow): Infraction {
  return {
    id: row.id,
    messageId: row.message_id,
    channelId: row.channel_id,
    authorId: row.author_id,
    createdAt: new Date(row.created_at),
    deletionTime: new Date(row.deletion_time),
    content: row.content
  };
}

export class DatabaseManager implements IDatabaseManager {
  private db: Database.Database | null = null;
  private dbPath: string;
  private logger: ILogger;

  constructor(dbPath: string, logger: ILogger) {
    this.dbPath = dbPath === IN_MEMORY ? dbPath : path.resolve(dbPath);
    this.logger = logger;
  }

  initialize(): void {
    try {
      if (this.dbPath !== IN_MEMORY) {
        const dbDir = path.dirname(this.dbPath);
        if (!fs.existsSync(dbDir)) {
          fs.mkdirSync(dbDir, { recursive: true });
        }
      }

      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = FULL');
      db.exec(fs.readFileSync(this.resolveSchemaPath(), 'utf8'));
      this.db = db;
    } catch (error) {
      throw new PersistenceError(`Failed to initialize database at ${this.dbPath}`, 'initialize', { cause: error });
    }

    this.logger.info('Database initialized', {
      component: 'database',
      dbPath: this.dbPath,
      pending: this.countPendingInfractions()
    });
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.logger.info('Database connection closed', { component: 'database' });
    }
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  addInfraction(infraction: NewInfraction): Infraction | null {
    return this.execute('add_infraction', db => {
      const result = db
        .prepare<[string, string, string, number, number, string]>(
          `INSERT OR IGNORE INTO infractions
             (message_id, channel_id, author_id, created_at, deletion_time, content)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(
          infraction.messageId,
          infraction.channelId,
          infraction.authorId,
          infraction.createdAt.getTime(),
          infraction.deletionTime.getTime(),
          infraction.content
        );

      if (result.changes === 0) {
        return null;
      }
      return { id: Number(result.lastInsertRowid), ...infraction };
    });
  }

  getInfractionByMessageId(messageId: string): Infraction | null {
    return this.execute('get_infraction', db => {
      const row = db
        .prepare<[string], InfractionRow>('SELECT * FROM infractions WHERE message_id = ?')
        .get(messageId);
      return row ? toInfraction(row) : null;
    });
  }

  getDueInfractions(now: Date): Infraction[] {
    return this.execute('get_due_infractions', db =>
      db
        .prepare<[number], InfractionRow>(
          'SELECT * FROM infractions WHERE deletion_time <= ? ORDER BY deletion_time ASC, id ASC'
        )
        .all(now.getTime())
        .map(toInfraction)
    );
  }

  getPendingInfractions(limit: number = DEFAULT_PENDING_LIMIT): Infraction[] {
    return this.execute('get_pending_infractions', db =>
      db
        .prepare<[number], InfractionRow>(
          'SELECT * FROM infractions ORDER BY deletion_time ASC, id ASC LIMIT ?'
        )
        .all(limit)
        .map(toInfraction)
    );
  }

  countPendingInfractions(): number {
    return this.execute('count_pending', db => {
      const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM infractions').get();
      return row?.count ?? 0;
    });
  }

  removeInfraction(id: number): boolean {
    return this.execute('remove_infraction', db =>
      db.prepare<[number]>('DELETE FROM infractions WHERE id = ?').run(id).changes > 0
    );
  }

  private execute<T>(operation: string, statement: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new PersistenceError('Database not initialized. Call initialize() first.', operation);
    }

    try {
      return statement(this.db);
    } catch (error) {
      throw new PersistenceError(`Database operation ${operation} failed: ${String(error)}`, operation, {
        cause: error
      });
    }
  }

  private resolveSchemaPath(): string {
    // Source and compiled layouts differ; fall back to the working directory.
    const besideSource = path.join(__dirname, '../../schemas/database.sql');
    return fs.existsSync(besideSource)
      ? besideSource
      : path.join(process.cwd(), 'bot/schemas/database.sql');
  }
}
