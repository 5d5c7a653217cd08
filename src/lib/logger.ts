import type { Database } from 'better-sqlite3';

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  id?: number;
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  args?: unknown[];
}

export interface LogFilter {
  level?: LogLevel;
  tags?: string[];
  search?: string;
  limit?: number;
  offset?: number;
}

interface LogRow {
  id: number;
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  args: string | null;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

function serializeArg(arg: unknown): unknown {
  if (arg instanceof Error) return { name: arg.name, message: arg.message };
  return arg;
}

export class Logger {
  private db: Database | null = null;
  private currentLogLevel: LogLevel = 'info';
  private onLogCallbacks: Set<(entry: LogEntry) => void> = new Set();

  constructor() {
    const envLevel = process.env.LOG_LEVEL;
    if (isLogLevel(envLevel)) {
      this.currentLogLevel = envLevel;
    }
  }

  /**
   * Mirror every emitted entry into a SQLite table. Pass ':memory:' for a
   * throwaway store. The native module is only loaded on first use.
   */
  async persistTo(dbPath: string): Promise<void> {
    const { default: BetterSqlite3 } = await import('better-sqlite3');
    const db = new BetterSqlite3(dbPath);
    if (dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.exec(`
        CREATE TABLE IF NOT EXISTS logs (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            timestamp TEXT NOT NULL,
            level TEXT NOT NULL,
            tag TEXT NOT NULL,
            message TEXT NOT NULL,
            args TEXT
        );
        CREATE INDEX IF NOT EXISTS idx_logs_timestamp ON logs(timestamp);
        CREATE INDEX IF NOT EXISTS idx_logs_tag ON logs(tag);
    `);
    this.db?.close();
    this.db = db;
  }

  closePersistence(): void {
    this.db?.close();
    this.db = null;
  }

  onLog(callback: (entry: LogEntry) => void) {
    this.onLogCallbacks.add(callback);
    return () => this.onLogCallbacks.delete(callback);
  }

  setLogLevel(level: LogLevel): void {
    this.currentLogLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.currentLogLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.currentLogLevel];
  }

  private getTimestamp() {
    return new Date().toISOString().replace('T', ' ').replace('Z', '');
  }

  private record(level: LogLevel, tag: string, message: string, args: unknown[]): LogEntry {
    const entry: LogEntry = {
      timestamp: this.getTimestamp(),
      level,
      tag,
      message,
      args: args.length > 0 ? args.map(serializeArg) : undefined
    };

    if (this.db) {
      try {
        const info = this.db
          .prepare('INSERT INTO logs (timestamp, level, tag, message, args) VALUES (?, ?, ?, ?, ?)')
          .run(entry.timestamp, level, tag, message, entry.args ? JSON.stringify(entry.args) : null);
        entry.id = Number(info.lastInsertRowid);
      } catch (e) {
        console.error('Failed to write log to DB:', e);
      }
    }

    this.onLogCallbacks.forEach(cb => cb(entry));
    return entry;
  }

  private formatConsole(entry: LogEntry): unknown[] {
    const timestamp = `${COLORS.dim}${entry.timestamp}${COLORS.reset}`;
    let levelColor = COLORS.reset;

    switch (entry.level) {
      case 'debug': levelColor = COLORS.blue; break;
      case 'info': levelColor = COLORS.green; break;
      case 'warn': levelColor = COLORS.yellow; break;
      case 'error': levelColor = COLORS.red; break;
    }

    const coloredLevel = `${levelColor}${entry.level.toUpperCase().padEnd(5)}${COLORS.reset}`;
    const coloredTag = `${COLORS.magenta}[${entry.tag}]${COLORS.reset}`;

    return [`${timestamp} ${coloredLevel} ${coloredTag} ${entry.message}`, ...(entry.args || [])];
  }

  debug(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('debug')) return;
    console.debug(...this.formatConsole(this.record('debug', tag, message, args)));
  }

  info(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('info')) return;
    console.info(...this.formatConsole(this.record('info', tag, message, args)));
  }

  warn(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('warn')) return;
    console.warn(...this.formatConsole(this.record('warn', tag, message, args)));
  }

  error(tag: string, message: string, ...args: unknown[]) {
    // Always log errors
    console.error(...this.formatConsole(this.record('error', tag, message, args)));
  }

  /**
   * Query persisted logs, newest first. Returns [] when persistence is off.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    if (!this.db) return [];

    let query = 'SELECT * FROM logs WHERE 1=1';
    const params: (string | number)[] = [];

    if (filter.level) {
      // Level filter means "this level or more severe"
      const priority = LOG_LEVEL_PRIORITY[filter.level];
      const levels = Object.entries(LOG_LEVEL_PRIORITY)
        .filter(([, p]) => p >= priority)
        .map(([l]) => l);
      query += ` AND level IN (${levels.map(() => '?').join(',')})`;
      params.push(...levels);
    }

    if (filter.tags && filter.tags.length > 0) {
      const conditions = filter.tags.map(() => 'tag LIKE ?').join(' OR ');
      query += ` AND (${conditions})`;
      params.push(...filter.tags.map(t => `%${t}%`));
    }

    if (filter.search) {
      query += ' AND (message LIKE ? OR tag LIKE ?)';
      const term = `%${filter.search}%`;
      params.push(term, term);
    }

    query += ' ORDER BY id DESC';

    if (filter.limit) {
      query += ' LIMIT ?';
      params.push(filter.limit);
    }

    if (filter.offset) {
      if (!filter.limit) query += ' LIMIT -1';
      query += ' OFFSET ?';
      params.push(filter.offset);
    }

    const rows = this.db.prepare<(string | number)[], LogRow>(query).all(...params);
    return rows.map(row => ({
      id: row.id,
      timestamp: row.timestamp,
      level: row.level,
      tag: row.tag,
      message: row.message,
      args: row.args ? JSON.parse(row.args) : undefined
    }));
  }
}

export const logger = new Logger();

if (process.env.LOG_DB) {
  logger.persistTo(process.env.LOG_DB).catch(e => {
    console.error('Failed to initialize SQLite logger:', e);
  });
}
