import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, asc, count, desc, eq, gte, sql } from "drizzle-orm";
import fs from "fs";
import path from "path";
import * as schema from "@shared/schema";
import type {
  User,
  InsertUser,
  GlucoseReading,
  WellbeingLog,
  ConversationLog,
  InsertConversationLog,
  LatestGlucoseReading,
} from "@shared/schema";
import { StoreError } from "./errors";
import { getEnv } from "./src/config/env";
import { log } from "./logger";

const USERS_DDL = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY,
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    city TEXT NOT NULL,
    date_of_birth TEXT NOT NULL,
    dietary_preference TEXT NOT NULL,
    medical_conditions TEXT NOT NULL DEFAULT '',
    physical_limitations TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  )
`;

const GLUCOSE_READINGS_DDL = `
  CREATE TABLE IF NOT EXISTS glucose_readings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id),
    value REAL NOT NULL,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_glucose_readings_user_timestamp
    ON glucose_readings(user_id, timestamp);
`;

const WELLBEING_LOGS_DDL = `
  CREATE TABLE IF NOT EXISTS wellbeing_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id),
    mood TEXT NOT NULL,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_wellbeing_logs_user_timestamp
    ON wellbeing_logs(user_id, timestamp);
`;

const CONVERSATION_LOGS_DDL = `
  CREATE TABLE IF NOT EXISTS conversation_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id),
    session_id TEXT NOT NULL,
    role TEXT NOT NULL,
    message TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    metadata TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_conversation_logs_session
    ON conversation_logs(session_id);
`;

/**
 * Typed access to users, glucose readings, mood logs and conversation logs.
 *
 * Every operation runs in its own transaction and surfaces failures as a
 * StoreError wrapping the driver error. Glucose and mood rows are only ever
 * inserted.
 */
export class HealthStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database<typeof schema>;
  private glucoseTableReady = false;

  constructor(filename = ":memory:") {
    this.sqlite = new Database(filename);
    this.sqlite.pragma("foreign_keys = ON");
    if (filename !== ":memory:") {
      this.sqlite.pragma("journal_mode = WAL");
    }
    this.db = drizzle(this.sqlite, { schema });
  }

  static open(filePath: string): HealthStore {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    return new HealthStore(filePath);
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return this.sqlite.transaction(fn)();
    } catch (error) {
      throw new StoreError(operation, error);
    }
  }

  /**
   * Creates every table the assistant touches. Safe to call repeatedly.
   */
  initializeSchema(): void {
    this.run("initialize the schema", () => {
      this.sqlite.exec(USERS_DDL);
      this.sqlite.exec(WELLBEING_LOGS_DDL);
      this.sqlite.exec(CONVERSATION_LOGS_DDL);
    });
    this.ensureGlucoseReadingsTable();
  }

  // The reading log may be provisioned after the rest of the schema
  ensureGlucoseReadingsTable(): void {
    if (this.glucoseTableReady) return;
    this.run("create the glucose readings table", () => {
      this.sqlite.exec(GLUCOSE_READINGS_DDL);
    });
    this.glucoseTableReady = true;
  }

  close(): void {
    this.sqlite.close();
  }

  // ============================================
  // Users
  // ============================================

  findUserById(id: number): User | undefined {
    return this.run("look up the user", () =>
      this.db.select().from(schema.users).where(eq(schema.users.id, id)).get()
    );
  }

  insertUser(user: InsertUser): User {
    return this.run("create the user", () =>
      this.db
        .insert(schema.users)
        .values({ ...user, createdAt: new Date().toISOString() })
        .returning()
        .get()
    );
  }

  countUsers(): number {
    return this.run("count users", () => {
      const row = this.db.select({ total: count() }).from(schema.users).get();
      return row?.total ?? 0;
    });
  }

  // ============================================
  // Glucose readings
  // ============================================

  insertGlucoseReading(userId: number, value: number, timestamp: Date = new Date()): GlucoseReading {
    this.ensureGlucoseReadingsTable();
    const reading = this.run("record the glucose reading", () =>
      this.db
        .insert(schema.glucoseReadings)
        .values({ userId, value, timestamp: timestamp.toISOString() })
        .returning()
        .get()
    );
    log(`Recorded glucose reading ${value} mg/dL`, "store", { userId, readingId: reading.id });
    return reading;
  }

  /**
   * Mean of the user's readings at or after `since`, or null when the window is empty.
   */
  averageGlucose(userId: number, since: Date): number | null {
    this.ensureGlucoseReadingsTable();
    return this.run("average glucose readings", () => {
      const row = this.db
        .select({ average: sql<number | null>`avg(${schema.glucoseReadings.value})` })
        .from(schema.glucoseReadings)
        .where(
          and(
            eq(schema.glucoseReadings.userId, userId),
            gte(schema.glucoseReadings.timestamp, since.toISOString())
          )
        )
        .get();
      return row?.average ?? null;
    });
  }

  latestGlucoseReading(userId: number): LatestGlucoseReading | null {
    this.ensureGlucoseReadingsTable();
    return this.run("read the latest glucose reading", () => {
      const row = this.db
        .select({ value: schema.glucoseReadings.value, timestamp: schema.glucoseReadings.timestamp })
        .from(schema.glucoseReadings)
        .where(eq(schema.glucoseReadings.userId, userId))
        .orderBy(desc(schema.glucoseReadings.timestamp), desc(schema.glucoseReadings.id))
        .limit(1)
        .get();
      return row ?? null;
    });
  }

  countGlucoseReadings(userId?: number): number {
    this.ensureGlucoseReadingsTable();
    return this.run("count glucose readings", () => {
      const query = this.db.select({ total: count() }).from(schema.glucoseReadings);
      const row = userId === undefined
        ? query.get()
        : query.where(eq(schema.glucoseReadings.userId, userId)).get();
      return row?.total ?? 0;
    });
  }

  // ============================================
  // Mood logs
  // ============================================

  insertMoodLog(userId: number, mood: string, timestamp: Date = new Date()): WellbeingLog {
    const entry = this.run("record the mood", () =>
      this.db
        .insert(schema.wellbeingLogs)
        .values({ userId, mood, timestamp: timestamp.toISOString() })
        .returning()
        .get()
    );
    log(`Recorded mood "${mood}"`, "store", { userId, logId: entry.id });
    return entry;
  }

  getMoodLogs(userId: number): WellbeingLog[] {
    return this.run("read mood logs", () =>
      this.db
        .select()
        .from(schema.wellbeingLogs)
        .where(eq(schema.wellbeingLogs.userId, userId))
        .orderBy(asc(schema.wellbeingLogs.timestamp), asc(schema.wellbeingLogs.id))
        .all()
    );
  }

  countMoodLogs(userId?: number): number {
    return this.run("count mood logs", () => {
      const query = this.db.select({ total: count() }).from(schema.wellbeingLogs);
      const row = userId === undefined
        ? query.get()
        : query.where(eq(schema.wellbeingLogs.userId, userId)).get();
      return row?.total ?? 0;
    });
  }

  // ============================================
  // Conversation logs
  // ============================================

  insertConversationTurn(turn: InsertConversationLog): ConversationLog {
    return this.run("record the conversation turn", () =>
      this.db
        .insert(schema.conversationLogs)
        .values({ ...turn, timestamp: new Date().toISOString() })
        .returning()
        .get()
    );
  }

  getConversationLogs(sessionId: string): ConversationLog[] {
    return this.run("read the conversation log", () =>
      this.db
        .select()
        .from(schema.conversationLogs)
        .where(eq(schema.conversationLogs.sessionId, sessionId))
        .orderBy(asc(schema.conversationLogs.id))
        .all()
    );
  }
}

let store: HealthStore | null = null;

export function getStore(): HealthStore {
  if (!store) {
    store = HealthStore.open(getEnv().DATABASE_PATH);
    store.initializeSchema();
  }
  return store;
}

export function closeStore(): void {
  if (store) {
    store.close();
    store = null;
  }
}
