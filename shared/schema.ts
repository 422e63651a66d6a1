import { sqliteTable, text, integer, real, index } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const dietaryPreferences = ["vegetarian", "vegan", "non-vegetarian"] as const;
export type DietaryPreference = typeof dietaryPreferences[number];

// Users are provisioned by seeding; the assistant only reads them
export const users = sqliteTable("users", {
  id: integer("id").primaryKey(),
  firstName: text("first_name").notNull(),
  lastName: text("last_name").notNull(),
  email: text("email").notNull().unique(),
  city: text("city").notNull(),
  dateOfBirth: text("date_of_birth").notNull(),
  dietaryPreference: text("dietary_preference", { enum: dietaryPreferences }).notNull(),
  // Comma-separated
  medicalConditions: text("medical_conditions").notNull().default(""),
  physicalLimitations: text("physical_limitations").notNull().default(""),
  createdAt: text("created_at").notNull(),
});

export const insertUserSchema = createInsertSchema(users).omit({
  createdAt: true,
});

export type InsertUser = z.infer<typeof insertUserSchema>;
export type User = typeof users.$inferSelect;

// Append-only glucose log (mg/dL)
export const glucoseReadings = sqliteTable("glucose_readings", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: integer("user_id").notNull().references(() => users.id),
  value: real("value").notNull(),
  timestamp: text("timestamp").notNull(),
}, (table) => ({
  userTimestampIdx: index("idx_glucose_readings_user_timestamp").on(table.userId, table.timestamp),
}));

export type GlucoseReading = typeof glucoseReadings.$inferSelect;

// Append-only mood log
export const wellbeingLogs = sqliteTable("wellbeing_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: integer("user_id").notNull().references(() => users.id),
  mood: text("mood").notNull(),
  timestamp: text("timestamp").notNull(),
}, (table) => ({
  userTimestampIdx: index("idx_wellbeing_logs_user_timestamp").on(table.userId, table.timestamp),
}));

export type WellbeingLog = typeof wellbeingLogs.$inferSelect;

export const conversationRoles = ["user", "agent", "system"] as const;
export type ConversationRole = typeof conversationRoles[number];

export const conversationLogs = sqliteTable("conversation_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: integer("user_id").notNull().references(() => users.id),
  sessionId: text("session_id").notNull(),
  role: text("role", { enum: conversationRoles }).notNull(),
  message: text("message").notNull(),
  timestamp: text("timestamp").notNull(),
  // JSON string
  metadata: text("metadata"),
}, (table) => ({
  sessionIdx: index("idx_conversation_logs_session").on(table.sessionId),
}));

export const insertConversationLogSchema = createInsertSchema(conversationLogs).omit({
  id: true,
  timestamp: true,
});

export type InsertConversationLog = z.infer<typeof insertConversationLogSchema>;
export type ConversationLog = typeof conversationLogs.$inferSelect;

export interface LatestGlucoseReading {
  value: number;
  timestamp: string;
}
