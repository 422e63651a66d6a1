import { HealthStore } from "../../db";
import { InteractionContext } from "../../context";
import type { InsertUser } from "@shared/schema";
import type { ToolInvocation } from "../../tools";

export const TEST_USERS: InsertUser[] = [
  {
    id: 7,
    firstName: "Daniel",
    lastName: "Okafor",
    email: "daniel@example.com",
    city: "Leeds",
    dateOfBirth: "1972-11-03",
    dietaryPreference: "non-vegetarian",
    medicalConditions: "type 2 diabetes, hypertension",
    physicalLimitations: "knee pain",
  },
  {
    id: 12,
    firstName: "Mei",
    lastName: "Lin",
    email: "mei@example.com",
    city: "Vancouver",
    dateOfBirth: "1990-07-21",
    dietaryPreference: "vegan",
    medicalConditions: "",
    physicalLimitations: "",
  },
];

export function createTestStore(): HealthStore {
  const store = new HealthStore(":memory:");
  store.initializeSchema();
  for (const user of TEST_USERS) {
    store.insertUser(user);
  }
  return store;
}

export function createInvocation(
  store: HealthStore,
  userId: number | null = null,
  overrides: Partial<ToolInvocation> = {}
): ToolInvocation {
  const context = new InteractionContext("test-session");
  if (userId !== null) {
    context.setUserId(userId);
  }
  return { context, store, ...overrides };
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysAgo(days: number): Date {
  return new Date(Date.now() - days * DAY_MS);
}
