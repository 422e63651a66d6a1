/**
 * Seed Script
 *
 * Creates the schema and a few demo users for local chats. Existing users
 * with the same ID are left alone.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { insertUserSchema } from "@shared/schema";
import { closeStore, getStore } from "../db";

const demoUsersPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "demo-users.json");

function seed(): void {
  console.log("Starting database seed...");

  const store = getStore();
  const demoUsers = z.array(insertUserSchema).parse(JSON.parse(fs.readFileSync(demoUsersPath, "utf-8")));

  let created = 0;
  for (const user of demoUsers) {
    if (user.id !== undefined && store.findUserById(user.id)) continue;
    store.insertUser(user);
    created++;
  }

  console.log(`Database seed completed successfully (${created} new users, ${store.countUsers()} total).`);
}

try {
  seed();
  closeStore();
  process.exit(0);
} catch (error) {
  console.error("Seed failed:", error);
  closeStore();
  process.exit(1);
}
