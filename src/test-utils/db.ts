import { createDatabase } from "../db";
import type { AppDatabase } from "../db";

/**
 * Creates an in-memory SQLite test database with the schema applied.
 * @returns A new AppDatabase instance with schema initialized.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}
