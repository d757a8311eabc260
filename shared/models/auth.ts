import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const USER_ROLES = ["admin", "standard"] as const;
export type UserRole = (typeof USER_ROLES)[number];

// User storage table.
export const users = sqliteTable(
  "users",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    username: text("username").notNull().unique(),
    passwordHash: text("password_hash").notNull(),
    role: text("role", { enum: USER_ROLES }).notNull().default("standard"),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => [index("idx_users_role").on(table.role)],
);

export const registerUserSchema = createInsertSchema(users)
  .pick({ role: true })
  .extend({
    username: z.string().min(1, "Username is required").max(64, "Username must be at most 64 characters"),
    password: z.string().min(1, "Password is required").max(1024),
  });

export type RegisterUser = z.infer<typeof registerUserSchema>;
export type User = typeof users.$inferSelect;
export type SafeUser = Omit<User, "passwordHash">;

// Request body for /api/register and /api/login.
export const credentialsSchema = z.object({
  username: z.string({ required_error: "Username is required" }),
  password: z.string({ required_error: "Password is required" }),
});

export type Credentials = z.infer<typeof credentialsSchema>;
