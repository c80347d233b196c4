import { primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

// Scalar values (delivery records, the publication timestamp).
export const keyValues = sqliteTable("key_values", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
});

// One row per set member (liker / disliker sets).
export const setMembers = sqliteTable(
  "set_members",
  {
    key: text("key").notNull(),
    member: text("member").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.key, table.member] }),
  }),
);
