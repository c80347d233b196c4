// pattern: Imperative Shell
import { and, count, eq, inArray, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { AnySQLiteColumn } from "drizzle-orm/sqlite-core";
import type { AppDatabase } from "../db";
import { keyValues, setMembers } from "../db/schema";
import { TransientStoreError } from "../errors";

/**
 * Durable key/value and set store shared by the registry, the reaction sets
 * and the publication cursor. Each of those owns a disjoint key namespace.
 *
 * Calls are synchronous request/response; a failed call throws
 * {@link TransientStoreError}.
 */
export interface KeyStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
  /** Removes scalar values and sets stored under `keys`; returns how many existed. */
  delete(keys: ReadonlyArray<string>): number;
  /** Every key (scalar or set) starting with `prefix`, sorted. */
  keys(prefix: string): Array<string>;
  setAdd(key: string, member: string): boolean;
  setRemove(key: string, member: string): boolean;
  setHas(key: string, member: string): boolean;
  setSize(key: string): number;
  /**
   * Runs `fn` as one indivisible unit. Competing writers, in this process or
   * another one on the same database file, serialize before or after it.
   */
  atomically<T>(fn: () => T): T;
}

// Literal prefix match on UTF-8 bytes: SQLite substr() counts text in
// characters while String#length counts UTF-16 units.
function startsWith(column: AnySQLiteColumn, prefix: string): SQL {
  const byteLength = Buffer.byteLength(prefix, "utf-8");
  return sql`substr(CAST(${column} AS BLOB), 1, ${byteLength}) = CAST(${prefix} AS BLOB)`;
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof TransientStoreError) throw err;
    throw new TransientStoreError(operation, { cause: err });
  }
}

export function createSqliteKeyStore(db: AppDatabase): KeyStore {
  return {
    get(key) {
      return guard("get", () => {
        const row = db
          .select({ value: keyValues.value })
          .from(keyValues)
          .where(eq(keyValues.key, key))
          .get();
        return row?.value ?? null;
      });
    },

    set(key, value) {
      guard("set", () => {
        db.insert(keyValues)
          .values({ key, value })
          .onConflictDoUpdate({ target: keyValues.key, set: { value } })
          .run();
      });
    },

    delete(keys) {
      if (keys.length === 0) return 0;
      const targets = [...keys];
      return guard("delete", () =>
        db.transaction(() => {
          const setKeys = db
            .selectDistinct({ key: setMembers.key })
            .from(setMembers)
            .where(inArray(setMembers.key, targets))
            .all();
          const scalars = db
            .delete(keyValues)
            .where(inArray(keyValues.key, targets))
            .run();
          db.delete(setMembers).where(inArray(setMembers.key, targets)).run();
          return scalars.changes + setKeys.length;
        }),
      );
    },

    keys(prefix) {
      return guard("keys", () => {
        const scalarKeys = db
          .select({ key: keyValues.key })
          .from(keyValues)
          .where(startsWith(keyValues.key, prefix))
          .all();
        const setKeys = db
          .selectDistinct({ key: setMembers.key })
          .from(setMembers)
          .where(startsWith(setMembers.key, prefix))
          .all();
        const all = new Set([...scalarKeys, ...setKeys].map((row) => row.key));
        return [...all].sort();
      });
    },

    setAdd(key, member) {
      return guard("setAdd", () => {
        const result = db
          .insert(setMembers)
          .values({ key, member })
          .onConflictDoNothing()
          .run();
        return result.changes > 0;
      });
    },

    setRemove(key, member) {
      return guard("setRemove", () => {
        const result = db
          .delete(setMembers)
          .where(and(eq(setMembers.key, key), eq(setMembers.member, member)))
          .run();
        return result.changes > 0;
      });
    },

    setHas(key, member) {
      return guard("setHas", () => {
        const row = db
          .select({ key: setMembers.key })
          .from(setMembers)
          .where(and(eq(setMembers.key, key), eq(setMembers.member, member)))
          .get();
        return row !== undefined;
      });
    },

    setSize(key) {
      return guard("setSize", () => {
        const row = db
          .select({ size: count() })
          .from(setMembers)
          .where(eq(setMembers.key, key))
          .get();
        return row?.size ?? 0;
      });
    },

    atomically<T>(fn: () => T): T {
      return guard("transaction", () =>
        db.transaction(() => fn(), { behavior: "immediate" }),
      );
    },
  };
}
