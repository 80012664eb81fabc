import type { DbClient } from "@vectorbridge/db";
import { KeyedMutex } from "./keyed-mutex.js";

/** Runs work exclusively per key. */
export interface TenantLock {
  run<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

/** One database session able to hold named locks. */
export interface LockSession {
  lock(name: string): Promise<void>;
  unlock(name: string): Promise<void>;
  release(): void;
}

export type LockSessionFactory = () => Promise<LockSession>;

const LOCK_PREFIX = "vectorbridge:tenant:";

/**
 * Tenant lock shared by every process on the same database.
 *
 * Callers in one process queue on a local mutex first, so a process holds
 * at most one session per key while it waits on the database.
 */
export class AdvisoryTenantLock implements TenantLock {
  private readonly local = new KeyedMutex();

  constructor(private readonly openSession: LockSessionFactory) {}

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.local.run(key, async () => {
      const name = LOCK_PREFIX + key;
      const session = await this.openSession();
      try {
        await session.lock(name);
        try {
          return await fn();
        } finally {
          await session.unlock(name);
        }
      } finally {
        session.release();
      }
    });
  }
}

/** Session-level `pg_advisory_lock` on a reserved pool connection. */
export function pgLockSessions(db: DbClient): LockSessionFactory {
  return async () => {
    const connection = await db.$client.reserve();
    return {
      async lock(name) {
        await connection`select pg_advisory_lock(hashtext(${name}))`;
      },
      async unlock(name) {
        await connection`select pg_advisory_unlock(hashtext(${name}))`;
      },
      release() {
        connection.release();
      },
    };
  };
}
