import { randomUUID } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { NotFoundError, PersistenceError } from "@vectorbridge/errors";

/**
 * Storage for original uploads. Keys are opaque to callers.
 */
export interface IBlobStorage {
  put(tenantId: string, fileName: string, content: Uint8Array): Promise<string>;
  get(storageKey: string): Promise<Uint8Array>;
  delete(storageKey: string): Promise<void>;
}

export function safeFileName(fileName: string): string {
  const base = path.basename(fileName).replace(/[^A-Za-z0-9._-]/g, "_");
  return base.replace(/^\.+/, "_") || "upload";
}

function datePart(date: Date): string {
  const y = String(date.getUTCFullYear());
  const m = String(date.getUTCMonth() + 1).padStart(2, "0");
  const d = String(date.getUTCDate()).padStart(2, "0");
  return `${y}${m}${d}`;
}

/** `<tenantId>/<yyyymmdd>_<uuid>_<safeName>` */
export function storageKeyFor(tenantId: string, fileName: string, date: Date, id: string): string {
  return `${tenantId}/${datePart(date)}_${id}_${safeFileName(fileName)}`;
}

export interface LocalBlobStorageOptions {
  rootDir: string;
  now?: () => Date;
  newId?: () => string;
}

export class LocalBlobStorage implements IBlobStorage {
  private readonly rootDir: string;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: LocalBlobStorageOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  async put(tenantId: string, fileName: string, content: Uint8Array): Promise<string> {
    const key = storageKeyFor(tenantId, fileName, this.now(), this.newId());
    const target = this.resolve(key);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
    return key;
  }

  async get(storageKey: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(this.resolve(storageKey)));
    } catch (err: unknown) {
      if (isMissing(err)) throw new NotFoundError(`Stored file ${storageKey} not found`, { cause: err });
      throw new PersistenceError("Could not read stored file", { cause: err });
    }
  }

  async delete(storageKey: string): Promise<void> {
    await rm(this.resolve(storageKey), { force: true });
  }

  private resolve(storageKey: string): string {
    const target = path.resolve(this.rootDir, storageKey);
    if (!target.startsWith(this.rootDir + path.sep)) {
      throw new PersistenceError(`Storage key escapes the uploads directory: ${storageKey}`);
    }
    return target;
  }
}

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
