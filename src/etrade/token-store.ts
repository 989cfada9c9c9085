import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

/**
 * On-disk shape of the persisted access token. Field names are kept
 * snake_case so the file stays readable by other tooling.
 */
export const persistedTokenSchema = z.object({
  access_token: z.string().min(1),
  access_token_secret: z.string().min(1),
  /** ISO-8601 with the Eastern offset */
  last_used: z.string().min(1),
  /** YYYY-MM-DD, Eastern */
  token_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  environment: z.enum(["sandbox", "production"]),
});

export type PersistedToken = z.infer<typeof persistedTokenSchema>;

/**
 * Single-slot persistence for the access token. Implementations may throw;
 * the token manager logs and carries on.
 */
export interface TokenStore {
  load(): PersistedToken | null;
  save(record: PersistedToken): void;
  clear(): void;
}

// Owner read/write only — the file holds live trading credentials.
const FILE_MODE = 0o600;

export class FileTokenStore implements TokenStore {
  constructor(readonly filePath: string) {}

  load(): PersistedToken | null {
    if (!existsSync(this.filePath)) return null;
    const raw: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
    const parsed = persistedTokenSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Malformed token file ${this.filePath}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  save(record: PersistedToken): void {
    mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    // written to a fresh 0600 file, then renamed over the target
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    rmSync(tmp, { force: true });
    try {
      writeFileSync(tmp, JSON.stringify(record, null, 2), { encoding: "utf-8", mode: FILE_MODE, flag: "wx" });
      renameSync(tmp, this.filePath);
    } catch (e) {
      rmSync(tmp, { force: true });
      throw e;
    }
  }

  clear(): void {
    rmSync(this.filePath, { force: true });
  }
}

export class MemoryTokenStore implements TokenStore {
  private record: PersistedToken | null;

  constructor(initial: PersistedToken | null = null) {
    this.record = initial;
  }

  load(): PersistedToken | null {
    return this.record ? { ...this.record } : null;
  }

  save(record: PersistedToken): void {
    this.record = { ...record };
  }

  clear(): void {
    this.record = null;
  }
}
