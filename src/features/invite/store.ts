// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Vetting Bot — src/features/invite/store.ts
 * WHAT: File-backed set of user ids that already received a one-time invite.
 * WHY: One invite per member; the list survives restarts and is edited by hand at times.
 * FLOWS:
 *  - button click → claim(id) → DM; a failed DM releases the claim with remove(id)
 *  - /resetinvite or member leaves a control server → remove(id)
 *
 * The path is resolved on every access, so a config reload that moves the file takes
 * effect without rebuilding the store.
 *
 * File shape: { "requested": ["123", "456"] }. Files written by older deployments hold
 * bare JSON numbers; those are quoted before parsing so 64-bit ids keep every digit.
 */

import { readFile, rename, writeFile } from "node:fs/promises";
import { z } from "zod";
import { logger } from "../../lib/logger.js";

const fileSchema = z.object({
  requested: z.array(z.string().regex(/^\d+$/, "expected a numeric id")).default([]),
});

const BARE_ID = /([[,]\s*)(\d+)(?=\s*[,\]])/g;

export function quoteBareIds(text: string): string {
  return text.replace(BARE_ID, '$1"$2"');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class InviteStore {
  // Every mutation chains onto this promise, so read-modify-write cycles never interleave.
  private tail: Promise<unknown> = Promise.resolve();

  private readonly resolvePath: () => string;

  constructor(filePath: string | (() => string)) {
    this.resolvePath = typeof filePath === "string" ? () => filePath : filePath;
  }

  private get filePath(): string {
    return this.resolvePath();
  }

  async list(): Promise<string[]> {
    await this.tail;
    return this.read();
  }

  async has(userId: string): Promise<boolean> {
    return (await this.list()).includes(userId);
  }

  /** No-op when already present. */
  async add(userId: string): Promise<void> {
    await this.claim(userId);
  }

  /**
   * Check and add as one step. True when the id was newly added, false when it was
   * already tracked.
   */
  async claim(userId: string): Promise<boolean> {
    return this.exclusive(async () => {
      const ids = await this.read();
      if (ids.includes(userId)) return false;
      ids.push(userId);
      await this.write(ids);
      return true;
    });
  }

  /** True when the id was present. */
  async remove(userId: string): Promise<boolean> {
    return this.exclusive(async () => {
      const ids = await this.read();
      const next = ids.filter((id) => id !== userId);
      if (next.length === ids.length) return false;
      await this.write(next);
      return true;
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.tail = run.catch((err: unknown) => {
      logger.error({ err, file: this.filePath }, "[invite] store write failed");
    });
    return run;
  }

  private async read(): Promise<string[]> {
    const filePath = this.filePath;
    let text: string;
    try {
      text = await readFile(filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const parsed = fileSchema.safeParse(JSON.parse(quoteBareIds(text)));
    if (!parsed.success) {
      throw new Error(`${filePath} is not a valid invite list: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data.requested;
  }

  private async write(ids: readonly string[]): Promise<void> {
    const filePath = this.filePath;
    const tmp = `${filePath}.tmp`;
    await writeFile(tmp, JSON.stringify({ requested: ids }, null, 4), "utf-8");
    await rename(tmp, filePath);
  }
}
