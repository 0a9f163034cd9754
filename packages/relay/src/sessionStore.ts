/**
 * Operator -> wallet mapping, kept across restarts
 *
 * Only what is needed to reattach a provisioned operator to its view-only
 * wallet file: never the view key itself.
 */

import { readFile, rename, writeFile } from 'fs/promises';
import { z } from 'zod';
import { SerialQueue, describeError } from '@coldmesh/protocol';

export const StoredOperatorSchema = z.object({
  walletName: z.string().min(1),
  walletAddress: z.string(),
  fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  restoreHeight: z.number().int().nonnegative(),
  provisionedAt: z.number().int().nonnegative(),
});

export type StoredOperator = z.infer<typeof StoredOperatorSchema>;

const StoreFileSchema = z.object({
  version: z.literal(1),
  operators: z.record(StoredOperatorSchema),
});

export interface SessionStore {
  load(): Promise<Map<string, StoredOperator>>;
  save(operatorId: string, entry: StoredOperator): Promise<void>;
}

export class MemorySessionStore implements SessionStore {
  readonly entries = new Map<string, StoredOperator>();

  async load(): Promise<Map<string, StoredOperator>> {
    return new Map(this.entries);
  }

  async save(operatorId: string, entry: StoredOperator): Promise<void> {
    this.entries.set(operatorId, entry);
  }
}

/** JSON file, rewritten whole through a temp file and rename */
export class JsonSessionStore implements SessionStore {
  private readonly writes = new SerialQueue();

  constructor(readonly path: string) {}

  async load(): Promise<Map<string, StoredOperator>> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return new Map();
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new Error(`Sessions file ${this.path} is not valid JSON: ${describeError(err)}`);
    }
    const parsed = StoreFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Sessions file ${this.path} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return new Map(Object.entries(parsed.data.operators));
  }

  save(operatorId: string, entry: StoredOperator): Promise<void> {
    return this.writes.run(async () => {
      const current = await this.load();
      current.set(operatorId, entry);
      const file = { version: 1, operators: Object.fromEntries(current) };
      const temp = `${this.path}.tmp`;
      await writeFile(temp, JSON.stringify(file, null, 2) + '\n', 'utf8');
      await rename(temp, this.path);
    });
  }
}
