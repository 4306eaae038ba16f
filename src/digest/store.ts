// pattern: Imperative Shell
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";

/**
 * Remembers the ids of the latest delivered batch per recipient, so the
 * next run can retract it.
 */
export type DeliveryStore = {
  readonly get: (recipientKey: string) => ReadonlyArray<number>;
  readonly save: (
    recipientKey: string,
    messageIds: ReadonlyArray<number>,
  ) => void;
  readonly clear: (recipientKey: string) => void;
};

const deliveryRecordSchema = z.object({
  messageIds: z.array(z.number().int()),
  createdAt: z.string(),
});

const storeDocumentSchema = z.record(z.string(), deliveryRecordSchema);

type StoreDocument = z.infer<typeof storeDocumentSchema>;

/**
 * JSON-file store. A missing, unreadable or malformed file reads as empty;
 * every mutation rewrites the whole document.
 */
export function createJsonFileStore(
  filePath: string,
  now: () => Date = () => new Date(),
): DeliveryStore {
  function read(): StoreDocument {
    if (!existsSync(filePath)) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch {
      return {};
    }
    const result = storeDocumentSchema.safeParse(parsed);
    return result.success ? result.data : {};
  }

  function write(document: StoreDocument): void {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
  }

  return {
    get: (recipientKey) => read()[recipientKey]?.messageIds ?? [],

    save: (recipientKey, messageIds) => {
      const document = read();
      document[recipientKey] = {
        messageIds: [...messageIds],
        createdAt: now().toISOString(),
      };
      write(document);
    },

    clear: (recipientKey) => {
      const document = read();
      if (!(recipientKey in document)) return;
      delete document[recipientKey];
      write(document);
    },
  };
}

export function createMemoryStore(): DeliveryStore {
  const records = new Map<string, ReadonlyArray<number>>();
  return {
    get: (recipientKey) => records.get(recipientKey) ?? [],
    save: (recipientKey, messageIds) => {
      records.set(recipientKey, [...messageIds]);
    },
    clear: (recipientKey) => {
      records.delete(recipientKey);
    },
  };
}
