import createDebug from "debug";

import { InvalidInputError, RecordNotFoundError } from "../errors.js";
import type { MessageInput, MessageRecord, RecordId } from "../types.js";
import type { RecordStore } from "../recordStore.js";

const debug = createDebug("mail-index:store");

export class MemoryRecordStore implements RecordStore {
  private readonly records = new Map<RecordId, MessageRecord>();
  private nextId: RecordId = 1;

  create(input: MessageInput): MessageRecord {
    // validate before touching the counter so a rejection consumes no id
    if (input.sender.length === 0) {
      throw new InvalidInputError("sender", "must be non-empty");
    }

    const record: MessageRecord = Object.freeze({
      id: this.nextId++,
      sender: input.sender,
      subject: input.subject,
      body: input.body,
      date: input.date,
    });
    this.records.set(record.id, record);
    debug("stored #%d from %s", record.id, record.sender);
    return record;
  }

  get(id: RecordId): MessageRecord {
    const record = this.records.get(id);
    if (!record) throw new RecordNotFoundError(id);
    return record;
  }

  has(id: RecordId): boolean {
    return this.records.has(id);
  }

  size(): number {
    return this.records.size;
  }

  values(): IterableIterator<MessageRecord> {
    return this.records.values();
  }
}
