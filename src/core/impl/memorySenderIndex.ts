import type { RecordId } from "../types.js";
import type { SenderIndex } from "../senderIndex.js";

export class MemorySenderIndex implements SenderIndex {
  private readonly bySender = new Map<string, RecordId[]>();

  insert(sender: string, id: RecordId): void {
    let ids = this.bySender.get(sender);
    if (!ids) {
      ids = [];
      this.bySender.set(sender, ids);
    }
    ids.push(id);
  }

  lookup(sender: string): RecordId[] {
    return Array.from(this.bySender.get(sender) ?? []);
  }

  senders(): string[] {
    return Array.from(this.bySender.keys());
  }
}
