import type { DateKey, RecordId } from "../types.js";
import type { OrderedIndex } from "../orderedIndex.js";

const NIL = -1;

type Node = {
  date: DateKey;
  /** Identifiers sharing this date, in insertion order. */
  bucket: RecordId[];
  left: number;
  right: number;
};

function makeNode(date: DateKey, id: RecordId): Node {
  return { date, bucket: [id], left: NIL, right: NIL };
}

/**
 * Unbalanced binary search tree over date keys.
 *
 * Nodes live in an arena array and point at their children by slot, so insert and
 * traversal are plain loops whose stack use does not depend on tree height. Sorted
 * input degenerates the tree into a list; equal dates never add depth.
 */
export class DateTree implements OrderedIndex {
  private readonly nodes: Node[] = [];
  private count = 0;

  insert(date: DateKey, id: RecordId): void {
    this.count++;
    if (this.nodes.length === 0) {
      this.nodes.push(makeNode(date, id));
      return;
    }

    let cur = 0;
    while (true) {
      const node = this.nodes[cur]!;
      if (date === node.date) {
        node.bucket.push(id);
        return;
      }

      const goLeft = date < node.date;
      const next = goLeft ? node.left : node.right;
      if (next !== NIL) {
        cur = next;
        continue;
      }

      const slot = this.nodes.length;
      this.nodes.push(makeNode(date, id));
      if (goLeft) node.left = slot;
      else node.right = slot;
      return;
    }
  }

  *inOrder(): IterableIterator<RecordId> {
    if (this.nodes.length === 0) return;

    const stack: number[] = [];
    let cur = 0;

    while (cur !== NIL || stack.length) {
      while (cur !== NIL) {
        stack.push(cur);
        cur = this.nodes[cur]!.left;
      }
      const slot = stack.pop()!;
      const node = this.nodes[slot]!;
      yield* node.bucket;
      cur = node.right;
    }
  }

  size(): number {
    return this.count;
  }

  nodeCount(): number {
    return this.nodes.length;
  }

  height(): number {
    if (this.nodes.length === 0) return 0;

    let max = 0;
    const stack: Array<{ slot: number; depth: number }> = [{ slot: 0, depth: 1 }];
    while (stack.length) {
      const { slot, depth } = stack.pop()!;
      const node = this.nodes[slot]!;
      if (depth > max) max = depth;
      if (node.left !== NIL) stack.push({ slot: node.left, depth: depth + 1 });
      if (node.right !== NIL) stack.push({ slot: node.right, depth: depth + 1 });
    }
    return max;
  }
}
