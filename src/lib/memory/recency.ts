import type { PageRef } from "@/lib/memory/types";

type Node = {
  page: PageRef;
  prev: Node | null;
  next: Node | null;
};

/**
 * Resident pages ordered least-recently-used first. A page -> node map keeps
 * membership, removal and touch O(1).
 */
export class RecencyTrack {
  private head: Node | null = null;

  private tail: Node | null = null;

  private nodes = new Map<PageRef, Node>();

  get size(): number {
    return this.nodes.size;
  }

  has(page: PageRef): boolean {
    return this.nodes.has(page);
  }

  private link(node: Node) {
    node.prev = this.tail;
    node.next = null;
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
  }

  private unlink(node: Node) {
    if (node.prev) node.prev.next = node.next;
    if (node.next) node.next.prev = node.prev;
    if (this.head === node) this.head = node.next;
    if (this.tail === node) this.tail = node.prev;
    node.prev = null;
    node.next = null;
  }

  /** Moves `page` to the most-recently-used end, inserting it if absent. */
  touch(page: PageRef) {
    const existing = this.nodes.get(page);
    if (existing) {
      this.unlink(existing);
      this.link(existing);
      return;
    }
    const node: Node = { page, prev: null, next: null };
    this.nodes.set(page, node);
    this.link(node);
  }

  remove(page: PageRef): boolean {
    const node = this.nodes.get(page);
    if (!node) return false;
    this.unlink(node);
    this.nodes.delete(page);
    return true;
  }

  popFront(): PageRef | null {
    const first = this.head;
    if (!first) return null;
    this.unlink(first);
    this.nodes.delete(first.page);
    return first.page;
  }

  toArray(): PageRef[] {
    const pages: PageRef[] = [];
    for (let node = this.head; node; node = node.next) {
      pages.push(node.page);
    }
    return pages;
  }
}
