/**
 * @invite-escrow/escrow — Sentinel-terminated relationship lists.
 *
 * One singly linked list per owner, stored as a `value → next` map. The
 * sentinel is both the head pointer and the terminator:
 *
 *   SENTINEL → C → B → A → SENTINEL
 *
 * An owner with no relationships is either absent or SENTINEL → SENTINEL;
 * both read as empty.
 *
 * Rules:
 * - insert() is O(1) and puts the value at the head
 * - remove() is O(n); removing an absent value is a no-op
 * - enumerate() returns most-recently-inserted first
 */

import { SENTINEL } from "@invite-escrow/types";
import type { Address } from "@invite-escrow/types";
import { EscrowError } from "./types.js";

export class RelationshipIndex {
  private readonly _lists: Map<Address, Map<Address, Address>> = new Map();

  /**
   * Link `value` to `owner` as the new head.
   * Throws if `value` is already linked to `owner` or is the sentinel.
   */
  insert(owner: Address, value: Address): void {
    this._assertLinkable(owner, value);

    let links = this._lists.get(owner);
    if (links === undefined) {
      links = new Map();
      this._lists.set(owner, links);
    }

    links.set(value, links.get(SENTINEL) ?? SENTINEL);
    links.set(SENTINEL, value);
  }

  /**
   * Unlink `value` from `owner`.
   *
   * Returns the predecessor `value` was spliced out after (the sentinel
   * when it was the head), or undefined when it was not linked.
   */
  remove(owner: Address, value: Address): Address | undefined {
    const links = this._lists.get(owner);
    if (links === undefined || value === SENTINEL || !links.has(value)) {
      return undefined;
    }

    let previous: Address = SENTINEL;
    let current = links.get(SENTINEL) ?? SENTINEL;
    let steps = 0;

    while (current !== SENTINEL) {
      if (current === value) {
        links.set(previous, links.get(value) ?? SENTINEL);
        links.delete(value);
        if (links.get(SENTINEL) === SENTINEL) {
          this._lists.delete(owner);
        }
        return previous;
      }
      previous = current;
      current = this._next(owner, links, current, ++steps);
    }

    throw new EscrowError(
      "INDEX_CORRUPTED",
      `"${value}" is linked to "${owner}" but unreachable from the head`,
    );
  }

  /**
   * Re-link `value` directly after `predecessor`, restoring the exact
   * position a prior remove() took it from.
   */
  relink(owner: Address, predecessor: Address, value: Address): void {
    this._assertLinkable(owner, value);

    let links = this._lists.get(owner);
    if (links === undefined) {
      links = new Map([[SENTINEL, SENTINEL]]);
      this._lists.set(owner, links);
    }

    const next = links.get(predecessor);
    if (next === undefined) {
      throw new EscrowError(
        "INDEX_CORRUPTED",
        `Cannot relink "${value}" after "${predecessor}": predecessor is not linked to "${owner}"`,
      );
    }

    links.set(value, next);
    links.set(predecessor, value);
  }

  /**
   * All values linked to `owner`, most recently inserted first.
   */
  enumerate(owner: Address): readonly Address[] {
    const links = this._lists.get(owner);
    if (links === undefined) {
      return [];
    }

    const values: Address[] = [];
    let current = links.get(SENTINEL) ?? SENTINEL;
    while (current !== SENTINEL) {
      values.push(current);
      current = this._next(owner, links, current, values.length);
    }
    return values;
  }

  has(owner: Address, value: Address): boolean {
    return value !== SENTINEL && (this._lists.get(owner)?.has(value) ?? false);
  }

  private _assertLinkable(owner: Address, value: Address): void {
    if (value === SENTINEL) {
      throw new EscrowError("INDEX_CORRUPTED", "The sentinel cannot be linked as a value");
    }
    if (this.has(owner, value)) {
      throw new EscrowError(
        "INDEX_CORRUPTED",
        `"${value}" is already linked to "${owner}"`,
      );
    }
  }

  /** Follow one link, failing on a dangling pointer or a cycle. */
  private _next(
    owner: Address,
    links: Map<Address, Address>,
    current: Address,
    steps: number,
  ): Address {
    const next = links.get(current);
    if (next === undefined || steps >= links.size) {
      throw new EscrowError(
        "INDEX_CORRUPTED",
        `Broken list for "${owner}" after "${current}"`,
      );
    }
    return next;
  }
}
