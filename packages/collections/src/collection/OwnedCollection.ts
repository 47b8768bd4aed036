/**
 * ## OwnedCollection - Ordered Attachments with a Single Primary
 *
 * Holds the attachment list for one owner and exposes the operations that
 * keep exactly one primary in a non-empty collection.
 *
 * ### Rules
 *
 * | Operation | Effect on `primary` |
 * |-----------|---------------------|
 * | `add` into an empty collection | new record becomes primary |
 * | `add` with `primary = true` | new record takes over the flag |
 * | `remove` of the primary | first remaining record is promoted |
 * | `setPrimary` | every other flag cleared |
 * | `reorder` | untouched |
 *
 * The list is kept in collection order. Construction orders records by
 * `sortKey` (ties keep their stored order); afterwards the list order is
 * authoritative and `sortKey` gaps left by removals are never renumbered.
 *
 * @example
 * ```typescript
 * const collection = OwnedCollection.fromOwner(owner);
 *
 * collection.add({ ...draft, sortKey: collection.nextSortKey(), primary: false });
 * collection.setPrimaryById("collections_attachment_0190...");
 *
 * const saved = await gateway.save(collection.toOwner());
 * ```
 */

import type { AttachmentRecord, MediaKind, Owner } from "../types.js";
import { CollectionErrorCodes, CollectionInvariantError } from "../errors.js";
import { attachmentLifecycle, type AttachmentState } from "../lifecycle/index.js";
import { copyRecord, sameRecord, sortBySortKey } from "../record/index.js";

export class OwnedCollection {
  private readonly owner: Owner;
  private items: AttachmentRecord[];
  private readonly detached: AttachmentRecord[] = [];

  private constructor(owner: Owner, records: AttachmentRecord[]) {
    this.owner = owner;
    this.items = records;
  }

  /**
   * Build a collection from an owner. The owner and its records are copied;
   * nothing done to the collection is visible through the argument.
   */
  static fromOwner(owner: Owner): OwnedCollection {
    const records = sortBySortKey(owner.attachments.map(copyRecord));
    return new OwnedCollection({ ...owner, attachments: [] }, records);
  }

  get ownerId(): string {
    return this.owner.id;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Members in collection order.
   */
  get records(): ReadonlyArray<Readonly<AttachmentRecord>> {
    return [...this.items];
  }

  get(id: string): Readonly<AttachmentRecord> | undefined {
    return this.memberById(id);
  }

  has(record: AttachmentRecord): boolean {
    return this.indexOf(record) !== -1;
  }

  byKind(kind: MediaKind): ReadonlyArray<Readonly<AttachmentRecord>> {
    return this.items.filter((record) => record.mediaKind === kind);
  }

  /**
   * 0 for an empty collection, otherwise one past the highest sort key.
   */
  nextSortKey(): number {
    if (this.items.length === 0) {
      return 0;
    }
    return Math.max(...this.items.map((record) => record.sortKey)) + 1;
  }

  /**
   * Lifecycle state of a record relative to this collection.
   */
  stateOf(record: AttachmentRecord): AttachmentState {
    const member = this.items[this.indexOf(record)];
    if (member) {
      return member.primary ? "primary" : "attached";
    }
    return this.detached.some((gone) => sameRecord(gone, record)) ? "detached" : "absent";
  }

  /**
   * Append a record.
   *
   * Into an empty collection the record becomes primary. Into a non-empty one
   * `primary` is left as given; a record given as primary takes the flag over
   * from the current primary.
   *
   * @throws FSMTransitionError if the record is already a member or was
   * detached from this collection
   */
  add(record: AttachmentRecord): void {
    const target: AttachmentState = this.isEmpty || record.primary ? "primary" : "attached";
    attachmentLifecycle.assertTransition(this.stateOf(record), target);

    if (target === "primary") {
      this.demoteAllExcept(record);
    }
    record.primary = target === "primary";
    this.items.push(record);
  }

  /**
   * Repeated `add` in order. Only the first record can receive first-add
   * promotion.
   */
  addAll(records: ReadonlyArray<AttachmentRecord>): void {
    for (const record of records) {
      this.add(record);
    }
  }

  /**
   * Remove a member by identity. If it was primary and records remain, the
   * current first record is promoted.
   *
   * @returns whether a removal occurred
   */
  remove(record: AttachmentRecord): boolean {
    const index = this.indexOf(record);
    return index === -1 ? false : this.removeAt(index);
  }

  /**
   * @returns false when no member carries the id
   */
  removeById(id: string): boolean {
    const index = this.items.findIndex((record) => record.id === id);
    return index === -1 ? false : this.removeAt(index);
  }

  /**
   * Make a member the only primary. Idempotent.
   *
   * @throws CollectionInvariantError NOT_OWNED if the record is not a member
   */
  setPrimary(record: AttachmentRecord): void {
    const member = this.items[this.indexOf(record)];
    if (!member) {
      throw new CollectionInvariantError(
        CollectionErrorCodes.NOT_OWNED,
        "Attachment is not a member of this collection",
        { ownerId: this.owner.id, recordId: record.id ?? null }
      );
    }
    this.promote(member);
  }

  /**
   * @throws CollectionInvariantError NOT_OWNED if no member carries the id
   */
  setPrimaryById(id: string): void {
    const member = this.memberById(id);
    if (!member) {
      throw new CollectionInvariantError(
        CollectionErrorCodes.NOT_OWNED,
        `Attachment ${id} is not a member of this collection`,
        { ownerId: this.owner.id, recordId: id }
      );
    }
    this.promote(member);
  }

  /**
   * The flagged member; the first member when none is flagged (data from
   * before the invariant existed); undefined when empty.
   */
  getPrimary(): Readonly<AttachmentRecord> | undefined {
    return this.primaryMember();
  }

  /**
   * Rewrite sort keys to the position in `ids` (0-based). Members not named
   * keep their relative order and follow the named ones. `primary` is not
   * touched.
   *
   * @throws CollectionInvariantError INVALID_ORDER if an id is not a member or
   * is listed twice; the collection is left unchanged
   */
  reorder(ids: ReadonlyArray<string>): void {
    const named: AttachmentRecord[] = [];
    for (const id of ids) {
      const member = this.memberById(id);
      if (!member) {
        throw new CollectionInvariantError(
          CollectionErrorCodes.INVALID_ORDER,
          `Attachment ${id} is not a member of this collection`,
          { ownerId: this.owner.id, recordId: id }
        );
      }
      if (named.includes(member)) {
        throw new CollectionInvariantError(
          CollectionErrorCodes.INVALID_ORDER,
          `Attachment ${id} is listed more than once`,
          { ownerId: this.owner.id, recordId: id }
        );
      }
      named.push(member);
    }

    const rest = this.items.filter((record) => !named.includes(record));
    this.items = [...named, ...rest];
    this.items.forEach((record, position) => {
      record.sortKey = position;
    });
  }

  /**
   * Detach every member and empty the collection. Bytes are not deleted.
   *
   * @returns the detached records, in collection order
   */
  clear(): AttachmentRecord[] {
    const removed = this.items;
    for (const record of removed) {
      attachmentLifecycle.assertTransition(this.stateOf(record), "detached");
    }
    this.items = [];
    this.detached.push(...removed);
    return removed;
  }

  /**
   * Bring data from before the single-primary invariant into line: with no
   * flagged member the first one is promoted; with several only the first
   * keeps the flag.
   *
   * @returns whether any flag changed
   */
  normalizePrimary(): boolean {
    const primary = this.primaryMember();
    if (!primary) {
      return false;
    }
    if (this.items.filter((record) => record.primary).length === 1) {
      return false;
    }
    this.promote(primary);
    return true;
  }

  /**
   * Owner snapshot carrying copies of the current members in collection order.
   */
  toOwner(): Owner {
    return { ...this.owner, attachments: this.items.map(copyRecord) };
  }

  private memberById(id: string): AttachmentRecord | undefined {
    return this.items.find((record) => record.id === id);
  }

  private primaryMember(): AttachmentRecord | undefined {
    return this.items.find((record) => record.primary) ?? this.items[0];
  }

  private indexOf(record: AttachmentRecord): number {
    return this.items.findIndex((member) => sameRecord(member, record));
  }

  private removeAt(index: number): boolean {
    const [removed] = this.items.splice(index, 1);
    if (!removed) {
      return false;
    }
    const from: AttachmentState = removed.primary ? "primary" : "attached";
    attachmentLifecycle.assertTransition(from, "detached");
    this.detached.push(removed);

    const successor = this.items[0];
    if (removed.primary && successor) {
      this.promote(successor);
    }
    return true;
  }

  private promote(member: AttachmentRecord): void {
    this.demoteAllExcept(member);
    if (!member.primary) {
      attachmentLifecycle.assertTransition("attached", "primary");
      member.primary = true;
    }
  }

  private demoteAllExcept(keep: AttachmentRecord): void {
    for (const record of this.items) {
      if (record !== keep && record.primary) {
        attachmentLifecycle.assertTransition("primary", "attached");
        record.primary = false;
      }
    }
  }
}
