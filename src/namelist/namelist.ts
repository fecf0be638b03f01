/**
 * The document: an ordered collection of named groups.
 */

import {
  DuplicateNameError,
  GroupNotFoundError,
  type NamelistError,
} from "../core/errors.js";
import { NamelistGroup } from "./group.js";
import type { MergeStrategy } from "./merge.js";
import { resolveWriteOptions, type WriteOptions } from "./options.js";
import { createGroupMatcher, type GroupSelection } from "./select.js";

export class Namelist {
  private readonly groupMap = new Map<string, NamelistGroup>();
  private readonly order: string[] = [];

  // ==========================================================================
  // Groups
  // ==========================================================================

  /**
   * Return the named group, creating it (at the end) when absent.
   */
  insertGroup(name: string): NamelistGroup {
    const key = name.toLowerCase();
    const existing = this.groupMap.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const group = new NamelistGroup(key);
    this.groupMap.set(key, group);
    this.order.push(key);
    return group;
  }

  /**
   * Create a new group; an existing group of that name is an error.
   */
  createGroup(name: string): NamelistGroup {
    if (this.hasGroup(name)) {
      throw new DuplicateNameError(name.toLowerCase(), "group");
    }
    return this.insertGroup(name);
  }

  /**
   * Store a group under its own name, replacing any group of that name
   * in place.
   */
  setGroup(group: NamelistGroup): void {
    if (!this.groupMap.has(group.name)) {
      this.order.push(group.name);
    }
    this.groupMap.set(group.name, group);
  }

  getGroup(name: string): NamelistGroup | undefined {
    return this.groupMap.get(name.toLowerCase());
  }

  requireGroup(name: string): NamelistGroup {
    const group = this.getGroup(name);
    if (group === undefined) {
      throw new GroupNotFoundError(name.toLowerCase());
    }
    return group;
  }

  hasGroup(name: string): boolean {
    return this.groupMap.has(name.toLowerCase());
  }

  removeGroup(name: string): NamelistGroup | undefined {
    const key = name.toLowerCase();
    const group = this.groupMap.get(key);
    if (group !== undefined) {
      this.groupMap.delete(key);
      this.order.splice(this.order.indexOf(key), 1);
    }
    return group;
  }

  groupNames(): string[] {
    return [...this.order];
  }

  *groups(): IterableIterator<NamelistGroup> {
    for (const key of this.order) {
      const group = this.groupMap.get(key);
      if (group !== undefined) {
        yield group;
      }
    }
  }

  get size(): number {
    return this.order.length;
  }

  isEmpty(): boolean {
    return this.order.length === 0;
  }

  // ==========================================================================
  // Patching and merging
  // ==========================================================================

  /**
   * Apply a patch document: matching groups merge variable by variable,
   * other groups are added as copies.
   *
   * Not transactional; a failure part-way leaves earlier groups applied.
   */
  applyPatch(patch: Namelist): void {
    this.applySelectivePatch(patch, {});
  }

  /**
   * applyPatch() restricted to patch groups whose names pass the
   * include/exclude globs.
   */
  applySelectivePatch(patch: Namelist, selection: GroupSelection): void {
    const matches = createGroupMatcher(selection);
    for (const patchGroup of patch.groups()) {
      if (!matches(patchGroup.name)) {
        continue;
      }
      const existing = this.getGroup(patchGroup.name);
      if (existing !== undefined) {
        existing.applyPatch(patchGroup);
      } else {
        this.setGroup(patchGroup.clone());
      }
    }
  }

  mergeWithStrategy(other: Namelist, strategy: MergeStrategy): void {
    for (const otherGroup of other.groups()) {
      const existing = this.getGroup(otherGroup.name);
      if (existing !== undefined) {
        existing.mergeWithStrategy(otherGroup, strategy);
      } else {
        this.setGroup(otherGroup.clone());
      }
    }
  }

  /**
   * The patch that turns this document into `other`: changed or new
   * variables, grouped; groups without changes are left out.
   */
  createPatchFrom(other: Namelist): Namelist {
    const patch = new Namelist();
    for (const otherGroup of other.groups()) {
      const mine = this.getGroup(otherGroup.name);
      const groupPatch =
        mine === undefined ? otherGroup.clone() : mine.createPatchFrom(otherGroup);
      if (!groupPatch.isEmpty() || mine === undefined) {
        patch.setGroup(groupPatch);
      }
    }
    return patch;
  }

  // ==========================================================================
  // Validation, comparison, output
  // ==========================================================================

  findIssues(): NamelistError[] {
    return [...this.groups()].flatMap((group) => group.findIssues());
  }

  validate(): void {
    for (const group of this.groups()) {
      group.validate();
    }
  }

  clone(): Namelist {
    const copy = new Namelist();
    for (const group of this.groups()) {
      copy.setGroup(group.clone());
    }
    return copy;
  }

  /**
   * Same groups in the same order, each with equal variables.
   */
  equals(other: Namelist): boolean {
    const names = this.groupNames();
    const otherNames = other.groupNames();
    return (
      names.length === otherNames.length &&
      names.every((name, i) => {
        const mine = this.getGroup(name);
        const theirs = other.getGroup(name);
        return (
          name === otherNames[i] &&
          mine !== undefined &&
          theirs !== undefined &&
          mine.equals(theirs)
        );
      })
    );
  }

  /**
   * Canonical text: `&name`, one assignment per line, `/`, with a blank
   * line between groups.
   */
  toText(options: Partial<WriteOptions> = {}): string {
    const resolved = resolveWriteOptions(options);
    const names = resolved.sortGroups ? [...this.order].sort() : this.order;

    const blocks: string[] = [];
    for (const name of names) {
      const group = this.groupMap.get(name);
      if (group === undefined) continue;
      const header = resolved.uppercase ? name.toUpperCase() : name;
      blocks.push(`&${header}\n${group.toText(resolved)}/\n`);
    }
    return blocks.join("\n");
  }
}
