/**
 * Mutable staging area for a table.
 *
 * Each key part maps to a slot holding either a finished value or the
 * builder of a nested table that dotted keys are still filling in. Nested
 * builders are turned into tables bottom-up when the owner is built.
 */

import { DEFAULT_PARSER_OPTIONS } from './types';
import { TomlOverflowError } from './errors';
import { TomlKey } from './key';
import { TomlLocation } from './source';
import { TomlTable, TomlValue } from './values';

type Slot = { type: 'value'; value: TomlValue } | { type: 'builder'; builder: TomlTableBuilder };

export interface TableBuilderOptions {
  location?: TomlLocation | undefined;
  /** Deepest nesting a key may reach, counted in key parts from the root. */
  maxDepth?: number | undefined;
}

export class TomlTableBuilder {
  private readonly slots = new Map<string, Slot>();
  private readonly maxDepth: number;
  private readonly depth: number;
  private location?: TomlLocation | undefined;
  private consumed = false;

  constructor(options: TableBuilderOptions = {}, depth = 0) {
    this.location = options.location;
    this.maxDepth = options.maxDepth ?? DEFAULT_PARSER_OPTIONS.maxKeyDepth;
    this.depth = depth;
  }

  /**
   * A builder seeded with the entries of an existing table.
   */
  static rebuild(table: TomlTable, options: TableBuilderOptions = {}, depth = 0): TomlTableBuilder {
    const builder = new TomlTableBuilder({ ...options, location: table.location }, depth);
    for (const [key, value] of table.entries()) {
      builder.slots.set(key, { type: 'value', value });
    }
    return builder;
  }

  withLocation(location: TomlLocation | undefined): this {
    this.location = location;
    return this;
  }

  /**
   * Associate `value` with `key`, replacing whatever was there. Dotted keys
   * create intermediate tables as needed; a non-table value in the way is
   * discarded, an existing table is extended.
   *
   * @throws TomlOverflowError if the key nests deeper than the configured limit
   */
  put(key: string | TomlKey, value: TomlValue): this {
    const resolved = typeof key === 'string' ? TomlKey.parseSimple(key) : key;
    this.merge(resolved, 0, value);
    return this;
  }

  /**
   * Make sure a table exists at `key`, creating it (and its parents) empty.
   */
  ensureTable(key: TomlKey): this {
    this.checkDepth(key, 0);
    let builder: TomlTableBuilder = this;
    for (const part of key.parts) {
      builder = builder.child(part, key.location);
    }
    return this;
  }

  build(): TomlTable {
    if (this.consumed) {
      throw new Error('Table builder has already been built');
    }
    this.consumed = true;
    const entries: Array<[string, TomlValue]> = [];
    for (const [key, slot] of this.slots) {
      entries.push([key, slot.type === 'value' ? slot.value : slot.builder.build()]);
    }
    return new TomlTable(entries, this.location);
  }

  private merge(key: TomlKey, index: number, value: TomlValue): void {
    this.checkDepth(key, index);
    const part = key.part(index);
    if (index === key.length - 1) {
      this.slots.set(part, { type: 'value', value });
      return;
    }
    this.child(part, key.location).merge(key, index + 1, value);
  }

  private checkDepth(key: TomlKey, index: number): void {
    if (this.depth + key.length - index > this.maxDepth) {
      throw new TomlOverflowError(
        `Key with ${key.length} levels of nesting is unreasonably large (limit ${this.maxDepth})`,
        key.location,
      );
    }
  }

  private child(part: string, location: TomlLocation | undefined): TomlTableBuilder {
    const slot = this.slots.get(part);
    if (slot?.type === 'builder') {
      return slot.builder;
    }
    const options = { maxDepth: this.maxDepth, location };
    const builder =
      slot !== undefined && slot.value instanceof TomlTable
        ? TomlTableBuilder.rebuild(slot.value, options, this.depth + 1)
        : new TomlTableBuilder(options, this.depth + 1);
    this.slots.set(part, { type: 'builder', builder });
    return builder;
  }
}
