/**
 * Shared named-set store. `move` must be atomic per value: a value is removed
 * from `fromGroup` and added to `toGroup` in one step, and only when it was a
 * member of `fromGroup`. Resolves to the number of values actually moved.
 */
export interface GroupStorePort {
  add(group: string, values: string[]): Promise<void>;
  isMember(group: string, value: string): Promise<boolean>;
  move(fromGroup: string, toGroup: string, values: string[]): Promise<number>;
  members(group: string): Promise<string[]>;
}
