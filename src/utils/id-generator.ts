/**
 * Unique ID Generator
 * Names per-task temp directories with short random suffixes
 */

import ShortUniqueId from "short-unique-id";

export class IdGenerator {
  private uid: ShortUniqueId;
  private issued = new Set<string>();

  constructor(length = 8) {
    this.uid = new ShortUniqueId({ length, dictionary: "alphanum_lower" });
  }

  /**
   * Next unused ID, optionally as "{prefix}-{id}".
   * IDs never repeat within one generator, whatever the prefix.
   */
  generate(prefix?: string): string {
    let id: string;
    do {
      id = this.uid.rnd();
    } while (this.issued.has(id));

    this.issued.add(id);
    return prefix ? `${prefix}-${id}` : id;
  }

  get count(): number {
    return this.issued.size;
  }
}
