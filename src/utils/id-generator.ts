/**
 * Unique ID Generator
 * Generates short IDs for temporary file names using short-unique-id
 */

import ShortUniqueId from "short-unique-id";

export class IdGenerator {
  private uid: ShortUniqueId;
  private usedIds = new Set<string>();

  constructor(length = 8) {
    this.uid = new ShortUniqueId({
      length,
      dictionary: "alphanum_lower",
    });
  }

  /**
   * Generate an ID not handed out before by this generator
   */
  generate(): string {
    let id: string;
    do {
      id = this.uid.rnd();
    } while (this.usedIds.has(id));

    this.usedIds.add(id);
    return id;
  }

  /**
   * Release an ID once its temporary file is gone
   */
  release(id: string): void {
    this.usedIds.delete(id);
  }
}
