/**
 * Run ID Generator
 * Names archive runs `archive-<timestamp>-<id>` with a short random suffix
 * from short-unique-id, so parallel runs on the same root never share a name.
 */

import ShortUniqueId from "short-unique-id";

const RUN_NAME = /^archive-\d{8}T\d{6}-([0-9a-z]{4})(?:\.jsonl)?$/;

function timestamp(date: Date): string {
  // 2024-05-01T12:30:45.123Z → 20240501T123045
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "");
}

export class IdGenerator {
  private uid: ShortUniqueId;
  private usedIds = new Set<string>();

  constructor() {
    this.uid = new ShortUniqueId({
      length: 4,
      dictionary: "alphanum_lower",
    });
  }

  /**
   * Register the suffixes of run names already present in an archive root
   */
  static fromRunNames(names: Iterable<string>): IdGenerator {
    const generator = new IdGenerator();
    for (const name of names) {
      const match = RUN_NAME.exec(name);
      if (match) generator.register(match[1]);
    }
    return generator;
  }

  /**
   * Generate a unique ID, ensuring no collisions
   */
  generate(): string {
    let id: string;
    do {
      id = this.uid.rnd();
    } while (this.isUsed(id));

    this.usedIds.add(id);
    return id;
  }

  register(id: string): void {
    this.usedIds.add(id);
  }

  isUsed(id: string): boolean {
    return this.usedIds.has(id);
  }

  runName(date: Date = new Date()): string {
    return `archive-${timestamp(date)}-${this.generate()}`;
  }
}
