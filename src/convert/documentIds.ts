/**
 * Hands out document ids that are unique for one run. Task ids are claimed up
 * front; ids minted later (fan-out parts) get `_2`, `_3` when already taken.
 */
export class DocumentIdRegistry {
  private readonly used = new Set<string>();

  constructor(taken: Iterable<string> = []) {
    for (const id of taken) {
      this.used.add(id);
    }
  }

  claim(preferred: string): string {
    let id = preferred;
    for (let n = 2; this.used.has(id); n += 1) {
      id = `${preferred}_${n}`;
    }
    this.used.add(id);
    return id;
  }
}
