// Sequential ID generation for reviews and comments

/**
 * Kinds of records that receive generated IDs
 */
export type IdKind = 'review' | 'comment';

/**
 * Maps record kinds to their ID prefixes
 */
const KIND_PREFIXES: Record<IdKind, string> = {
  review: 'REV',
  comment: 'C'
};

const ID_PATTERN = /^([A-Z]+)-(\d+)$/;

/**
 * Formats an ID with a zero-padded sequence number (REV-0001)
 */
export function formatId(kind: IdKind, sequence: number): string {
  return `${KIND_PREFIXES[kind]}-${sequence.toString().padStart(4, '0')}`;
}

/**
 * Extracts the sequence number of an ID of the given kind, or null
 */
export function parseSequence(kind: IdKind, id: string): number | null {
  const match = ID_PATTERN.exec(id);
  if (!match || match[1] !== KIND_PREFIXES[kind]) {
    return null;
  }
  return parseInt(match[2] ?? '', 10);
}

/**
 * Issues sequential IDs for one kind of record.
 * Counters are seeded from IDs already in use, so reloaded state keeps
 * counting where it stopped.
 */
export class IdGenerator {
  private counter = 0;

  constructor(private readonly kind: IdKind, existing: Iterable<string> = []) {
    for (const id of existing) {
      this.observe(id);
    }
  }

  /**
   * Records an ID in use so it is never issued again
   */
  observe(id: string): void {
    const sequence = parseSequence(this.kind, id);
    if (sequence !== null && sequence > this.counter) {
      this.counter = sequence;
    }
  }

  /**
   * Generates the next ID
   */
  next(): string {
    this.counter += 1;
    return formatId(this.kind, this.counter);
  }

  /**
   * Returns the ID that next() would produce, without consuming it
   */
  peek(): string {
    return formatId(this.kind, this.counter + 1);
  }
}
