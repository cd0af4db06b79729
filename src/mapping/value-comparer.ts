/**
 * Equality, hashing and snapshotting strategy attached to a mapping
 * Reference comparison is wrong for array-like values, so binary mappings carry one of these
 */
export interface ValueComparer<T> {
  equals(left: T | null | undefined, right: T | null | undefined): boolean;
  hashCode(value: T | null | undefined): number;
  snapshot(value: T | null | undefined): T | null | undefined;
}

/**
 * Compares byte sequences by content
 * Snapshots are copies so a value read back never aliases the tracked one
 */
export const bytesComparer: ValueComparer<Uint8Array> = {
  equals(left, right) {
    if (left == null || right == null) {
      return left == right;
    }
    if (left.length !== right.length) {
      return false;
    }
    return Buffer.compare(left, right) === 0;
  },

  hashCode(value) {
    if (value == null) {
      return 0;
    }
    // FNV-1a over the contents
    let hash = 0x811c9dc5;
    for (const byte of value) {
      hash ^= byte;
      hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
  },

  snapshot(value) {
    // Buffer#slice returns a view, so copy through the Uint8Array constructor
    return value == null ? value : new Uint8Array(value);
  },
};
