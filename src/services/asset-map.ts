export type AssetKind = 'image' | 'file';
export type AssetStatus = 'resolved' | 'unresolved' | 'copied' | 'copy_failed';

export interface AssetEntry {
  /** Reference exactly as written in the markup. */
  readonly reference: string;
  readonly kind: AssetKind;
  readonly status: AssetStatus;
  readonly resolvedPath: string | null;
  readonly destination: string | null;
  readonly outputReference: string | null;
}

/**
 * Original reference → local asset. Keys are unique; insertion order is
 * document order. Built by the asset resolver, then updated only by asset
 * placement.
 */
export class AssetMap {
  private readonly entries = new Map<string, AssetEntry>();

  add(reference: string, kind: AssetKind, resolvedPath: string | null): void {
    if (this.entries.has(reference)) return;
    this.entries.set(reference, {
      reference,
      kind,
      status: resolvedPath === null ? 'unresolved' : 'resolved',
      resolvedPath,
      destination: null,
      outputReference: null,
    });
  }

  get(reference: string): AssetEntry | undefined {
    return this.entries.get(reference);
  }

  has(reference: string): boolean {
    return this.entries.has(reference);
  }

  get size(): number {
    return this.entries.size;
  }

  values(): AssetEntry[] {
    return [...this.entries.values()];
  }

  resolved(): AssetEntry[] {
    return this.values().filter((entry) => entry.resolvedPath !== null);
  }

  unresolved(): AssetEntry[] {
    return this.values().filter((entry) => entry.resolvedPath === null);
  }

  assignDestination(
    reference: string,
    destination: string,
    outputReference: string
  ): void {
    const entry = this.requireEntry(reference);
    this.entries.set(reference, {
      ...entry,
      status: 'copied',
      destination,
      outputReference,
    });
  }

  markCopyFailed(reference: string): void {
    const entry = this.requireEntry(reference);
    this.entries.set(reference, { ...entry, status: 'copy_failed' });
  }

  /**
   * Reference to write into the Markdown: the placed copy when there is
   * one, otherwise the original reference.
   */
  referenceFor(reference: string): string {
    return this.entries.get(reference)?.outputReference ?? reference;
  }

  private requireEntry(reference: string): AssetEntry {
    const entry = this.entries.get(reference);
    if (!entry) {
      throw new Error(`Unknown asset reference: ${reference}`);
    }
    return entry;
  }
}
