/**
 * Ordered record of what the live chat has already seen: the last message of
 * each request and every answer. Lives exactly as long as one browser session.
 */
export class SessionLedger {
  private readonly fragments: string[] = [];
  private readonly index = new Set<string>();

  public append(fragment: string): void {
    const trimmed = fragment.trim();
    if (!trimmed) {
      return;
    }
    this.fragments.push(trimmed);
    this.index.add(trimmed);
  }

  public has(fragment: string): boolean {
    return this.index.has(fragment.trim());
  }

  public entries(): readonly string[] {
    return [...this.fragments];
  }

  public size(): number {
    return this.fragments.length;
  }

  public clear(): void {
    this.fragments.length = 0;
    this.index.clear();
  }
}
