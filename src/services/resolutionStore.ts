export interface ResolutionSnapshot {
  substitutions: Record<string, string>;
  ignored: string[];
}

/**
 * Per-player answers to "this name has no stats": either score someone else
 * in their place, or leave them out entirely. A player holds at most one of
 * the two at a time.
 */
export class ResolutionStore {
  private readonly substitutions = new Map<string, string>();
  private readonly ignored = new Set<string>();

  setSubstitution(player: string, replacement: string): void {
    const name = player.trim();
    const sub = replacement.trim();
    if (!name) return;

    if (!sub) {
      this.setIgnored(name);
      return;
    }

    this.ignored.delete(name);
    this.substitutions.set(name, sub);
  }

  setIgnored(player: string): void {
    const name = player.trim();
    if (!name) return;

    this.substitutions.delete(name);
    this.ignored.add(name);
  }

  /** Applies one client "resolve" action; a blank replacement means ignore. */
  resolve(player: string, replacement: string): void {
    this.setSubstitution(player, replacement);
  }

  resolveAll(updates: Record<string, string>): void {
    for (const [player, replacement] of Object.entries(updates)) {
      this.resolve(player, replacement);
    }
  }

  clear(player: string): boolean {
    const name = player.trim();
    const hadSubstitution = this.substitutions.delete(name);
    const wasIgnored = this.ignored.delete(name);
    return hadSubstitution || wasIgnored;
  }

  clearAll(): void {
    this.substitutions.clear();
    this.ignored.clear();
  }

  isIgnored(player: string): boolean {
    return this.ignored.has(player);
  }

  substitutionFor(player: string): string | undefined {
    return this.substitutions.get(player);
  }

  get size(): number {
    return this.substitutions.size + this.ignored.size;
  }

  snapshot(): ResolutionSnapshot {
    const substitutions: Record<string, string> = {};
    for (const player of [...this.substitutions.keys()].sort()) {
      substitutions[player] = this.substitutions.get(player) ?? '';
    }

    return {
      substitutions,
      ignored: [...this.ignored].sort(),
    };
  }
}
