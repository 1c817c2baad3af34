import { Analyzer, AnalyzerTier, normalizeCommand } from './BaseAnalyzer';

export interface AnalyzerInfo {
  name: string;
  description: string;
  tier: AnalyzerTier;
}

/**
 * Ordered analyzer list plus a command -> analyzer memo.
 * Owned by one session's controller; no locking.
 */
export class AnalyzerRegistry {
  private analyzers: Analyzer[] = [];
  private cache = new Map<string, Analyzer | null>();

  register(analyzer: Analyzer): void {
    if (this.analyzers.some(a => a.name === analyzer.name)) {
      throw new Error(`Analyzer '${analyzer.name}' is already registered`);
    }
    this.analyzers.push(analyzer);
    // Array.prototype.sort is stable, so equal tiers keep registration order
    this.analyzers.sort((a, b) => a.tier - b.tier);
  }

  getAnalyzer(command: string): Analyzer | null {
    const key = normalizeCommand(command);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const match = this.analyzers.find(a => a.canAnalyze(key)) ?? null;
    this.cache.set(key, match);
    return match;
  }

  listAnalyzers(): AnalyzerInfo[] {
    return this.analyzers.map(a => ({ name: a.name, description: a.description, tier: a.tier }));
  }

  clearCache(): void {
    this.cache.clear();
  }
}
