/**
 * ANALYSIS SESSION
 * ================
 *
 * Explicit per-user context. Created by the first run, replaced wholesale by
 * the next run on the same id, never shared between ids.
 */

import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../../common/errors.js';
import type { AnalysisRequest, SymbolAnalysis } from './analysis.types.js';

export class AnalysisSession {
  readonly id: string;
  readonly createdAt: Date;
  private _updatedAt: Date;
  private _request: AnalysisRequest;
  private _results: ReadonlyMap<string, SymbolAnalysis>;

  constructor(request: AnalysisRequest, results: SymbolAnalysis[], now: Date = new Date()) {
    this.id = uuidv4();
    this.createdAt = now;
    this._updatedAt = now;
    this._request = request;
    this._results = AnalysisSession.index(results);
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get request(): AnalysisRequest {
    return this._request;
  }

  get results(): SymbolAnalysis[] {
    return [...this._results.values()];
  }

  result(symbol: string): SymbolAnalysis | undefined {
    return this._results.get(symbol.toUpperCase());
  }

  replace(request: AnalysisRequest, results: SymbolAnalysis[], now: Date = new Date()): void {
    this._request = request;
    this._results = AnalysisSession.index(results);
    this._updatedAt = now;
  }

  private static index(results: SymbolAnalysis[]): ReadonlyMap<string, SymbolAnalysis> {
    return new Map(results.map((r) => [r.symbol.toUpperCase(), r]));
  }
}

/**
 * In-memory, bounded. The least recently used session is evicted first.
 */
export class SessionStore {
  private readonly sessions = new Map<string, AnalysisSession>();

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.sessions.size;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  get(id: string): AnalysisSession {
    const session = this.sessions.get(id);
    if (!session) throw new NotFoundError(`Session ${id} not found`);
    this.touch(session);
    return session;
  }

  save(session: AnalysisSession): void {
    this.touch(session);
    while (this.sessions.size > this.capacity) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  private touch(session: AnalysisSession): void {
    this.sessions.delete(session.id);
    this.sessions.set(session.id, session);
  }
}
