/**
 * In-process stand-in for `QdrantClient`, covering the calls `QdrantVectorStore`
 * makes. Scores with cosine similarity and supports `must` equality filters.
 */

type PointId = string | number;
type Payload = Record<string, unknown>;

interface StoredPoint {
  id: PointId;
  vector: number[];
  payload: Payload;
}

interface MatchCondition {
  key: string;
  match: { value: unknown };
}

interface FilterArg {
  must?: MatchCondition[];
}

type FakeMethod =
  | 'getCollections'
  | 'createCollection'
  | 'deleteCollection'
  | 'upsert'
  | 'search'
  | 'delete'
  | 'count'
  | 'scroll';

export function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

function matches(point: StoredPoint, filter?: FilterArg | null): boolean {
  const conditions = filter?.must ?? [];
  return conditions.every(condition => point.payload[condition.key] === condition.match.value);
}

export class FakeQdrantClient {
  static instances: FakeQdrantClient[] = [];

  static latest(): FakeQdrantClient {
    const instance = FakeQdrantClient.instances[FakeQdrantClient.instances.length - 1];
    if (!instance) throw new Error('No FakeQdrantClient has been constructed');
    return instance;
  }

  static reset(): void {
    FakeQdrantClient.instances = [];
  }

  readonly collections = new Map<string, { size: number; distance: string; points: Map<PointId, StoredPoint> }>();
  readonly calls: Array<{ method: FakeMethod; args: unknown[] }> = [];
  /** Errors to throw, keyed by method. `afterCalls` lets earlier calls succeed. */
  readonly failures = new Map<FakeMethod, { error: Error; afterCalls: number }>();

  constructor(public options: Record<string, unknown> = {}) {
    FakeQdrantClient.instances.push(this);
  }

  failOn(method: FakeMethod, error: Error, afterCalls = 0): void {
    this.failures.set(method, { error, afterCalls });
  }

  private record(method: FakeMethod, ...args: unknown[]): void {
    const previous = this.calls.filter(call => call.method === method).length;
    this.calls.push({ method, args });
    const failure = this.failures.get(method);
    if (failure && previous >= failure.afterCalls) {
      throw failure.error;
    }
  }

  private collection(name: string) {
    const collection = this.collections.get(name);
    if (!collection) throw new Error(`Collection ${name} not found`);
    return collection;
  }

  async getCollections() {
    this.record('getCollections');
    return { collections: [...this.collections.keys()].map(name => ({ name })) };
  }

  async createCollection(name: string, params: { vectors: { size: number; distance: string } }) {
    this.record('createCollection', name, params);
    this.collections.set(name, { ...params.vectors, points: new Map() });
    return true;
  }

  async deleteCollection(name: string) {
    this.record('deleteCollection', name);
    return this.collections.delete(name);
  }

  async upsert(name: string, params: { wait?: boolean; points: Array<{ id: PointId; vector: number[]; payload?: Payload | null }> }) {
    this.record('upsert', name, params);
    const { points } = this.collection(name);
    for (const point of params.points) {
      points.set(point.id, { id: point.id, vector: point.vector, payload: point.payload ?? {} });
    }
    return { operation_id: 1, status: 'completed' };
  }

  async search(
    name: string,
    params: {
      vector: number[];
      limit: number;
      filter?: FilterArg | null;
      score_threshold?: number | null;
      with_payload?: boolean;
    }
  ) {
    this.record('search', name, params);
    const { points } = this.collection(name);
    const threshold = params.score_threshold ?? Number.NEGATIVE_INFINITY;
    return [...points.values()]
      .filter(point => matches(point, params.filter))
      .map(point => ({ id: point.id, version: 0, score: cosine(params.vector, point.vector), payload: point.payload }))
      .filter(result => result.score >= threshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, params.limit);
  }

  async delete(name: string, params: { wait?: boolean; points?: PointId[]; filter?: FilterArg | null }) {
    this.record('delete', name, params);
    const { points } = this.collection(name);
    if (params.points) {
      for (const id of params.points) points.delete(id);
    } else if (params.filter) {
      for (const point of [...points.values()]) {
        if (matches(point, params.filter)) points.delete(point.id);
      }
    }
    return { operation_id: 2, status: 'completed' };
  }

  async count(name: string, params: { filter?: FilterArg | null; exact?: boolean } = {}) {
    this.record('count', name, params);
    const { points } = this.collection(name);
    return { count: [...points.values()].filter(point => matches(point, params.filter)).length };
  }

  async scroll(name: string, params: { limit?: number; offset?: PointId | null; with_payload?: boolean; with_vector?: boolean }) {
    this.record('scroll', name, params);
    const all = [...this.collection(name).points.values()];
    const start = params.offset === undefined || params.offset === null ? 0 : all.findIndex(p => p.id === params.offset);
    const limit = params.limit ?? 10;
    const page = all.slice(start, start + limit);
    const nextPoint = all[start + limit];
    return {
      points: page.map(point => ({ id: point.id, payload: point.payload })),
      next_page_offset: nextPoint ? nextPoint.id : null,
    };
  }
}
