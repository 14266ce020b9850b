/**
 * In-memory stand-in for the vector service REST surface.
 * Exposes a fetch function the client can be constructed with, records every
 * request, and can inject network failures and error statuses.
 */

// ============================================================
// STATE
// ============================================================

type Scalar = string | number | boolean | null;

interface StoredRecord {
  id: string;
  embedding: number[];
  metadata: Record<string, Scalar> | null;
  document: string | null;
}

interface CollectionState {
  id: string;
  name: string;
  metadata: Record<string, Scalar> | null;
  dimension: number;
  tenant: string;
  database: string;
  records: Map<string, StoredRecord>;
}

interface DatabaseState {
  id: string;
  name: string;
  tenant: string;
  collections: Map<string, CollectionState>;
}

/** Failure injected in place of the next response */
export type InjectedFailure =
  | { kind: 'refused' }
  | { kind: 'reset' }
  | { kind: 'hang' }
  | {
      kind: 'status';
      status: number;
      body?: unknown;
      headers?: Record<string, string>;
    };

/** One request as the server received it */
export interface ReceivedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: Headers;
  body: unknown;
}

export interface FakeServerOptions {
  /** Require `Authorization: Bearer <token>` */
  token?: string;
}

// ============================================================
// JSON HELPERS
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(body: unknown, key: string): unknown {
  return isRecord(body) ? body[key] : undefined;
}

function stringField(body: unknown, key: string): string {
  const value = field(body, key);
  return typeof value === 'string' ? value : '';
}

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((v): v is string => typeof v === 'string')
    : [];
}

function numberList(value: unknown): number[] {
  return Array.isArray(value)
    ? value.filter((v): v is number => typeof v === 'number')
    : [];
}

function metadataOf(value: unknown): Record<string, Scalar> | null {
  if (!isRecord(value)) {
    return null;
  }
  const metadata: Record<string, Scalar> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (
      entry === null ||
      typeof entry === 'string' ||
      typeof entry === 'number' ||
      typeof entry === 'boolean'
    ) {
      metadata[key] = entry;
    }
  }
  return metadata;
}

function json(status: number, body: unknown): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function notFound(message: string): Response {
  return json(404, { error: 'NotFoundError', message });
}

function conflict(message: string): Response {
  return json(409, { error: 'UniqueConstraintError', message });
}

function socketError(code: string): TypeError {
  const cause = Object.assign(new Error(`socket ${code}`), { code });
  return new TypeError('fetch failed', { cause });
}

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

/** Squared euclidean distance */
function l2(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return sum;
}

/** Equality filter on metadata keys */
function matchesWhere(record: StoredRecord, where: unknown): boolean {
  if (!isRecord(where)) {
    return true;
  }
  return Object.entries(where).every(
    ([key, value]) => record.metadata?.[key] === value
  );
}

// ============================================================
// FAKE SERVER
// ============================================================

export class FakeVectorServer {
  readonly requests: ReceivedRequest[] = [];
  private readonly failures: InjectedFailure[] = [];
  private readonly rejected = new Map<string, string>();
  private readonly tenants = new Map<string, Map<string, DatabaseState>>();
  private readonly token: string | undefined;
  private nextId = 1;

  constructor(options: FakeServerOptions = {}) {
    this.token = options.token;
    this.reset();
  }

  /** fetch implementation bound to this server */
  readonly fetch: typeof fetch = (input, init) => {
    const url = new URL(String(input));
    const headers = new Headers(init?.headers);
    const rawBody = init?.body;
    const request: ReceivedRequest = {
      method: init?.method ?? 'GET',
      path: url.pathname,
      query: url.searchParams,
      headers,
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
    };
    this.requests.push(request);

    const signal = init?.signal ?? undefined;
    if (signal?.aborted) {
      return Promise.reject(abortError());
    }

    const failure = this.failures.shift();
    if (failure?.kind === 'refused') {
      return Promise.reject(socketError('ECONNREFUSED'));
    }
    if (failure?.kind === 'reset') {
      return Promise.reject(socketError('ECONNRESET'));
    }
    if (failure?.kind === 'hang') {
      return new Promise((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(abortError()));
      });
    }
    if (failure?.kind === 'status') {
      return Promise.resolve(
        new Response(
          failure.body === undefined ? null : JSON.stringify(failure.body),
          { status: failure.status, headers: failure.headers ?? {} }
        )
      );
    }

    return Promise.resolve(this.handle(request));
  };

  /** Fail the next `times` requests */
  fail(failure: InjectedFailure, times = 1): void {
    for (let i = 0; i < times; i++) {
      this.failures.push(failure);
    }
  }

  /** Reject these ids in add, upsert and update with a per-item error */
  rejectItems(ids: readonly string[], reason: string): void {
    for (const id of ids) {
      this.rejected.set(id, reason);
    }
  }

  /** Requests matching a method and a path suffix */
  requestsTo(method: string, suffix: string): ReceivedRequest[] {
    return this.requests.filter(
      (r) => r.method === method && r.path.endsWith(suffix)
    );
  }

  /** Drop all data and recreate the default tenant and database */
  reset(): void {
    this.tenants.clear();
    this.tenants.set('default_tenant', new Map());
    this.addDatabase('default_tenant', 'default_database');
  }

  // ============================================================
  // ROUTING
  // ============================================================

  private handle(request: ReceivedRequest): Response {
    if (
      this.token !== undefined &&
      request.headers.get('Authorization') !== `Bearer ${this.token}`
    ) {
      return json(401, { error: 'AuthError', message: 'Unauthorized' });
    }

    const { method, path } = request;
    const parts = path
      .replace(/^\/api\/v2\/?/, '')
      .split('/')
      .filter((p) => p !== '')
      .map((p) => decodeURIComponent(p));

    if (parts.length === 1) {
      if (method === 'GET' && parts[0] === 'heartbeat') {
        return json(200, { 'nanosecond heartbeat': 1234567890 });
      }
      if (method === 'GET' && parts[0] === 'version') {
        return json(200, '1.0.0');
      }
      if (method === 'GET' && parts[0] === 'pre-flight-checks') {
        return json(200, { max_batch_size: 100 });
      }
      if (method === 'POST' && parts[0] === 'reset') {
        this.reset();
        return json(200, true);
      }
      if (method === 'POST' && parts[0] === 'tenants') {
        return this.createTenant(request.body);
      }
    }

    const [root, tenantName, section, databaseName, kind, target, action] =
      parts;
    if (root !== 'tenants' || tenantName === undefined) {
      return notFound(`no route for ${method} ${path}`);
    }
    const databases = this.tenants.get(tenantName);
    if (databases === undefined) {
      return notFound(`Tenant ${tenantName} not found`);
    }
    if (section === undefined) {
      return method === 'GET'
        ? json(200, { name: tenantName })
        : notFound(`no route for ${method} ${path}`);
    }

    if (databaseName === undefined) {
      if (method === 'GET') {
        return this.page(
          request,
          [...databases.values()].map((db) => this.databaseJson(db)),
          'databases'
        );
      }
      if (method === 'POST') {
        const name = stringField(request.body, 'name');
        if (databases.has(name)) {
          return conflict(`Database ${name} already exists`);
        }
        return json(200, this.databaseJson(this.addDatabase(tenantName, name)));
      }
    }
    const database =
      databaseName === undefined ? undefined : databases.get(databaseName);
    if (database === undefined) {
      return notFound(`Database ${databaseName ?? ''} not found`);
    }

    if (kind === undefined) {
      if (method === 'GET') {
        return json(200, this.databaseJson(database));
      }
      if (method === 'DELETE') {
        databases.delete(database.name);
        return json(200, {});
      }
    }
    if (kind === 'collections_count' && method === 'GET') {
      return json(200, database.collections.size);
    }
    if (kind !== 'collections') {
      return notFound(`no route for ${method} ${path}`);
    }

    if (target === undefined) {
      if (method === 'GET') {
        const sorted = [...database.collections.values()].sort((a, b) =>
          a.name < b.name ? -1 : 1
        );
        return this.page(
          request,
          sorted.map((c) => this.collectionJson(c)),
          'collections'
        );
      }
      if (method === 'POST') {
        return this.createCollection(database, request.body);
      }
    }

    if (action === undefined && target !== undefined) {
      if (method === 'GET' || method === 'DELETE') {
        const collection = database.collections.get(target);
        if (collection === undefined) {
          return notFound(`Collection ${target} does not exist`);
        }
        if (method === 'DELETE') {
          database.collections.delete(target);
          return json(200, {});
        }
        return json(200, this.collectionJson(collection));
      }
      if (method === 'PUT') {
        return this.updateCollection(database, target, request.body);
      }
    }

    const collection = [...database.collections.values()].find(
      (c) => c.id === target
    );
    if (collection === undefined) {
      return notFound(`Collection ${target ?? ''} does not exist`);
    }

    switch (`${method} ${action ?? ''}`) {
      case 'GET count':
        return json(200, collection.records.size);
      case 'POST add':
      case 'POST upsert':
      case 'POST update':
        return this.write(collection, action ?? '', request.body);
      case 'POST get':
        return this.get(collection, request.body);
      case 'POST delete':
        return this.delete(collection, request.body);
      case 'POST query':
        return this.query(collection, request.body);
      default:
        return notFound(`no route for ${method} ${path}`);
    }
  }

  // ============================================================
  // HANDLERS
  // ============================================================

  private page(
    request: ReceivedRequest,
    all: unknown[],
    key: string
  ): Response {
    const limit = Number(request.query.get('limit') ?? all.length);
    const offset = Number(request.query.get('cursor') ?? 0);
    const next = offset + limit;
    return json(200, {
      [key]: all.slice(offset, next),
      next_cursor: next < all.length ? String(next) : null,
    });
  }

  private createTenant(body: unknown): Response {
    const name = stringField(body, 'name');
    if (this.tenants.has(name)) {
      return conflict(`Tenant ${name} already exists`);
    }
    this.tenants.set(name, new Map());
    return json(200, {});
  }

  private addDatabase(tenant: string, name: string): DatabaseState {
    const database: DatabaseState = {
      id: `db-${this.nextId++}`,
      name,
      tenant,
      collections: new Map(),
    };
    this.tenants.get(tenant)?.set(name, database);
    return database;
  }

  private databaseJson(database: DatabaseState): unknown {
    return { id: database.id, name: database.name, tenant: database.tenant };
  }

  private collectionJson(collection: CollectionState): unknown {
    return {
      id: collection.id,
      name: collection.name,
      metadata: collection.metadata,
      dimension: collection.dimension,
      tenant: collection.tenant,
      database: collection.database,
    };
  }

  private createCollection(database: DatabaseState, body: unknown): Response {
    const name = stringField(body, 'name');
    const existing = database.collections.get(name);
    if (existing !== undefined) {
      return field(body, 'get_or_create') === true
        ? json(200, this.collectionJson(existing))
        : conflict(`Collection ${name} already exists`);
    }
    const dimension = field(body, 'dimension');
    const collection: CollectionState = {
      id: `col-${this.nextId++}`,
      name,
      metadata: metadataOf(field(body, 'metadata')),
      dimension: typeof dimension === 'number' ? dimension : 0,
      tenant: database.tenant,
      database: database.name,
      records: new Map(),
    };
    database.collections.set(name, collection);
    return json(200, this.collectionJson(collection));
  }

  private updateCollection(
    database: DatabaseState,
    id: string,
    body: unknown
  ): Response {
    const collection = [...database.collections.values()].find(
      (c) => c.id === id
    );
    if (collection === undefined) {
      return notFound(`Collection ${id} does not exist`);
    }
    const newName = field(body, 'new_name');
    if (typeof newName === 'string' && newName !== collection.name) {
      if (database.collections.has(newName)) {
        return conflict(`Collection ${newName} already exists`);
      }
      database.collections.delete(collection.name);
      collection.name = newName;
      database.collections.set(newName, collection);
    }
    const newMetadata = field(body, 'new_metadata');
    if (isRecord(newMetadata)) {
      collection.metadata = metadataOf(newMetadata);
    }
    return json(200, {});
  }

  private write(
    collection: CollectionState,
    action: string,
    body: unknown
  ): Response {
    const ids = stringList(field(body, 'ids'));
    const embeddings = field(body, 'embeddings');
    const metadatas = field(body, 'metadatas');
    const documents = field(body, 'documents');

    const results = ids.map((id, index) => {
      const reason = this.rejected.get(id);
      if (reason !== undefined) {
        return { id, ok: false, error: reason };
      }
      const exists = collection.records.has(id);
      if (action === 'add' && exists) {
        return { id, ok: false, error: `id ${id} already exists` };
      }
      if (action === 'update' && !exists) {
        return { id, ok: false, error: `id ${id} does not exist` };
      }
      const document = Array.isArray(documents) ? documents[index] : null;
      collection.records.set(id, {
        id,
        embedding: numberList(
          Array.isArray(embeddings) ? embeddings[index] : []
        ),
        metadata: metadataOf(
          Array.isArray(metadatas) ? metadatas[index] : null
        ),
        document: typeof document === 'string' ? document : null,
      });
      return { id, ok: true };
    });

    return results.every((r) => r.ok)
      ? json(200, {})
      : json(200, { results });
  }

  private columns(
    records: readonly StoredRecord[],
    include: string[]
  ): Record<string, unknown> {
    return {
      ids: records.map((r) => r.id),
      embeddings: include.includes('embeddings')
        ? records.map((r) => r.embedding)
        : null,
      metadatas: include.includes('metadatas')
        ? records.map((r) => r.metadata)
        : null,
      documents: include.includes('documents')
        ? records.map((r) => r.document)
        : null,
    };
  }

  private get(collection: CollectionState, body: unknown): Response {
    const ids = field(body, 'ids');
    const where = field(body, 'where');
    const include = stringList(field(body, 'include'));
    const limitValue = field(body, 'limit');
    const cursorValue = field(body, 'cursor');

    let records = [...collection.records.values()];
    if (Array.isArray(ids)) {
      const wanted = new Set(stringList(ids));
      records = records.filter((r) => wanted.has(r.id));
    }
    records = records.filter((r) => matchesWhere(r, where));

    const offset = typeof cursorValue === 'string' ? Number(cursorValue) : 0;
    const limit =
      typeof limitValue === 'number' ? limitValue : records.length;
    const next = offset + limit;
    return json(200, {
      ...this.columns(records.slice(offset, next), include),
      next_cursor: next < records.length ? String(next) : null,
    });
  }

  private delete(collection: CollectionState, body: unknown): Response {
    const deleted = stringList(field(body, 'ids')).filter((id) =>
      collection.records.delete(id)
    );
    return json(200, { deleted });
  }

  /** Results ordered by distance only; equal distances keep insertion order */
  private query(collection: CollectionState, body: unknown): Response {
    const queries = field(body, 'query_embeddings');
    const vector = numberList(Array.isArray(queries) ? queries[0] : []);
    const nResults = field(body, 'n_results');
    const include = stringList(field(body, 'include'));
    const where = field(body, 'where');

    const ranked = [...collection.records.values()]
      .filter((r) => matchesWhere(r, where))
      .map((r) => ({ record: r, distance: l2(r.embedding, vector) }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, typeof nResults === 'number' ? nResults : 10);

    const columns = this.columns(
      ranked.map((r) => r.record),
      include
    );
    return json(200, {
      ids: [columns['ids']],
      distances: [ranked.map((r) => r.distance)],
      embeddings: columns['embeddings'] === null ? null : [columns['embeddings']],
      metadatas: columns['metadatas'] === null ? null : [columns['metadatas']],
      documents: columns['documents'] === null ? null : [columns['documents']],
    });
  }
}
