/**
 * VectorServiceClient
 * Typed operations over the vector service's REST surface.
 */

import {
  ConnectionError,
  createError,
  emitClientEvent,
  executeRequest,
  createSemaphore,
  NotFoundError,
  Paginator,
  withEventEmission,
  type ClientCallbacks,
  type Page,
  type RequestSpec,
  type Semaphore,
  type TransportConfig,
} from '@vectorscope/core';
import { settleBatch } from './batch.js';
import { baseUrlOf, resolveClientConfig } from './config.js';
import {
  checkDisposed,
  closedError,
  createDisposalState,
  dispose,
  linkSignals,
  type DisposalState,
} from './disposal.js';
import { sortMatches, tiedAtCutoff } from './distance.js';
import { mapServiceError, type ErrorTarget } from './errors.js';
import type {
  BatchWriteResult,
  CallOptions,
  ClientOptions,
  Collection,
  CollectionRef,
  ConnectionConfig,
  CreateCollectionParams,
  Database,
  DeleteItemsResult,
  Heartbeat,
  IncludeField,
  Item,
  ItemLookupResult,
  ListItemsOptions,
  ListOptions,
  MutationOptions,
  QueryParams,
  QueryResult,
  StoredItem,
  Tenant,
  UpdateCollectionParams,
} from './types.js';
import {
  assertDimension,
  assertPositiveInteger,
  validateCollectionName,
  validateIds,
  validateInclude,
  validateItems,
  validateMetadata,
  validateResourceName,
  validateVector,
} from './validation.js';
import {
  parseBatchStatuses,
  parseBoolean,
  parseCollection,
  parseCollectionPage,
  parseCount,
  parseDatabase,
  parseDatabasePage,
  parseDeleted,
  parseHeartbeat,
  parseItemsPage,
  parseQueryMatches,
  parseRecord,
  parseTenant,
  parseVersion,
  PATHS,
  toInclude,
  toItemsPayload,
} from './wire.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Event name prefix for every client event */
const EVENT_PREFIX = 'vectorscope';

const ALL_FIELDS: readonly IncludeField[] = [
  'embeddings',
  'metadatas',
  'documents',
];

const QUERY_FIELDS: readonly IncludeField[] = ['metadatas', 'documents'];

/** Mutating item operations and their paths */
type WriteOperation = 'addItems' | 'upsertItems' | 'updateItems';

const WRITE_PATHS: Record<WriteOperation, string> = {
  addItems: PATHS.add,
  upsertItems: PATHS.upsert,
  updateItems: PATHS.update,
};

// ============================================================
// CLIENT
// ============================================================

/**
 * Client for one vector service endpoint.
 *
 * Holds a frozen connection configuration and nothing else between calls:
 * collection handles are plain values and are never cached. Every operation
 * validates its arguments before sending anything, retries transient
 * failures per the request's idempotency, and raises typed errors.
 *
 * @example
 * ```typescript
 * const client = await VectorServiceClient.connect({ host: 'localhost' });
 * const docs = await client.createCollection({ name: 'docs', dimension: 3 });
 * await client.upsertItems(docs, [{ id: 'a', vector: [0, 0, 1] }]);
 * const [best] = await client.query(docs, { vector: [0, 0, 1], topK: 1 });
 * // best: { item: { id: 'a', ... }, distance: 0 }
 * await client.close();
 * ```
 */
export class VectorServiceClient {
  readonly config: ConnectionConfig;
  readonly callbacks: ClientCallbacks | undefined;

  private readonly transport: TransportConfig;
  private readonly semaphore: Semaphore | undefined;
  private readonly state: DisposalState;
  private readonly inFlight = new Set<Promise<unknown>>();

  /**
   * @throws ValidationError when the resolved configuration is invalid
   */
  constructor(options: ClientOptions = {}) {
    this.config = resolveClientConfig(options);
    this.callbacks = options.callbacks;

    const headers: Record<string, string> = { ...this.config.headers };
    if (this.config.apiKey !== undefined) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    this.transport = {
      baseUrl: baseUrlOf(this.config),
      headers,
      timeout: this.config.timeout,
      retryLimit: this.config.maxRetries,
      retryDelay: this.config.retryDelay,
      fetch: options.fetch,
      callbacks: options.callbacks,
    };
    this.semaphore = createSemaphore(this.config.maxConcurrent);
    this.state = createDisposalState();
  }

  /**
   * Create a client and verify the server answers a heartbeat.
   * The client is closed again when the heartbeat fails.
   *
   * @throws ConnectionError when the server is unreachable after retries
   */
  static async connect(
    options: ClientOptions = {}
  ): Promise<VectorServiceClient> {
    const client = new VectorServiceClient(options);
    try {
      await client.heartbeat();
    } catch (error: unknown) {
      await client.close();
      throw error;
    }
    return client;
  }

  /** True once close() has been called */
  get closed(): boolean {
    return this.state.isDisposed;
  }

  // ============================================================
  // REQUEST PLUMBING
  // ============================================================

  /**
   * Send one request through the transport.
   * Links the disposal signal, tracks the request for close(), and maps
   * status errors onto the taxonomy for the addressed entity.
   */
  private async send(
    spec: RequestSpec,
    target?: ErrorTarget | undefined
  ): Promise<unknown> {
    checkDisposed(this.state);
    const { signal, release } = linkSignals(this.state, spec.signal);
    const pending = executeRequest(
      this.transport,
      { ...spec, signal },
      this.semaphore
    );
    this.inFlight.add(pending);

    try {
      return await pending;
    } catch (error: unknown) {
      if (
        this.state.isDisposed &&
        error instanceof ConnectionError &&
        error.errorId === 'VS-T003'
      ) {
        throw closedError();
      }
      throw mapServiceError(error, target);
    } finally {
      release();
      this.inFlight.delete(pending);
    }
  }

  private run<T>(
    operation: string,
    metadata: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    return withEventEmission(this, EVENT_PREFIX, operation, metadata, fn);
  }

  private scope(): Record<string, string> {
    return { tenant: this.config.tenant, database: this.config.database };
  }

  private collectionParams(collection: Collection): Record<string, string> {
    return {
      tenant: collection.tenant,
      database: collection.database,
      collection: collection.id,
    };
  }

  private fetchCollection(
    name: string,
    signal: AbortSignal | undefined
  ): Promise<Collection> {
    return this.send(
      {
        method: 'GET',
        path: PATHS.collection,
        pathParams: { ...this.scope(), collection: name },
        idempotent: true,
        signal,
      },
      { resource: 'collection', name }
    ).then((body) => parseCollection(body, 'getCollection'));
  }

  /** Handles pass through; names cost one GET */
  private resolveCollection(
    ref: CollectionRef,
    signal: AbortSignal | undefined
  ): Promise<Collection> {
    if (typeof ref === 'string') {
      return this.fetchCollection(ref, signal);
    }
    return Promise.resolve(ref);
  }

  private static checkRef(ref: CollectionRef): void {
    if (typeof ref === 'string') {
      validateCollectionName(ref, 'collection');
    }
  }

  private static refName(ref: CollectionRef): string {
    return typeof ref === 'string' ? ref : ref.name;
  }

  // ============================================================
  // SERVER
  // ============================================================

  /**
   * Server liveness token.
   *
   * @returns Server clock in nanoseconds
   * @throws ConnectionError when unreachable within the timeout, after retries
   */
  async heartbeat(options: CallOptions = {}): Promise<Heartbeat> {
    return this.run('heartbeat', {}, async () => {
      const body = await this.send({
        method: 'GET',
        path: PATHS.heartbeat,
        idempotent: true,
        signal: options.signal,
      });
      return parseHeartbeat(body);
    });
  }

  /** Server version string */
  async version(options: CallOptions = {}): Promise<string> {
    return this.run('version', {}, async () => {
      const body = await this.send({
        method: 'GET',
        path: PATHS.version,
        idempotent: true,
        signal: options.signal,
      });
      return parseVersion(body);
    });
  }

  /** Server limits, e.g. `{ max_batch_size: 5461 }` */
  async preFlightChecks(
    options: CallOptions = {}
  ): Promise<Readonly<Record<string, unknown>>> {
    return this.run('preFlightChecks', {}, async () => {
      const body = await this.send({
        method: 'GET',
        path: PATHS.preFlightChecks,
        idempotent: true,
        signal: options.signal,
      });
      return parseRecord(body, 'preFlightChecks');
    });
  }

  /**
   * Delete everything on the server.
   * Servers refuse unless resets are enabled on their side.
   */
  async reset(options: CallOptions = {}): Promise<boolean> {
    return this.run('reset', {}, async () => {
      const body = await this.send({
        method: 'POST',
        path: PATHS.reset,
        idempotent: true,
        signal: options.signal,
      });
      return parseBoolean(body, 'reset');
    });
  }

  // ============================================================
  // TENANTS AND DATABASES
  // ============================================================

  async createTenant(
    name: string,
    options: MutationOptions = {}
  ): Promise<Tenant> {
    validateResourceName(name, 'name');
    return this.run('createTenant', { tenant: name }, async () => {
      await this.send(
        {
          method: 'POST',
          path: PATHS.tenants,
          body: { name },
          idempotent: false,
          idempotencyKey: options.idempotencyKey,
          signal: options.signal,
        },
        { resource: 'tenant', name }
      );
      return { name };
    });
  }

  async getTenant(name: string, options: CallOptions = {}): Promise<Tenant> {
    validateResourceName(name, 'name');
    return this.run('getTenant', { tenant: name }, async () => {
      const body = await this.send(
        {
          method: 'GET',
          path: PATHS.tenant,
          pathParams: { tenant: name },
          idempotent: true,
          signal: options.signal,
        },
        { resource: 'tenant', name }
      );
      return parseTenant(body);
    });
  }

  /** Create a database in the configured tenant */
  async createDatabase(
    name: string,
    options: MutationOptions = {}
  ): Promise<Database> {
    validateResourceName(name, 'name');
    return this.run('createDatabase', { database: name }, async () => {
      const body = await this.send(
        {
          method: 'POST',
          path: PATHS.databases,
          pathParams: { tenant: this.config.tenant },
          body: { name },
          idempotent: false,
          idempotencyKey: options.idempotencyKey,
          signal: options.signal,
        },
        { resource: 'database', name }
      );
      return parseDatabase(body, 'createDatabase');
    });
  }

  async getDatabase(
    name: string,
    options: CallOptions = {}
  ): Promise<Database> {
    validateResourceName(name, 'name');
    return this.run('getDatabase', { database: name }, async () => {
      const body = await this.send(
        {
          method: 'GET',
          path: PATHS.database,
          pathParams: { tenant: this.config.tenant, database: name },
          idempotent: true,
          signal: options.signal,
        },
        { resource: 'database', name }
      );
      return parseDatabase(body);
    });
  }

  /** Lazy listing of the configured tenant's databases */
  listDatabases(options: ListOptions & CallOptions = {}): Paginator<Database> {
    const fetchPage = (
      cursor: string | null,
      limit: number
    ): Promise<Page<Database>> =>
      this.run('listDatabases', { cursor, limit }, async () => {
        const body = await this.send({
          method: 'GET',
          path: PATHS.databases,
          pathParams: { tenant: this.config.tenant },
          query: { limit, cursor },
          idempotent: true,
          signal: options.signal,
        });
        return parseDatabasePage(body);
      });
    return new Paginator(fetchPage, options.pageSize ?? this.config.pageSize);
  }

  /**
   * @throws NotFoundError when the database does not exist
   */
  async deleteDatabase(
    name: string,
    options: CallOptions = {}
  ): Promise<void> {
    validateResourceName(name, 'name');
    return this.run('deleteDatabase', { database: name }, async () => {
      await this.send(
        {
          method: 'DELETE',
          path: PATHS.database,
          pathParams: { tenant: this.config.tenant, database: name },
          idempotent: true,
          signal: options.signal,
        },
        { resource: 'database', name }
      );
    });
  }

  // ============================================================
  // COLLECTIONS
  // ============================================================

  /**
   * Create a collection.
   *
   * @throws ValidationError when the name, dimension or metadata is invalid
   * @throws ConflictError when a collection with the name exists
   */
  async createCollection(
    params: CreateCollectionParams,
    options: MutationOptions = {}
  ): Promise<Collection> {
    validateCollectionName(params.name);
    assertPositiveInteger(params.dimension, 'dimension');
    validateMetadata(params.metadata, 'metadata');

    return this.run(
      'createCollection',
      { collection: params.name, dimension: params.dimension },
      async () => {
        const body = await this.send(
          {
            method: 'POST',
            path: PATHS.collections,
            pathParams: this.scope(),
            body: {
              name: params.name,
              metadata: params.metadata ?? null,
              dimension: params.dimension,
              get_or_create: false,
            },
            idempotent: false,
            idempotencyKey: options.idempotencyKey,
            signal: options.signal,
          },
          { resource: 'collection', name: params.name }
        );
        return parseCollection(body, 'createCollection');
      }
    );
  }

  /**
   * Return the named collection, creating it when absent.
   *
   * @throws ValidationError when an existing collection has another dimension
   */
  async getOrCreateCollection(
    params: CreateCollectionParams,
    options: CallOptions = {}
  ): Promise<Collection> {
    validateCollectionName(params.name);
    assertPositiveInteger(params.dimension, 'dimension');
    validateMetadata(params.metadata, 'metadata');

    return this.run(
      'getOrCreateCollection',
      { collection: params.name, dimension: params.dimension },
      async () => {
        const body = await this.send(
          {
            method: 'POST',
            path: PATHS.collections,
            pathParams: this.scope(),
            body: {
              name: params.name,
              metadata: params.metadata ?? null,
              dimension: params.dimension,
              get_or_create: true,
            },
            idempotent: true,
            signal: options.signal,
          },
          { resource: 'collection', name: params.name }
        );
        const collection = parseCollection(body, 'getOrCreateCollection');
        if (collection.dimension !== params.dimension) {
          throw createError('VS-V002', {
            field: 'dimension',
            expected: collection.dimension,
            actual: params.dimension,
          });
        }
        return collection;
      }
    );
  }

  /**
   * @throws NotFoundError when no collection has the name
   */
  async getCollection(
    name: string,
    options: CallOptions = {}
  ): Promise<Collection> {
    validateCollectionName(name);
    return this.run('getCollection', { collection: name }, () =>
      this.fetchCollection(name, options.signal)
    );
  }

  /**
   * Lazy listing of the configured database's collections.
   * Nothing is requested until iteration; each iteration starts over.
   *
   * @throws ValidationError when pageSize is not a positive integer
   */
  listCollections(
    options: ListOptions & CallOptions = {}
  ): Paginator<Collection> {
    const fetchPage = (
      cursor: string | null,
      limit: number
    ): Promise<Page<Collection>> =>
      this.run('listCollections', { cursor, limit }, async () => {
        const body = await this.send({
          method: 'GET',
          path: PATHS.collections,
          pathParams: this.scope(),
          query: { limit, cursor },
          idempotent: true,
          signal: options.signal,
        });
        return parseCollectionPage(body);
      });
    return new Paginator(fetchPage, options.pageSize ?? this.config.pageSize);
  }

  async countCollections(options: CallOptions = {}): Promise<number> {
    return this.run('countCollections', {}, async () => {
      const body = await this.send({
        method: 'GET',
        path: PATHS.collectionsCount,
        pathParams: this.scope(),
        idempotent: true,
        signal: options.signal,
      });
      return parseCount(body, 'countCollections');
    });
  }

  /**
   * Rename a collection or replace its metadata.
   *
   * @returns The collection as the server holds it after the update
   * @throws ValidationError when neither newName nor metadata is given
   * @throws NotFoundError when no collection has the name
   * @throws ConflictError when newName is taken
   */
  async updateCollection(
    name: string,
    params: UpdateCollectionParams,
    options: CallOptions = {}
  ): Promise<Collection> {
    validateCollectionName(name);
    if (params.newName === undefined && params.metadata === undefined) {
      throw createError('VS-V001', {
        field: 'params',
        reason: 'newName or metadata is required',
      });
    }
    if (params.newName !== undefined) {
      validateCollectionName(params.newName, 'newName');
    }
    validateMetadata(params.metadata, 'metadata');

    return this.run('updateCollection', { collection: name }, async () => {
      const collection = await this.fetchCollection(name, options.signal);
      await this.send(
        {
          method: 'PUT',
          path: PATHS.collection,
          pathParams: this.collectionParams(collection),
          body: {
            new_name: params.newName ?? null,
            new_metadata: params.metadata ?? null,
          },
          idempotent: true,
          signal: options.signal,
        },
        { resource: 'collection', name: params.newName ?? name }
      );
      return this.fetchCollection(params.newName ?? name, options.signal);
    });
  }

  /**
   * Delete a collection and its items.
   *
   * @throws NotFoundError when no collection has the name
   */
  async deleteCollection(
    name: string,
    options: CallOptions = {}
  ): Promise<void> {
    validateCollectionName(name);
    return this.run('deleteCollection', { collection: name }, async () => {
      await this.send(
        {
          method: 'DELETE',
          path: PATHS.collection,
          pathParams: { ...this.scope(), collection: name },
          idempotent: true,
          signal: options.signal,
        },
        { resource: 'collection', name }
      );
    });
  }

  // ============================================================
  // ITEMS
  // ============================================================

  async countItems(
    collection: CollectionRef,
    options: CallOptions = {}
  ): Promise<number> {
    VectorServiceClient.checkRef(collection);
    const name = VectorServiceClient.refName(collection);
    return this.run('countItems', { collection: name }, async () => {
      const resolved = await this.resolveCollection(collection, options.signal);
      const body = await this.send(
        {
          method: 'GET',
          path: PATHS.itemCount,
          pathParams: this.collectionParams(resolved),
          idempotent: true,
          signal: options.signal,
        },
        { resource: 'collection', name: resolved.name }
      );
      return parseCount(body, 'countItems');
    });
  }

  /**
   * Shared path of add, upsert and update.
   * Validates the whole batch before the first request.
   */
  private async writeItems(
    operation: WriteOperation,
    collection: CollectionRef,
    items: readonly Item[],
    options: MutationOptions
  ): Promise<BatchWriteResult> {
    VectorServiceClient.checkRef(collection);
    const handleDimension =
      typeof collection === 'string' ? undefined : collection.dimension;
    validateItems(items, this.config.maxBatchSize, handleDimension);

    const name = VectorServiceClient.refName(collection);
    const metadata = { collection: name, count: items.length };
    return this.run(operation, metadata, async () => {
      if (items.length === 0) {
        return { succeeded: 0 };
      }
      const resolved = await this.resolveCollection(collection, options.signal);
      if (handleDimension === undefined) {
        items.forEach((item, index) =>
          assertDimension(
            item.vector,
            `items[${index}].vector`,
            resolved.dimension
          )
        );
      }

      const body = await this.send(
        {
          method: 'POST',
          path: WRITE_PATHS[operation],
          pathParams: this.collectionParams(resolved),
          body: toItemsPayload(items),
          idempotent: false,
          idempotencyKey: options.idempotencyKey,
          signal: options.signal,
        },
        { resource: 'collection', name: resolved.name }
      );
      const statuses = parseBatchStatuses(body, operation);
      return settleBatch(operation, items, statuses);
    });
  }

  /**
   * Add items; the server rejects ids that already exist.
   *
   * @throws BatchError when the server rejects some items
   */
  addItems(
    collection: CollectionRef,
    items: readonly Item[],
    options: MutationOptions = {}
  ): Promise<BatchWriteResult> {
    return this.writeItems('addItems', collection, items, options);
  }

  /**
   * Insert or replace items by id.
   *
   * Every item is validated first; one invalid item rejects the batch and
   * nothing is sent. Without an idempotencyKey, a failure that leaves the
   * outcome unknown (connection reset, timeout) is not retried.
   *
   * @throws ValidationError when an item is invalid or a vector's length
   *   differs from the collection dimension
   * @throws BatchError when the server rejects some items
   */
  upsertItems(
    collection: CollectionRef,
    items: readonly Item[],
    options: MutationOptions = {}
  ): Promise<BatchWriteResult> {
    return this.writeItems('upsertItems', collection, items, options);
  }

  /**
   * Update existing items; the server rejects ids it does not hold.
   *
   * @throws BatchError when the server rejects some items
   */
  updateItems(
    collection: CollectionRef,
    items: readonly Item[],
    options: MutationOptions = {}
  ): Promise<BatchWriteResult> {
    return this.writeItems('updateItems', collection, items, options);
  }

  /**
   * Nearest neighbors of a vector.
   *
   * Asks the server for one match beyond topK, and for twice as many while
   * the last returned match ties the cutoff, so ties at the cutoff resolve
   * by id whatever order the server returns them in.
   *
   * @returns Matches by ascending distance, ties by ascending id
   * @throws ValidationError when topK is not a positive integer or the
   *   vector's length differs from the collection dimension
   */
  async query(
    collection: CollectionRef,
    params: QueryParams,
    options: CallOptions = {}
  ): Promise<QueryResult> {
    VectorServiceClient.checkRef(collection);
    assertPositiveInteger(params.topK, 'topK');
    validateVector(
      params.vector,
      'vector',
      typeof collection === 'string' ? undefined : collection.dimension
    );
    validateInclude(params.include);

    const name = VectorServiceClient.refName(collection);
    const metadata = { collection: name, topK: params.topK };
    return this.run('query', metadata, async () => {
      const resolved = await this.resolveCollection(collection, options.signal);
      assertDimension(params.vector, 'vector', resolved.dimension);

      // One extra result shows whether the cutoff falls inside a tie
      let limit = params.topK + 1;
      for (;;) {
        const body = await this.send(
          {
            method: 'POST',
            path: PATHS.query,
            pathParams: this.collectionParams(resolved),
            body: {
              query_embeddings: [params.vector],
              n_results: limit,
              where: params.where,
              where_document: params.whereDocument,
              include: [
                ...toInclude(params.include ?? QUERY_FIELDS),
                'distances',
              ],
            },
            idempotent: true,
            signal: options.signal,
          },
          { resource: 'collection', name: resolved.name }
        );
        const matches = sortMatches(parseQueryMatches(body));
        if (!tiedAtCutoff(matches, params.topK, limit)) {
          return matches.slice(0, params.topK);
        }
        limit *= 2;
      }
    });
  }

  /**
   * Page through the get endpoint for one resolved collection.
   */
  private itemPages(
    operation: string,
    resolve: () => Promise<Collection>,
    filter: Record<string, unknown>,
    include: readonly IncludeField[],
    pageSize: number,
    signal: AbortSignal | undefined
  ): Paginator<StoredItem> {
    let resolved: Collection | undefined;
    const fetchPage = async (
      cursor: string | null,
      limit: number
    ): Promise<Page<StoredItem>> => {
      // Each iteration re-resolves on its first page
      if (resolved === undefined || cursor === null) {
        resolved = await resolve();
      }
      const body = await this.send(
        {
          method: 'POST',
          path: PATHS.get,
          pathParams: this.collectionParams(resolved),
          body: { ...filter, include: toInclude(include), limit, cursor },
          idempotent: true,
          signal,
        },
        { resource: 'collection', name: resolved.name }
      );
      return parseItemsPage(body, operation);
    };
    return new Paginator(fetchPage, pageSize);
  }

  /**
   * Look up items by id.
   *
   * @returns Found items and missing ids, both in request order
   * @throws NotFoundError when none of the ids exist
   */
  async getItems(
    collection: CollectionRef,
    ids: readonly string[],
    options: CallOptions & { readonly include?: readonly IncludeField[] } = {}
  ): Promise<ItemLookupResult> {
    VectorServiceClient.checkRef(collection);
    validateIds(ids);
    validateInclude(options.include);

    const name = VectorServiceClient.refName(collection);
    const metadata = { collection: name, count: ids.length };
    return this.run('getItems', metadata, async () => {
      if (ids.length === 0) {
        return { items: [], missing: [] };
      }
      const resolved = await this.resolveCollection(collection, options.signal);
      const pages = this.itemPages(
        'getItems',
        () => Promise.resolve(resolved),
        { ids },
        options.include ?? ALL_FIELDS,
        this.config.pageSize,
        options.signal
      );

      const found = new Map<string, StoredItem>();
      for await (const item of pages) {
        found.set(item.id, item);
      }

      const items: StoredItem[] = [];
      const missing: string[] = [];
      for (const id of ids) {
        const item = found.get(id);
        if (item === undefined) {
          missing.push(id);
        } else {
          items.push(item);
        }
      }
      if (items.length === 0) {
        throw new NotFoundError('items', ids.join(', '));
      }
      return { items, missing };
    });
  }

  /**
   * Lazy listing of a collection's items.
   * A collection given by name is resolved at the start of each iteration.
   *
   * @throws ValidationError when pageSize is not a positive integer
   */
  listItems(
    collection: CollectionRef,
    options: ListItemsOptions & CallOptions = {}
  ): Paginator<StoredItem> {
    VectorServiceClient.checkRef(collection);
    validateInclude(options.include);

    const name = VectorServiceClient.refName(collection);
    const pages = this.itemPages(
      'listItems',
      () =>
        this.run('listItems', { collection: name }, () =>
          this.resolveCollection(collection, options.signal)
        ),
      { where: options.where, where_document: options.whereDocument },
      options.include ?? ALL_FIELDS,
      options.pageSize ?? this.config.pageSize,
      options.signal
    );
    return pages;
  }

  /**
   * Delete items by id.
   *
   * @returns Deleted and missing ids, both in request order
   * @throws NotFoundError when none of the ids exist
   */
  async deleteItems(
    collection: CollectionRef,
    ids: readonly string[],
    options: CallOptions = {}
  ): Promise<DeleteItemsResult> {
    VectorServiceClient.checkRef(collection);
    validateIds(ids);

    const name = VectorServiceClient.refName(collection);
    const metadata = { collection: name, count: ids.length };
    return this.run('deleteItems', metadata, async () => {
      if (ids.length === 0) {
        return { deleted: [], missing: [] };
      }
      const resolved = await this.resolveCollection(collection, options.signal);
      const body = await this.send(
        {
          method: 'POST',
          path: PATHS.delete,
          pathParams: this.collectionParams(resolved),
          body: { ids },
          idempotent: true,
          signal: options.signal,
        },
        { resource: 'collection', name: resolved.name }
      );

      const removed = new Set(parseDeleted(body));
      const deleted = ids.filter((id) => removed.has(id));
      const missing = ids.filter((id) => !removed.has(id));
      if (deleted.length === 0) {
        throw new NotFoundError('items', ids.join(', '));
      }
      return { deleted, missing };
    });
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /**
   * Close the client.
   * Aborts in-flight requests and waits for them to settle. Later calls
   * fail with ConnectionError. Idempotent.
   */
  async close(): Promise<void> {
    await dispose(this.state, async () => {
      await Promise.allSettled([...this.inFlight]);
      emitClientEvent(this, {
        event: `${EVENT_PREFIX}:close`,
        subsystem: 'client',
      });
    });
  }
}
