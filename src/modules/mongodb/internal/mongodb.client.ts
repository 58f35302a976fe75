import { MongoClient, type MongoClientOptions } from 'mongodb';

/** Injection token for the client factory (swapped for a fake in tests). */
export const MONGO_CLIENT_FACTORY = Symbol('MONGO_CLIENT_FACTORY');

/** Creates an unconnected client for a URI. */
export type MongoClientFactory = (
  uri: string,
  options: MongoClientOptions,
) => MongoClient;

export const createMongoClient: MongoClientFactory = (uri, options) =>
  new MongoClient(uri, options);

/**
 * Lazy holder for one MongoClient.
 * - Concurrent first calls share a single connect attempt.
 * - A failed connect is forgotten so the next call retries with a fresh client.
 */
export class LazyMongoClient {
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  public constructor(
    private readonly factory: MongoClientFactory,
    private readonly uri: string,
    private readonly options: MongoClientOptions,
  ) {}

  /** Get (or create) a connected MongoClient instance. */
  public async get(): Promise<MongoClient> {
    if (this.client) return this.client;
    if (this.connecting) return this.connecting;

    const connectPromise = (async () => {
      const created = this.factory(this.uri, this.options);
      try {
        await created.connect();
      } catch (err) {
        // A client whose connect failed keeps its topology timers alive.
        await created.close().catch(() => undefined);
        throw err;
      }
      this.client = created;
      return created;
    })();

    this.connecting = connectPromise;
    try {
      return await connectPromise;
    } finally {
      this.connecting = undefined;
    }
  }

  public get connected(): boolean {
    return this.client !== undefined;
  }

  /** Close client if connected (idempotent). */
  public async close(): Promise<void> {
    const current = this.client;
    if (!current) return;
    this.client = undefined;
    await current.close();
  }
}
