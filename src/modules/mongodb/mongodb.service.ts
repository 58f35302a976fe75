import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import type { Document, MongoClient } from 'mongodb';
import {
  buildMongoUri,
  initConfig,
  maskMongoUri,
} from '../../config/init.config';
import {
  MongoActionError,
  type MongoOperation,
} from '../../lib/errors/MongoActionError';
import {
  LazyMongoClient,
  MONGO_CLIENT_FACTORY,
  type MongoClientFactory,
} from './internal/mongodb.client';

const ADMIN_DB = 'admin';

@Injectable()
export class MongodbService implements OnModuleDestroy {
  private readonly logger = new Logger(MongodbService.name);
  private readonly lazy: LazyMongoClient;
  private readonly maskedUri: string;

  public constructor(
    @Inject(initConfig.KEY)
    cfg: ConfigType<typeof initConfig>,
    @Inject(MONGO_CLIENT_FACTORY)
    factory: MongoClientFactory,
  ) {
    const uri = buildMongoUri(cfg);
    this.maskedUri = maskMongoUri(uri);
    this.lazy = new LazyMongoClient(factory, uri, {
      serverSelectionTimeoutMS: cfg.serverSelectionTimeoutMs,
      ignoreUndefined: true,
      appName: 'mongo-initialiser',
    });
  }

  /** Resolves once the server answered `{ ping: 1 }` on `admin`. */
  public async ping(): Promise<void> {
    await this.runCommand(ADMIN_DB, { ping: 1 }, 'ping');
  }

  /** Names of the databases that currently hold data. */
  public async listDatabaseNames(): Promise<string[]> {
    const res = await this.runCommand(
      ADMIN_DB,
      { listDatabases: 1, nameOnly: true },
      'listDatabases',
    );
    const databases: unknown = res['databases'];
    if (!Array.isArray(databases)) return [];
    const names: string[] = [];
    for (const entry of databases) {
      const name: unknown =
        entry !== null && typeof entry === 'object'
          ? Reflect.get(entry, 'name')
          : undefined;
      if (typeof name === 'string') names.push(name);
    }
    return names;
  }

  /**
   * Runs a raw command on `dbName` and returns its raw result.
   * `operation` only labels errors; defaults to "runCommand".
   */
  public async runCommand(
    dbName: string,
    command: Document,
    operation: MongoOperation = 'runCommand',
  ): Promise<Document> {
    const client = await this.getClient(operation, dbName);
    try {
      return await client.db(dbName).command(command);
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation,
        dbName,
        argsPreview: preview(command),
      });
    }
  }

  /** Close the client if connected (idempotent). */
  public async close(): Promise<void> {
    try {
      await this.lazy.close();
    } catch (err) {
      throw MongoActionError.wrap(err, { operation: 'close' });
    }
  }

  public async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  private async getClient(
    operation: MongoOperation,
    dbName: string,
  ): Promise<MongoClient> {
    if (!this.lazy.connected) {
      this.logger.debug(`Connecting to ${this.maskedUri}`);
    }
    try {
      return await this.lazy.get();
    } catch (err) {
      throw MongoActionError.wrap(err, { operation, dbName });
    }
  }
}

// Log-safe view of a command: first few keys, credentials masked,
// strings truncated, nested values reduced to their shape.
const SECRET_KEY_RX = /pwd|pass|secret|token/i;
const PREVIEW_KEYS = 6;
const PREVIEW_STRING_MAX = 120;

function preview(command: Document): Record<string, unknown> {
  const entries = Object.entries(command)
    .slice(0, PREVIEW_KEYS)
    .map(([key, value]): [string, unknown] => [
      key,
      SECRET_KEY_RX.test(key) ? '****' : shapeOf(value),
    ]);
  return Object.fromEntries(entries);
}

function shapeOf(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.length > PREVIEW_STRING_MAX
      ? `${value.slice(0, PREVIEW_STRING_MAX - 3)}...`
      : value;
  }
  if (Array.isArray(value)) return `[array(${value.length})]`;
  if (value !== null && typeof value === 'object') return '[object]';
  return value;
}
