import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { initConfig } from '../../config/init.config';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import { MongodbService } from '../mongodb/mongodb.service';
import { ReadinessService } from '../readiness/readiness.service';
import {
  USER_ALREADY_EXISTS_CODE,
  type InitialisationOutcome,
  type InitialisationStatus,
} from './initialisation.types';

/**
 * Provisions the application database and its admin user. Idempotent:
 * rerunning against an initialised server changes nothing.
 */
@Injectable()
export class InitialisationService {
  private readonly logger = new Logger(InitialisationService.name);

  public constructor(
    @Inject(initConfig.KEY)
    private readonly cfg: ConfigType<typeof initConfig>,
    private readonly mongo: MongodbService,
    private readonly readiness: ReadinessService,
  ) {}

  public async run(): Promise<InitialisationOutcome> {
    this.logger.log(
      `Beginning mongodb initialisation. Connecting to server: ${this.cfg.host}:${this.cfg.port}`,
    );
    await this.readiness.waitForDatabase();
    const outcome = await this.ensureDatabase();
    this.logger.log('Database initialisation complete.');
    return outcome;
  }

  /**
   * A database only shows up in listDatabases once it holds data, while the
   * user lives in admin.system.users; check both before creating anything.
   */
  public async ensureDatabase(): Promise<InitialisationOutcome> {
    const { dbName, adminUsername } = this.cfg;

    const existing = await this.mongo.listDatabaseNames();
    if (existing.includes(dbName)) {
      this.logger.log(
        `Database '${dbName}' already exists. Exiting initialisation.`,
      );
      return this.outcome('database-exists');
    }

    if (await this.userExists()) {
      this.logger.log(
        `Application Admin user '${adminUsername}' already exists on '${dbName}'. Exiting initialisation.`,
      );
      return this.outcome('user-exists');
    }

    this.logger.log(`Creating database '${dbName}'...`);
    this.logger.log(`Creating Application Admin user '${adminUsername}'...`);
    try {
      await this.mongo.runCommand(
        dbName,
        {
          createUser: adminUsername,
          pwd: this.cfg.adminPassword,
          roles: [...this.cfg.adminRoles],
        },
        'createUser',
      );
    } catch (err) {
      if (
        err instanceof MongoActionError &&
        err.context.driverCode === USER_ALREADY_EXISTS_CODE
      ) {
        this.logger.warn(
          `Application Admin user '${adminUsername}' was created concurrently; leaving it as is.`,
        );
        return this.outcome('user-exists');
      }
      throw err;
    }
    this.logger.log('Admin user created successfully.');
    return this.outcome('created');
  }

  private async userExists(): Promise<boolean> {
    const res = await this.mongo.runCommand(
      this.cfg.dbName,
      { usersInfo: this.cfg.adminUsername },
      'usersInfo',
    );
    const users: unknown = res['users'];
    return Array.isArray(users) && users.length > 0;
  }

  private outcome(status: InitialisationStatus): InitialisationOutcome {
    return {
      status,
      database: this.cfg.dbName,
      user: this.cfg.adminUsername,
    };
  }
}
